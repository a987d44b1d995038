import { Entity, Enum, Index, ManyToOne, Property, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { User } from '../../user/entities/user.entity';
import { LegalPackage } from '../../catalog/entities/legal-package.entity';

export enum SubscriptionStatus {
  TRIAL = 'trial',
  ACTIVE = 'active',
  EXPIRED = 'expired',
  CANCELLED = 'cancelled',
}

/**
 * Entitlement of one user to one package. Rows are extended or expired,
 * never deleted.
 */
@Entity({ tableName: 'package_subscription' })
@Unique({ properties: ['user', 'package'] })
@Index({ properties: ['user', 'isActive'] })
@Index({ properties: ['expiresAt'] })
export class PackageSubscription extends BaseEntity<'status' | 'isActive' | 'startsAt' | 'autoRenew'> {
  @ManyToOne(() => User)
  user!: User;

  @ManyToOne(() => LegalPackage)
  package!: LegalPackage;

  @Enum(() => SubscriptionStatus)
  status: SubscriptionStatus = SubscriptionStatus.TRIAL;

  @Property({ type: 'boolean' })
  isActive: boolean = true;

  @Property({ type: 'datetime' })
  startsAt: Date = new Date();

  @Property({ type: 'datetime' })
  expiresAt!: Date;

  @Property({ type: 'boolean' })
  autoRenew: boolean = false;

  /** Minor currency units. */
  @Property({ type: 'integer', nullable: true })
  pricePaid?: number;

  /** Order number of the last order applied to this row. */
  @Property({ type: 'string', length: 100, nullable: true })
  paymentReference?: string;
}
