import { Entity, Enum, Index, ManyToOne, Property } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { User } from '../../user/entities/user.entity';

export enum ActivityType {
  PACKAGE_ACCESS_DENIED = 'package_access_denied',
  CONTENT_VIEW = 'content_view',
  ORDER_CREATED = 'order_created',
  ORDER_PAID = 'order_paid',
  ORDER_CANCELLED = 'order_cancelled',
  TRIAL_STARTED = 'trial_started',
}

/**
 * Append-only trail of user-facing events.
 */
@Entity({ tableName: 'user_activity' })
@Index({ properties: ['user', 'activityType'] })
export class UserActivity extends BaseEntity {
  @ManyToOne(() => User, { nullable: true, deleteRule: 'set null' })
  user?: User;

  @Enum(() => ActivityType)
  activityType!: ActivityType;

  @Property({ type: 'text' })
  description!: string;

  @Property({ type: 'string', length: 64, nullable: true })
  ipAddress?: string;

  @Property({ type: 'text', nullable: true })
  userAgent?: string;

  @Property({ type: 'json', nullable: true })
  metadata?: Record<string, unknown>;
}
