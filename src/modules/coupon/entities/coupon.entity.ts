import {
  BeforeCreate,
  BeforeUpdate,
  Collection,
  DecimalType,
  Entity,
  Enum,
  Index,
  ManyToMany,
  Property,
} from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { LegalPackage } from '../../catalog/entities/legal-package.entity';

export enum CouponType {
  PERCENTAGE = 'percentage',
  FIXED = 'fixed',
}

@Entity({ tableName: 'coupon' })
@Index({ properties: ['validFrom', 'validUntil'] })
export class Coupon extends BaseEntity<
  'couponType' | 'minimumOrderAmount' | 'usageLimitPerUser' | 'usedCount' | 'isActive' | 'applicablePackages'
> {
  /** Stored upper case; lookups are case-insensitive. */
  @Property({ type: 'string', length: 50, unique: true })
  code!: string;

  @Property({ type: 'string', length: 200 })
  name!: string;

  @Property({ type: 'text', nullable: true })
  description?: string;

  @Enum(() => CouponType)
  couponType: CouponType = CouponType.PERCENTAGE;

  /** Percent (two decimals, e.g. 12.5) for percentage coupons, minor units for fixed ones. */
  @Property({ type: new DecimalType('number'), precision: 10, scale: 2 })
  discountValue!: number;

  @Property({ type: 'integer' })
  minimumOrderAmount: number = 0;

  @Property({ type: 'integer', nullable: true })
  maximumDiscountAmount?: number;

  @Property({ type: 'integer', nullable: true })
  usageLimit?: number;

  @Property({ type: 'integer' })
  usageLimitPerUser: number = 1;

  @Property({ type: 'integer' })
  usedCount: number = 0;

  @Property({ type: 'boolean' })
  isActive: boolean = true;

  @Property({ type: 'datetime' })
  validFrom!: Date;

  @Property({ type: 'datetime' })
  validUntil!: Date;

  /** Empty means every package. */
  @ManyToMany(() => LegalPackage, undefined, { pivotTable: 'coupon_applicable_packages' })
  applicablePackages = new Collection<LegalPackage>(this);

  @BeforeCreate()
  @BeforeUpdate()
  normalizeCode(): void {
    this.code = this.code.toUpperCase();
  }
}
