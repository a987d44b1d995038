import {
  Collection,
  Entity,
  Enum,
  Index,
  ManyToOne,
  OneToMany,
  Property,
} from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { User } from '../../user/entities/user.entity';
import { OrderItem } from './order-item.entity';
import { ORDER_NUMBER_LENGTH } from '../domain/order-number';

export enum OrderStatus {
  PENDING = 'pending',
  PAID = 'paid',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  CANCELLED = 'cancelled',
  REFUNDED = 'refunded',
}

export enum OrderPaymentStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
  REFUNDED = 'refunded',
}

/**
 * A purchase of one or more packages. Amounts are minor currency units and
 * the billing fields are a snapshot taken at checkout.
 */
@Entity({ tableName: 'customer_order' })
@Index({ properties: ['user', 'createdAt'] })
@Index({ properties: ['status'] })
@Index({ properties: ['paymentStatus'] })
export class Order extends BaseEntity<
  'status' | 'paymentStatus' | 'taxAmount' | 'discountAmount' | 'currency' | 'billingCountry' | 'items'
> {
  @Property({ type: 'string', length: ORDER_NUMBER_LENGTH, unique: true })
  orderNumber!: string;

  @ManyToOne(() => User)
  user!: User;

  @OneToMany(() => OrderItem, (item) => item.order, { orphanRemoval: true })
  items = new Collection<OrderItem>(this);

  @Property({ type: 'integer' })
  totalAmount!: number;

  @Property({ type: 'integer' })
  taxAmount: number = 0;

  @Property({ type: 'integer' })
  discountAmount: number = 0;

  @Property({ type: 'integer' })
  finalAmount!: number;

  @Property({ type: 'string', length: 3 })
  currency: string = 'nok';

  @Enum(() => OrderStatus)
  status: OrderStatus = OrderStatus.PENDING;

  @Enum(() => OrderPaymentStatus)
  paymentStatus: OrderPaymentStatus = OrderPaymentStatus.PENDING;

  @Property({ type: 'string', length: 200, nullable: true, unique: true })
  stripePaymentIntentId?: string;

  @Property({ type: 'string', length: 200, nullable: true })
  stripeCustomerId?: string;

  @Property({ type: 'string', length: 50, nullable: true })
  paymentMethod?: string;

  @Property({ type: 'string' })
  billingEmail!: string;

  @Property({ type: 'string', length: 200 })
  billingName!: string;

  @Property({ type: 'string', length: 200, nullable: true })
  billingOrganization?: string;

  @Property({ type: 'text', nullable: true })
  billingAddress?: string;

  @Property({ type: 'string', length: 100, nullable: true })
  billingCity?: string;

  @Property({ type: 'string', length: 20, nullable: true })
  billingPostalCode?: string;

  @Property({ type: 'string', length: 2 })
  billingCountry: string = 'NO';

  @Property({ type: 'string', length: 50, nullable: true })
  couponCode?: string;

  @Property({ type: 'text', nullable: true })
  customerNotes?: string;

  @Property({ type: 'datetime', nullable: true })
  paidAt?: Date;

  @Property({ type: 'datetime', nullable: true })
  completedAt?: Date;

  @Property({ type: 'datetime', nullable: true })
  cancelledAt?: Date;
}
