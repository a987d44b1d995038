import { Entity, ManyToOne, Property } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { Order } from '../../order/entities/order.entity';

/**
 * Local mirror of a Stripe PaymentIntent, updated from webhook callbacks.
 */
@Entity({ tableName: 'payment_intent' })
export class PaymentIntent extends BaseEntity {
  @Property({ type: 'string', length: 200, unique: true })
  stripePaymentIntentId!: string;

  @ManyToOne(() => Order, { deleteRule: 'cascade' })
  order!: Order;

  @Property({ type: 'integer' })
  amount!: number;

  @Property({ type: 'string', length: 3 })
  currency!: string;

  /** Provider status string, e.g. `requires_payment_method` or `succeeded`. */
  @Property({ type: 'string', length: 50 })
  status!: string;

  @Property({ type: 'string', length: 50, nullable: true })
  paymentMethodType?: string;

  @Property({ type: 'string', length: 4, nullable: true })
  lastFour?: string;

  @Property({ type: 'json', nullable: true })
  webhookData?: object;
}
