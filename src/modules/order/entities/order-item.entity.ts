import { Entity, ManyToOne, Property } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { LegalPackage } from '../../catalog/entities/legal-package.entity';
import { Order } from './order.entity';

@Entity({ tableName: 'order_item' })
export class OrderItem extends BaseEntity<'quantity'> {
  @ManyToOne(() => Order, { deleteRule: 'cascade' })
  order!: Order;

  @ManyToOne(() => LegalPackage)
  package!: LegalPackage;

  @Property({ type: 'integer' })
  quantity: number = 1;

  /** Unit price at purchase, minor currency units. */
  @Property({ type: 'integer' })
  price!: number;
}
