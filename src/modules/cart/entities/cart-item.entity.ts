import { Entity, ManyToOne, Property, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { LegalPackage } from '../../catalog/entities/legal-package.entity';
import { ShoppingCart } from './shopping-cart.entity';

@Entity({ tableName: 'cart_item' })
@Unique({ properties: ['cart', 'package'] })
export class CartItem extends BaseEntity<'quantity'> {
  @ManyToOne(() => ShoppingCart, { deleteRule: 'cascade' })
  cart!: ShoppingCart;

  @ManyToOne(() => LegalPackage, { deleteRule: 'cascade' })
  package!: LegalPackage;

  @Property({ type: 'integer' })
  quantity: number = 1;

  /** Unit price when the item was added, minor currency units. */
  @Property({ type: 'integer' })
  price!: number;
}
