import { Check, Collection, Entity, Index, OneToMany, OneToOne, Property } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { User } from '../../user/entities/user.entity';
import { CartItem } from './cart-item.entity';

/**
 * Belongs to exactly one of a user or an anonymous session key.
 */
@Entity({ tableName: 'shopping_cart' })
@Check({ name: 'shopping_cart_single_owner', expression: '(user_id is null) <> (session_key is null)' })
@Index({ properties: ['updatedAt'] })
export class ShoppingCart extends BaseEntity<'items'> {
  @OneToOne(() => User, { owner: true, nullable: true, unique: true, deleteRule: 'cascade' })
  user?: User;

  @Property({ type: 'string', length: 64, nullable: true, unique: true })
  sessionKey?: string;

  @OneToMany(() => CartItem, (item) => item.cart, { orphanRemoval: true })
  items = new Collection<CartItem>(this);
}
