import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EntityManager } from '@mikro-orm/core';
import { isUUID } from 'class-validator';
import { ShoppingCart } from '../entities/shopping-cart.entity';
import { CartItem } from '../entities/cart-item.entity';
import { User } from '../../user/entities/user.entity';
import { CatalogService } from '../../catalog/services/catalog.service';
import { SubscriptionService } from '../../subscription/services/subscription.service';
import { addDays } from '../../subscription/domain/subscription-period';

export type CartOwner = { kind: 'user'; userId: string } | { kind: 'session'; sessionKey: string };

export const ALREADY_OWNED_MESSAGE = 'You already have access to this package.';

export type AddToCartResult =
  | { added: true; cart: ShoppingCart; item: CartItem }
  | { added: false; reason: 'package_not_found' | 'already_owned'; message: string };

export interface PriceDrift {
  packageId: string;
  packageName: string;
  previousPrice: number;
  /** `null` when the package has been withdrawn from sale. */
  currentPrice: number | null;
}

@Injectable()
export class CartService {
  private readonly logger = new Logger(CartService.name);

  constructor(
    private readonly em: EntityManager,
    private readonly catalogService: CatalogService,
    private readonly subscriptionService: SubscriptionService,
    private readonly configService: ConfigService,
  ) {}

  /**
   * Picks the cart a request works on. Authenticated requests that still
   * carry an anonymous key fold that cart into the user's cart first.
   * Returns `null` for an anonymous request without a key.
   */
  async resolveOwner(userId: string | undefined, sessionKey?: string): Promise<CartOwner | null> {
    if (sessionKey && !isUUID(sessionKey)) {
      throw new BadRequestException('Malformed cart session key.');
    }

    if (userId) {
      if (sessionKey) {
        await this.mergeSessionCart(userId, sessionKey);
      }
      return { kind: 'user', userId };
    }

    return sessionKey ? { kind: 'session', sessionKey } : null;
  }

  async getCart(owner: CartOwner): Promise<ShoppingCart | null> {
    return this.em.findOne(ShoppingCart, ownerFilter(owner), {
      populate: ['items', 'items.package'],
    });
  }

  async getOrCreateCart(owner: CartOwner): Promise<ShoppingCart> {
    const existing = await this.getCart(owner);
    if (existing) {
      return existing;
    }

    const cart =
      owner.kind === 'user'
        ? this.em.create(ShoppingCart, { user: this.em.getReference(User, owner.userId) })
        : this.em.create(ShoppingCart, { sessionKey: owner.sessionKey });
    this.em.persist(cart);
    return cart;
  }

  async addPackage(owner: CartOwner, packageId: string, quantity = 1): Promise<AddToCartResult> {
    const pkg = await this.catalogService.findActiveById(packageId);
    if (!pkg) {
      return { added: false, reason: 'package_not_found', message: 'Package not found.' };
    }

    if (owner.kind === 'user' && (await this.subscriptionService.hasAccess(owner.userId, pkg.id))) {
      return { added: false, reason: 'already_owned', message: ALREADY_OWNED_MESSAGE };
    }

    const cart = await this.getOrCreateCart(owner);
    let item = cart.items.getItems().find((candidate) => candidate.package.id === pkg.id);

    if (item) {
      item.quantity += quantity;
    } else {
      item = this.em.create(CartItem, { cart, package: pkg, quantity, price: pkg.price });
      cart.items.add(item);
    }

    cart.updatedAt = new Date();
    await this.em.flush();
    return { added: true, cart, item };
  }

  /** Removing a package that is not in the cart is a no-op. */
  async removePackage(owner: CartOwner, packageId: string): Promise<ShoppingCart | null> {
    const cart = await this.getCart(owner);
    if (!cart) {
      return null;
    }

    const item = cart.items.getItems().find((candidate) => candidate.package.id === packageId);
    if (item) {
      cart.items.remove(item);
      cart.updatedAt = new Date();
      await this.em.flush();
    }
    return cart;
  }

  /**
   * Empties the user's cart. Changes are left for the caller's flush so
   * this can join an open transaction.
   */
  async clearForUser(userId: string): Promise<void> {
    const cart = await this.em.findOne(ShoppingCart, { user: userId }, { populate: ['items'] });
    if (cart) {
      cart.items.removeAll();
    }
  }

  /**
   * Moves an anonymous cart into the user's cart after login. Packages the
   * user already holds are dropped, duplicates add their quantities and
   * the anonymous cart is deleted.
   */
  async mergeSessionCart(userId: string, sessionKey: string): Promise<ShoppingCart | null> {
    return this.em.transactional(async () => {
      const sessionCart = await this.getCart({ kind: 'session', sessionKey });
      if (!sessionCart) {
        return this.getCart({ kind: 'user', userId });
      }

      const userCart = await this.getOrCreateCart({ kind: 'user', userId });
      let merged = 0;

      for (const sessionItem of sessionCart.items.getItems()) {
        if (await this.subscriptionService.hasAccess(userId, sessionItem.package.id)) {
          continue;
        }

        const existing = userCart.items
          .getItems()
          .find((candidate) => candidate.package.id === sessionItem.package.id);
        if (existing) {
          existing.quantity += sessionItem.quantity;
        } else {
          userCart.items.add(
            this.em.create(CartItem, {
              cart: userCart,
              package: sessionItem.package,
              quantity: sessionItem.quantity,
              price: sessionItem.price,
            }),
          );
        }
        merged++;
      }

      userCart.updatedAt = new Date();
      this.em.remove(sessionCart);
      await this.em.flush();

      this.logger.log(`Merged ${merged} session cart items into cart of user ${userId}`);
      return userCart;
    });
  }

  /** Items whose snapshot no longer matches the live catalog. */
  async findPriceDrift(cart: ShoppingCart): Promise<PriceDrift[]> {
    const drift: PriceDrift[] = [];

    for (const item of cart.items.getItems()) {
      const current = await this.catalogService.findActiveById(item.package.id);
      if (!current) {
        drift.push({
          packageId: item.package.id,
          packageName: item.package.name,
          previousPrice: item.price,
          currentPrice: null,
        });
      } else if (current.price !== item.price) {
        drift.push({
          packageId: item.package.id,
          packageName: current.name,
          previousPrice: item.price,
          currentPrice: current.price,
        });
      }
    }

    return drift;
  }

  /** Applies live prices and drops withdrawn packages. */
  async refreshPrices(cart: ShoppingCart, drift: PriceDrift[]): Promise<void> {
    for (const change of drift) {
      const item = cart.items.getItems().find((candidate) => candidate.package.id === change.packageId);
      if (!item) {
        continue;
      }
      if (change.currentPrice === null) {
        cart.items.remove(item);
      } else {
        item.price = change.currentPrice;
      }
    }

    cart.updatedAt = new Date();
    await this.em.flush();
  }

  /** Deletes anonymous carts idle for longer than the session TTL. */
  async pruneAbandonedSessionCarts(now: Date = new Date()): Promise<number> {
    const ttlDays = Number(this.configService.get('CART_SESSION_TTL_DAYS', 7));
    return this.em.nativeDelete(ShoppingCart, {
      user: null,
      updatedAt: { $lt: addDays(now, -ttlDays) },
    });
  }
}

function ownerFilter(owner: CartOwner): { user: string } | { sessionKey: string } {
  return owner.kind === 'user' ? { user: owner.userId } : { sessionKey: owner.sessionKey };
}
