import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EntityManager } from '@mikro-orm/core';
import { BadRequestException, Logger } from '@nestjs/common';
import { ALREADY_OWNED_MESSAGE, CartService } from '../cart.service';
import { ShoppingCart } from '../../entities/shopping-cart.entity';
import { CartItem } from '../../entities/cart-item.entity';
import { CatalogService } from '../../../catalog/services/catalog.service';
import { SubscriptionService } from '../../../subscription/services/subscription.service';
import { itemCount, toCartLines } from '../../domain/cart-totals';

interface FakeItem {
  package: { id: string; name: string };
  price: number;
  quantity: number;
}

function fakeCollection(items: FakeItem[]) {
  return {
    getItems: () => items,
    add: jest.fn((item: FakeItem) => {
      items.push(item);
    }),
    remove: jest.fn((item: FakeItem) => {
      items.splice(items.indexOf(item), 1);
    }),
    removeAll: jest.fn(() => {
      items.splice(0, items.length);
    }),
  };
}

function fakeCart(items: FakeItem[] = []) {
  return { id: 'cart-1', updatedAt: new Date(0), items: fakeCollection(items) };
}

describe('CartService', () => {
  let service: CartService;

  const userOwner = { kind: 'user' as const, userId: 'user-1' };
  const sessionOwner = { kind: 'session' as const, sessionKey: 'session-1' };
  const pkg = { id: 'pkg-1', name: 'Arbeidsrett', price: 180000 };

  const mockEntityManager = {
    findOne: jest.fn(),
    create: jest.fn((_entity: unknown, data: Record<string, unknown>) => ({ ...data })),
    persist: jest.fn(),
    remove: jest.fn(),
    flush: jest.fn(),
    nativeDelete: jest.fn(),
    getReference: jest.fn((_entity: unknown, id: string) => ({ id })),
    transactional: jest.fn(
      async (callback: (em: unknown) => Promise<unknown>): Promise<unknown> => callback(mockEntityManager),
    ),
  };

  const mockCatalogService = { findActiveById: jest.fn() };
  const mockSubscriptionService = { hasAccess: jest.fn() };
  const mockConfigService = {
    get: jest.fn((_key: string, defaultValue?: unknown) => defaultValue),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CartService,
        { provide: EntityManager, useValue: mockEntityManager },
        { provide: CatalogService, useValue: mockCatalogService },
        { provide: SubscriptionService, useValue: mockSubscriptionService },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    service = module.get<CartService>(CartService);
    mockSubscriptionService.hasAccess.mockResolvedValue(false);
    jest.spyOn(Logger.prototype, 'log').mockImplementation();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('resolveOwner', () => {
    const sessionKey = '3f2c1a9e-8b7d-4c6e-9f0a-1b2c3d4e5f60';

    it('should use the user cart for an authenticated request without a key', async () => {
      await expect(service.resolveOwner('user-1')).resolves.toEqual(userOwner);
      expect(mockEntityManager.transactional).not.toHaveBeenCalled();
    });

    it('should use the session cart for an anonymous request with a key', async () => {
      await expect(service.resolveOwner(undefined, sessionKey)).resolves.toEqual({ kind: 'session', sessionKey });
    });

    it('should resolve no owner for an anonymous request without a key', async () => {
      await expect(service.resolveOwner(undefined)).resolves.toBeNull();
    });

    it('should reject a malformed session key', async () => {
      await expect(service.resolveOwner(undefined, 'not-a-cart-key')).rejects.toThrow(
        new BadRequestException('Malformed cart session key.'),
      );
      await expect(service.resolveOwner('user-1', 'not-a-cart-key')).rejects.toThrow(BadRequestException);
      expect(mockEntityManager.transactional).not.toHaveBeenCalled();
    });

    it('should merge the anonymous cart when an authenticated request still carries its key', async () => {
      const sessionCart = fakeCart([{ package: { id: 'pkg-1', name: 'Arbeidsrett' }, price: 150000, quantity: 1 }]);
      const userCart = fakeCart();
      mockEntityManager.findOne.mockImplementation(async (_entity: unknown, where: { sessionKey?: string }) =>
        where.sessionKey ? sessionCart : userCart,
      );

      const owner = await service.resolveOwner('user-1', sessionKey);

      expect(owner).toEqual(userOwner);
      expect(mockEntityManager.findOne).toHaveBeenCalledWith(
        ShoppingCart,
        { sessionKey },
        { populate: ['items', 'items.package'] },
      );
      expect(userCart.items.getItems().map((item) => item.package.id)).toEqual(['pkg-1']);
      expect(mockEntityManager.remove).toHaveBeenCalledWith(sessionCart);
    });
  });

  describe('addPackage', () => {
    it('should reject a package that is missing or inactive', async () => {
      mockCatalogService.findActiveById.mockResolvedValue(null);

      const result = await service.addPackage(userOwner, 'pkg-1');

      expect(result).toEqual({ added: false, reason: 'package_not_found', message: 'Package not found.' });
      expect(mockEntityManager.flush).not.toHaveBeenCalled();
    });

    it('should refuse a package the user already has access to', async () => {
      mockCatalogService.findActiveById.mockResolvedValue(pkg);
      mockSubscriptionService.hasAccess.mockResolvedValue(true);

      const result = await service.addPackage(userOwner, 'pkg-1');

      expect(result).toEqual({ added: false, reason: 'already_owned', message: ALREADY_OWNED_MESSAGE });
      expect(mockEntityManager.findOne).not.toHaveBeenCalled();
    });

    it('should not consult the ledger for anonymous carts', async () => {
      mockCatalogService.findActiveById.mockResolvedValue(pkg);
      mockEntityManager.findOne.mockResolvedValue(fakeCart());

      await service.addPackage(sessionOwner, 'pkg-1');

      expect(mockSubscriptionService.hasAccess).not.toHaveBeenCalled();
    });

    it('should snapshot the current price on a new item', async () => {
      const cart = fakeCart();
      mockCatalogService.findActiveById.mockResolvedValue(pkg);
      mockEntityManager.findOne.mockResolvedValue(cart);

      const result = await service.addPackage(userOwner, 'pkg-1');

      expect(result.added).toBe(true);
      expect(mockEntityManager.create).toHaveBeenCalledWith(CartItem, {
        cart,
        package: pkg,
        quantity: 1,
        price: 180000,
      });
      expect(cart.items.getItems()).toHaveLength(1);
      expect(mockEntityManager.flush).toHaveBeenCalledTimes(1);
    });

    it('should add to the quantity of an existing item and keep its price', async () => {
      const existing = { package: { id: 'pkg-1', name: 'Arbeidsrett' }, price: 150000, quantity: 1 };
      mockCatalogService.findActiveById.mockResolvedValue(pkg);
      mockEntityManager.findOne.mockResolvedValue(fakeCart([existing]));

      await service.addPackage(userOwner, 'pkg-1', 2);

      expect(existing.quantity).toBe(3);
      expect(existing.price).toBe(150000);
      expect(mockEntityManager.create).not.toHaveBeenCalled();
    });

    it('should create the cart lazily', async () => {
      mockCatalogService.findActiveById.mockResolvedValue(pkg);
      mockEntityManager.findOne.mockResolvedValue(null);
      mockEntityManager.create.mockImplementationOnce(() => fakeCart());

      await service.addPackage(sessionOwner, 'pkg-1');

      expect(mockEntityManager.create).toHaveBeenNthCalledWith(1, ShoppingCart, { sessionKey: 'session-1' });
      expect(mockEntityManager.persist).toHaveBeenCalledTimes(1);
    });
  });

  describe('removePackage', () => {
    it('should restore the item count after add then remove', async () => {
      const other = { package: { id: 'pkg-2', name: 'Helse' }, price: 170000, quantity: 1 };
      const cart = fakeCart([other]);
      mockCatalogService.findActiveById.mockResolvedValue(pkg);
      mockEntityManager.findOne.mockResolvedValue(cart);
      const before = itemCount(toCartLines(cart.items.getItems()));

      await service.addPackage(userOwner, 'pkg-1');
      expect(itemCount(toCartLines(cart.items.getItems()))).toBe(before + 1);

      await service.removePackage(userOwner, 'pkg-1');
      expect(itemCount(toCartLines(cart.items.getItems()))).toBe(before);
    });

    it('should be a no-op for a package that is not in the cart', async () => {
      const cart = fakeCart();
      mockEntityManager.findOne.mockResolvedValue(cart);

      await service.removePackage(userOwner, 'pkg-1');

      expect(cart.items.remove).not.toHaveBeenCalled();
      expect(mockEntityManager.flush).not.toHaveBeenCalled();
    });
  });

  describe('clearForUser', () => {
    it('should empty the cart without flushing', async () => {
      const cart = fakeCart([{ package: { id: 'pkg-1', name: 'Arbeidsrett' }, price: 180000, quantity: 1 }]);
      mockEntityManager.findOne.mockResolvedValue(cart);

      await service.clearForUser('user-1');

      expect(cart.items.getItems()).toHaveLength(0);
      expect(mockEntityManager.flush).not.toHaveBeenCalled();
    });
  });

  describe('mergeSessionCart', () => {
    it('should fold the anonymous cart into the user cart and delete it', async () => {
      const sessionCart = fakeCart([
        { package: { id: 'pkg-1', name: 'Arbeidsrett' }, price: 150000, quantity: 1 },
        { package: { id: 'pkg-2', name: 'Helse' }, price: 170000, quantity: 1 },
        { package: { id: 'pkg-3', name: 'Forvaltningsrett' }, price: 200000, quantity: 1 },
      ]);
      const userItem = { package: { id: 'pkg-2', name: 'Helse' }, price: 170000, quantity: 1 };
      const userCart = fakeCart([userItem]);
      mockEntityManager.findOne.mockImplementation(async (_entity: unknown, where: { sessionKey?: string }) =>
        where.sessionKey ? sessionCart : userCart,
      );
      mockSubscriptionService.hasAccess.mockImplementation(
        async (_userId: string, packageId: string) => packageId === 'pkg-3',
      );

      const merged = await service.mergeSessionCart('user-1', 'session-1');

      expect(merged).toBe(userCart);
      expect(userItem.quantity).toBe(2);
      expect(userCart.items.getItems().map((item) => item.package.id)).toEqual(['pkg-2', 'pkg-1']);
      expect(userCart.items.getItems()[1].price).toBe(150000);
      expect(mockEntityManager.remove).toHaveBeenCalledWith(sessionCart);
      expect(mockEntityManager.flush).toHaveBeenCalledTimes(1);
    });

    it('should return the user cart untouched without an anonymous cart', async () => {
      const userCart = fakeCart();
      mockEntityManager.findOne.mockImplementation(async (_entity: unknown, where: { sessionKey?: string }) =>
        where.sessionKey ? null : userCart,
      );

      await expect(service.mergeSessionCart('user-1', 'session-1')).resolves.toBe(userCart);
      expect(mockEntityManager.remove).not.toHaveBeenCalled();
    });
  });

  describe('findPriceDrift / refreshPrices', () => {
    it('should report changed prices and withdrawn packages, then apply them', async () => {
      const changed = { package: { id: 'pkg-1', name: 'Arbeidsrett' }, price: 150000, quantity: 1 };
      const withdrawn = { package: { id: 'pkg-2', name: 'Helse' }, price: 170000, quantity: 1 };
      const unchanged = { package: { id: 'pkg-3', name: 'Forvaltningsrett' }, price: 200000, quantity: 1 };
      const cart = fakeCart([changed, withdrawn, unchanged]);
      mockCatalogService.findActiveById.mockImplementation(async (id: string) => {
        if (id === 'pkg-1') return { id, name: 'Arbeidsrett', price: 180000 };
        if (id === 'pkg-3') return { id, name: 'Forvaltningsrett', price: 200000 };
        return null;
      });

      const drift = await service.findPriceDrift(cart as unknown as ShoppingCart);

      expect(drift).toEqual([
        { packageId: 'pkg-1', packageName: 'Arbeidsrett', previousPrice: 150000, currentPrice: 180000 },
        { packageId: 'pkg-2', packageName: 'Helse', previousPrice: 170000, currentPrice: null },
      ]);

      await service.refreshPrices(cart as unknown as ShoppingCart, drift);

      expect(changed.price).toBe(180000);
      expect(cart.items.getItems().map((item) => item.package.id)).toEqual(['pkg-1', 'pkg-3']);
    });
  });

  describe('pruneAbandonedSessionCarts', () => {
    it('should delete anonymous carts idle longer than the TTL', async () => {
      mockEntityManager.nativeDelete.mockResolvedValue(4);
      const now = new Date('2025-03-08T00:00:00.000Z');

      await expect(service.pruneAbandonedSessionCarts(now)).resolves.toBe(4);
      expect(mockEntityManager.nativeDelete).toHaveBeenCalledWith(ShoppingCart, {
        user: null,
        updatedAt: { $lt: new Date('2025-03-01T00:00:00.000Z') },
      });
    });
  });
});
