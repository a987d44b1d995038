import { Test, TestingModule } from '@nestjs/testing';
import { ConflictException, NotFoundException } from '@nestjs/common';
import { EntityManager, LockMode } from '@mikro-orm/core';
import { SubscriptionService } from '../subscription.service';
import { PackageSubscription, SubscriptionStatus } from '../../entities/package-subscription.entity';
import { CatalogService } from '../../../catalog/services/catalog.service';
import { ActivityLogService } from '../../../activity/services/activity-log.service';
import { ActivityType } from '../../../activity/entities/user-activity.entity';
import { addDays } from '../../domain/subscription-period';

describe('SubscriptionService', () => {
  let service: SubscriptionService;

  const now = new Date('2025-03-01T12:00:00.000Z');

  const mockEntityManager = {
    findOne: jest.fn(),
    find: jest.fn(),
    count: jest.fn(),
    create: jest.fn((_entity: unknown, data: Record<string, unknown>) => ({ id: 'sub-new', ...data })),
    persist: jest.fn(),
    persistAndFlush: jest.fn(),
    nativeUpdate: jest.fn(),
    getReference: jest.fn((_entity: unknown, id: string) => ({ id })),
  };

  const mockCatalogService = {
    findActiveById: jest.fn(),
  };

  const mockActivityLogService = {
    record: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SubscriptionService,
        { provide: EntityManager, useValue: mockEntityManager },
        { provide: CatalogService, useValue: mockCatalogService },
        { provide: ActivityLogService, useValue: mockActivityLogService },
      ],
    }).compile();

    service = module.get<SubscriptionService>(SubscriptionService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('hasAccess', () => {
    it('should count active rows that expire after now', async () => {
      mockEntityManager.count.mockResolvedValue(1);

      await expect(service.hasAccess('user-1', 'pkg-1', now)).resolves.toBe(true);
      expect(mockEntityManager.count).toHaveBeenCalledWith(PackageSubscription, {
        user: 'user-1',
        package: 'pkg-1',
        isActive: true,
        expiresAt: { $gt: now },
      });
    });

    it('should deny when no row matches', async () => {
      mockEntityManager.count.mockResolvedValue(0);

      await expect(service.hasAccess('user-1', 'pkg-1', now)).resolves.toBe(false);
    });
  });

  describe('accessiblePackageIds', () => {
    it('should list the packages of live subscriptions', async () => {
      mockEntityManager.find.mockResolvedValue([{ package: { id: 'pkg-1' } }, { package: { id: 'pkg-3' } }]);

      await expect(service.accessiblePackageIds('user-1', now)).resolves.toEqual(['pkg-1', 'pkg-3']);
      expect(mockEntityManager.find).toHaveBeenCalledWith(PackageSubscription, {
        user: 'user-1',
        isActive: true,
        expiresAt: { $gt: now },
      });
    });
  });

  describe('activateForOrder', () => {
    const request = {
      userId: 'user-1',
      orderNumber: 'ORD202503011200',
      items: [{ packageId: 'pkg-1', price: 250000 }],
    };

    it('should create a one-year subscription when none exists', async () => {
      mockEntityManager.findOne.mockResolvedValue(null);

      const outcomes = await service.activateForOrder(request, now);

      expect(mockEntityManager.findOne).toHaveBeenCalledWith(
        PackageSubscription,
        { user: 'user-1', package: 'pkg-1' },
        { lockMode: LockMode.PESSIMISTIC_WRITE },
      );
      expect(mockEntityManager.create).toHaveBeenCalledWith(PackageSubscription, {
        user: { id: 'user-1' },
        package: { id: 'pkg-1' },
        status: SubscriptionStatus.ACTIVE,
        isActive: true,
        startsAt: now,
        expiresAt: new Date('2026-03-01T12:00:00.000Z'),
        pricePaid: 250000,
        paymentReference: 'ORD202503011200',
      });
      expect(mockEntityManager.persist).toHaveBeenCalledTimes(1);
      expect(outcomes).toEqual([
        { packageId: 'pkg-1', action: 'created', expiresAt: new Date('2026-03-01T12:00:00.000Z') },
      ]);
    });

    it('should stack a year onto a subscription expiring in 10 days', async () => {
      const existing = {
        expiresAt: addDays(now, 10),
        isActive: true,
        status: SubscriptionStatus.ACTIVE,
        paymentReference: 'ORD202403011200',
      };
      mockEntityManager.findOne.mockResolvedValue(existing);

      const outcomes = await service.activateForOrder(request, now);

      expect(existing.expiresAt).toEqual(new Date('2026-03-11T12:00:00.000Z'));
      expect(existing.paymentReference).toBe('ORD202503011200');
      expect(outcomes[0].action).toBe('extended');
      expect(mockEntityManager.create).not.toHaveBeenCalled();
    });

    it('should restart a subscription that expired 5 days ago from now', async () => {
      const existing = {
        expiresAt: addDays(now, -5),
        isActive: false,
        status: SubscriptionStatus.EXPIRED,
        paymentReference: 'ORD202403011200',
      };
      mockEntityManager.findOne.mockResolvedValue(existing);

      const outcomes = await service.activateForOrder(request, now);

      expect(existing.expiresAt).toEqual(new Date('2026-03-01T12:00:00.000Z'));
      expect(existing.isActive).toBe(true);
      expect(existing.status).toBe(SubscriptionStatus.ACTIVE);
      expect(outcomes[0].action).toBe('reactivated');
    });

    it('should not extend twice for the same order', async () => {
      const expiresAt = new Date('2026-03-01T12:00:00.000Z');
      const existing = {
        expiresAt,
        isActive: true,
        status: SubscriptionStatus.ACTIVE,
        paymentReference: 'ORD202503011200',
      };
      mockEntityManager.findOne.mockResolvedValue(existing);

      const outcomes = await service.activateForOrder(request, now);

      expect(existing.expiresAt).toBe(expiresAt);
      expect(outcomes).toEqual([{ packageId: 'pkg-1', action: 'skipped', expiresAt }]);
    });
  });

  describe('startTrial', () => {
    it('should reject an unknown package', async () => {
      mockCatalogService.findActiveById.mockResolvedValue(null);

      await expect(service.startTrial('user-1', 'pkg-1', now)).rejects.toThrow(NotFoundException);
    });

    it('should reject a package the user already has a subscription for', async () => {
      mockCatalogService.findActiveById.mockResolvedValue({ id: 'pkg-1', trialPeriodDays: 7 });
      mockEntityManager.count.mockResolvedValue(1);

      await expect(service.startTrial('user-1', 'pkg-1', now)).rejects.toThrow(ConflictException);
      expect(mockEntityManager.persistAndFlush).not.toHaveBeenCalled();
    });

    it('should create a trial lasting the package trial period', async () => {
      const pkg = { id: 'pkg-1', name: 'Arbeidsrett', trialPeriodDays: 7 };
      mockCatalogService.findActiveById.mockResolvedValue(pkg);
      mockEntityManager.count.mockResolvedValue(0);

      const subscription = await service.startTrial('user-1', 'pkg-1', now);

      expect(subscription.status).toBe(SubscriptionStatus.TRIAL);
      expect(subscription.expiresAt).toEqual(new Date('2025-03-08T12:00:00.000Z'));
      expect(mockActivityLogService.record).toHaveBeenCalledWith(
        expect.objectContaining({ userId: 'user-1', activityType: ActivityType.TRIAL_STARTED }),
      );
    });
  });

  describe('getAccessStatus', () => {
    it('should report no access without a subscription', async () => {
      mockEntityManager.findOne.mockResolvedValue(null);

      await expect(service.getAccessStatus('user-1', 'pkg-1', now)).resolves.toEqual({
        hasAccess: false,
        status: null,
        expiresAt: null,
        daysRemaining: 0,
      });
    });

    it('should report the days left on an active subscription', async () => {
      const expiresAt = addDays(now, 30);
      mockEntityManager.findOne.mockResolvedValue({
        isActive: true,
        status: SubscriptionStatus.ACTIVE,
        expiresAt,
      });

      await expect(service.getAccessStatus('user-1', 'pkg-1', now)).resolves.toEqual({
        hasAccess: true,
        status: SubscriptionStatus.ACTIVE,
        expiresAt,
        daysRemaining: 30,
      });
    });
  });

  describe('expireLapsed', () => {
    it('should mark running rows past their expiry as expired', async () => {
      mockEntityManager.nativeUpdate.mockResolvedValue(3);

      await expect(service.expireLapsed(now)).resolves.toBe(3);
      expect(mockEntityManager.nativeUpdate).toHaveBeenCalledWith(
        PackageSubscription,
        {
          status: { $in: [SubscriptionStatus.ACTIVE, SubscriptionStatus.TRIAL] },
          expiresAt: { $lte: now },
        },
        { status: SubscriptionStatus.EXPIRED },
      );
    });
  });
});
