import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { EntityManager, LockMode, UniqueConstraintViolationException } from '@mikro-orm/core';
import { PackageSubscription, SubscriptionStatus } from '../entities/package-subscription.entity';
import { User } from '../../user/entities/user.entity';
import { LegalPackage } from '../../catalog/entities/legal-package.entity';
import { CatalogService } from '../../catalog/services/catalog.service';
import { ActivityLogService } from '../../activity/services/activity-log.service';
import { ActivityType } from '../../activity/entities/user-activity.entity';
import { addDays, daysRemaining, hasActiveAccess, nextExpiry, SUBSCRIPTION_TERM_DAYS } from '../domain/subscription-period';

export interface ActivationItem {
  packageId: string;
  /** Unit price paid, minor currency units. */
  price: number;
}

export interface ActivationRequest {
  userId: string;
  orderNumber: string;
  items: ActivationItem[];
}

export type ActivationAction = 'created' | 'extended' | 'reactivated' | 'skipped';

export interface ActivationOutcome {
  packageId: string;
  action: ActivationAction;
  expiresAt: Date;
}

export interface AccessStatus {
  hasAccess: boolean;
  status: SubscriptionStatus | null;
  expiresAt: Date | null;
  daysRemaining: number;
}

@Injectable()
export class SubscriptionService {
  private readonly logger = new Logger(SubscriptionService.name);

  constructor(
    private readonly em: EntityManager,
    private readonly catalogService: CatalogService,
    private readonly activityLogService: ActivityLogService,
  ) {}

  async hasAccess(userId: string, packageId: string, now: Date = new Date()): Promise<boolean> {
    const count = await this.em.count(PackageSubscription, {
      user: userId,
      package: packageId,
      isActive: true,
      expiresAt: { $gt: now },
    });
    return count > 0;
  }

  /** Packages the user holds a live subscription to. */
  async accessiblePackageIds(userId: string, now: Date = new Date()): Promise<string[]> {
    const subscriptions = await this.em.find(PackageSubscription, {
      user: userId,
      isActive: true,
      expiresAt: { $gt: now },
    });
    return subscriptions.map((subscription) => subscription.package.id);
  }

  /**
   * Grants one term per order item. Must run inside a transaction: each
   * existing row is read with a write lock, and a row already stamped with
   * this order number is left alone so a replayed payment cannot extend
   * twice.
   */
  async activateForOrder(request: ActivationRequest, now: Date = new Date()): Promise<ActivationOutcome[]> {
    const outcomes: ActivationOutcome[] = [];

    for (const item of request.items) {
      const existing = await this.em.findOne(
        PackageSubscription,
        { user: request.userId, package: item.packageId },
        { lockMode: LockMode.PESSIMISTIC_WRITE },
      );

      if (existing) {
        if (existing.paymentReference === request.orderNumber) {
          outcomes.push({ packageId: item.packageId, action: 'skipped', expiresAt: existing.expiresAt });
          continue;
        }

        const running = existing.expiresAt.getTime() > now.getTime();
        existing.expiresAt = nextExpiry(existing.expiresAt, now);
        existing.isActive = true;
        existing.status = SubscriptionStatus.ACTIVE;
        existing.paymentReference = request.orderNumber;
        outcomes.push({
          packageId: item.packageId,
          action: running ? 'extended' : 'reactivated',
          expiresAt: existing.expiresAt,
        });
        continue;
      }

      const subscription = this.em.create(PackageSubscription, {
        user: this.em.getReference(User, request.userId),
        package: this.em.getReference(LegalPackage, item.packageId),
        status: SubscriptionStatus.ACTIVE,
        isActive: true,
        startsAt: now,
        expiresAt: addDays(now, SUBSCRIPTION_TERM_DAYS),
        pricePaid: item.price,
        paymentReference: request.orderNumber,
      });
      this.em.persist(subscription);
      outcomes.push({ packageId: item.packageId, action: 'created', expiresAt: subscription.expiresAt });
    }

    this.logger.log(
      `Applied order ${request.orderNumber} to ${outcomes.length} subscriptions for user ${request.userId}`,
    );
    return outcomes;
  }

  /**
   * Starts the package's trial period. Only possible when the user has
   * never held the package.
   */
  async startTrial(userId: string, packageId: string, now: Date = new Date()): Promise<PackageSubscription> {
    const pkg = await this.catalogService.findActiveById(packageId);
    if (!pkg) {
      throw new NotFoundException('Package not found');
    }

    const existing = await this.em.count(PackageSubscription, { user: userId, package: packageId });
    if (existing > 0) {
      throw new ConflictException('A subscription for this package already exists.');
    }

    const subscription = this.em.create(PackageSubscription, {
      user: this.em.getReference(User, userId),
      package: pkg,
      status: SubscriptionStatus.TRIAL,
      isActive: true,
      startsAt: now,
      expiresAt: addDays(now, pkg.trialPeriodDays),
    });

    try {
      await this.em.persistAndFlush(subscription);
    } catch (error) {
      if (error instanceof UniqueConstraintViolationException) {
        throw new ConflictException('A subscription for this package already exists.');
      }
      throw error;
    }

    await this.activityLogService.record({
      userId,
      activityType: ActivityType.TRIAL_STARTED,
      description: `Started trial of ${pkg.name}`,
      metadata: { packageId, expiresAt: subscription.expiresAt.toISOString() },
    });

    return subscription;
  }

  async listForUser(userId: string): Promise<PackageSubscription[]> {
    return this.em.find(
      PackageSubscription,
      { user: userId },
      { populate: ['package'], orderBy: { expiresAt: 'desc' } },
    );
  }

  async getAccessStatus(userId: string, packageId: string, now: Date = new Date()): Promise<AccessStatus> {
    const subscription = await this.em.findOne(PackageSubscription, { user: userId, package: packageId });
    if (!subscription) {
      return { hasAccess: false, status: null, expiresAt: null, daysRemaining: 0 };
    }

    const access = hasActiveAccess(subscription, now);
    return {
      hasAccess: access,
      status: subscription.status,
      expiresAt: subscription.expiresAt,
      daysRemaining: access ? daysRemaining(subscription.expiresAt, now) : 0,
    };
  }

  /** Marks running rows whose expiry has passed. Returns the number updated. */
  async expireLapsed(now: Date = new Date()): Promise<number> {
    return this.em.nativeUpdate(
      PackageSubscription,
      {
        status: { $in: [SubscriptionStatus.ACTIVE, SubscriptionStatus.TRIAL] },
        expiresAt: { $lte: now },
      },
      { status: SubscriptionStatus.EXPIRED },
    );
  }
}
