import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import { SubscriptionService } from '../services/subscription.service';
import { CatalogService } from '../../catalog/services/catalog.service';
import { ActivityLogService } from '../../activity/services/activity-log.service';
import { ActivityType } from '../../activity/entities/user-activity.entity';
import { UserRole } from '../../user/entities/user.entity';
import { MaybeAuthenticatedRequest } from '../../auth/interfaces/authenticated-request.interface';
import { getClientIp } from '../../../common/utils/client-ip.util';

/**
 * Requires an active subscription to the package named by the `:slug`
 * route parameter. Runs after `JwtAuthGuard`.
 */
@Injectable()
export class PackageAccessGuard implements CanActivate {
  private readonly logger = new Logger(PackageAccessGuard.name);

  constructor(
    private readonly subscriptionService: SubscriptionService,
    private readonly catalogService: CatalogService,
    private readonly activityLogService: ActivityLogService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<MaybeAuthenticatedRequest>();
    const user = request.user;
    if (!user) {
      throw new UnauthorizedException();
    }

    const pkg = await this.catalogService.findBySlug(request.params.slug);
    if (!pkg) {
      throw new NotFoundException('Package not found');
    }

    if (user.role === UserRole.ADMIN) {
      return true;
    }

    if (await this.subscriptionService.hasAccess(user.id, pkg.id)) {
      return true;
    }

    this.logger.warn(`User ${user.id} denied access to package ${pkg.slug}`);
    await this.activityLogService.record({
      userId: user.id,
      activityType: ActivityType.PACKAGE_ACCESS_DENIED,
      description: `Access denied to ${pkg.name}`,
      ipAddress: getClientIp(request),
      userAgent: request.headers['user-agent'],
      metadata: { packageId: pkg.id, path: request.originalUrl },
    });

    throw new ForbiddenException('You do not have access to this package.');
  }
}
