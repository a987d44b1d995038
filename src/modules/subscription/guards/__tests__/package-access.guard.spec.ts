import { Test, TestingModule } from '@nestjs/testing';
import { ExecutionContext, ForbiddenException, Logger, NotFoundException } from '@nestjs/common';
import { PackageAccessGuard } from '../package-access.guard';
import { SubscriptionService } from '../../services/subscription.service';
import { CatalogService } from '../../../catalog/services/catalog.service';
import { ActivityLogService } from '../../../activity/services/activity-log.service';
import { ActivityType } from '../../../activity/entities/user-activity.entity';
import { UserRole } from '../../../user/entities/user.entity';

describe('PackageAccessGuard', () => {
  let guard: PackageAccessGuard;

  const mockSubscriptionService = { hasAccess: jest.fn() };
  const mockCatalogService = { findBySlug: jest.fn() };
  const mockActivityLogService = { record: jest.fn() };

  const pkg = { id: 'pkg-1', slug: 'arbeidsrett', name: 'Arbeidsrett' };

  let mockRequest: {
    user?: { id: string; role: UserRole };
    params: Record<string, string>;
    headers: Record<string, string>;
    originalUrl: string;
    socket: { remoteAddress: string };
  };

  const context = {
    switchToHttp: () => ({ getRequest: () => mockRequest }),
  } as unknown as ExecutionContext;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PackageAccessGuard,
        { provide: SubscriptionService, useValue: mockSubscriptionService },
        { provide: CatalogService, useValue: mockCatalogService },
        { provide: ActivityLogService, useValue: mockActivityLogService },
      ],
    }).compile();

    guard = module.get<PackageAccessGuard>(PackageAccessGuard);

    mockRequest = {
      user: { id: 'user-1', role: UserRole.CLIENT },
      params: { slug: 'arbeidsrett' },
      headers: { 'user-agent': 'jest' },
      originalUrl: '/api/v1/packages/arbeidsrett/content',
      socket: { remoteAddress: '10.0.0.5' },
    };
    mockCatalogService.findBySlug.mockResolvedValue(pkg);

    jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should allow a user with an active subscription', async () => {
    mockSubscriptionService.hasAccess.mockResolvedValue(true);

    await expect(guard.canActivate(context)).resolves.toBe(true);
    expect(mockSubscriptionService.hasAccess).toHaveBeenCalledWith('user-1', 'pkg-1');
    expect(mockActivityLogService.record).not.toHaveBeenCalled();
  });

  it('should let admins through without checking the ledger', async () => {
    mockRequest.user = { id: 'admin-1', role: UserRole.ADMIN };

    await expect(guard.canActivate(context)).resolves.toBe(true);
    expect(mockSubscriptionService.hasAccess).not.toHaveBeenCalled();
  });

  it('should record the denial and refuse with 403', async () => {
    mockSubscriptionService.hasAccess.mockResolvedValue(false);

    await expect(guard.canActivate(context)).rejects.toThrow(ForbiddenException);
    expect(mockActivityLogService.record).toHaveBeenCalledWith({
      userId: 'user-1',
      activityType: ActivityType.PACKAGE_ACCESS_DENIED,
      description: 'Access denied to Arbeidsrett',
      ipAddress: '10.0.0.5',
      userAgent: 'jest',
      metadata: { packageId: 'pkg-1', path: '/api/v1/packages/arbeidsrett/content' },
    });
  });

  it('should answer 404 for an unknown package', async () => {
    mockCatalogService.findBySlug.mockResolvedValue(null);

    await expect(guard.canActivate(context)).rejects.toThrow(NotFoundException);
  });
});
