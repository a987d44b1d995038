import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsUUID } from 'class-validator';
import { PackageSubscription, SubscriptionStatus } from '../entities/package-subscription.entity';
import { hasActiveAccess, daysRemaining } from '../domain/subscription-period';
import { formatMinorUnits } from '../../../common/utils/money.util';

export class StartTrialDto {
  @ApiProperty()
  @IsUUID()
  packageId!: string;
}

export class SubscriptionResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  packageId!: string;

  @ApiProperty()
  packageName!: string;

  @ApiProperty()
  packageSlug!: string;

  @ApiProperty({ enum: SubscriptionStatus })
  status!: SubscriptionStatus;

  @ApiProperty()
  hasAccess!: boolean;

  @ApiProperty()
  startsAt!: Date;

  @ApiProperty()
  expiresAt!: Date;

  @ApiProperty()
  daysRemaining!: number;

  @ApiPropertyOptional({ example: '2500.00' })
  pricePaid?: string;

  static fromEntity(subscription: PackageSubscription, now: Date = new Date()): SubscriptionResponseDto {
    const dto = new SubscriptionResponseDto();
    dto.id = subscription.id;
    dto.packageId = subscription.package.id;
    dto.packageName = subscription.package.name;
    dto.packageSlug = subscription.package.slug;
    dto.status = subscription.status;
    dto.hasAccess = hasActiveAccess(subscription, now);
    dto.startsAt = subscription.startsAt;
    dto.expiresAt = subscription.expiresAt;
    dto.daysRemaining = daysRemaining(subscription.expiresAt, now);
    dto.pricePaid = subscription.pricePaid === undefined ? undefined : formatMinorUnits(subscription.pricePaid);
    return dto;
  }
}
