import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from '@mikro-orm/core';
import { ActivityType, UserActivity } from '../entities/user-activity.entity';
import { User } from '../../user/entities/user.entity';
import { errorMessage } from '../../../common/utils/error.util';

export interface RecordActivityDto {
  userId?: string;
  activityType: ActivityType;
  description: string;
  ipAddress?: string;
  userAgent?: string;
  metadata?: Record<string, unknown>;
}

@Injectable()
export class ActivityLogService {
  private readonly logger = new Logger(ActivityLogService.name);

  constructor(private readonly em: EntityManager) {}

  /**
   * Persists an activity entry. A failing write is logged and reported
   * as `null` so the calling request is not aborted by the audit trail.
   */
  async record(dto: RecordActivityDto): Promise<UserActivity | null> {
    try {
      const activity = this.em.create(UserActivity, {
        user: dto.userId ? this.em.getReference(User, dto.userId) : undefined,
        activityType: dto.activityType,
        description: dto.description,
        ipAddress: dto.ipAddress,
        userAgent: dto.userAgent,
        metadata: dto.metadata,
      });

      await this.em.persistAndFlush(activity);
      return activity;
    } catch (error) {
      this.logger.error(`Failed to record ${dto.activityType} activity: ${errorMessage(error)}`);
      return null;
    }
  }
}
