import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { UserActivity } from './entities/user-activity.entity';
import { ActivityLogService } from './services/activity-log.service';

@Module({
  imports: [MikroOrmModule.forFeature([UserActivity])],
  providers: [ActivityLogService],
  exports: [ActivityLogService],
})
export class ActivityModule {}
