import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { Content } from './entities/content.entity';
import { ContentBookmark } from './entities/content-bookmark.entity';
import { ContentProgress } from './entities/content-progress.entity';
import { ContentService } from './services/content.service';
import { BookmarkService } from './services/bookmark.service';
import { ProgressService } from './services/progress.service';
import { ContentController } from './controllers/content.controller';
import { LibraryController } from './controllers/library.controller';
import { SubscriptionModule } from '../subscription/subscription.module';

@Module({
  imports: [MikroOrmModule.forFeature([Content, ContentBookmark, ContentProgress]), SubscriptionModule],
  controllers: [ContentController, LibraryController],
  providers: [ContentService, BookmarkService, ProgressService],
})
export class ContentModule {}
