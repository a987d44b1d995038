import { Controller, Get, HttpCode, HttpStatus, Param, Post, Query, Req, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ContentService } from '../services/content.service';
import { BookmarkService } from '../services/bookmark.service';
import { ProgressService } from '../services/progress.service';
import {
  BookmarkToggleResponseDto,
  ContentDetailDto,
  ContentSummaryDto,
  ListContentQueryDto,
  ProgressResponseDto,
} from '../dto/content.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { PackageAccessGuard } from '../../subscription/guards/package-access.guard';
import { AuthenticatedRequest } from '../../auth/interfaces/authenticated-request.interface';
import { ActivityLogService } from '../../activity/services/activity-log.service';
import { ActivityType } from '../../activity/entities/user-activity.entity';
import { getClientIp } from '../../../common/utils/client-ip.util';

@ApiTags('content')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard, PackageAccessGuard)
@Controller('packages/:slug/content')
export class ContentController {
  constructor(
    private readonly contentService: ContentService,
    private readonly bookmarkService: BookmarkService,
    private readonly progressService: ProgressService,
    private readonly activityLogService: ActivityLogService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List published content of a package' })
  @ApiResponse({ status: 200, type: [ContentSummaryDto] })
  @ApiResponse({ status: 403, description: 'No active subscription to the package' })
  async list(@Param('slug') slug: string, @Query() query: ListContentQueryDto): Promise<ContentSummaryDto[]> {
    const contents = await this.contentService.listPublished(slug, query.type);
    return contents.map((content) => ContentSummaryDto.fromEntity(content));
  }

  @Get(':contentSlug')
  @ApiOperation({ summary: 'Read a published content item' })
  @ApiResponse({ status: 200, type: ContentDetailDto })
  async findOne(
    @Param('slug') slug: string,
    @Param('contentSlug') contentSlug: string,
    @Req() request: AuthenticatedRequest,
  ): Promise<ContentDetailDto> {
    const content = await this.contentService.findPublished(slug, contentSlug);

    await this.progressService.markStarted(request.user.id, content);
    await this.activityLogService.record({
      userId: request.user.id,
      activityType: ActivityType.CONTENT_VIEW,
      description: `Viewed ${content.title}`,
      ipAddress: getClientIp(request),
      userAgent: request.headers['user-agent'],
      metadata: { contentId: content.id, packageSlug: slug },
    });

    return ContentDetailDto.fromDetail(content);
  }

  @Post(':contentSlug/bookmark')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Bookmark a content item, or remove the bookmark' })
  @ApiResponse({ status: 200, type: BookmarkToggleResponseDto })
  async toggleBookmark(
    @Param('slug') slug: string,
    @Param('contentSlug') contentSlug: string,
    @Req() request: AuthenticatedRequest,
  ): Promise<BookmarkToggleResponseDto> {
    const content = await this.contentService.findPublished(slug, contentSlug);
    const state = await this.bookmarkService.toggle(request.user.id, content);
    return BookmarkToggleResponseDto.fromState(state);
  }

  @Post(':contentSlug/complete')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark a content item as completed' })
  @ApiResponse({ status: 200, type: ProgressResponseDto })
  async markComplete(
    @Param('slug') slug: string,
    @Param('contentSlug') contentSlug: string,
    @Req() request: AuthenticatedRequest,
  ): Promise<ProgressResponseDto> {
    const content = await this.contentService.findPublished(slug, contentSlug);
    const progress = await this.progressService.markCompleted(request.user.id, content);
    return ProgressResponseDto.fromEntity(progress);
  }
}
