import { Controller, Get, Query, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ContentService } from '../services/content.service';
import { BookmarkService } from '../services/bookmark.service';
import { ProgressService } from '../services/progress.service';
import {
  BookmarkResponseDto,
  ContentSearchResultDto,
  ListProgressQueryDto,
  ProgressResponseDto,
  SearchContentQueryDto,
} from '../dto/content.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { User } from '../../user/entities/user.entity';

/** Content across every package the user can read. */
@ApiTags('content')
@ApiBearerAuth()
@UseGuards(JwtAuthGuard)
@Controller('content')
export class LibraryController {
  constructor(
    private readonly contentService: ContentService,
    private readonly bookmarkService: BookmarkService,
    private readonly progressService: ProgressService,
  ) {}

  @Get('search')
  @ApiOperation({ summary: 'Search published content in subscribed packages' })
  @ApiResponse({ status: 200, type: [ContentSearchResultDto] })
  async search(@CurrentUser() user: User, @Query() query: SearchContentQueryDto): Promise<ContentSearchResultDto[]> {
    const results = await this.contentService.search(user, query.q);
    return results.map((content) => ContentSearchResultDto.fromResult(content));
  }

  @Get('bookmarks')
  @ApiOperation({ summary: 'Bookmarked content, newest first' })
  @ApiResponse({ status: 200, type: [BookmarkResponseDto] })
  async bookmarks(@CurrentUser() user: User): Promise<BookmarkResponseDto[]> {
    const bookmarks = await this.bookmarkService.listForUser(user.id);
    return bookmarks.map((bookmark) => BookmarkResponseDto.fromEntity(bookmark));
  }

  @Get('progress')
  @ApiOperation({ summary: 'Reading progress, most recently accessed first' })
  @ApiResponse({ status: 200, type: [ProgressResponseDto] })
  async progress(@CurrentUser() user: User, @Query() query: ListProgressQueryDto): Promise<ProgressResponseDto[]> {
    const entries = await this.progressService.listForUser(user.id, query.status);
    return entries.map((entry) => ProgressResponseDto.fromEntity(entry));
  }
}
