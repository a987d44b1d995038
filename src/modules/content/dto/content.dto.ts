import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsOptional, IsString, MaxLength } from 'class-validator';
import { Content, ContentType } from '../entities/content.entity';
import { ContentBookmark } from '../entities/content-bookmark.entity';
import { ContentProgress, ProgressStatus } from '../entities/content-progress.entity';
import { BookmarkState } from '../services/bookmark.service';

export class ListContentQueryDto {
  @ApiPropertyOptional({ enum: ContentType })
  @IsOptional()
  @IsEnum(ContentType)
  type?: ContentType;
}

export class ContentSummaryDto {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  title!: string;

  @ApiProperty()
  slug!: string;

  @ApiProperty({ enum: ContentType })
  contentType!: ContentType;

  @ApiPropertyOptional()
  excerpt?: string;

  @ApiProperty()
  featured!: boolean;

  @ApiPropertyOptional()
  publishedAt?: Date;

  static fromEntity(content: Content): ContentSummaryDto {
    const dto = new ContentSummaryDto();
    dto.id = content.id;
    dto.title = content.title;
    dto.slug = content.slug;
    dto.contentType = content.contentType;
    dto.excerpt = content.excerpt;
    dto.featured = content.featured;
    dto.publishedAt = content.publishedAt;
    return dto;
  }
}

export class ContentDetailDto extends ContentSummaryDto {
  @ApiProperty()
  body!: string;

  static fromDetail(content: Content): ContentDetailDto {
    const dto = Object.assign(new ContentDetailDto(), ContentSummaryDto.fromEntity(content));
    dto.body = content.body;
    return dto;
  }
}

export class SearchContentQueryDto {
  @ApiProperty({ minLength: 3, example: 'oppsigelse' })
  @IsString()
  @MaxLength(200)
  q!: string;
}

export class ContentSearchResultDto extends ContentSummaryDto {
  @ApiProperty()
  packageSlug!: string;

  @ApiProperty()
  packageName!: string;

  static fromResult(content: Content): ContentSearchResultDto {
    const dto = Object.assign(new ContentSearchResultDto(), ContentSummaryDto.fromEntity(content));
    dto.packageSlug = content.package.slug;
    dto.packageName = content.package.name;
    return dto;
  }
}

export class BookmarkToggleResponseDto {
  @ApiProperty({ enum: ['bookmarked', 'removed'] })
  status!: BookmarkState;

  @ApiProperty()
  message!: string;

  static fromState(status: BookmarkState): BookmarkToggleResponseDto {
    const dto = new BookmarkToggleResponseDto();
    dto.status = status;
    dto.message = status === 'bookmarked' ? 'Content bookmarked' : 'Bookmark removed';
    return dto;
  }
}

export class BookmarkResponseDto {
  @ApiProperty()
  id!: string;

  @ApiPropertyOptional()
  notes?: string;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty({ type: ContentSearchResultDto })
  content!: ContentSearchResultDto;

  static fromEntity(bookmark: ContentBookmark): BookmarkResponseDto {
    const dto = new BookmarkResponseDto();
    dto.id = bookmark.id;
    dto.notes = bookmark.notes;
    dto.createdAt = bookmark.createdAt;
    dto.content = ContentSearchResultDto.fromResult(bookmark.content);
    return dto;
  }
}

export class ListProgressQueryDto {
  @ApiPropertyOptional({ enum: ProgressStatus })
  @IsOptional()
  @IsEnum(ProgressStatus)
  status?: ProgressStatus;
}

export class ProgressResponseDto {
  @ApiProperty()
  contentId!: string;

  @ApiProperty({ enum: ProgressStatus })
  status!: ProgressStatus;

  @ApiPropertyOptional()
  startedAt?: Date;

  @ApiPropertyOptional()
  completedAt?: Date;

  @ApiProperty()
  lastAccessedAt!: Date;

  static fromEntity(progress: ContentProgress): ProgressResponseDto {
    const dto = new ProgressResponseDto();
    dto.contentId = progress.content.id;
    dto.status = progress.status;
    dto.startedAt = progress.startedAt;
    dto.completedAt = progress.completedAt;
    dto.lastAccessedAt = progress.lastAccessedAt;
    return dto;
  }
}
