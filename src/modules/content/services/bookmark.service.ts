import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from '@mikro-orm/core';
import { ContentBookmark } from '../entities/content-bookmark.entity';
import { Content } from '../entities/content.entity';
import { User } from '../../user/entities/user.entity';

export type BookmarkState = 'bookmarked' | 'removed';

@Injectable()
export class BookmarkService {
  private readonly logger = new Logger(BookmarkService.name);

  constructor(private readonly em: EntityManager) {}

  /** Bookmarks the content, or removes the bookmark when it already exists. */
  async toggle(userId: string, content: Content): Promise<BookmarkState> {
    const existing = await this.em.findOne(ContentBookmark, { user: userId, content });
    if (existing) {
      this.em.remove(existing);
      await this.em.flush();
      this.logger.log(`User ${userId} removed bookmark on content ${content.id}`);
      return 'removed';
    }

    const bookmark = this.em.create(ContentBookmark, {
      user: this.em.getReference(User, userId),
      content,
    });
    await this.em.persistAndFlush(bookmark);
    this.logger.log(`User ${userId} bookmarked content ${content.id}`);
    return 'bookmarked';
  }

  async listForUser(userId: string): Promise<ContentBookmark[]> {
    return this.em.find(
      ContentBookmark,
      { user: userId },
      { populate: ['content', 'content.package'], orderBy: { createdAt: 'desc' } },
    );
  }
}
