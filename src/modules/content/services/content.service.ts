import { Injectable, NotFoundException } from '@nestjs/common';
import { EntityManager } from '@mikro-orm/core';
import { Content, ContentStatus, ContentType } from '../entities/content.entity';
import { CatalogService } from '../../catalog/services/catalog.service';
import { LegalPackage } from '../../catalog/entities/legal-package.entity';
import { SubscriptionService } from '../../subscription/services/subscription.service';
import { User, UserRole } from '../../user/entities/user.entity';

export const MIN_SEARCH_LENGTH = 3;
export const MAX_SEARCH_RESULTS = 50;

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (match) => `\\${match}`);
}

@Injectable()
export class ContentService {
  constructor(
    private readonly em: EntityManager,
    private readonly catalogService: CatalogService,
    private readonly subscriptionService: SubscriptionService,
  ) {}

  async listPublished(
    packageSlug: string,
    contentType?: ContentType,
    now: Date = new Date(),
  ): Promise<Content[]> {
    const pkg = await this.requirePackage(packageSlug);

    return this.em.find(
      Content,
      {
        package: pkg,
        status: ContentStatus.PUBLISHED,
        publishedAt: { $lte: now },
        ...(contentType ? { contentType } : {}),
      },
      {
        orderBy: { featured: 'desc', priority: 'desc', publishedAt: 'desc' },
      },
    );
  }

  async findPublished(packageSlug: string, contentSlug: string, now: Date = new Date()): Promise<Content> {
    const pkg = await this.requirePackage(packageSlug);

    const content = await this.em.findOne(
      Content,
      {
        package: pkg,
        slug: contentSlug,
        status: ContentStatus.PUBLISHED,
        publishedAt: { $lte: now },
      },
      { populate: ['body'] },
    );
    if (!content) {
      throw new NotFoundException('Content not found');
    }
    return content;
  }

  /**
   * Case-insensitive match on title, excerpt and body across the packages
   * the user can read. Queries shorter than three characters match nothing.
   */
  async search(user: User, query: string, now: Date = new Date()): Promise<Content[]> {
    const term = query.trim();
    if (term.length < MIN_SEARCH_LENGTH) {
      return [];
    }

    const packageIds =
      user.role === UserRole.ADMIN ? undefined : await this.subscriptionService.accessiblePackageIds(user.id, now);
    if (packageIds && packageIds.length === 0) {
      return [];
    }

    const pattern = `%${escapeLike(term)}%`;
    return this.em.find(
      Content,
      {
        ...(packageIds ? { package: { $in: packageIds } } : {}),
        status: ContentStatus.PUBLISHED,
        publishedAt: { $lte: now },
        $or: [{ title: { $ilike: pattern } }, { excerpt: { $ilike: pattern } }, { body: { $ilike: pattern } }],
      },
      {
        populate: ['package'],
        orderBy: { featured: 'desc', priority: 'desc', publishedAt: 'desc' },
        limit: MAX_SEARCH_RESULTS,
      },
    );
  }

  private async requirePackage(slug: string): Promise<LegalPackage> {
    const pkg = await this.catalogService.findBySlug(slug);
    if (!pkg) {
      throw new NotFoundException('Package not found');
    }
    return pkg;
  }
}
