import { Entity, Enum, Index, ManyToOne, Property, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { LegalPackage } from '../../catalog/entities/legal-package.entity';

export enum ContentType {
  ARTICLE = 'article',
  FORM = 'form',
  QA = 'qa',
  RESOURCE = 'resource',
  CHECKLIST = 'checklist',
  GUIDE = 'guide',
}

export enum ContentStatus {
  DRAFT = 'draft',
  REVIEW = 'review',
  PUBLISHED = 'published',
  ARCHIVED = 'archived',
}

@Entity({ tableName: 'content' })
@Unique({ properties: ['package', 'slug'] })
@Index({ properties: ['package', 'status'] })
export class Content extends BaseEntity<'contentType' | 'status' | 'featured' | 'priority'> {
  @ManyToOne(() => LegalPackage, { deleteRule: 'cascade' })
  package!: LegalPackage;

  @Property({ type: 'string', length: 200 })
  title!: string;

  @Property({ type: 'string', length: 200 })
  slug!: string;

  @Enum(() => ContentType)
  contentType: ContentType = ContentType.ARTICLE;

  @Property({ type: 'text', nullable: true })
  excerpt?: string;

  @Property({ type: 'text', lazy: true })
  body!: string;

  @Enum(() => ContentStatus)
  status: ContentStatus = ContentStatus.DRAFT;

  @Property({ type: 'datetime', nullable: true })
  publishedAt?: Date;

  @Property({ type: 'boolean' })
  featured: boolean = false;

  /** Higher first. */
  @Property({ type: 'integer' })
  priority: number = 0;
}
