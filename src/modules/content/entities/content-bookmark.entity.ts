import { Entity, Index, ManyToOne, Property, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { User } from '../../user/entities/user.entity';
import { Content } from './content.entity';

@Entity({ tableName: 'content_bookmark' })
@Unique({ properties: ['user', 'content'] })
@Index({ properties: ['user', 'createdAt'] })
export class ContentBookmark extends BaseEntity {
  @ManyToOne(() => User, { deleteRule: 'cascade' })
  user!: User;

  @ManyToOne(() => Content, { deleteRule: 'cascade' })
  content!: Content;

  @Property({ type: 'text', nullable: true })
  notes?: string;
}
