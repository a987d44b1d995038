import { Entity, Enum, Index, ManyToOne, Property, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { User } from '../../user/entities/user.entity';
import { Content } from './content.entity';

export enum ProgressStatus {
  NOT_STARTED = 'not_started',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
}

/**
 * Reading progress of one user through one content item.
 */
@Entity({ tableName: 'content_progress' })
@Unique({ properties: ['user', 'content'] })
@Index({ properties: ['user', 'status'] })
export class ContentProgress extends BaseEntity<'status' | 'lastAccessedAt'> {
  @ManyToOne(() => User, { deleteRule: 'cascade' })
  user!: User;

  @ManyToOne(() => Content, { deleteRule: 'cascade' })
  content!: Content;

  @Enum(() => ProgressStatus)
  status: ProgressStatus = ProgressStatus.NOT_STARTED;

  @Property({ type: 'datetime', nullable: true })
  startedAt?: Date;

  @Property({ type: 'datetime', nullable: true })
  completedAt?: Date;

  @Property({ type: 'datetime' })
  lastAccessedAt: Date = new Date();
}
