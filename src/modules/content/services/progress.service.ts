import { Injectable } from '@nestjs/common';
import { EntityManager } from '@mikro-orm/core';
import { ContentProgress, ProgressStatus } from '../entities/content-progress.entity';
import { Content } from '../entities/content.entity';
import { User } from '../../user/entities/user.entity';

@Injectable()
export class ProgressService {
  constructor(private readonly em: EntityManager) {}

  /**
   * Called on every view. The first view starts the item; later views
   * only touch `lastAccessedAt`, so completed items stay completed.
   */
  async markStarted(userId: string, content: Content, now: Date = new Date()): Promise<ContentProgress> {
    const progress = await this.getOrCreate(userId, content, now);
    if (!progress.startedAt) {
      progress.startedAt = now;
      progress.status = ProgressStatus.IN_PROGRESS;
    }
    progress.lastAccessedAt = now;

    await this.em.flush();
    return progress;
  }

  async markCompleted(userId: string, content: Content, now: Date = new Date()): Promise<ContentProgress> {
    const progress = await this.getOrCreate(userId, content, now);
    if (!progress.startedAt) {
      progress.startedAt = now;
    }
    progress.completedAt = now;
    progress.status = ProgressStatus.COMPLETED;
    progress.lastAccessedAt = now;

    await this.em.flush();
    return progress;
  }

  async listForUser(userId: string, status?: ProgressStatus): Promise<ContentProgress[]> {
    return this.em.find(
      ContentProgress,
      { user: userId, ...(status ? { status } : {}) },
      { populate: ['content', 'content.package'], orderBy: { lastAccessedAt: 'desc' } },
    );
  }

  private async getOrCreate(userId: string, content: Content, now: Date): Promise<ContentProgress> {
    const existing = await this.em.findOne(ContentProgress, { user: userId, content });
    if (existing) {
      return existing;
    }

    const progress = this.em.create(ContentProgress, {
      user: this.em.getReference(User, userId),
      content,
      lastAccessedAt: now,
    });
    this.em.persist(progress);
    return progress;
  }
}
