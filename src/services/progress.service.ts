import { RecommendationNotFoundError } from '../lib/errors.js';
import { EVENT_TOPICS } from '../jobs/queue.js';
import type { ProgressLogEntry, ProgressStatus, Recommendation } from '../types/rehab.js';
import { ContextualService } from './service-context.js';

/** Percentage at or above which a recommendation is complete. */
export const COMPLETION_THRESHOLD = 100;

export interface LogProgressOptions {
  recommendationId: string;
  status: ProgressStatus;
  progressPercentage?: number | null;
  notes?: string | null;
  recordedBy: string;
}

export interface LoggedProgress {
  entry: ProgressLogEntry;
  /** True only for the entry that moved the recommendation to COMPLETED. */
  completed: boolean;
}

export class ProgressService extends ContextualService {
  /**
   * Append a progress entry. Entries keep being accepted after completion;
   * they are informational at that point.
   */
  async logProgress(options: LogProgressOptions): Promise<LoggedProgress> {
    const { store, events } = this.context;

    const recommendation = await this.requireRecommendation(options.recommendationId);
    const progressPercentage = options.progressPercentage ?? null;

    const entry = await store.appendProgress({
      inmateId: recommendation.inmateId,
      recommendationId: recommendation.id,
      status: options.status,
      progressPercentage,
      notes: options.notes ?? null,
      recordedBy: options.recordedBy,
    });

    let completed = false;
    if (progressPercentage !== null && progressPercentage >= COMPLETION_THRESHOLD) {
      completed = await store.markRecommendationCompleted(recommendation.id);
      if (completed) {
        console.info(`[progress] Recommendation ${recommendation.id} completed`);
        await this.releaseCapacity(recommendation);
      }
    }

    await events.publish(EVENT_TOPICS.PROGRESS_UPDATED, {
      recommendationId: recommendation.id,
      inmateId: recommendation.inmateId,
      progressLogId: entry.id,
      status: entry.status,
      progressPercentage: entry.progressPercentage,
      completed,
    });

    return { entry, completed };
  }

  /** Oldest first. */
  async getHistory(recommendationId: string): Promise<ProgressLogEntry[]> {
    await this.requireRecommendation(recommendationId);
    return this.context.store.listProgress(recommendationId);
  }

  private async requireRecommendation(id: string): Promise<Recommendation> {
    const recommendation = await this.context.store.findRecommendationById(id);
    if (!recommendation) {
      throw new RecommendationNotFoundError(id);
    }
    return recommendation;
  }

  private async releaseCapacity(recommendation: Recommendation) {
    const { store } = this.context;
    if (recommendation.stationId) {
      await store.release({ kind: 'station', id: recommendation.stationId });
    }
    if (recommendation.officerId) {
      await store.release({ kind: 'officer', id: recommendation.officerId });
    }
  }
}

export const progressService = new ProgressService();
