import { Queue } from 'bullmq';
import type { ConnectionOptions } from 'bullmq';
import { getRehabConfig } from '../lib/config/rehab.js';
import type { NoteSentiment, ProgressStatus } from '../types/rehab.js';

// Redis connection options for BullMQ
export function redisConnection(options: { enableOfflineQueue?: boolean } = {}): ConnectionOptions {
  const { redis } = getRehabConfig();
  return {
    host: redis.host,
    port: redis.port,
    password: redis.password,
    db: redis.db,
    enableOfflineQueue: options.enableOfflineQueue ?? true,
  };
}

// Queue names
export const QUEUE_NAMES = {
  REHAB_EVENTS: 'rehab-events',
} as const;

// Event topics (used as job names on the rehab-events queue)
export const EVENT_TOPICS = {
  RECOMMENDATION_CREATED: 'recommendation-created',
  PROGRESS_UPDATED: 'progress-updated',
  MEDICAL_REPORT_ADDED: 'medical-report-added',
  COUNSELING_NOTE_ADDED: 'counseling-note-added',
} as const;

export type EventTopic = (typeof EVENT_TOPICS)[keyof typeof EVENT_TOPICS];

// Event payloads
export interface EventPayloads {
  'recommendation-created': {
    recommendationId: string;
    inmateId: string;
    programId: string;
    stationId: string | null;
    officerId: string | null;
    degraded: boolean;
  };
  'progress-updated': {
    recommendationId: string;
    inmateId: string;
    progressLogId: string;
    status: ProgressStatus;
    progressPercentage: number | null;
    completed: boolean;
  };
  'medical-report-added': {
    reportId: string;
    inmateId: string;
    diagnosis: string | null;
  };
  'counseling-note-added': {
    noteId: string;
    inmateId: string;
    sessionScore: number | null;
    sentiment: NoteSentiment | null;
  };
}

// Job data
export interface RehabEventJobData<T extends EventTopic = EventTopic> {
  topic: T;
  payload: EventPayloads[T];
  publishedAt: string;
}

export function isEventOf<K extends EventTopic>(
  data: RehabEventJobData,
  topic: K
): data is RehabEventJobData<K> {
  return data.topic === topic;
}

let rehabEventsQueue: Queue<RehabEventJobData> | null = null;

/**
 * Get or create the rehab events queue
 */
export function getRehabEventsQueue(): Queue<RehabEventJobData> {
  if (!rehabEventsQueue) {
    rehabEventsQueue = new Queue<RehabEventJobData>(QUEUE_NAMES.REHAB_EVENTS, {
      // Producers fail fast while Redis is down instead of buffering commands
      connection: redisConnection({ enableOfflineQueue: false }),
      defaultJobOptions: {
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 1000,
        },
        removeOnComplete: {
          age: 24 * 3600, // Keep completed jobs for 24 hours
          count: 1000,
        },
        removeOnFail: {
          age: 7 * 24 * 3600, // Keep failed jobs for 7 days
        },
      },
    });
  }
  return rehabEventsQueue;
}

/**
 * Close all queue connections
 */
export async function closeQueues(): Promise<void> {
  if (rehabEventsQueue) {
    const queue = rehabEventsQueue;
    rehabEventsQueue = null;
    await queue.close();
  }
}

/**
 * Helper to add one event job
 */
export async function enqueueRehabEvent<T extends EventTopic>(
  topic: T,
  payload: EventPayloads[T]
): Promise<string | null> {
  const queue = getRehabEventsQueue();
  const data: RehabEventJobData<T> = { topic, payload, publishedAt: new Date().toISOString() };
  const job = await queue.add(topic, data);
  return job.id ?? null;
}
