import { getRehabConfig } from '../lib/config/rehab.js';
import { enqueueRehabEvent } from '../jobs/queue.js';
import type { EventPayloads, EventTopic } from '../jobs/queue.js';

/**
 * Fire-and-forget notification to other subsystems. Implementations never
 * reject: delivery failures are logged and dropped.
 */
export interface EventPublisher {
  publish<T extends EventTopic>(topic: T, payload: EventPayloads[T]): Promise<void>;
}

/** Longest a caller waits on the queue before the event is dropped. */
export const DEFAULT_PUBLISH_TIMEOUT_MS = 2000;

class PublishTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`enqueue timed out after ${timeoutMs}ms`);
    this.name = 'PublishTimeoutError';
  }
}

/** Publishes each event as a job on the rehab-events queue. */
export class QueueEventPublisher implements EventPublisher {
  constructor(private readonly timeoutMs: number = DEFAULT_PUBLISH_TIMEOUT_MS) {}

  async publish<T extends EventTopic>(topic: T, payload: EventPayloads[T]): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new PublishTimeoutError(this.timeoutMs)), this.timeoutMs);
    });

    try {
      const jobId = await Promise.race([enqueueRehabEvent(topic, payload), timeout]);
      console.info(`[events] Published ${topic} (job ${jobId ?? 'unknown'})`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[events] Failed to publish ${topic}: ${message}`);
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Writes events to the log only; for running without Redis. */
export class LogEventPublisher implements EventPublisher {
  async publish<T extends EventTopic>(topic: T, payload: EventPayloads[T]): Promise<void> {
    console.info(`[events] ${topic} ${JSON.stringify(payload)}`);
  }
}

let publisher: EventPublisher | null = null;

export function getEventPublisher(): EventPublisher {
  if (!publisher) {
    publisher =
      getRehabConfig().events.driver === 'bullmq'
        ? new QueueEventPublisher()
        : new LogEventPublisher();
  }
  return publisher;
}
