import { Worker, Job } from 'bullmq';
import { redisConnection, QUEUE_NAMES } from './queue.js';
import type { RehabEventJobData } from './queue.js';
import { processRehabEvent } from './processors/rehab-event.processor.js';
import type { RehabEventResult } from './processors/rehab-event.processor.js';

let rehabEventsWorker: Worker<RehabEventJobData, RehabEventResult> | null = null;

/**
 * Start the rehab event worker
 */
export async function startWorkers(): Promise<void> {
  console.log('Starting background job workers...');

  rehabEventsWorker = new Worker<RehabEventJobData, RehabEventResult>(
    QUEUE_NAMES.REHAB_EVENTS,
    processRehabEvent,
    {
      connection: redisConnection(),
      concurrency: 5,
      limiter: {
        max: 50,
        duration: 1000, // Max 50 events per second
      },
    }
  );

  rehabEventsWorker.on('completed', (job: Job<RehabEventJobData>, result: RehabEventResult) => {
    console.log(
      `[rehab-events] Job ${job.id} completed: ${result.topic}${result.profileRefreshed ? ' (profile refreshed)' : ''}`
    );
  });

  rehabEventsWorker.on('failed', (job: Job<RehabEventJobData> | undefined, err: Error) => {
    console.error(`[rehab-events] Job ${job?.id} failed:`, err.message);
  });

  rehabEventsWorker.on('error', (err: Error) => {
    console.error('[rehab-events] Worker error:', err.message);
  });

  console.log('All workers started successfully');
}

/**
 * Stop all workers gracefully
 */
export async function stopWorkers(): Promise<void> {
  console.log('Stopping background job workers...');

  if (rehabEventsWorker) {
    const worker = rehabEventsWorker;
    rehabEventsWorker = null;
    await worker.close();
  }

  console.log('All workers stopped');
}

/**
 * Get worker status for health checks
 */
export function getWorkerStatus(): { rehabEvents: boolean } {
  return {
    rehabEvents: rehabEventsWorker !== null && !rehabEventsWorker.closing,
  };
}
