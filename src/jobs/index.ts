// Queue exports
export {
  QUEUE_NAMES,
  EVENT_TOPICS,
  redisConnection,
  getRehabEventsQueue,
  closeQueues,
  enqueueRehabEvent,
  isEventOf,
} from './queue.js';

export type { EventTopic, EventPayloads, RehabEventJobData } from './queue.js';

// Worker exports
export { startWorkers, stopWorkers, getWorkerStatus } from './worker.js';

// Processor exports (for testing)
export { processRehabEvent } from './processors/rehab-event.processor.js';
export type { RehabEventResult } from './processors/rehab-event.processor.js';
