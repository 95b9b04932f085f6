import { getRehabConfig } from '../lib/config/rehab.js';
import { getRehabStore } from '../stores/index.js';
import type { RehabStore } from '../stores/index.js';
import { getPredictorClient } from './predictor-client.service.js';
import type { ProgramPredictor } from './predictor-client.service.js';
import { getEventPublisher } from './event-publisher.service.js';
import type { EventPublisher } from './event-publisher.service.js';

/** Collaborators shared by the rehabilitation services. */
export interface ServiceContext {
  store: RehabStore;
  predictor: ProgramPredictor;
  events: EventPublisher;
  autoCreateProfiles: boolean;
}

export function defaultServiceContext(): ServiceContext {
  return {
    store: getRehabStore(),
    predictor: getPredictorClient(),
    events: getEventPublisher(),
    autoCreateProfiles: getRehabConfig().autoCreateProfiles,
  };
}

/**
 * Resolves its context on first use, so module-level service singletons
 * don't read configuration or open connections at import time.
 */
export abstract class ContextualService {
  private resolved: ServiceContext | null = null;

  constructor(private readonly factory: () => ServiceContext = defaultServiceContext) {}

  protected get context(): ServiceContext {
    if (!this.resolved) {
      this.resolved = this.factory();
    }
    return this.resolved;
  }
}
