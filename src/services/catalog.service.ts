import type { Officer, Program, ProgramCategory, Station } from '../types/rehab.js';
import { ContextualService } from './service-context.js';

/** Read-only views over the program catalog and the resource pool. */
export class CatalogService extends ContextualService {
  async listPrograms(category?: ProgramCategory): Promise<Program[]> {
    return this.context.store.findActivePrograms(category);
  }

  async listStations(): Promise<Station[]> {
    return this.context.store.listStations();
  }

  async listOfficers(): Promise<Officer[]> {
    return this.context.store.listOfficers();
  }
}

export const catalogService = new CatalogService();
