import Fastify, { FastifyInstance } from 'fastify';
import { vi } from 'vitest';
import { registerErrorHandler } from '../lib/error-handler.js';
import { fallbackPrediction } from '../engine/prediction/index.js';
import type { PredictionOutcome, PredictionRequest } from '../engine/prediction/index.js';
import type { NotesAnalysis, ProgramPredictor } from '../services/predictor-client.service.js';
import type { EventPublisher } from '../services/event-publisher.service.js';
import type { EventTopic } from '../jobs/queue.js';
import type { ServiceContext } from '../services/service-context.js';
import { InMemoryRehabStore } from '../stores/memory-store.js';
import type { MemoryStoreSeed } from '../stores/memory-store.js';
import { RecommendationStatus } from '../types/rehab.js';
import type {
  Officer,
  Program,
  Recommendation,
  RehabProfile,
  Station,
} from '../types/rehab.js';

export async function buildTestApp(): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
  });

  registerErrorHandler(app);

  return app;
}

// Helper to parse JSON response
export function parseJsonResponse<T>(response: { body: string }): T {
  const parsed: T = JSON.parse(response.body);
  return parsed;
}

// Helper to generate test UUIDs
export function testUuid(suffix: string): string {
  const paddedSuffix = suffix.padStart(12, '0');
  return `00000000-0000-4000-8000-${paddedSuffix}`;
}

// Mock data generators
export const mockData = {
  program(overrides?: Partial<Program>): Program {
    return {
      id: testUuid('p1'),
      name: 'Test Program',
      category: 'vocational',
      durationWeeks: 16,
      requiredSkills: [],
      capacity: 20,
      currentEnrollment: 0,
      description: null,
      active: true,
      ...overrides,
    };
  },

  station(overrides?: Partial<Station>): Station {
    return {
      id: testUuid('s1'),
      name: 'Test Station',
      location: null,
      zone: null,
      capacity: 10,
      currentLoad: 0,
      specializations: [],
      successRate: null,
      active: true,
      ...overrides,
    };
  },

  officer(overrides?: Partial<Officer>): Officer {
    return {
      id: testUuid('o1'),
      badgeNumber: 'B-0001',
      name: 'Test Officer',
      specializations: [],
      assignedStationId: null,
      currentLoad: 0,
      maxCapacity: 5,
      successRate: null,
      active: true,
      ...overrides,
    };
  },

  profile(overrides?: Partial<RehabProfile>): RehabProfile {
    return {
      inmateId: 'INM001',
      suitabilityGroup: 'general',
      riskScore: 0.5,
      features: {},
      lastUpdated: new Date('2024-01-01T00:00:00.000Z'),
      ...overrides,
    };
  },

  recommendation(overrides?: Partial<Recommendation>): Recommendation {
    return {
      id: testUuid('r1'),
      inmateId: 'INM001',
      programId: testUuid('p1'),
      stationId: null,
      officerId: null,
      recommendedDurationWeeks: 16,
      rationale: 'Test rationale',
      confidence: 0.8,
      degraded: false,
      assignmentGaps: [],
      status: RecommendationStatus.PENDING,
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
      startDate: null,
      expectedEndDate: null,
      ...overrides,
    };
  },
};

/** A predictor stub that is unreachable unless told otherwise. */
export function mockPredictor() {
  const predict = vi.fn(
    async (request: PredictionRequest): Promise<PredictionOutcome> => ({
      kind: 'degraded',
      reason: 'HTTP 503',
      prediction: fallbackPrediction(request.suitabilityGroup),
    })
  );
  const analyzeNotes = vi.fn(
    async (_inmateId: string, _text: string): Promise<NotesAnalysis> => ({
      summary: 'Analysis unavailable',
      sentiment: null,
      keyPoints: [],
      degraded: true,
    })
  );
  const predictor: ProgramPredictor = { predict, analyzeNotes };
  return { predictor, predict, analyzeNotes };
}

export function mockPublisher() {
  const publish = vi.fn(async (_topic: EventTopic, _payload: unknown): Promise<void> => undefined);
  const events: EventPublisher = { publish };
  return { events, publish };
}

/**
 * In-memory service context with stubbed predictor and publisher.
 */
export function createServiceContext(seed: MemoryStoreSeed = {}, autoCreateProfiles = true) {
  const store = new InMemoryRehabStore(seed);
  const { predictor, predict, analyzeNotes } = mockPredictor();
  const { events, publish } = mockPublisher();
  const context: ServiceContext = { store, predictor, events, autoCreateProfiles };
  return { context, store, predict, analyzeNotes, publish };
}
