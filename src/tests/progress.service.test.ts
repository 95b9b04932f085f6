import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createServiceContext, mockData, testUuid } from './setup.js';
import { ProgressService } from '../services/progress.service.js';
import { RecommendationNotFoundError } from '../lib/errors.js';
import type { NewRecommendation } from '../types/rehab.js';

const STATION_ID = testUuid('s1');
const OFFICER_ID = testUuid('o1');

function draft(overrides: Partial<NewRecommendation> = {}): NewRecommendation {
  return {
    inmateId: 'INM001',
    programId: testUuid('p1'),
    stationId: STATION_ID,
    officerId: OFFICER_ID,
    recommendedDurationWeeks: 12,
    rationale: 'Test rationale',
    confidence: 0.7,
    degraded: false,
    assignmentGaps: [],
    startDate: null,
    expectedEndDate: null,
    ...overrides,
  };
}

async function setup() {
  const ctx = createServiceContext({
    programs: [mockData.program()],
    stations: [mockData.station({ id: STATION_ID, currentLoad: 3 })],
    officers: [mockData.officer({ id: OFFICER_ID, currentLoad: 2 })],
  });
  const recommendation = await ctx.store.createRecommendation(draft());
  const service = new ProgressService(() => ctx.context);
  return { ...ctx, service, recommendation };
}

describe('ProgressService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('logProgress', () => {
    it('appends an entry for the recommendation', async () => {
      const { service, recommendation } = await setup();

      const { entry, completed } = await service.logProgress({
        recommendationId: recommendation.id,
        status: 'ON_TRACK',
        progressPercentage: 40,
        notes: 'Attending every session',
        recordedBy: 'officer-17',
      });

      expect(completed).toBe(false);
      expect(entry).toMatchObject({
        inmateId: 'INM001',
        recommendationId: recommendation.id,
        status: 'ON_TRACK',
        progressPercentage: 40,
        notes: 'Attending every session',
        recordedBy: 'officer-17',
      });
    });

    it('stores absent percentage and notes as null', async () => {
      const { service, recommendation } = await setup();

      const { entry } = await service.logProgress({
        recommendationId: recommendation.id,
        status: 'ENROLLED',
        recordedBy: 'officer-17',
      });

      expect(entry.progressPercentage).toBeNull();
      expect(entry.notes).toBeNull();
    });

    it('completes the recommendation at 100%', async () => {
      const { service, store, recommendation } = await setup();

      const { completed } = await service.logProgress({
        recommendationId: recommendation.id,
        status: 'COMPLETED',
        progressPercentage: 100,
        recordedBy: 'officer-17',
      });

      expect(completed).toBe(true);
      expect((await store.findRecommendationById(recommendation.id))?.status).toBe('COMPLETED');
    });

    it('leaves the recommendation pending at 99%', async () => {
      const { service, store, recommendation } = await setup();

      const { completed } = await service.logProgress({
        recommendationId: recommendation.id,
        status: 'ON_TRACK',
        progressPercentage: 99,
        recordedBy: 'officer-17',
      });

      expect(completed).toBe(false);
      expect((await store.findRecommendationById(recommendation.id))?.status).toBe('PENDING');
    });

    it('does not complete on a COMPLETED status without the percentage', async () => {
      const { service, store, recommendation } = await setup();

      await service.logProgress({
        recommendationId: recommendation.id,
        status: 'COMPLETED',
        recordedBy: 'officer-17',
      });

      expect((await store.findRecommendationById(recommendation.id))?.status).toBe('PENDING');
    });

    it('releases station and officer load once on completion', async () => {
      const { service, store, recommendation } = await setup();

      await service.logProgress({
        recommendationId: recommendation.id,
        status: 'COMPLETED',
        progressPercentage: 100,
        recordedBy: 'officer-17',
      });
      expect((await store.findStationById(STATION_ID))?.currentLoad).toBe(2);
      expect((await store.findOfficerById(OFFICER_ID))?.currentLoad).toBe(1);

      await service.logProgress({
        recommendationId: recommendation.id,
        status: 'COMPLETED',
        progressPercentage: 100,
        recordedBy: 'officer-17',
      });
      expect((await store.findStationById(STATION_ID))?.currentLoad).toBe(2);
      expect((await store.findOfficerById(OFFICER_ID))?.currentLoad).toBe(1);
    });

    it('accepts entries after completion', async () => {
      const { service, recommendation } = await setup();
      await service.logProgress({
        recommendationId: recommendation.id,
        status: 'COMPLETED',
        progressPercentage: 100,
        recordedBy: 'officer-17',
      });

      const late = await service.logProgress({
        recommendationId: recommendation.id,
        status: 'ON_HOLD',
        progressPercentage: 100,
        notes: 'Follow-up visit',
        recordedBy: 'officer-17',
      });

      expect(late.completed).toBe(false);
      expect(late.entry.notes).toBe('Follow-up visit');
      expect(await service.getHistory(recommendation.id)).toHaveLength(2);
    });

    it('publishes one event per entry', async () => {
      const { service, publish, recommendation } = await setup();

      const { entry } = await service.logProgress({
        recommendationId: recommendation.id,
        status: 'COMPLETED',
        progressPercentage: 100,
        recordedBy: 'officer-17',
      });

      expect(publish).toHaveBeenCalledTimes(1);
      expect(publish).toHaveBeenCalledWith('progress-updated', {
        recommendationId: recommendation.id,
        inmateId: 'INM001',
        progressLogId: entry.id,
        status: 'COMPLETED',
        progressPercentage: 100,
        completed: true,
      });
    });

    it('throws RecommendationNotFoundError for an unknown recommendation', async () => {
      const { service, publish } = await setup();

      await expect(
        service.logProgress({
          recommendationId: testUuid('999'),
          status: 'ON_TRACK',
          recordedBy: 'officer-17',
        })
      ).rejects.toBeInstanceOf(RecommendationNotFoundError);
      expect(publish).not.toHaveBeenCalled();
    });
  });

  describe('getHistory', () => {
    it('returns entries oldest first', async () => {
      const { service, recommendation } = await setup();
      for (const status of ['ENROLLED', 'ON_TRACK', 'NEEDS_ATTENTION'] as const) {
        await service.logProgress({ recommendationId: recommendation.id, status, recordedBy: 'officer-17' });
      }

      const history = await service.getHistory(recommendation.id);

      expect(history.map((e) => e.status)).toEqual(['ENROLLED', 'ON_TRACK', 'NEEDS_ATTENTION']);
    });

    it('throws RecommendationNotFoundError for an unknown recommendation', async () => {
      const { service } = await setup();

      await expect(service.getHistory(testUuid('999'))).rejects.toBeInstanceOf(
        RecommendationNotFoundError
      );
    });
  });
});
