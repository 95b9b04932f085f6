import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createServiceContext, mockData } from './setup.js';
import { ProfileService } from '../services/profile.service.js';
import { ProfileNotFoundError } from '../lib/errors.js';

function setup() {
  const ctx = createServiceContext({
    profiles: [mockData.profile({ inmateId: 'INM001', features: { age: 34 } })],
  });
  const service = new ProfileService(() => ctx.context);
  return { ...ctx, service };
}

describe('ProfileService', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getProfile', () => {
    it('returns the stored profile', async () => {
      const { service } = setup();

      expect(await service.getProfile('INM001')).toMatchObject({
        inmateId: 'INM001',
        suitabilityGroup: 'general',
        features: { age: 34 },
      });
    });

    it('throws ProfileNotFoundError when absent', async () => {
      const { service } = setup();

      await expect(service.getProfile('INM404')).rejects.toBeInstanceOf(ProfileNotFoundError);
    });
  });

  describe('addMedicalReport', () => {
    it('stores the report and publishes an event', async () => {
      const { service, publish } = setup();

      const report = await service.addMedicalReport({
        inmateId: 'INM001',
        officerId: 'MO-1001',
        vitals: { pulse: 72 },
        diagnosis: 'Hypertension',
      });

      expect(report).toMatchObject({
        inmateId: 'INM001',
        officerId: 'MO-1001',
        vitals: { pulse: 72 },
        diagnosis: 'Hypertension',
        notes: null,
      });
      expect(publish).toHaveBeenCalledWith('medical-report-added', {
        reportId: report.id,
        inmateId: 'INM001',
        diagnosis: 'Hypertension',
      });
    });
  });

  describe('addCounselingNote', () => {
    it('stores the analysis returned by the predictor', async () => {
      const { service, analyzeNotes, publish } = setup();
      analyzeNotes.mockResolvedValueOnce({
        summary: 'Motivated to continue',
        sentiment: 'positive',
        keyPoints: ['attended all sessions'],
        degraded: false,
      });

      const note = await service.addCounselingNote({
        inmateId: 'INM001',
        counselorId: 'C-7',
        text: 'Talked about family visits.',
        sessionScore: 8,
      });

      expect(analyzeNotes).toHaveBeenCalledWith('INM001', 'Talked about family visits.');
      expect(note).toMatchObject({
        summary: 'Motivated to continue',
        sentiment: 'positive',
        keyPoints: ['attended all sessions'],
        sessionScore: 8,
      });
      expect(publish).toHaveBeenCalledWith('counseling-note-added', {
        noteId: note.id,
        inmateId: 'INM001',
        sessionScore: 8,
        sentiment: 'positive',
      });
    });

    it('keeps the note when analysis is unavailable', async () => {
      const { service } = setup();

      const note = await service.addCounselingNote({
        inmateId: 'INM001',
        counselorId: 'C-7',
        text: 'Short session.',
      });

      expect(note).toMatchObject({
        text: 'Short session.',
        summary: 'Analysis unavailable',
        sentiment: null,
        sessionScore: null,
      });
    });
  });

  describe('refreshFeatures', () => {
    it('merges features and bumps lastUpdated', async () => {
      const { service, store } = setup();

      const refreshed = await service.refreshFeatures('INM001', { lastDiagnosis: 'Hypertension' });

      expect(refreshed?.features).toEqual({ age: 34, lastDiagnosis: 'Hypertension' });
      expect(refreshed?.lastUpdated.getTime()).toBeGreaterThan(
        new Date('2024-01-01T00:00:00.000Z').getTime()
      );
      expect((await store.getProfile('INM001'))?.features).toEqual({
        age: 34,
        lastDiagnosis: 'Hypertension',
      });
    });

    it('returns null and creates nothing for an unknown inmate', async () => {
      const { service, store } = setup();

      expect(await service.refreshFeatures('INM404', { lastDiagnosis: 'Flu' })).toBeNull();
      expect(await store.getProfile('INM404')).toBeNull();
    });
  });
});
