import { ProfileNotFoundError } from '../lib/errors.js';
import { EVENT_TOPICS } from '../jobs/queue.js';
import type {
  CounselingNote,
  FeatureValue,
  MedicalReport,
  ProfileFeatures,
  RehabProfile,
} from '../types/rehab.js';
import type {
  CreateCounselingNoteInput,
  CreateMedicalReportInput,
} from '../schemas/rehabilitation.schema.js';
import { ContextualService } from './service-context.js';

/** Profile feature keys maintained from clinical records. */
export const CLINICAL_FEATURES = {
  LAST_DIAGNOSIS: 'lastDiagnosis',
  LAST_SESSION_SCORE: 'lastSessionScore',
  LAST_SESSION_SENTIMENT: 'lastSessionSentiment',
} as const;

export class ProfileService extends ContextualService {
  async getProfile(inmateId: string): Promise<RehabProfile> {
    const profile = await this.context.store.getProfile(inmateId);
    if (!profile) {
      throw new ProfileNotFoundError(inmateId);
    }
    return profile;
  }

  async addMedicalReport(input: CreateMedicalReportInput): Promise<MedicalReport> {
    const { store, events } = this.context;

    const report = await store.addMedicalReport({
      inmateId: input.inmateId,
      officerId: input.officerId,
      vitals: input.vitals,
      diagnosis: input.diagnosis ?? null,
      notes: input.notes ?? null,
    });
    console.info(`[profile] Medical report ${report.id} recorded for inmate ${report.inmateId}`);

    await events.publish(EVENT_TOPICS.MEDICAL_REPORT_ADDED, {
      reportId: report.id,
      inmateId: report.inmateId,
      diagnosis: report.diagnosis,
    });

    return report;
  }

  /**
   * Store a counseling note with the predictor's analysis. The note is kept
   * even when analysis is unavailable.
   */
  async addCounselingNote(input: CreateCounselingNoteInput): Promise<CounselingNote> {
    const { store, predictor, events } = this.context;

    const analysis = await predictor.analyzeNotes(input.inmateId, input.text);
    const note = await store.addCounselingNote({
      inmateId: input.inmateId,
      counselorId: input.counselorId,
      text: input.text,
      sessionScore: input.sessionScore ?? null,
      sentiment: analysis.sentiment,
      summary: analysis.summary,
      keyPoints: analysis.keyPoints,
    });
    console.info(`[profile] Counseling note ${note.id} recorded for inmate ${note.inmateId}`);

    await events.publish(EVENT_TOPICS.COUNSELING_NOTE_ADDED, {
      noteId: note.id,
      inmateId: note.inmateId,
      sessionScore: note.sessionScore,
      sentiment: note.sentiment,
    });

    return note;
  }

  /**
   * Merge features into an existing profile and bump lastUpdated. Returns
   * null when the inmate has no profile; clinical records never create one.
   */
  async refreshFeatures(
    inmateId: string,
    updates: Record<string, FeatureValue>
  ): Promise<RehabProfile | null> {
    const { store } = this.context;

    const profile = await store.getProfile(inmateId);
    if (!profile) {
      console.info(`[profile] No profile for inmate ${inmateId}; skipping refresh`);
      return null;
    }

    const features: ProfileFeatures = { ...profile.features, ...updates };
    return store.saveProfile({ ...profile, features, lastUpdated: new Date() });
  }
}

export const profileService = new ProfileService();
