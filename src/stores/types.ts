import type {
  CounselingNote,
  MedicalReport,
  NewCounselingNote,
  NewMedicalReport,
  NewProgressLogEntry,
  NewRecommendation,
  Officer,
  Program,
  ProgramCategory,
  ProgressLogEntry,
  Recommendation,
  RehabProfile,
  ResourceRef,
  Station,
} from '../types/rehab.js';

export interface ProfileStore {
  getProfile(inmateId: string): Promise<RehabProfile | null>;
  /** Insert or replace the profile keyed by inmateId. */
  saveProfile(profile: RehabProfile): Promise<RehabProfile>;
}

export interface ProgramCatalog {
  /** Active programs, ordered by name; all categories when none is given. */
  findActivePrograms(category?: ProgramCategory): Promise<Program[]>;
  findProgramById(id: string): Promise<Program | null>;
}

export interface ResourcePool {
  /** Active stations with spare capacity, in a stable order that selection ties fall back on. */
  findEligibleStations(): Promise<Station[]>;
  /** Active officers with spare capacity, in a stable order. */
  findEligibleOfficers(): Promise<Officer[]>;
  listStations(): Promise<Station[]>;
  listOfficers(): Promise<Officer[]>;
  findStationById(id: string): Promise<Station | null>;
  findOfficerById(id: string): Promise<Officer | null>;
  /**
   * Atomically increment the resource's load if it is active and below
   * capacity. Returns false when the increment did not happen.
   */
  reserve(ref: ResourceRef): Promise<boolean>;
  /** Atomically decrement the resource's load if it is above zero. */
  release(ref: ResourceRef): Promise<boolean>;
}

export interface RecommendationStore {
  createRecommendation(draft: NewRecommendation): Promise<Recommendation>;
  findRecommendationById(id: string): Promise<Recommendation | null>;
  /** Newest first. */
  findRecommendationsByInmate(inmateId: string): Promise<Recommendation[]>;
  findLatestPendingRecommendation(inmateId: string): Promise<Recommendation | null>;
  /**
   * Flip the status to COMPLETED unless it already is. Returns true only for
   * the call that performed the transition.
   */
  markRecommendationCompleted(id: string): Promise<boolean>;
}

export interface ProgressLogStore {
  appendProgress(entry: NewProgressLogEntry): Promise<ProgressLogEntry>;
  /** Oldest first. */
  listProgress(recommendationId: string): Promise<ProgressLogEntry[]>;
}

export interface ClinicalRecordStore {
  addMedicalReport(report: NewMedicalReport): Promise<MedicalReport>;
  addCounselingNote(note: NewCounselingNote): Promise<CounselingNote>;
}

export interface RehabStore
  extends ProfileStore,
    ProgramCatalog,
    ResourcePool,
    RecommendationStore,
    ProgressLogStore,
    ClinicalRecordStore {
  readonly kind: 'postgres' | 'memory';
}
