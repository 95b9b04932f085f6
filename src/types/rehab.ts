/**
 * Domain contracts for the rehabilitation recommendation engine.
 *
 * Enum-like values are exported as const objects alongside a union type of
 * their values, mirroring how generated database enums read.
 */

// ─── Enumerations ────────────────────────────────────────────────────────────

export const ProgramCategory = {
  SUBSTANCE_ABUSE: 'substance_abuse',
  MENTAL_HEALTH: 'mental_health',
  VOCATIONAL: 'vocational',
  EDUCATION: 'education',
  BEHAVIOR: 'behavior',
} as const;

export type ProgramCategory = (typeof ProgramCategory)[keyof typeof ProgramCategory];

export const PROGRAM_CATEGORIES = [
  ProgramCategory.SUBSTANCE_ABUSE,
  ProgramCategory.MENTAL_HEALTH,
  ProgramCategory.VOCATIONAL,
  ProgramCategory.EDUCATION,
  ProgramCategory.BEHAVIOR,
] as const;

export const RecommendationStatus = {
  /** Created, assignment recorded, participation not yet finished. */
  PENDING: 'PENDING',
  /** Terminal. Reached only when a progress entry reports 100%. */
  COMPLETED: 'COMPLETED',
} as const;

export type RecommendationStatus =
  (typeof RecommendationStatus)[keyof typeof RecommendationStatus];

export const RECOMMENDATION_STATUSES = [
  RecommendationStatus.PENDING,
  RecommendationStatus.COMPLETED,
] as const;

/**
 * Status reported on an individual progress entry. These describe engagement
 * only; none of them changes the owning recommendation's status on its own.
 */
export const ProgressStatus = {
  /** Placed on the program, no session attended yet. */
  ENROLLED: 'ENROLLED',
  /** Attending and meeting the program's milestones. */
  ON_TRACK: 'ON_TRACK',
  /** Minor setbacks: a missed session or a slipped milestone. */
  NEEDS_ATTENTION: 'NEEDS_ATTENTION',
  /** Repeated absences or regression; the case officer should intervene. */
  STRUGGLING: 'STRUGGLING',
  /** Participation paused (medical leave, transfer, disciplinary hold). */
  ON_HOLD: 'ON_HOLD',
  /** Participant finished the program's curriculum. */
  COMPLETED: 'COMPLETED',
  /** Participant withdrew or was removed from the program. */
  DROPPED_OUT: 'DROPPED_OUT',
} as const;

export type ProgressStatus = (typeof ProgressStatus)[keyof typeof ProgressStatus];

export const PROGRESS_STATUSES = [
  ProgressStatus.ENROLLED,
  ProgressStatus.ON_TRACK,
  ProgressStatus.NEEDS_ATTENTION,
  ProgressStatus.STRUGGLING,
  ProgressStatus.ON_HOLD,
  ProgressStatus.COMPLETED,
  ProgressStatus.DROPPED_OUT,
] as const;

export type FeatureValue = string | number | boolean | null;
export type ProfileFeatures = Record<string, FeatureValue>;

// ─── Records ─────────────────────────────────────────────────────────────────

export interface RehabProfile {
  inmateId: string;
  suitabilityGroup: string;
  /** 0.0 – 1.0 */
  riskScore: number;
  features: ProfileFeatures;
  lastUpdated: Date;
}

export interface Program {
  id: string;
  name: string;
  category: ProgramCategory;
  durationWeeks: number;
  requiredSkills: string[];
  capacity: number;
  currentEnrollment: number;
  description: string | null;
  active: boolean;
}

export interface Station {
  id: string;
  name: string;
  location: string | null;
  zone: string | null;
  capacity: number;
  currentLoad: number;
  specializations: string[];
  /** Historical success rate, 0.0 – 1.0. Null when never measured. */
  successRate: number | null;
  active: boolean;
}

export interface Officer {
  id: string;
  badgeNumber: string;
  name: string;
  specializations: string[];
  assignedStationId: string | null;
  currentLoad: number;
  maxCapacity: number;
  successRate: number | null;
  active: boolean;
}

export type AssignmentGap = 'station' | 'officer';

export interface Recommendation {
  id: string;
  inmateId: string;
  programId: string;
  stationId: string | null;
  officerId: string | null;
  recommendedDurationWeeks: number;
  rationale: string;
  /** 0.0 – 1.0 */
  confidence: number;
  /** True when the local fallback predictor produced the program choice. */
  degraded: boolean;
  assignmentGaps: AssignmentGap[];
  status: RecommendationStatus;
  createdAt: Date;
  startDate: Date | null;
  expectedEndDate: Date | null;
}

export type NewRecommendation = Omit<Recommendation, 'id' | 'createdAt' | 'status'>;

export interface ProgressLogEntry {
  id: string;
  inmateId: string;
  recommendationId: string;
  loggedAt: Date;
  status: ProgressStatus;
  /** 0 – 100, optional. */
  progressPercentage: number | null;
  notes: string | null;
  recordedBy: string;
}

export type NewProgressLogEntry = Omit<ProgressLogEntry, 'id' | 'loggedAt'>;

export interface MedicalReport {
  id: string;
  inmateId: string;
  officerId: string;
  reportedAt: Date;
  vitals: Record<string, FeatureValue>;
  diagnosis: string | null;
  notes: string | null;
}

export type NewMedicalReport = Omit<MedicalReport, 'id' | 'reportedAt'>;

export const NOTE_SENTIMENTS = ['positive', 'neutral', 'negative'] as const;

export type NoteSentiment = (typeof NOTE_SENTIMENTS)[number];

export interface CounselingNote {
  id: string;
  inmateId: string;
  counselorId: string;
  sessionDate: Date;
  text: string;
  /** Counselor rating, 0 – 10. */
  sessionScore: number | null;
  sentiment: NoteSentiment | null;
  summary: string;
  keyPoints: string[];
}

export type NewCounselingNote = Omit<CounselingNote, 'id' | 'sessionDate'>;

/** A resource whose load counter can be reserved or released. */
export type ResourceRef =
  | { kind: 'station'; id: string }
  | { kind: 'officer'; id: string };
