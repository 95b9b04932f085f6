import type { ProfileFeatures, ProgramCategory } from '../../types/rehab.js';

export interface PredictionRequest {
  inmateId: string;
  profileFeatures: ProfileFeatures;
  suitabilityGroup: string;
  riskScore: number;
}

export interface PredictedProgram {
  programType: ProgramCategory;
  programName: string;
  durationWeeks: number;
  /** 0.0 – 1.0 */
  score: number;
  reason: string;
}

export interface Prediction {
  programs: PredictedProgram[];
  explanation: string;
  confidence: number;
}

/**
 * Result of asking for a program prediction. The degraded variant still
 * carries a usable prediction, produced locally.
 */
export type PredictionOutcome =
  | { kind: 'predicted'; prediction: Prediction }
  | { kind: 'degraded'; reason: string; prediction: Prediction };
