import { ProgramCategory } from '../../types/rehab.js';
import type { PredictedProgram, Prediction } from './types.js';

export const FALLBACK_CONFIDENCE = 0.6;
export const FALLBACK_EXPLANATION = 'Rule-based recommendation (prediction service unavailable)';

/**
 * Keyword rule on the suitability group. Total: every input, including an
 * empty string, maps to exactly one program.
 */
export function fallbackPrediction(suitabilityGroup: string): Prediction {
  const group = suitabilityGroup.toLowerCase();
  let program: PredictedProgram;

  if (group.includes('substance')) {
    program = {
      programType: ProgramCategory.SUBSTANCE_ABUSE,
      programName: 'Drug Rehabilitation Program',
      durationWeeks: 12,
      score: 0.7,
      reason: 'Recommended based on substance abuse history',
    };
  } else if (group.includes('mental')) {
    program = {
      programType: ProgramCategory.MENTAL_HEALTH,
      programName: 'Mental Health Support Program',
      durationWeeks: 8,
      score: 0.7,
      reason: 'Recommended based on mental health assessment',
    };
  } else {
    program = {
      programType: ProgramCategory.VOCATIONAL,
      programName: 'Vocational Training',
      durationWeeks: 16,
      score: 0.6,
      reason: 'Default vocational training recommendation',
    };
  }

  return {
    programs: [program],
    explanation: FALLBACK_EXPLANATION,
    confidence: FALLBACK_CONFIDENCE,
  };
}

/** Highest score first; equal scores keep the predictor's order. */
export function topRankedProgram(prediction: Prediction): PredictedProgram | null {
  let top: PredictedProgram | null = null;
  for (const program of prediction.programs) {
    if (top === null || program.score > top.score) {
      top = program;
    }
  }
  return top;
}
