export {
  fallbackPrediction,
  topRankedProgram,
  FALLBACK_CONFIDENCE,
  FALLBACK_EXPLANATION,
} from './fallback-predictor.js';
export type {
  PredictionRequest,
  PredictedProgram,
  Prediction,
  PredictionOutcome,
} from './types.js';
