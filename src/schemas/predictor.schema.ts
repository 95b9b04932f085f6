import { z } from 'zod';
import { NOTE_SENTIMENTS, PROGRAM_CATEGORIES } from '../types/rehab.js';

// ============================================================================
// External predictor responses
// ============================================================================

export const PredictedProgramSchema = z.object({
  programType: z.enum(PROGRAM_CATEGORIES),
  programName: z.string(),
  durationWeeks: z.number().int().positive(),
  score: z.number().min(0).max(1),
  reason: z.string(),
});

export const PredictionResponseSchema = z.object({
  programs: z.array(PredictedProgramSchema).min(1, 'Prediction returned no programs'),
  explanation: z.string(),
  confidence: z.number().min(0).max(1),
});

export const NotesAnalysisResponseSchema = z.object({
  summary: z.string(),
  sentiment: z.enum(NOTE_SENTIMENTS),
  keyPoints: z.array(z.string()).default([]),
});

