import { z } from 'zod';
import { PROGRAM_CATEGORIES, PROGRESS_STATUSES } from '../types/rehab.js';

const featureValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

// ============================================================================
// Recommendation Schemas
// ============================================================================

export const GenerateRecommendationSchema = z.object({
  inmateId: z.string().trim().min(1, 'inmateId is required').max(64),
  inmateData: z.record(featureValue).optional(),
  forceRegenerate: z.boolean().optional().default(false),
  startDate: z.coerce.date().optional(),
});

export const InmateParamsSchema = z.object({
  inmateId: z.string().trim().min(1).max(64),
});

export const IdParamsSchema = z.object({
  id: z.string().uuid('Invalid recommendation ID'),
});

// ============================================================================
// Progress Schemas
// ============================================================================

export const LogProgressSchema = z.object({
  recommendationId: z.string().uuid('Invalid recommendation ID'),
  status: z.enum(PROGRESS_STATUSES),
  progressPercentage: z.number().int().min(0).max(100).optional().nullable(),
  notes: z.string().max(4000).optional().nullable(),
  recordedBy: z.string().trim().min(1, 'recordedBy is required').max(64),
});

export const ProgressParamsSchema = z.object({
  recommendationId: z.string().uuid('Invalid recommendation ID'),
});

// ============================================================================
// Clinical Record Schemas
// ============================================================================

export const CreateMedicalReportSchema = z.object({
  inmateId: z.string().trim().min(1).max(64),
  officerId: z.string().trim().min(1).max(64),
  vitals: z.record(featureValue).optional().default({}),
  diagnosis: z.string().max(1000).optional().nullable(),
  notes: z.string().max(4000).optional().nullable(),
});

export type CreateMedicalReportInput = z.infer<typeof CreateMedicalReportSchema>;

export const CreateCounselingNoteSchema = z.object({
  inmateId: z.string().trim().min(1).max(64),
  counselorId: z.string().trim().min(1).max(64),
  text: z.string().min(1, 'Note text is required').max(10_000),
  sessionScore: z.number().min(0).max(10).optional().nullable(),
});

export type CreateCounselingNoteInput = z.infer<typeof CreateCounselingNoteSchema>;

// ============================================================================
// Catalog Schemas
// ============================================================================

export const ProgramFiltersSchema = z.object({
  category: z.enum(PROGRAM_CATEGORIES).optional(),
});

