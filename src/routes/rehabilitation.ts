import { FastifyInstance } from 'fastify';
import {
  CreateCounselingNoteSchema,
  CreateMedicalReportSchema,
  GenerateRecommendationSchema,
  IdParamsSchema,
  InmateParamsSchema,
  LogProgressSchema,
  ProgramFiltersSchema,
  ProgressParamsSchema,
} from '../schemas/rehabilitation.schema.js';
import {
  recommendationService,
  toRecommendationResponse,
} from '../services/recommendation.service.js';
import { progressService } from '../services/progress.service.js';
import { profileService } from '../services/profile.service.js';
import { catalogService } from '../services/catalog.service.js';

const PREFIX = '/api/rehabilitation';

export async function rehabilitationRoutes(fastify: FastifyInstance): Promise<void> {
  // ============================================================================
  // Recommendations
  // ============================================================================

  // POST /api/rehabilitation/recommend - Generate (or reuse) a recommendation
  fastify.post<{ Body: unknown }>(`${PREFIX}/recommend`, async (request, reply) => {
    const data = GenerateRecommendationSchema.parse(request.body);
    const result = await recommendationService.generate({
      inmateId: data.inmateId,
      overrideFeatures: data.inmateData,
      forceRegenerate: data.forceRegenerate,
      startDate: data.startDate,
    });

    // Nothing new is created when a pending recommendation is reused
    return reply.status(result.reused ? 200 : 201).send({
      ...toRecommendationResponse(result),
      reused: result.reused,
      degradedReason: result.degradedReason,
      warnings: result.warnings,
    });
  });

  // GET /api/rehabilitation/recommendations/:inmateId - Recommendations for an inmate
  fastify.get<{ Params: { inmateId: string } }>(
    `${PREFIX}/recommendations/:inmateId`,
    async (request) => {
      const { inmateId } = InmateParamsSchema.parse(request.params);
      const recommendations = await recommendationService.listForInmate(inmateId);
      return recommendations.map(toRecommendationResponse);
    }
  );

  // GET /api/rehabilitation/recommendation/:id - One recommendation
  fastify.get<{ Params: { id: string } }>(
    `${PREFIX}/recommendation/:id`,
    async (request) => {
      const { id } = IdParamsSchema.parse(request.params);
      return toRecommendationResponse(await recommendationService.getById(id));
    }
  );

  // ============================================================================
  // Progress
  // ============================================================================

  // POST /api/rehabilitation/progress - Append a progress entry
  fastify.post<{ Body: unknown }>(`${PREFIX}/progress`, async (request, reply) => {
    const data = LogProgressSchema.parse(request.body);
    const { entry, completed } = await progressService.logProgress(data);
    return reply.status(201).send({ ...entry, recommendationCompleted: completed });
  });

  // GET /api/rehabilitation/progress/:recommendationId - Progress history
  fastify.get<{ Params: { recommendationId: string } }>(
    `${PREFIX}/progress/:recommendationId`,
    async (request) => {
      const { recommendationId } = ProgressParamsSchema.parse(request.params);
      return progressService.getHistory(recommendationId);
    }
  );

  // ============================================================================
  // Profiles and clinical records
  // ============================================================================

  // GET /api/rehabilitation/profile/:inmateId - Rehabilitation profile
  fastify.get<{ Params: { inmateId: string } }>(
    `${PREFIX}/profile/:inmateId`,
    async (request) => {
      const { inmateId } = InmateParamsSchema.parse(request.params);
      return profileService.getProfile(inmateId);
    }
  );

  // POST /api/rehabilitation/medical-report - Record a medical report
  fastify.post<{ Body: unknown }>(`${PREFIX}/medical-report`, async (request, reply) => {
    const data = CreateMedicalReportSchema.parse(request.body);
    const report = await profileService.addMedicalReport(data);
    return reply.status(201).send(report);
  });

  // POST /api/rehabilitation/counseling-note - Record and analyse a counseling note
  fastify.post<{ Body: unknown }>(`${PREFIX}/counseling-note`, async (request, reply) => {
    const data = CreateCounselingNoteSchema.parse(request.body);
    const note = await profileService.addCounselingNote(data);
    return reply.status(201).send(note);
  });

  // ============================================================================
  // Catalog and resource pool
  // ============================================================================

  // GET /api/rehabilitation/programs - Active programs
  fastify.get<{ Querystring: Record<string, unknown> }>(
    `${PREFIX}/programs`,
    async (request) => {
      const filters = ProgramFiltersSchema.parse(request.query);
      return catalogService.listPrograms(filters.category);
    }
  );

  // GET /api/rehabilitation/stations
  fastify.get(`${PREFIX}/stations`, async () => catalogService.listStations());

  // GET /api/rehabilitation/officers
  fastify.get(`${PREFIX}/officers`, async () => catalogService.listOfficers());
}
