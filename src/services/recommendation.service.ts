import {
  NoSuitableProgramError,
  ProfileNotFoundError,
  RecommendationNotFoundError,
  ValidationError,
} from '../lib/errors.js';
import { selectOfficer, selectStation } from '../engine/assignment/index.js';
import type { AssignmentNeeds } from '../engine/assignment/index.js';
import { topRankedProgram } from '../engine/prediction/index.js';
import { EVENT_TOPICS } from '../jobs/queue.js';
import type {
  AssignmentGap,
  Officer,
  ProfileFeatures,
  Program,
  Recommendation,
  RehabProfile,
  ResourceRef,
  Station,
} from '../types/rehab.js';
import { ContextualService } from './service-context.js';

export const DEFAULT_SUITABILITY_GROUP = 'general';
export const DEFAULT_RISK_SCORE = 0.5;
/** Locality sentinel for inmates without a zone; it prefers no station. */
export const GENERAL_ZONE = 'general';
/** How many lost reservation races to tolerate per resource kind. */
export const MAX_RESERVATION_ATTEMPTS = 5;

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

export interface GenerateRecommendationOptions {
  inmateId: string;
  /** Merged over the stored profile features for this call only. */
  overrideFeatures?: ProfileFeatures;
  forceRegenerate?: boolean;
  startDate?: Date;
}

export interface RecommendationDetails {
  recommendation: Recommendation;
  /** Null only when the catalog entry has since been removed. */
  program: Program | null;
  station: Station | null;
  officer: Officer | null;
}

export interface GeneratedRecommendation extends RecommendationDetails {
  /** True when an existing PENDING recommendation was returned as-is. */
  reused: boolean;
  /** Why the rule-based fallback was used, when it was. */
  degradedReason: string | null;
  warnings: string[];
}

export interface RecommendationResponse {
  recommendationId: string;
  inmateId: string;
  program: Program | null;
  station: Station | null;
  officer: Officer | null;
  durationWeeks: number;
  explanation: string;
  confidence: number;
  status: Recommendation['status'];
  degraded: boolean;
  assignmentGaps: AssignmentGap[];
  createdAt: Date;
  startDate: Date | null;
  expectedEndDate: Date | null;
}

/**
 * Specialization needs and locality hint for an inmate. The suitability
 * group is the single need; the zone comes from the `zone` feature.
 */
export function deriveAssignmentNeeds(
  profile: RehabProfile,
  features: ProfileFeatures
): AssignmentNeeds {
  const group = profile.suitabilityGroup.trim().toLowerCase() || DEFAULT_SUITABILITY_GROUP;

  const rawZone = features.zone;
  const zone = rawZone === null || rawZone === undefined ? '' : String(rawZone).trim();

  return {
    needs: [group],
    zone: zone === '' || zone.toLowerCase() === GENERAL_ZONE ? null : zone,
  };
}

export function toRecommendationResponse(details: RecommendationDetails): RecommendationResponse {
  const { recommendation } = details;
  return {
    recommendationId: recommendation.id,
    inmateId: recommendation.inmateId,
    program: details.program,
    station: details.station,
    officer: details.officer,
    durationWeeks: recommendation.recommendedDurationWeeks,
    explanation: recommendation.rationale,
    confidence: recommendation.confidence,
    status: recommendation.status,
    degraded: recommendation.degraded,
    assignmentGaps: recommendation.assignmentGaps,
    createdAt: recommendation.createdAt,
    startDate: recommendation.startDate,
    expectedEndDate: recommendation.expectedEndDate,
  };
}

export class RecommendationService extends ContextualService {
  /**
   * Produce a recommendation for an inmate: profile, prediction (or the
   * rule-based fallback), catalog lookup, station/officer reservation.
   *
   * Only a missing catalog program, or a missing profile when profiles may
   * not be auto-created, fails the call.
   */
  async generate(options: GenerateRecommendationOptions): Promise<GeneratedRecommendation> {
    const { store, predictor, events } = this.context;
    const inmateId = options.inmateId.trim();
    if (inmateId === '') {
      throw new ValidationError('inmateId is required');
    }

    if (!options.forceRegenerate) {
      const existing = await store.findLatestPendingRecommendation(inmateId);
      if (existing) {
        console.info(
          `[recommendation] Reusing pending recommendation ${existing.id} for inmate ${inmateId}`
        );
        const details = await this.hydrate(existing);
        return { ...details, reused: true, degradedReason: null, warnings: [] };
      }
    }

    console.info(`[recommendation] Generating recommendation for inmate ${inmateId}`);

    const profile = await this.getOrCreateProfile(inmateId, options.overrideFeatures);
    const features: ProfileFeatures = { ...profile.features, ...options.overrideFeatures };

    const outcome = await predictor.predict({
      inmateId,
      profileFeatures: features,
      suitabilityGroup: profile.suitabilityGroup,
      riskScore: profile.riskScore,
    });
    const degradedReason = outcome.kind === 'degraded' ? outcome.reason : null;
    if (degradedReason !== null) {
      console.warn(
        `[recommendation] Degraded mode for inmate ${inmateId}: ${degradedReason}`
      );
    }

    const top = topRankedProgram(outcome.prediction);
    if (!top) {
      throw new NoSuitableProgramError('none');
    }

    const [program] = await store.findActivePrograms(top.programType);
    if (!program) {
      throw new NoSuitableProgramError(top.programType);
    }

    const { needs, zone } = deriveAssignmentNeeds(profile, features);
    const startDate = options.startDate ?? null;
    const expectedEndDate = startDate
      ? new Date(startDate.getTime() + top.durationWeeks * WEEK_MS)
      : null;

    // Anything reserved from here on is released if a later step fails
    let station: Station | null = null;
    let officer: Officer | null = null;
    let recommendation: Recommendation;
    let assignmentGaps: AssignmentGap[];
    try {
      station = await this.reserveBest(
        'station',
        () => store.findEligibleStations(),
        (pool) => selectStation(pool, needs, zone)?.station ?? null
      );
      const stationId = station?.id ?? null;
      officer = await this.reserveBest(
        'officer',
        () => store.findEligibleOfficers(),
        (pool) => selectOfficer(pool, needs, stationId)?.officer ?? null
      );

      assignmentGaps = [];
      if (!station) assignmentGaps.push('station');
      if (!officer) assignmentGaps.push('officer');

      recommendation = await store.createRecommendation({
        inmateId,
        programId: program.id,
        stationId,
        officerId: officer?.id ?? null,
        recommendedDurationWeeks: top.durationWeeks,
        rationale: outcome.prediction.explanation,
        confidence: outcome.prediction.confidence,
        degraded: outcome.kind === 'degraded',
        assignmentGaps,
        startDate,
        expectedEndDate,
      });
    } catch (error) {
      await this.releaseReservations(station, officer);
      throw error;
    }

    const warnings = assignmentGaps.map((gap) => `No ${gap} could be assigned`);
    if (assignmentGaps.length > 0) {
      console.warn(
        `[recommendation] Assignment gap for inmate ${inmateId}: ${assignmentGaps.join(', ')}`
      );
    }

    await events.publish(EVENT_TOPICS.RECOMMENDATION_CREATED, {
      recommendationId: recommendation.id,
      inmateId,
      programId: program.id,
      stationId: recommendation.stationId,
      officerId: recommendation.officerId,
      degraded: recommendation.degraded,
    });

    return { recommendation, program, station, officer, reused: false, degradedReason, warnings };
  }

  async getById(id: string): Promise<RecommendationDetails> {
    const recommendation = await this.context.store.findRecommendationById(id);
    if (!recommendation) {
      throw new RecommendationNotFoundError(id);
    }
    return this.hydrate(recommendation);
  }

  /** All recommendations for an inmate, newest first. */
  async listForInmate(inmateId: string): Promise<RecommendationDetails[]> {
    const recommendations = await this.context.store.findRecommendationsByInmate(inmateId);
    return Promise.all(recommendations.map((r) => this.hydrate(r)));
  }

  // ── Helpers ───────────────────────────────────────────────────────────────

  private async getOrCreateProfile(
    inmateId: string,
    initialFeatures?: ProfileFeatures
  ): Promise<RehabProfile> {
    const { store, autoCreateProfiles } = this.context;

    const existing = await store.getProfile(inmateId);
    if (existing) {
      return existing;
    }
    if (!autoCreateProfiles) {
      throw new ProfileNotFoundError(inmateId);
    }

    try {
      const profile = await store.saveProfile({
        inmateId,
        suitabilityGroup: DEFAULT_SUITABILITY_GROUP,
        riskScore: DEFAULT_RISK_SCORE,
        features: { ...initialFeatures },
        lastUpdated: new Date(),
      });
      console.info(`[recommendation] Created initial profile for inmate ${inmateId}`);
      return profile;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[recommendation] Could not create profile for inmate ${inmateId}: ${message}`);
      throw new ProfileNotFoundError(inmateId);
    }
  }

  /**
   * Select from a fresh snapshot, then reserve. A lost race excludes the
   * candidate and selects again from a re-read pool.
   */
  private async reserveBest<T extends { id: string; currentLoad: number }>(
    kind: ResourceRef['kind'],
    loadPool: () => Promise<T[]>,
    select: (pool: T[]) => T | null
  ): Promise<T | null> {
    const lost = new Set<string>();

    for (let attempt = 1; attempt <= MAX_RESERVATION_ATTEMPTS; attempt++) {
      const pool = (await loadPool()).filter((candidate) => !lost.has(candidate.id));
      const candidate = select(pool);
      if (!candidate) {
        return null;
      }

      if (await this.context.store.reserve({ kind, id: candidate.id })) {
        return { ...candidate, currentLoad: candidate.currentLoad + 1 };
      }

      lost.add(candidate.id);
      console.warn(
        `[recommendation] ${kind} ${candidate.id} filled up before it could be reserved ` +
          `(attempt ${attempt}/${MAX_RESERVATION_ATTEMPTS}); re-selecting`
      );
    }

    return null;
  }

  /** Best effort: a failed release is logged so it cannot mask the original error. */
  private async releaseReservations(station: Station | null, officer: Officer | null) {
    const held: ResourceRef[] = [];
    if (station) held.push({ kind: 'station', id: station.id });
    if (officer) held.push({ kind: 'officer', id: officer.id });

    for (const ref of held) {
      try {
        await this.context.store.release(ref);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[recommendation] Could not release ${ref.kind} ${ref.id}: ${message}`);
      }
    }
  }

  private async hydrate(recommendation: Recommendation): Promise<RecommendationDetails> {
    const { store } = this.context;
    const [program, station, officer] = await Promise.all([
      store.findProgramById(recommendation.programId),
      recommendation.stationId ? store.findStationById(recommendation.stationId) : null,
      recommendation.officerId ? store.findOfficerById(recommendation.officerId) : null,
    ]);
    return { recommendation, program, station, officer };
  }
}

export const recommendationService = new RecommendationService();
