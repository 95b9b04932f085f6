import { and, asc, desc, eq, gt, ne, sql } from 'drizzle-orm';
import type { Database } from '../lib/db.js';
import {
  counselingNotes,
  medicalReports,
  officers,
  programs,
  progressLogs,
  recommendations,
  rehabProfiles,
  rehabStations,
} from '../db/schema.js';
import { RecommendationStatus } from '../types/rehab.js';
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
import type { RehabStore } from './types.js';

function first<T>(rows: T[]): T | null {
  return rows[0] ?? null;
}

function single<T>(rows: T[], what: string): T {
  const row = rows[0];
  if (row === undefined) {
    throw new Error(`Insert into ${what} returned no row`);
  }
  return row;
}

/**
 * PostgreSQL-backed RehabStore. Load counters change only through
 * conditional single-statement updates, so two requests racing for the last
 * slot of a station cannot both win.
 */
export class DrizzleRehabStore implements RehabStore {
  readonly kind = 'postgres' as const;

  constructor(private readonly db: Database) {}

  // ── Profiles ──────────────────────────────────────────────────────────────

  async getProfile(inmateId: string): Promise<RehabProfile | null> {
    const rows = await this.db
      .select()
      .from(rehabProfiles)
      .where(eq(rehabProfiles.inmateId, inmateId))
      .limit(1);
    return first(rows);
  }

  async saveProfile(profile: RehabProfile): Promise<RehabProfile> {
    const rows = await this.db
      .insert(rehabProfiles)
      .values(profile)
      .onConflictDoUpdate({
        target: rehabProfiles.inmateId,
        set: {
          suitabilityGroup: profile.suitabilityGroup,
          riskScore: profile.riskScore,
          features: profile.features,
          lastUpdated: profile.lastUpdated,
        },
      })
      .returning();
    return single(rows, 'rehab_profiles');
  }

  // ── Catalog ───────────────────────────────────────────────────────────────

  async findActivePrograms(category?: ProgramCategory): Promise<Program[]> {
    return this.db
      .select()
      .from(programs)
      .where(
        and(
          eq(programs.active, true),
          category === undefined ? undefined : eq(programs.category, category)
        )
      )
      .orderBy(asc(programs.name));
  }

  async findProgramById(id: string): Promise<Program | null> {
    const rows = await this.db.select().from(programs).where(eq(programs.id, id)).limit(1);
    return first(rows);
  }

  // ── Resource pool ─────────────────────────────────────────────────────────

  async findEligibleStations(): Promise<Station[]> {
    return this.db
      .select()
      .from(rehabStations)
      .where(
        and(
          eq(rehabStations.active, true),
          sql`${rehabStations.currentLoad} < ${rehabStations.capacity}`
        )
      )
      .orderBy(asc(rehabStations.id));
  }

  async findEligibleOfficers(): Promise<Officer[]> {
    return this.db
      .select()
      .from(officers)
      .where(and(eq(officers.active, true), sql`${officers.currentLoad} < ${officers.maxCapacity}`))
      .orderBy(asc(officers.id));
  }

  async listStations(): Promise<Station[]> {
    return this.db.select().from(rehabStations).orderBy(asc(rehabStations.name));
  }

  async listOfficers(): Promise<Officer[]> {
    return this.db.select().from(officers).orderBy(asc(officers.name));
  }

  async findStationById(id: string): Promise<Station | null> {
    const rows = await this.db
      .select()
      .from(rehabStations)
      .where(eq(rehabStations.id, id))
      .limit(1);
    return first(rows);
  }

  async findOfficerById(id: string): Promise<Officer | null> {
    const rows = await this.db.select().from(officers).where(eq(officers.id, id)).limit(1);
    return first(rows);
  }

  async reserve(ref: ResourceRef): Promise<boolean> {
    if (ref.kind === 'station') {
      const rows = await this.db
        .update(rehabStations)
        .set({ currentLoad: sql`${rehabStations.currentLoad} + 1` })
        .where(
          and(
            eq(rehabStations.id, ref.id),
            eq(rehabStations.active, true),
            sql`${rehabStations.currentLoad} < ${rehabStations.capacity}`
          )
        )
        .returning({ id: rehabStations.id });
      return rows.length === 1;
    }

    const rows = await this.db
      .update(officers)
      .set({ currentLoad: sql`${officers.currentLoad} + 1` })
      .where(
        and(
          eq(officers.id, ref.id),
          eq(officers.active, true),
          sql`${officers.currentLoad} < ${officers.maxCapacity}`
        )
      )
      .returning({ id: officers.id });
    return rows.length === 1;
  }

  async release(ref: ResourceRef): Promise<boolean> {
    if (ref.kind === 'station') {
      const rows = await this.db
        .update(rehabStations)
        .set({ currentLoad: sql`${rehabStations.currentLoad} - 1` })
        .where(and(eq(rehabStations.id, ref.id), gt(rehabStations.currentLoad, 0)))
        .returning({ id: rehabStations.id });
      return rows.length === 1;
    }

    const rows = await this.db
      .update(officers)
      .set({ currentLoad: sql`${officers.currentLoad} - 1` })
      .where(and(eq(officers.id, ref.id), gt(officers.currentLoad, 0)))
      .returning({ id: officers.id });
    return rows.length === 1;
  }

  // ── Recommendations ───────────────────────────────────────────────────────

  async createRecommendation(draft: NewRecommendation): Promise<Recommendation> {
    const rows = await this.db
      .insert(recommendations)
      .values({ ...draft, status: RecommendationStatus.PENDING })
      .returning();
    return single(rows, 'recommendations');
  }

  async findRecommendationById(id: string): Promise<Recommendation | null> {
    const rows = await this.db
      .select()
      .from(recommendations)
      .where(eq(recommendations.id, id))
      .limit(1);
    return first(rows);
  }

  async findRecommendationsByInmate(inmateId: string): Promise<Recommendation[]> {
    return this.db
      .select()
      .from(recommendations)
      .where(eq(recommendations.inmateId, inmateId))
      .orderBy(desc(recommendations.createdAt), desc(recommendations.id));
  }

  async findLatestPendingRecommendation(inmateId: string): Promise<Recommendation | null> {
    const rows = await this.db
      .select()
      .from(recommendations)
      .where(
        and(
          eq(recommendations.inmateId, inmateId),
          eq(recommendations.status, RecommendationStatus.PENDING)
        )
      )
      .orderBy(desc(recommendations.createdAt))
      .limit(1);
    return first(rows);
  }

  async markRecommendationCompleted(id: string): Promise<boolean> {
    const rows = await this.db
      .update(recommendations)
      .set({ status: RecommendationStatus.COMPLETED })
      .where(
        and(
          eq(recommendations.id, id),
          ne(recommendations.status, RecommendationStatus.COMPLETED)
        )
      )
      .returning({ id: recommendations.id });
    return rows.length === 1;
  }

  // ── Progress ──────────────────────────────────────────────────────────────

  async appendProgress(entry: NewProgressLogEntry): Promise<ProgressLogEntry> {
    const rows = await this.db.insert(progressLogs).values(entry).returning();
    return single(rows, 'progress_logs');
  }

  async listProgress(recommendationId: string): Promise<ProgressLogEntry[]> {
    return this.db
      .select()
      .from(progressLogs)
      .where(eq(progressLogs.recommendationId, recommendationId))
      .orderBy(asc(progressLogs.loggedAt), asc(progressLogs.id));
  }

  // ── Clinical records ──────────────────────────────────────────────────────

  async addMedicalReport(report: NewMedicalReport): Promise<MedicalReport> {
    const rows = await this.db.insert(medicalReports).values(report).returning();
    return single(rows, 'medical_reports');
  }

  async addCounselingNote(note: NewCounselingNote): Promise<CounselingNote> {
    const rows = await this.db.insert(counselingNotes).values(note).returning();
    return single(rows, 'counseling_notes');
  }
}
