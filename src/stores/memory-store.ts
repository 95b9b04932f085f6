import { randomUUID } from 'crypto';
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

export interface MemoryStoreSeed {
  programs?: Program[];
  stations?: Station[];
  officers?: Officer[];
  profiles?: RehabProfile[];
}

const copy = <T>(value: T): T => structuredClone(value);

/**
 * Process-local RehabStore. Every read-modify-write runs without an await
 * between the check and the write, so it is atomic on the event loop and
 * concurrent requests cannot overshoot a capacity counter.
 */
export class InMemoryRehabStore implements RehabStore {
  readonly kind = 'memory' as const;

  private readonly profiles = new Map<string, RehabProfile>();
  private readonly programs = new Map<string, Program>();
  private readonly stations = new Map<string, Station>();
  private readonly officers = new Map<string, Officer>();
  private readonly recommendations = new Map<string, Recommendation>();
  private readonly progress: ProgressLogEntry[] = [];
  private readonly medicalReports: MedicalReport[] = [];
  private readonly counselingNotes: CounselingNote[] = [];

  constructor(seed: MemoryStoreSeed = {}) {
    for (const program of seed.programs ?? []) this.programs.set(program.id, copy(program));
    for (const station of seed.stations ?? []) this.stations.set(station.id, copy(station));
    for (const officer of seed.officers ?? []) this.officers.set(officer.id, copy(officer));
    for (const profile of seed.profiles ?? []) this.profiles.set(profile.inmateId, copy(profile));
  }

  // ── Profiles ──────────────────────────────────────────────────────────────

  async getProfile(inmateId: string): Promise<RehabProfile | null> {
    const profile = this.profiles.get(inmateId);
    return profile ? copy(profile) : null;
  }

  async saveProfile(profile: RehabProfile): Promise<RehabProfile> {
    this.profiles.set(profile.inmateId, copy(profile));
    return copy(profile);
  }

  // ── Catalog ───────────────────────────────────────────────────────────────

  async findActivePrograms(category?: ProgramCategory): Promise<Program[]> {
    return [...this.programs.values()]
      .filter((p) => p.active && (category === undefined || p.category === category))
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(copy);
  }

  async findProgramById(id: string): Promise<Program | null> {
    const program = this.programs.get(id);
    return program ? copy(program) : null;
  }

  // ── Resource pool ─────────────────────────────────────────────────────────

  async findEligibleStations(): Promise<Station[]> {
    return [...this.stations.values()]
      .filter((s) => s.active && s.currentLoad < s.capacity)
      .map(copy);
  }

  async findEligibleOfficers(): Promise<Officer[]> {
    return [...this.officers.values()]
      .filter((o) => o.active && o.currentLoad < o.maxCapacity)
      .map(copy);
  }

  async listStations(): Promise<Station[]> {
    return [...this.stations.values()].map(copy);
  }

  async listOfficers(): Promise<Officer[]> {
    return [...this.officers.values()].map(copy);
  }

  async findStationById(id: string): Promise<Station | null> {
    const station = this.stations.get(id);
    return station ? copy(station) : null;
  }

  async findOfficerById(id: string): Promise<Officer | null> {
    const officer = this.officers.get(id);
    return officer ? copy(officer) : null;
  }

  async reserve(ref: ResourceRef): Promise<boolean> {
    if (ref.kind === 'station') {
      const station = this.stations.get(ref.id);
      if (!station || !station.active || station.currentLoad >= station.capacity) return false;
      station.currentLoad += 1;
      return true;
    }

    const officer = this.officers.get(ref.id);
    if (!officer || !officer.active || officer.currentLoad >= officer.maxCapacity) return false;
    officer.currentLoad += 1;
    return true;
  }

  async release(ref: ResourceRef): Promise<boolean> {
    const resource = ref.kind === 'station' ? this.stations.get(ref.id) : this.officers.get(ref.id);
    if (!resource || resource.currentLoad <= 0) return false;
    resource.currentLoad -= 1;
    return true;
  }

  // ── Recommendations ───────────────────────────────────────────────────────

  async createRecommendation(draft: NewRecommendation): Promise<Recommendation> {
    const recommendation: Recommendation = {
      ...copy(draft),
      id: randomUUID(),
      status: RecommendationStatus.PENDING,
      createdAt: new Date(),
    };
    this.recommendations.set(recommendation.id, recommendation);
    return copy(recommendation);
  }

  async findRecommendationById(id: string): Promise<Recommendation | null> {
    const recommendation = this.recommendations.get(id);
    return recommendation ? copy(recommendation) : null;
  }

  async findRecommendationsByInmate(inmateId: string): Promise<Recommendation[]> {
    // Map iteration is insertion order; reverse it for newest first
    return [...this.recommendations.values()]
      .filter((r) => r.inmateId === inmateId)
      .reverse()
      .map(copy);
  }

  async findLatestPendingRecommendation(inmateId: string): Promise<Recommendation | null> {
    const pending = (await this.findRecommendationsByInmate(inmateId)).find(
      (r) => r.status === RecommendationStatus.PENDING
    );
    return pending ?? null;
  }

  async markRecommendationCompleted(id: string): Promise<boolean> {
    const recommendation = this.recommendations.get(id);
    if (!recommendation || recommendation.status === RecommendationStatus.COMPLETED) return false;
    recommendation.status = RecommendationStatus.COMPLETED;
    return true;
  }

  // ── Progress ──────────────────────────────────────────────────────────────

  async appendProgress(entry: NewProgressLogEntry): Promise<ProgressLogEntry> {
    const logged: ProgressLogEntry = { ...copy(entry), id: randomUUID(), loggedAt: new Date() };
    this.progress.push(logged);
    return copy(logged);
  }

  async listProgress(recommendationId: string): Promise<ProgressLogEntry[]> {
    return this.progress.filter((e) => e.recommendationId === recommendationId).map(copy);
  }

  // ── Clinical records ──────────────────────────────────────────────────────

  async addMedicalReport(report: NewMedicalReport): Promise<MedicalReport> {
    const stored: MedicalReport = { ...copy(report), id: randomUUID(), reportedAt: new Date() };
    this.medicalReports.push(stored);
    return copy(stored);
  }

  async addCounselingNote(note: NewCounselingNote): Promise<CounselingNote> {
    const stored: CounselingNote = { ...copy(note), id: randomUUID(), sessionDate: new Date() };
    this.counselingNotes.push(stored);
    return copy(stored);
  }
}
