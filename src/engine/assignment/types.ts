import type { Officer, Station } from '../../types/rehab.js';

export interface ScoreBreakdown {
  specialization: number;
  /** Stations only. */
  proximity?: number;
  load: number;
  success: number;
  composite: number;
}

export interface StationMatch {
  station: Station;
  score: ScoreBreakdown;
}

export interface OfficerMatch {
  officer: Officer;
  score: ScoreBreakdown;
}

/** What the engine needs to know about an inmate to place them. */
export interface AssignmentNeeds {
  /** Specialization tags the resource should offer. */
  needs: readonly string[];
  /** Locality hint; null when the inmate's zone is unknown. */
  zone: string | null;
}
