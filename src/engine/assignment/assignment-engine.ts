import type { Officer, Station } from '../../types/rehab.js';
import type { OfficerMatch, StationMatch } from './types.js';
import {
  loadScore,
  officerComposite,
  proximityScore,
  specializationScore,
  stationComposite,
  successScore,
} from './scoring.js';

// ─── Eligibility ─────────────────────────────────────────────────────────────

export function isStationEligible(station: Station): boolean {
  return station.active && station.capacity > 0 && station.currentLoad < station.capacity;
}

export function isOfficerEligible(officer: Officer): boolean {
  return officer.active && officer.maxCapacity > 0 && officer.currentLoad < officer.maxCapacity;
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

export function scoreStation(
  station: Station,
  needs: readonly string[],
  zone: string | null
): StationMatch {
  const specialization = specializationScore(station.specializations, needs);
  const proximity = proximityScore(station.zone, zone);
  const load = loadScore(station.currentLoad, station.capacity);
  const success = successScore(station.successRate);

  return {
    station,
    score: {
      specialization,
      proximity,
      load,
      success,
      composite: stationComposite({ specialization, proximity, load, success }),
    },
  };
}

export function scoreOfficer(officer: Officer, needs: readonly string[]): OfficerMatch {
  const specialization = specializationScore(officer.specializations, needs);
  const load = loadScore(officer.currentLoad, officer.maxCapacity);
  const success = successScore(officer.successRate);

  return {
    officer,
    score: {
      specialization,
      load,
      success,
      composite: officerComposite({ specialization, load, success }),
    },
  };
}

/** Highest composite wins; on a tie the earlier candidate is kept. */
function pickBest<T extends { score: { composite: number } }>(matches: T[]): T | null {
  let best: T | null = null;
  for (const match of matches) {
    if (best === null || match.score.composite > best.score.composite) {
      best = match;
    }
  }
  return best;
}

// ─── Selection ───────────────────────────────────────────────────────────────

/**
 * Pick the best station for the given needs and zone.
 * Returns null when no station is eligible; that is a normal outcome.
 */
export function selectStation(
  stations: readonly Station[],
  needs: readonly string[],
  zone: string | null
): StationMatch | null {
  const candidates = stations.filter(isStationEligible);
  if (candidates.length === 0) {
    console.warn('[assignment] No eligible stations');
    return null;
  }

  return pickBest(candidates.map((station) => scoreStation(station, needs, zone)));
}

/**
 * Pick the best officer. When a station has been chosen only officers pinned
 * to it are considered; an empty filtered pool is a miss, not a reason to
 * widen the search.
 */
export function selectOfficer(
  officers: readonly Officer[],
  needs: readonly string[],
  stationId: string | null
): OfficerMatch | null {
  let candidates = officers.filter(isOfficerEligible);
  if (candidates.length === 0) {
    console.warn('[assignment] No eligible officers');
    return null;
  }

  if (stationId !== null) {
    candidates = candidates.filter((officer) => officer.assignedStationId === stationId);
    if (candidates.length === 0) {
      console.warn(`[assignment] No eligible officers at station ${stationId}`);
      return null;
    }
  }

  return pickBest(candidates.map((officer) => scoreOfficer(officer, needs)));
}
