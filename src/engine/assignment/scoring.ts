// ─── Weights ─────────────────────────────────────────────────────────────────

export const WEIGHTS = {
  specialization: 0.4,
  proximity: 0.2,
  load: 0.2,
  success: 0.2,
} as const;

export const NEUTRAL_SCORE = 0.5;
export const SAME_ZONE_SCORE = 1.0;
export const OTHER_ZONE_SCORE = 0.3;

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

// ─── Sub-scores ──────────────────────────────────────────────────────────────

/**
 * Fraction of needs the candidate covers, compared case-insensitively.
 * No needs → neutral 0.5; a candidate without specializations → 0.
 */
export function specializationScore(
  specializations: readonly string[],
  needs: readonly string[]
): number {
  if (needs.length === 0) return NEUTRAL_SCORE;
  if (specializations.length === 0) return 0;

  const offered = new Set(specializations.map((s) => s.toLowerCase()));
  const matched = needs.filter((need) => offered.has(need.toLowerCase())).length;

  return matched / needs.length;
}

/** 1.0 same zone, 0.3 different zone, 0.5 when either side is unknown. */
export function proximityScore(stationZone: string | null, requestedZone: string | null): number {
  if (!stationZone || !requestedZone) return NEUTRAL_SCORE;
  return stationZone.toLowerCase() === requestedZone.toLowerCase()
    ? SAME_ZONE_SCORE
    : OTHER_ZONE_SCORE;
}

/** 1 − utilisation, clamped to [0, 1]. Zero capacity scores 0. */
export function loadScore(currentLoad: number, capacity: number): number {
  if (capacity <= 0) return 0;
  return clamp01(1 - currentLoad / capacity);
}

export function successScore(successRate: number | null): number {
  return successRate === null ? NEUTRAL_SCORE : clamp01(successRate);
}

// ─── Composites ──────────────────────────────────────────────────────────────

export function stationComposite(parts: {
  specialization: number;
  proximity: number;
  load: number;
  success: number;
}): number {
  return (
    WEIGHTS.specialization * parts.specialization +
    WEIGHTS.proximity * parts.proximity +
    WEIGHTS.load * parts.load +
    WEIGHTS.success * parts.success
  );
}

/**
 * Officers have no proximity term. The remaining weights are used as-is,
 * so an officer's composite tops out at 0.8.
 */
export function officerComposite(parts: {
  specialization: number;
  load: number;
  success: number;
}): number {
  return (
    WEIGHTS.specialization * parts.specialization +
    WEIGHTS.load * parts.load +
    WEIGHTS.success * parts.success
  );
}
