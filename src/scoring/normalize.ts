// Normalization helpers shared by the component scorers

export const NEUTRAL_SCORE = 50;

export function clamp(value: number, lo: number = 0, hi: number = 100): number {
  return Math.max(lo, Math.min(hi, value));
}

/**
 * Clamp to [0, 100]; non-finite input collapses to the neutral score.
 */
export function toScore(value: number): number {
  if (!Number.isFinite(value)) return NEUTRAL_SCORE;
  return clamp(value, 0, 100);
}

export function isUsable(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Linearly map [lo, hi] onto [0, 100], clipping outside the range.
 */
export function linearScore(value: number, lo: number, hi: number): number {
  if (hi === lo) return NEUTRAL_SCORE;
  return clamp(((value - lo) / (hi - lo)) * 100);
}

/**
 * Symmetric range mapping: -maxAbs -> 0, 0 -> 50, +maxAbs -> 100.
 */
export function symmetricScore(value: number, maxAbs: number): number {
  return linearScore(clamp(value, -maxAbs, maxAbs), -maxAbs, maxAbs);
}

/**
 * Higher input, lower score: 100 / (1 + x / scale). Negative input counts as zero.
 */
export function inverseScaleScore(value: number, scale: number): number {
  const x = Math.max(0, value);
  return clamp(100 / (1 + x / scale));
}

export function weightedBlend(parts: ReadonlyArray<readonly [score: number, weight: number]>): number {
  let total = 0;
  let weightSum = 0;
  for (const [score, weight] of parts) {
    total += score * weight;
    weightSum += weight;
  }
  return weightSum > 0 ? total / weightSum : NEUTRAL_SCORE;
}
