import { FeatureSet } from '../shared/types';
import { ComponentScorer, ScoreComputation } from './component-scorer';
import { clamp, symmetricScore, weightedBlend } from './normalize';

export const VOLUME_FEATURES = {
  rvol: 'rvol',
  trendSlopePct: 'volume_trend_slope_pct',
  percentile: 'volume_percentile',
} as const;

const RVOL_IDEAL_LOW = 1.5;
const RVOL_IDEAL_HIGH = 3;
const RVOL_TAPER_SPAN = 4;
const MAX_VOLUME_SLOPE_PCT = 20;

/**
 * Relative volume curve tuned for breakout setups: thin interest scores low,
 * 1.5x-3x is the sweet spot, and blow-off volume tapers back toward 70.
 */
export function rvolScore(rvol: number): number {
  if (rvol <= 0) return 0;
  if (rvol < 1) return clamp(rvol * 60, 0, 60);
  if (rvol < RVOL_IDEAL_LOW) {
    return 60 + ((rvol - 1) / (RVOL_IDEAL_LOW - 1)) * 20;
  }
  if (rvol <= RVOL_IDEAL_HIGH) {
    return 80 + ((rvol - RVOL_IDEAL_LOW) / (RVOL_IDEAL_HIGH - RVOL_IDEAL_LOW)) * 20;
  }
  const extra = rvol - RVOL_IDEAL_HIGH;
  if (extra >= RVOL_TAPER_SPAN) return 70;
  return 100 - (extra / RVOL_TAPER_SPAN) * 30;
}

export class VolumeScorer extends ComponentScorer {
  readonly name = 'volume' as const;
  protected readonly requiredFeatures = Object.values(VOLUME_FEATURES);

  protected compute(features: FeatureSet): ScoreComputation {
    const rvol = this.read(features, VOLUME_FEATURES.rvol);
    const slopePct = this.read(features, VOLUME_FEATURES.trendSlopePct);
    const percentile = clamp(this.read(features, VOLUME_FEATURES.percentile), 0, 1);

    const rvolComponent = rvolScore(rvol);
    const slopeComponent = symmetricScore(slopePct, MAX_VOLUME_SLOPE_PCT);
    const percentileComponent = percentile * 100;

    return {
      value: weightedBlend([
        [rvolComponent, 0.45],
        [slopeComponent, 0.25],
        [percentileComponent, 0.3],
      ]),
      details: {
        rvol_score: rvolComponent,
        volume_trend_slope_score: slopeComponent,
        volume_percentile_score: percentileComponent,
      },
    };
  }
}
