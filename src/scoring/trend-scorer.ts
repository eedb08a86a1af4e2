import { FeatureSet } from '../shared/types';
import { ComponentScorer, ScoreComputation } from './component-scorer';
import { clamp, symmetricScore, weightedBlend } from './normalize';

export const TREND_FEATURES = {
  maAlignment: 'ma_alignment',
  persistence: 'trend_persistence',
  distanceFromMaPct: 'distance_from_ma_pct',
  maSlopePct: 'ma_slope_pct',
} as const;

const MAX_DISTANCE_PCT = 10;
const MAX_SLOPE_PCT = 5;

/**
 * Trend strength from moving-average structure. Every sub-score rises with
 * bullishness, so the blend is monotonic in each input.
 *
 * - ma_alignment: -1 (short MA below long), 0, +1 (short above long)
 * - trend_persistence: share of recent closes above the MA, 0..1
 * - distance_from_ma_pct: signed % distance of price from the MA
 * - ma_slope_pct: % change of the MA over its slope lookback
 */
export class TrendScorer extends ComponentScorer {
  readonly name = 'trend' as const;
  protected readonly requiredFeatures = Object.values(TREND_FEATURES);

  protected compute(features: FeatureSet): ScoreComputation {
    const alignment = clamp(this.read(features, TREND_FEATURES.maAlignment), -1, 1);
    const persistence = clamp(this.read(features, TREND_FEATURES.persistence), 0, 1);
    const distancePct = this.read(features, TREND_FEATURES.distanceFromMaPct);
    const slopePct = this.read(features, TREND_FEATURES.maSlopePct);

    const alignmentScore = (alignment + 1) * 50;
    const persistenceScore = persistence * 100;
    const distanceScore = symmetricScore(distancePct, MAX_DISTANCE_PCT);
    const slopeScore = symmetricScore(slopePct, MAX_SLOPE_PCT);

    const value = weightedBlend([
      [alignmentScore, 0.35],
      [persistenceScore, 0.3],
      [distanceScore, 0.2],
      [slopeScore, 0.15],
    ]);

    return {
      value,
      details: {
        ma_alignment_score: alignmentScore,
        trend_persistence_score: persistenceScore,
        distance_from_ma_score: distanceScore,
        ma_slope_score: slopeScore,
      },
    };
  }
}
