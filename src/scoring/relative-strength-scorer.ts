import { FeatureSet } from '../shared/types';
import { ComponentScorer, ScoreComputation } from './component-scorer';
import { clamp, linearScore, weightedBlend } from './normalize';

export const RELATIVE_STRENGTH_FEATURES = {
  ret20Pct: 'ret_20_pct',
  ret60Pct: 'ret_60_pct',
  ret120Pct: 'ret_120_pct',
} as const;

/** Optional cross-sectional percentile rank of the symbol's returns, 0..1 */
export const RELATIVE_STRENGTH_RANK_FEATURE = 'rank_pct';

const RETURN_FLOOR_PCT = -50;
const RETURN_CEILING_PCT = 150;

export class RelativeStrengthScorer extends ComponentScorer {
  readonly name = 'relative_strength' as const;
  protected readonly requiredFeatures = Object.values(RELATIVE_STRENGTH_FEATURES);

  protected compute(features: FeatureSet): ScoreComputation {
    const s20 = linearScore(this.read(features, RELATIVE_STRENGTH_FEATURES.ret20Pct), RETURN_FLOOR_PCT, RETURN_CEILING_PCT);
    const s60 = linearScore(this.read(features, RELATIVE_STRENGTH_FEATURES.ret60Pct), RETURN_FLOOR_PCT, RETURN_CEILING_PCT);
    const s120 = linearScore(this.read(features, RELATIVE_STRENGTH_FEATURES.ret120Pct), RETURN_FLOOR_PCT, RETURN_CEILING_PCT);

    const returnsScore = weightedBlend([
      [s20, 0.25],
      [s60, 0.35],
      [s120, 0.4],
    ]);

    const details: Record<string, number> = {
      ret_20_score: s20,
      ret_60_score: s60,
      ret_120_score: s120,
    };

    const rank = this.readOptional(features, RELATIVE_STRENGTH_RANK_FEATURE);
    if (rank === null) {
      return { value: returnsScore, details };
    }

    const rankScore = clamp(rank, 0, 1) * 100;
    details.rank_score = rankScore;
    return {
      value: (returnsScore + rankScore) / 2,
      details,
    };
  }
}
