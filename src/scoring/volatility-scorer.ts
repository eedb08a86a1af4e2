import { FeatureSet } from '../shared/types';
import { ComponentScorer, ScoreComputation } from './component-scorer';
import { inverseScaleScore, weightedBlend } from './normalize';

export const VOLATILITY_FEATURES = {
  atrPct: 'atr_pct',
  bbWidthPct: 'bb_width_pct',
  contractionRatio: 'contraction_ratio',
} as const;

const ATR_SCALE = 5;
const BB_WIDTH_SCALE = 10;
const MAX_CONTRACTION_RATIO = 2;

/**
 * recent ATR% / earlier ATR%: <= 0 -> 100, 2 or more -> 0, linear between.
 */
export function contractionRatioScore(ratio: number): number {
  if (ratio <= 0) return 100;
  if (ratio >= MAX_CONTRACTION_RATIO) return 0;
  return ((MAX_CONTRACTION_RATIO - ratio) / MAX_CONTRACTION_RATIO) * 100;
}

/**
 * Volatility compression: the tighter the ranges, the higher the score.
 */
export class VolatilityScorer extends ComponentScorer {
  readonly name = 'volatility' as const;
  protected readonly requiredFeatures = Object.values(VOLATILITY_FEATURES);

  protected compute(features: FeatureSet): ScoreComputation {
    const atrPct = this.read(features, VOLATILITY_FEATURES.atrPct);
    const bbWidthPct = this.read(features, VOLATILITY_FEATURES.bbWidthPct);
    const contractionRatio = this.read(features, VOLATILITY_FEATURES.contractionRatio);

    const atrComponent = inverseScaleScore(atrPct, ATR_SCALE);
    const bbComponent = inverseScaleScore(bbWidthPct, BB_WIDTH_SCALE);
    const contractionComponent = contractionRatioScore(contractionRatio);

    return {
      value: weightedBlend([
        [atrComponent, 0.3],
        [bbComponent, 0.35],
        [contractionComponent, 0.35],
      ]),
      details: {
        atr_score: atrComponent,
        bb_width_score: bbComponent,
        contraction_ratio_score: contractionComponent,
      },
    };
  }
}
