import { FeatureSet } from '../shared/types';
import { ComponentScorer, ScoreComputation } from './component-scorer';
import { NEUTRAL_SCORE, clamp, isUsable } from './normalize';

export const POSITIONING_FEATURES = {
  fundingRate: 'funding_rate',
  fundingZ: 'funding_z',
  openInterestPercentile: 'open_interest_percentile',
} as const;

/**
 * Positioning is contrarian: crowding in the direction of price lowers the score.
 * Flipping this to +1 would turn the component into a momentum signal.
 */
export const CONTRARIAN_DIRECTION = -1;

/** Funding per interval beyond which the crowd counts as fully one-sided */
const FUNDING_RATE_SATURATION = 0.003;
const FUNDING_Z_LIMIT = 3;
const MAX_SWING = 40;

/**
 * Scores derivatives positioning from funding and open interest.
 *
 * Funding tilt in [-1, 1] comes from the funding z-score when available,
 * otherwise from the raw rate. Open interest amplifies the tilt: the same
 * funding matters twice as much when OI sits at the top of its range.
 */
export class PositioningScorer extends ComponentScorer {
  readonly name = 'positioning' as const;
  protected readonly requiredFeatures = [POSITIONING_FEATURES.openInterestPercentile];

  protected findMissing(features: FeatureSet): string[] {
    const missing = super.findMissing(features);
    if (!isUsable(features[POSITIONING_FEATURES.fundingZ]) && !isUsable(features[POSITIONING_FEATURES.fundingRate])) {
      missing.push(POSITIONING_FEATURES.fundingRate);
    }
    return missing;
  }

  protected compute(features: FeatureSet): ScoreComputation {
    const tilt = this.fundingTilt(features);
    const oiPercentile = clamp(this.read(features, POSITIONING_FEATURES.openInterestPercentile), 0, 1);

    const crowding = tilt * (0.5 + 0.5 * oiPercentile);
    const value = NEUTRAL_SCORE + CONTRARIAN_DIRECTION * MAX_SWING * crowding;

    return {
      value,
      details: {
        funding_tilt: tilt,
        open_interest_percentile: oiPercentile,
        crowding,
      },
    };
  }

  private fundingTilt(features: FeatureSet): number {
    const fundingZ = this.readOptional(features, POSITIONING_FEATURES.fundingZ);
    if (fundingZ !== null) {
      return clamp(fundingZ, -FUNDING_Z_LIMIT, FUNDING_Z_LIMIT) / FUNDING_Z_LIMIT;
    }
    return clamp(this.read(features, POSITIONING_FEATURES.fundingRate) / FUNDING_RATE_SATURATION, -1, 1);
  }
}
