import logger from '../shared/logger';
import { ComponentName, ComponentScore, FeatureSet } from '../shared/types';
import { NEUTRAL_SCORE, isUsable, toScore } from './normalize';

export interface ScoreComputation {
  value: number;
  details: Record<string, number>;
}

/**
 * Base for the five component scorers.
 *
 * Subclasses declare their required feature keys and implement `compute` over
 * inputs that are guaranteed finite. Missing inputs never throw: the scorer
 * reports `available: false` with the neutral score so the aggregator can drop it.
 */
export abstract class ComponentScorer {
  abstract readonly name: ComponentName;
  protected abstract readonly requiredFeatures: readonly string[];

  score(features: FeatureSet | undefined): ComponentScore {
    const source: FeatureSet = features ?? {};
    const missing = this.findMissing(source);

    if (missing.length > 0) {
      logger.debug(`[${this.constructor.name}] Unavailable, missing features: ${missing.join(', ')}`);
      return this.unavailable(missing);
    }

    const { value, details } = this.compute(source);
    return {
      name: this.name,
      value: toScore(value),
      available: true,
      missing: [],
      details,
    };
  }

  protected abstract compute(features: FeatureSet): ScoreComputation;

  protected findMissing(features: FeatureSet): string[] {
    return this.requiredFeatures.filter((key) => !isUsable(features[key]));
  }

  /**
   * Read a feature already checked by `findMissing`.
   */
  protected read(features: FeatureSet, key: string): number {
    const value = features[key];
    return isUsable(value) ? value : NEUTRAL_SCORE;
  }

  protected readOptional(features: FeatureSet, key: string): number | null {
    const value = features[key];
    return isUsable(value) ? value : null;
  }

  private unavailable(missing: string[]): ComponentScore {
    return {
      name: this.name,
      value: NEUTRAL_SCORE,
      available: false,
      missing,
      details: {},
    };
  }
}
