import { RegimeWeightsConfig } from '../shared/config';
import { ConfigurationError } from '../shared/errors';
import { COMPONENT_NAMES, REGIME_LABELS, RegimeLabel, WeightVector } from '../shared/types';

export const WEIGHT_SUM_TOLERANCE = 1e-6;

/**
 * Per-regime component weights, validated once at construction.
 */
export class WeightTable {
  private readonly vectors: Readonly<Record<RegimeLabel, WeightVector>>;

  constructor(raw: RegimeWeightsConfig) {
    const issues: string[] = [];

    for (const regime of REGIME_LABELS) {
      const vector = raw[regime];
      if (!vector) {
        issues.push(`${regime}: missing weight vector`);
        continue;
      }

      for (const component of COMPONENT_NAMES) {
        const weight = vector[component];
        if (typeof weight !== 'number' || !Number.isFinite(weight)) {
          issues.push(`${regime}.${component}: weight is missing or not a number`);
        } else if (weight < 0 || weight > 1) {
          issues.push(`${regime}.${component}: weight ${weight} is outside [0, 1]`);
        }
      }

      const sum = COMPONENT_NAMES.reduce((acc, component) => acc + (vector[component] ?? 0), 0);
      if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
        issues.push(`${regime}: weights sum to ${sum.toFixed(6)}, expected 1`);
      }
    }

    if (issues.length > 0) {
      throw new ConfigurationError('Invalid regime weight table', issues);
    }

    this.vectors = Object.freeze({
      bull: Object.freeze({ ...raw.bull }),
      sideways: Object.freeze({ ...raw.sideways }),
      bear: Object.freeze({ ...raw.bear }),
    });
  }

  weightsFor(regime: RegimeLabel): WeightVector {
    return this.vectors[regime];
  }
}
