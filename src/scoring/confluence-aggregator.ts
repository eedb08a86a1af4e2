import logger from '../shared/logger';
import { COMPONENT_NAMES, ComponentName, ComponentScores, ConfluenceResult, Regime } from '../shared/types';
import { NEUTRAL_SCORE, clamp } from './normalize';
import { WeightTable } from './weight-table';

export const MIN_COMPONENTS_FOR_CONFIDENCE = 2;

/**
 * Regime-weighted combination of the five component scores.
 *
 * Unavailable components are dropped and the remaining weights re-normalized,
 * so partial data still yields a best-effort score. Confidence is the share of
 * the regime's weight that was actually backed by data, scaled by how clearly
 * the regime itself was identified.
 */
export class ConfluenceAggregator {
  private readonly weightTable: WeightTable;

  constructor(weightTable: WeightTable) {
    this.weightTable = weightTable;
  }

  aggregate(scores: ComponentScores, regime: Regime): ConfluenceResult {
    const weights = this.weightTable.weightsFor(regime.label);
    const available = COMPONENT_NAMES.filter((name) => scores[name].available);

    if (available.length === 0) {
      return {
        confluence: NEUTRAL_SCORE,
        confidence: 0,
        lowConfidence: true,
        effectiveWeights: {},
        availableComponents: [],
      };
    }

    const availableWeight = available.reduce((acc, name) => acc + weights[name], 0);
    const effectiveWeights: Partial<Record<ComponentName, number>> = {};
    let confluence: number;

    if (availableWeight > 0) {
      confluence = 0;
      for (const name of available) {
        const w = weights[name] / availableWeight;
        effectiveWeights[name] = w;
        confluence += w * scores[name].value;
      }
    } else {
      // Only zero-weighted components have data; fall back to an even split
      const even = 1 / available.length;
      confluence = 0;
      for (const name of available) {
        effectiveWeights[name] = even;
        confluence += even * scores[name].value;
      }
    }

    const lowConfidence = available.length < MIN_COMPONENTS_FOR_CONFIDENCE;
    if (lowConfidence) {
      logger.debug(`[ConfluenceAggregator] Only ${available.length} component(s) available; score is best-effort`);
    }

    return {
      confluence: clamp(confluence),
      confidence: clamp(availableWeight * regime.confidence, 0, 1),
      lowConfidence,
      effectiveWeights,
      availableComponents: available,
    };
  }
}
