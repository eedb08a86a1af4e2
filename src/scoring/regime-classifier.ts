import { RegimeClassifierConfig } from '../shared/config';
import { MarketHealth, Regime, RegimeLabel } from '../shared/types';
import { NEUTRAL_SCORE, clamp, isUsable } from './normalize';

/**
 * Maps a market-health summary to bull / sideways / bear using fixed bands on a
 * composite 0-100 index.
 *
 *   0 ........ bearMax ........ bullMin ........ 100
 *      bear        sideways          bull
 *
 * Confidence is the distance from the nearest band edge, divided by the
 * largest distance possible inside that band. Stateless: hysteresis belongs to
 * whoever keeps run-to-run state.
 */
export class RegimeClassifier {
  private readonly config: RegimeClassifierConfig;

  constructor(config: RegimeClassifierConfig) {
    this.config = config;
  }

  classify(health: MarketHealth): Regime {
    const index = this.compositeIndex(health);
    const label = this.labelFor(index);
    return {
      label,
      confidence: this.confidenceFor(label, index),
      index,
    };
  }

  compositeIndex(health: MarketHealth): number {
    if (isUsable(health.riskOn)) {
      return clamp(health.riskOn);
    }

    const weights = this.config.indexWeights;
    const parts: Array<[number | null | undefined, number]> = [
      [health.benchmarkTrend, weights.trend],
      [health.breadth, weights.breadth],
      [health.volatilityComfort, weights.volatilityComfort],
      [health.avgPositioning, weights.positioning],
    ];

    let total = 0;
    let weightSum = 0;
    for (const [value, weight] of parts) {
      if (!isUsable(value) || weight <= 0) continue;
      total += clamp(value) * weight;
      weightSum += weight;
    }

    return weightSum > 0 ? clamp(total / weightSum) : NEUTRAL_SCORE;
  }

  private labelFor(index: number): RegimeLabel {
    if (index >= this.config.bullMinIndex) return 'bull';
    if (index <= this.config.bearMaxIndex) return 'bear';
    return 'sideways';
  }

  private confidenceFor(label: RegimeLabel, index: number): number {
    const [distance, maxDistance] = this.bandDistance(label, index);
    // A band squeezed against 0 or 100 has no interior to measure against
    if (maxDistance <= 0) return 1;
    return clamp(distance / maxDistance, 0, 1);
  }

  private bandDistance(label: RegimeLabel, index: number): [distance: number, maxDistance: number] {
    const { bullMinIndex, bearMaxIndex } = this.config;
    if (label === 'bull') {
      return [index - bullMinIndex, 100 - bullMinIndex];
    }
    if (label === 'bear') {
      return [bearMaxIndex - index, bearMaxIndex];
    }
    return [Math.min(index - bearMaxIndex, bullMinIndex - index), (bullMinIndex - bearMaxIndex) / 2];
  }
}
