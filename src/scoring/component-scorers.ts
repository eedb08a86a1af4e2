import { ComponentFeatures, ComponentName, ComponentScores } from '../shared/types';
import { ComponentScorer } from './component-scorer';
import { PositioningScorer } from './positioning-scorer';
import { RelativeStrengthScorer } from './relative-strength-scorer';
import { TrendScorer } from './trend-scorer';
import { VolatilityScorer } from './volatility-scorer';
import { VolumeScorer } from './volume-scorer';

export type ComponentScorerSet = Readonly<Record<ComponentName, ComponentScorer>>;

export function createComponentScorers(): ComponentScorerSet {
  return {
    trend: new TrendScorer(),
    volume: new VolumeScorer(),
    volatility: new VolatilityScorer(),
    relative_strength: new RelativeStrengthScorer(),
    positioning: new PositioningScorer(),
  };
}

/**
 * Run every scorer against its own feature set. A component with no feature
 * set at all is reported unavailable like any other missing input.
 */
export function scoreComponents(
  features: ComponentFeatures,
  scorers: ComponentScorerSet = createComponentScorers()
): ComponentScores {
  return {
    trend: scorers.trend.score(features.trend),
    volume: scorers.volume.score(features.volume),
    volatility: scorers.volatility.score(features.volatility),
    relative_strength: scorers.relative_strength.score(features.relative_strength),
    positioning: scorers.positioning.score(features.positioning),
  };
}
