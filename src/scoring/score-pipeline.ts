import { Regime, ScoreBundle, SymbolInput } from '../shared/types';
import { ComponentScorerSet, createComponentScorers, scoreComponents } from './component-scorers';
import { ConfluenceAggregator } from './confluence-aggregator';
import { isUsable } from './normalize';
import { VOLATILITY_FEATURES } from './volatility-scorer';

export interface ScoreContext {
  regime: Regime;
  runId: string;
  now: Date;
}

/**
 * Features in, frozen ScoreBundle out, for one (symbol, timeframe). Pure: no
 * state is read or written, so symbols can be scored in any order or in parallel.
 */
export class ScorePipeline {
  private readonly aggregator: ConfluenceAggregator;
  private readonly scorers: ComponentScorerSet;

  constructor(aggregator: ConfluenceAggregator, scorers: ComponentScorerSet = createComponentScorers()) {
    this.aggregator = aggregator;
    this.scorers = scorers;
  }

  buildScoreBundle(input: SymbolInput, context: ScoreContext): ScoreBundle {
    const components = scoreComponents(input.features, this.scorers);
    const result = this.aggregator.aggregate(components, context.regime);
    const bbWidth = input.features.volatility?.[VOLATILITY_FEATURES.bbWidthPct];

    const bundle: ScoreBundle = {
      symbol: input.symbol,
      timeframe: input.timeframe,
      runId: context.runId,
      components,
      confluence: result.confluence,
      confidence: result.confidence,
      lowConfidence: result.lowConfidence,
      effectiveWeights: result.effectiveWeights,
      regime: context.regime,
      patterns: (input.patterns ?? []).map((pattern) => ({ ...pattern })),
      bbWidthPct: isUsable(bbWidth) ? bbWidth : null,
      createdAt: new Date(context.now.getTime()),
    };

    return deepFreezeBundle(bundle);
  }
}

function deepFreezeBundle(bundle: ScoreBundle): ScoreBundle {
  for (const component of Object.values(bundle.components)) {
    Object.freeze(component.details);
    Object.freeze(component.missing);
    Object.freeze(component);
  }
  Object.freeze(bundle.components);
  Object.freeze(bundle.effectiveWeights);
  bundle.patterns.forEach((pattern) => Object.freeze(pattern));
  Object.freeze(bundle.patterns);
  Object.freeze(bundle.regime);
  return Object.freeze(bundle);
}
