import { v4 as uuidv4 } from 'uuid';
import { AlertEvaluator } from '../alerts/alert-evaluator';
import { AlertStateStore } from '../data/alert-state-store';
import { ScorePipeline } from '../scoring/score-pipeline';
import { RegimeClassifier } from '../scoring/regime-classifier';
import { runBounded } from '../shared/bounded-pool';
import { CycleAbortedError, StateStoreError } from '../shared/errors';
import logger from '../shared/logger';
import { AlertEvent, CycleInput, CycleResult, ScoreBundle } from '../shared/types';

export interface ScanCycleDeps {
  classifier: RegimeClassifier;
  pipeline: ScorePipeline;
  evaluator: AlertEvaluator;
  store: AlertStateStore;
  concurrency: number;
  /** Evaluate regime_change once per timeframe under the market-wide key */
  marketRegimeAlerts: boolean;
}

export interface RunOptions {
  signal?: AbortSignal;
  now?: Date;
  runId?: string;
}

/**
 * One batch scan: classify the regime, score every symbol in parallel, then
 * apply alert decisions against the shared state store.
 *
 * Scoring touches no shared state, so it runs on a bounded pool in any order.
 * Alert evaluation serializes per key inside the evaluator. An abort before
 * the alert stage discards every bundle and leaves the store untouched. Once
 * evaluation has started an abort stops picking up bundles, but the cycle
 * still flushes and returns the events already committed to the store.
 */
export class ScanCycle {
  private readonly deps: ScanCycleDeps;

  constructor(deps: ScanCycleDeps) {
    this.deps = deps;
  }

  async run(input: CycleInput, options: RunOptions = {}): Promise<CycleResult> {
    const { classifier, pipeline, evaluator, store, concurrency } = this.deps;
    const runId = options.runId ?? uuidv4();
    const now = options.now ?? new Date();
    const startedAt = new Date();
    const warnings: string[] = [];

    this.throwIfAborted(options.signal, runId, 'startup');

    const regime = classifier.classify(input.marketHealth);
    logger.info(
      `[ScanCycle] ${runId}: regime ${regime.label} (index ${regime.index.toFixed(1)}, confidence ${regime.confidence.toFixed(2)}), ${input.symbols.length} symbol(s)`
    );

    const scored = await runBounded(
      input.symbols,
      (symbolInput) => pipeline.buildScoreBundle(symbolInput, { regime, runId, now }),
      { size: concurrency, signal: options.signal }
    );

    this.throwIfAborted(options.signal, runId, 'scoring');

    const bundles: ScoreBundle[] = [];
    scored.forEach((result, index) => {
      const { symbol, timeframe } = input.symbols[index];
      if (result.status === 'fulfilled') {
        bundles.push(result.value);
      } else if (result.status === 'rejected') {
        const warning = `Scoring failed for ${symbol} ${timeframe}: ${errorMessage(result.reason)}`;
        logger.warn(`[ScanCycle] ${warning}`);
        warnings.push(warning);
      }
    });

    const evaluations = await runBounded(
      bundles,
      (bundle) => evaluator.evaluate(bundle, now),
      { size: concurrency, signal: options.signal }
    );

    const events: AlertEvent[] = [];
    let skipped = 0;
    evaluations.forEach((result, index) => {
      const bundle = bundles[index];
      if (result.status === 'skipped') {
        skipped++;
      } else if (result.status === 'fulfilled') {
        events.push(...result.value.events);
        warnings.push(...result.value.warnings);
      } else if (result.status === 'rejected') {
        const warning = `Alert evaluation failed for ${bundle.symbol} ${bundle.timeframe}: ${errorMessage(result.reason)}`;
        logger.warn(`[ScanCycle] ${warning}`);
        warnings.push(warning);
      }
    });

    if (this.deps.marketRegimeAlerts && !options.signal?.aborted) {
      const timeframes = Array.from(new Set(bundles.map((bundle) => bundle.timeframe)));
      for (const timeframe of timeframes) {
        try {
          const evaluation = await evaluator.evaluateMarketRegime(regime, timeframe, now);
          events.push(...evaluation.events);
          warnings.push(...evaluation.warnings);
        } catch (error) {
          const warning = `Market regime evaluation failed for ${timeframe}: ${errorMessage(error)}`;
          logger.warn(`[ScanCycle] ${warning}`);
          warnings.push(warning);
        }
      }
    }

    try {
      await store.flush();
    } catch (error) {
      if (!(error instanceof StateStoreError)) throw error;
      const warning = `Alert state flush failed: ${error.message}`;
      logger.warn(`[ScanCycle] ${warning}`);
      warnings.push(warning);
    }

    const aborted = options.signal?.aborted ?? false;
    if (aborted) {
      const warning = `Cycle aborted during alert evaluation; ${skipped} bundle(s) not evaluated, ${events.length} alert(s) already committed`;
      logger.warn(`[ScanCycle] ${runId}: ${warning}`);
      warnings.push(warning);
    }

    const completedAt = new Date();
    logger.info(
      `[ScanCycle] ${runId}: ${bundles.length} bundle(s), ${events.length} alert(s), ${warnings.length} warning(s) in ${completedAt.getTime() - startedAt.getTime()}ms`
    );

    return { runId, regime, bundles, events, warnings, aborted, startedAt, completedAt };
  }

  private throwIfAborted(signal: AbortSignal | undefined, runId: string, stage: string): void {
    if (signal?.aborted) {
      logger.warn(`[ScanCycle] ${runId}: aborted during ${stage}`);
      throw new CycleAbortedError(runId, stage);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
