import { AlertEvaluator } from '../alerts/alert-evaluator';
import { AlertStateStore } from '../data/alert-state-store';
import { ConfluenceAggregator } from '../scoring/confluence-aggregator';
import { RegimeClassifier } from '../scoring/regime-classifier';
import { ScorePipeline } from '../scoring/score-pipeline';
import { WeightTable } from '../scoring/weight-table';
import { ScannerConfig } from '../shared/config';
import { KeyedMutex } from '../shared/keyed-mutex';
import { ScanCycle } from './scan-cycle';

/**
 * Wire the scoring and alerting components from one immutable config.
 * Throws ConfigurationError before anything runs if the weight table is invalid.
 */
export function createScanCycle(config: ScannerConfig, store: AlertStateStore): ScanCycle {
  const weightTable = new WeightTable(config.regimeWeights);

  return new ScanCycle({
    classifier: new RegimeClassifier(config.regimes),
    pipeline: new ScorePipeline(new ConfluenceAggregator(weightTable)),
    evaluator: new AlertEvaluator(config.alerts, store, new KeyedMutex()),
    store,
    concurrency: config.scan.concurrency,
    marketRegimeAlerts: config.alerts.regimeChangeScope === 'market',
  });
}
