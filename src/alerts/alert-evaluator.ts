import { v4 as uuidv4 } from 'uuid';
import { AlertStateStore, serializeAlertKey } from '../data/alert-state-store';
import { AlertConfig } from '../shared/config';
import { StateStoreError } from '../shared/errors';
import { KeyedMutex } from '../shared/keyed-mutex';
import logger from '../shared/logger';
import {
  ALERT_TYPES,
  AlertDecision,
  AlertEvaluation,
  AlertEvent,
  AlertKey,
  AlertScoreSnapshot,
  AlertState,
  AlertType,
  DivergenceDirection,
  PatternTag,
  Regime,
  ScoreBundle,
} from '../shared/types';
import { formatDivergenceLead, formatRegimeChange, formatScoreLine, snapshotScores } from './alert-message';

export const MARKET_SYMBOL = '__MARKET__';

export const RSI_DIVERGENCE_TAGS: ReadonlyMap<string, DivergenceDirection> = new Map<string, DivergenceDirection>([
  ['rsi_bullish_divergence', 'bullish'],
  ['rsi_bearish_divergence', 'bearish'],
]);

const MINUTE_MS = 60 * 1000;

type Qualification =
  | { qualified: false }
  | { qualified: true; direction: DivergenceDirection | null; lead: string | null };

const NOT_QUALIFIED: Qualification = { qualified: false };

interface Subject {
  key: AlertKey;
  regime: Regime;
  /** null for market-wide evaluation */
  bundle: ScoreBundle | null;
}

interface TypeOutcome {
  decision: AlertDecision;
  event: AlertEvent | null;
  warning: string | null;
}

/**
 * Turns score bundles into de-duplicated alert events.
 *
 * Each (symbol, timeframe, alert type) is an independent, never-closing state
 * machine: no prior alert -> eligible -> cooling down -> eligible ... The
 * checks run in a fixed order: qualifying condition, cooldown, minimum
 * confluence change, fire. The read-modify-write on a key runs under a per-key
 * lock so parallel callers cannot interleave on the same state.
 */
export class AlertEvaluator {
  private readonly config: AlertConfig;
  private readonly store: AlertStateStore;
  private readonly locks: KeyedMutex;

  constructor(config: AlertConfig, store: AlertStateStore, locks: KeyedMutex = new KeyedMutex()) {
    this.config = config;
    this.store = store;
    this.locks = locks;
  }

  async evaluate(bundle: ScoreBundle, now: Date = new Date()): Promise<AlertEvaluation> {
    const evaluation: AlertEvaluation = { events: [], decisions: {}, warnings: [] };

    for (const alertType of ALERT_TYPES) {
      if (alertType === 'regime_change' && this.config.regimeChangeScope === 'market') {
        continue;
      }

      const outcome = await this.evaluateType(
        alertType,
        {
          key: { symbol: bundle.symbol, timeframe: bundle.timeframe, alertType },
          regime: bundle.regime,
          bundle,
        },
        now
      );
      this.record(evaluation, alertType, outcome);
    }

    return evaluation;
  }

  /**
   * Market-wide regime change, evaluated once per timeframe per cycle instead of once per symbol.
   */
  async evaluateMarketRegime(regime: Regime, timeframe: string, now: Date = new Date()): Promise<AlertEvaluation> {
    const evaluation: AlertEvaluation = { events: [], decisions: {}, warnings: [] };
    const outcome = await this.evaluateType(
      'regime_change',
      {
        key: { symbol: MARKET_SYMBOL, timeframe, alertType: 'regime_change' },
        regime,
        bundle: null,
      },
      now
    );
    this.record(evaluation, 'regime_change', outcome);
    return evaluation;
  }

  private record(evaluation: AlertEvaluation, alertType: AlertType, outcome: TypeOutcome): void {
    evaluation.decisions[alertType] = outcome.decision;
    if (outcome.event) evaluation.events.push(outcome.event);
    if (outcome.warning) evaluation.warnings.push(outcome.warning);
  }

  private async evaluateType(alertType: AlertType, subject: Subject, now: Date): Promise<TypeOutcome> {
    if (!this.config.enabled || !this.config.types[alertType]) {
      return { decision: 'disabled', event: null, warning: null };
    }

    const { bundle } = subject;
    // Fewer than two backing components means there is no agreement to alert on
    if (
      bundle &&
      alertType !== 'regime_change' &&
      (bundle.lowConfidence || bundle.confidence < this.config.minConfidence)
    ) {
      return { decision: 'low_confidence', event: null, warning: null };
    }

    const stateKey = serializeAlertKey(subject.key);
    return this.locks.runExclusive(stateKey, async () => {
      const state = await this.store.get(subject.key);

      if (alertType === 'regime_change' && (!state || state.lastRegime === null)) {
        return this.recordBaseline(subject, state, now);
      }

      const qualification = this.qualify(alertType, subject, state);
      if (!qualification.qualified) {
        return { decision: 'not_qualified', event: null, warning: null };
      }

      if (state) {
        if (this.isCoolingDown(alertType, state, now)) {
          return this.suppress(state, 'suppressed_cooldown', now);
        }
        if (alertType !== 'regime_change' && bundle && this.isBelowDelta(bundle.confluence, state)) {
          return this.suppress(state, 'suppressed_delta', now);
        }
      }

      return this.fire(alertType, subject, state, qualification, now);
    });
  }

  private qualify(alertType: AlertType, subject: Subject, state: AlertState | undefined): Qualification {
    const { bundle, regime } = subject;

    if (alertType === 'regime_change') {
      return state && state.lastRegime !== null && state.lastRegime !== regime.label
        ? { qualified: true, direction: null, lead: null }
        : NOT_QUALIFIED;
    }

    if (!bundle) return NOT_QUALIFIED;
    const { components } = bundle;
    const cfg = this.config;

    switch (alertType) {
      case 'high_confluence': {
        if (cfg.requireUptrendRegime && regime.label === 'bear') return NOT_QUALIFIED;
        const passes =
          components.trend.available &&
          components.volume.available &&
          components.positioning.available &&
          bundle.confluence >= cfg.minConfluenceScore &&
          components.trend.value >= cfg.minTrendScore &&
          components.volume.value >= cfg.minVolumeScore &&
          components.positioning.value >= cfg.minPositioningScore;
        return passes ? { qualified: true, direction: null, lead: null } : NOT_QUALIFIED;
      }
      case 'volume_spike':
        return components.volume.available && components.volume.value >= cfg.volumeSpikeMinVolumeScore
          ? { qualified: true, direction: null, lead: 'Volume spike' }
          : NOT_QUALIFIED;
      case 'squeeze_candidate':
        return components.volatility.available &&
          bundle.bbWidthPct !== null &&
          components.volatility.value <= cfg.squeezeMaxVolScore &&
          bundle.bbWidthPct <= cfg.squeezeMaxBbwPct
          ? { qualified: true, direction: null, lead: `Squeeze candidate (BB width ${bundle.bbWidthPct.toFixed(2)}%)` }
          : NOT_QUALIFIED;
      case 'rsi_divergence':
        return this.qualifyDivergence(bundle);
    }
  }

  private qualifyDivergence(bundle: ScoreBundle): Qualification {
    const timeframes = this.config.rsiDivergenceTimeframes;
    if (timeframes.length > 0 && !timeframes.includes(bundle.timeframe)) {
      return NOT_QUALIFIED;
    }

    let best: { pattern: PatternTag; direction: DivergenceDirection } | null = null;
    for (const pattern of bundle.patterns) {
      const direction = RSI_DIVERGENCE_TAGS.get(pattern.tag);
      if (!direction) continue;
      if (pattern.barsSinceTrigger < 0 || pattern.barsSinceTrigger > this.config.rsiDivergenceMaxBarsFromLast) continue;
      const strength = pattern.strength ?? 0;
      if (strength < this.config.rsiDivergenceMinStrength) continue;
      const bestStrength = best ? best.pattern.strength ?? 0 : -Infinity;
      // Strongest wins; bullish wins ties
      if (strength > bestStrength || (strength === bestStrength && direction === 'bullish')) {
        best = { pattern, direction };
      }
    }

    if (!best) return NOT_QUALIFIED;
    return {
      qualified: true,
      direction: best.direction,
      lead: formatDivergenceLead(best.direction, best.pattern.barsSinceTrigger),
    };
  }

  private cooldownMs(alertType: AlertType): number {
    return (this.config.cooldownOverrides[alertType] ?? this.config.cooldownMinutes) * MINUTE_MS;
  }

  private isCoolingDown(alertType: AlertType, state: AlertState, now: Date): boolean {
    if (!state.lastFiredAt) return false;
    return now.getTime() - state.lastFiredAt.getTime() < this.cooldownMs(alertType);
  }

  private isBelowDelta(confluence: number, state: AlertState): boolean {
    if (state.lastScore === null) return false;
    return Math.abs(confluence - state.lastScore) < this.config.minCsDelta;
  }

  private async recordBaseline(subject: Subject, state: AlertState | undefined, now: Date): Promise<TypeOutcome> {
    const baseline: AlertState = {
      ...subject.key,
      lastFiredAt: state?.lastFiredAt ?? null,
      lastScore: state?.lastScore ?? null,
      lastRegime: subject.regime.label,
      suppressionCount: state?.suppressionCount ?? 0,
      updatedAt: now,
    };
    const warning = await this.persist(baseline);
    logger.debug(`[AlertEvaluator] Recorded regime baseline ${subject.regime.label} for ${serializeAlertKey(subject.key)}`);
    return { decision: 'baseline', event: null, warning };
  }

  private async suppress(
    state: AlertState,
    decision: 'suppressed_cooldown' | 'suppressed_delta',
    now: Date
  ): Promise<TypeOutcome> {
    const updated: AlertState = {
      ...state,
      suppressionCount: state.suppressionCount + 1,
      updatedAt: now,
    };
    const warning = await this.persist(updated);
    logger.debug(
      `[AlertEvaluator] ${decision} for ${serializeAlertKey(state)} (suppressed ${updated.suppressionCount}x in a row)`
    );
    return { decision, event: null, warning };
  }

  private async fire(
    alertType: AlertType,
    subject: Subject,
    state: AlertState | undefined,
    qualification: Extract<Qualification, { qualified: true }>,
    now: Date
  ): Promise<TypeOutcome> {
    const { bundle, regime, key } = subject;
    const scores: AlertScoreSnapshot | null = bundle ? snapshotScores(bundle) : null;
    const previousRegime = state?.lastRegime ?? null;

    const next: AlertState = {
      ...key,
      lastFiredAt: now,
      lastScore: bundle ? bundle.confluence : null,
      lastRegime: regime.label,
      suppressionCount: 0,
      updatedAt: now,
    };
    const warning = await this.persist(next);

    const event: AlertEvent = {
      id: uuidv4(),
      type: alertType,
      symbol: key.symbol,
      timeframe: key.timeframe,
      createdAt: now,
      regime: regime.label,
      previousRegime,
      direction: qualification.direction,
      scores,
      message: this.buildMessage(alertType, subject, previousRegime, scores, qualification.lead),
      persisted: warning === null,
    };

    logger.info(`[AlertEvaluator] Fired ${alertType} for ${key.symbol} ${key.timeframe}`);
    return { decision: 'fired', event, warning };
  }

  private buildMessage(
    alertType: AlertType,
    subject: Subject,
    previousRegime: AlertState['lastRegime'],
    scores: AlertScoreSnapshot | null,
    lead: string | null
  ): string {
    if (alertType === 'regime_change' && previousRegime) {
      const subjectName = subject.bundle ? subject.key.symbol : null;
      const change = formatRegimeChange(previousRegime, subject.regime, subjectName);
      return scores ? `${change} | ${formatScoreLine(scores, subject.regime.label)}` : change;
    }

    const line = scores ? formatScoreLine(scores, subject.regime.label) : `Regime: ${subject.regime.label.toUpperCase()}`;
    return lead ? `${lead} | ${line}` : line;
  }

  /**
   * Returns a warning when the store could not record the state; the caller still
   * emits the decision so delivery is not blocked by a store outage.
   */
  private async persist(state: AlertState): Promise<string | null> {
    try {
      await this.store.put(state);
      return null;
    } catch (error) {
      if (!(error instanceof StateStoreError)) throw error;
      const warning = `Alert state for ${serializeAlertKey(state)} not persisted: ${error.message}`;
      logger.warn(`[AlertEvaluator] ${warning}`);
      return warning;
    }
  }
}
