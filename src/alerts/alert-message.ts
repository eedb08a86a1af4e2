import { AlertScoreSnapshot, DivergenceDirection, Regime, RegimeLabel, ScoreBundle } from '../shared/types';

export function snapshotScores(bundle: ScoreBundle): AlertScoreSnapshot {
  const { components } = bundle;
  return {
    confluence: bundle.confluence,
    confidence: bundle.confidence,
    trend: components.trend.value,
    volume: components.volume.value,
    volatility: components.volatility.value,
    relativeStrength: components.relative_strength.value,
    positioning: components.positioning.value,
  };
}

export function formatScoreLine(scores: AlertScoreSnapshot, regime: RegimeLabel): string {
  return (
    `CS: ${scores.confluence.toFixed(1)} | ` +
    `Trend: ${scores.trend.toFixed(1)} | Vol: ${scores.volatility.toFixed(1)} | ` +
    `Volu: ${scores.volume.toFixed(1)} | RS: ${scores.relativeStrength.toFixed(1)} | ` +
    `Pos: ${scores.positioning.toFixed(1)} | Regime: ${regime.toUpperCase()}`
  );
}

export function formatDivergenceLead(direction: DivergenceDirection, barsSinceTrigger: number): string {
  const label = direction === 'bullish' ? 'Bullish' : 'Bearish';
  const when = barsSinceTrigger === 0 ? 'on the last bar' : `${barsSinceTrigger} bar(s) ago`;
  return `${label} RSI divergence ${when}`;
}

export function formatRegimeChange(previous: RegimeLabel, regime: Regime, subject: string | null): string {
  const who = subject ? `${subject} regime` : 'Market regime';
  return (
    `${who} changed from ${previous.toUpperCase()} to ${regime.label.toUpperCase()} ` +
    `(health index ${regime.index.toFixed(1)}, confidence ${regime.confidence.toFixed(2)})`
  );
}
