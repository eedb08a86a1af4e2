export const COMPONENT_NAMES = [
  'trend',
  'volume',
  'volatility',
  'relative_strength',
  'positioning',
] as const;

export type ComponentName = typeof COMPONENT_NAMES[number];

/**
 * Raw numeric features for one component of one (symbol, timeframe).
 * Produced by the feature-extraction collaborator; `null` and `NaN` both mean "missing".
 */
export type FeatureSet = Readonly<Record<string, number | null | undefined>>;

export type ComponentFeatures = Readonly<Partial<Record<ComponentName, FeatureSet>>>;

export interface ComponentScore {
  name: ComponentName;
  /** Always within [0, 100]; 50 when unavailable */
  value: number;
  available: boolean;
  /** Required feature keys that were absent or non-finite */
  missing: string[];
  /** Sub-scores and raw inputs, for debugging */
  details: Record<string, number>;
}

export type ComponentScores = Readonly<Record<ComponentName, ComponentScore>>;

export const REGIME_LABELS = ['bull', 'sideways', 'bear'] as const;

export type RegimeLabel = typeof REGIME_LABELS[number];

export interface Regime {
  label: RegimeLabel;
  /** Distance from the nearest band boundary, normalized to [0, 1] */
  confidence: number;
  /** Composite market-health index the label was derived from (0-100) */
  index: number;
}

export type WeightVector = Readonly<Record<ComponentName, number>>;

/**
 * Market-wide summary supplied once per cycle by the market-regime collaborator.
 * Every metric is on a 0-100 scale; absent metrics are left out of the composite.
 */
export interface MarketHealth {
  benchmarkTrend?: number | null;
  /** Percentage of the universe in an uptrend */
  breadth?: number | null;
  volatilityComfort?: number | null;
  avgPositioning?: number | null;
  /** Pre-computed composite; used as-is when provided */
  riskOn?: number | null;
}

export interface PatternTag {
  /** e.g. 'rsi_bullish_divergence' */
  tag: string;
  /** Bars elapsed since the pattern's trigger bar (0 = last bar) */
  barsSinceTrigger: number;
  strength: number | null;
}

export interface ConfluenceResult {
  confluence: number;
  confidence: number;
  /** Fewer than two components were available */
  lowConfidence: boolean;
  effectiveWeights: Readonly<Partial<Record<ComponentName, number>>>;
  availableComponents: ComponentName[];
}

export interface ScoreBundle {
  symbol: string;
  timeframe: string;
  runId: string;
  components: ComponentScores;
  confluence: number;
  confidence: number;
  lowConfidence: boolean;
  effectiveWeights: Readonly<Partial<Record<ComponentName, number>>>;
  regime: Regime;
  patterns: readonly PatternTag[];
  /** Raw Bollinger Band width (%) from the volatility features, when supplied */
  bbWidthPct: number | null;
  createdAt: Date;
}

export const ALERT_TYPES = [
  'high_confluence',
  'volume_spike',
  'squeeze_candidate',
  'regime_change',
  'rsi_divergence',
] as const;

export type AlertType = typeof ALERT_TYPES[number];

export interface AlertKey {
  symbol: string;
  timeframe: string;
  alertType: AlertType;
}

export interface AlertState extends AlertKey {
  /** null while only a regime baseline has been recorded */
  lastFiredAt: Date | null;
  lastScore: number | null;
  lastRegime: RegimeLabel | null;
  suppressionCount: number;
  updatedAt: Date;
}

export type DivergenceDirection = 'bullish' | 'bearish';

export interface AlertScoreSnapshot {
  confluence: number;
  confidence: number;
  trend: number;
  volume: number;
  volatility: number;
  relativeStrength: number;
  positioning: number;
}

export interface AlertEvent {
  id: string;
  type: AlertType;
  symbol: string;
  timeframe: string;
  createdAt: Date;
  regime: RegimeLabel;
  previousRegime: RegimeLabel | null;
  direction: DivergenceDirection | null;
  /** null for market-wide events */
  scores: AlertScoreSnapshot | null;
  message: string;
  /** false when the state store could not record the firing */
  persisted: boolean;
}

export type AlertDecision =
  | 'fired'
  | 'suppressed_cooldown'
  | 'suppressed_delta'
  | 'not_qualified'
  | 'low_confidence'
  | 'baseline'
  | 'disabled';

export interface AlertEvaluation {
  events: AlertEvent[];
  decisions: Partial<Record<AlertType, AlertDecision>>;
  warnings: string[];
}

export interface SymbolInput {
  symbol: string;
  timeframe: string;
  features: ComponentFeatures;
  patterns?: PatternTag[];
}

export interface CycleInput {
  marketHealth: MarketHealth;
  symbols: SymbolInput[];
}

export interface CycleResult {
  runId: string;
  regime: Regime;
  bundles: ScoreBundle[];
  events: AlertEvent[];
  warnings: string[];
  /** Aborted after alert evaluation began; `events` holds only the keys already decided */
  aborted: boolean;
  startedAt: Date;
  completedAt: Date;
}
