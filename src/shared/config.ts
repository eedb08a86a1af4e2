import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import cron from 'node-cron';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { ALERT_TYPES, AlertType, ComponentName, RegimeLabel } from './types';

const WEIGHT_SUM_EPSILON = 1e-6;

const scoreThreshold = z.number().min(0).max(100);
const weight = z.number().min(0).max(1);

const weightVectorSchema = z
  .object({
    trend: weight,
    volume: weight,
    volatility: weight,
    relative_strength: weight,
    positioning: weight,
  })
  .strict()
  .superRefine((vector, ctx) => {
    const sum = Object.values(vector).reduce((acc, w) => acc + w, 0);
    if (Math.abs(sum - 1) > WEIGHT_SUM_EPSILON) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `weights must sum to 1 (got ${sum.toFixed(6)})`,
      });
    }
  });

const DEFAULT_REGIME_WEIGHTS: Record<RegimeLabel, Record<ComponentName, number>> = {
  bull: { trend: 0.3, volume: 0.25, volatility: 0.1, relative_strength: 0.25, positioning: 0.1 },
  sideways: { trend: 0.2, volume: 0.2, volatility: 0.25, relative_strength: 0.2, positioning: 0.15 },
  bear: { trend: 0.15, volume: 0.15, volatility: 0.2, relative_strength: 0.25, positioning: 0.25 },
};

const alertToggleSchema = z
  .object({
    high_confluence: z.boolean().default(true),
    volume_spike: z.boolean().default(true),
    squeeze_candidate: z.boolean().default(true),
    regime_change: z.boolean().default(true),
    rsi_divergence: z.boolean().default(true),
  })
  .strict()
  .default({});

const cooldownOverridesSchema = z
  .object({
    high_confluence: z.number().int().positive().optional(),
    volume_spike: z.number().int().positive().optional(),
    squeeze_candidate: z.number().int().positive().optional(),
    regime_change: z.number().int().positive().optional(),
    rsi_divergence: z.number().int().positive().optional(),
  })
  .strict()
  .default({});

const rawConfigSchema = z
  .object({
    app: z
      .object({
        name: z.string().min(1).default('Confluence Scanner'),
        log_level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      })
      .strict()
      .default({}),
    state: z
      .object({
        path: z.string().min(1).default('./data/alert-state.db'),
      })
      .strict()
      .default({}),
    scan: z
      .object({
        concurrency: z.number().int().min(1).max(256).default(8),
        cron: z
          .string()
          .refine((expr) => cron.validate(expr), { message: 'invalid cron expression' })
          .nullable()
          .default(null),
        input_path: z.string().min(1).nullable().default(null),
      })
      .strict()
      .default({}),
    regimes: z
      .object({
        bull_min_index: scoreThreshold.default(65),
        bear_max_index: scoreThreshold.default(35),
        index_weights: z
          .object({
            trend: weight.default(0.4),
            breadth: weight.default(0.3),
            volatility_comfort: weight.default(0.15),
            positioning: weight.default(0.15),
          })
          .strict()
          .default({}),
      })
      .strict()
      .default({})
      .refine((r) => r.bull_min_index > r.bear_max_index, {
        message: 'bull_min_index must be greater than bear_max_index',
      }),
    confluence: z
      .object({
        regime_weights: z
          .object({
            bull: weightVectorSchema.default(DEFAULT_REGIME_WEIGHTS.bull),
            sideways: weightVectorSchema.default(DEFAULT_REGIME_WEIGHTS.sideways),
            bear: weightVectorSchema.default(DEFAULT_REGIME_WEIGHTS.bear),
          })
          .strict()
          .default({}),
      })
      .strict()
      .default({}),
    alerts: z
      .object({
        enabled: z.boolean().default(true),
        types: alertToggleSchema,
        min_confluence_score: scoreThreshold.default(60),
        min_trend_score: scoreThreshold.default(55),
        min_volume_score: scoreThreshold.default(50),
        min_positioning_score: scoreThreshold.default(50),
        require_uptrend_regime: z.boolean().default(false),
        min_cs_delta: z.number().min(0).max(100).default(3),
        cooldown_minutes: z.number().int().positive().default(60),
        cooldown_overrides: cooldownOverridesSchema,
        min_confidence: z.number().min(0).max(1).default(0.05),
        volume_spike_min_volume_score: scoreThreshold.default(75),
        squeeze_max_vol_score: scoreThreshold.default(40),
        squeeze_max_bbw_pct: z.number().min(0).default(6),
        rsi_divergence_max_bars_from_last: z.number().int().min(0).default(1),
        rsi_divergence_min_strength: scoreThreshold.default(5),
        rsi_divergence_timeframes: z.array(z.string().min(1)).default([]),
        regime_change_scope: z.enum(['market', 'symbol']).default('market'),
      })
      .strict()
      .default({}),
  })
  .strict();

type ParsedConfig = z.output<typeof rawConfigSchema>;

export interface RegimeClassifierConfig {
  bullMinIndex: number;
  bearMaxIndex: number;
  indexWeights: {
    trend: number;
    breadth: number;
    volatilityComfort: number;
    positioning: number;
  };
}

export type RegimeWeightsConfig = Record<RegimeLabel, Record<ComponentName, number>>;

export interface AlertConfig {
  enabled: boolean;
  types: Record<AlertType, boolean>;
  minConfluenceScore: number;
  minTrendScore: number;
  minVolumeScore: number;
  minPositioningScore: number;
  requireUptrendRegime: boolean;
  minCsDelta: number;
  cooldownMinutes: number;
  cooldownOverrides: Partial<Record<AlertType, number>>;
  minConfidence: number;
  volumeSpikeMinVolumeScore: number;
  squeezeMaxVolScore: number;
  squeezeMaxBbwPct: number;
  rsiDivergenceMaxBarsFromLast: number;
  rsiDivergenceMinStrength: number;
  rsiDivergenceTimeframes: string[];
  regimeChangeScope: 'market' | 'symbol';
}

export interface ScannerConfig {
  app: {
    name: string;
    logLevel: 'error' | 'warn' | 'info' | 'debug';
  };
  state: {
    path: string;
  };
  scan: {
    concurrency: number;
    cron: string | null;
    inputPath: string | null;
  };
  regimes: RegimeClassifierConfig;
  regimeWeights: RegimeWeightsConfig;
  alerts: AlertConfig;
}

export type Env = Readonly<Record<string, string | undefined>>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  const copy = isRecord(existing) ? { ...existing } : {};
  raw[key] = copy;
  return copy;
}

function parseNumberEnv(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Environment variable ${name} is not a number`, [`${name}=${value}`]);
  }
  return parsed;
}

/**
 * Environment variables win over the config file.
 */
function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };

  if (env.LOG_LEVEL) section(merged, 'app').log_level = env.LOG_LEVEL;
  if (env.ALERT_STATE_DB_PATH) section(merged, 'state').path = env.ALERT_STATE_DB_PATH;
  if (env.SCAN_CRON) section(merged, 'scan').cron = env.SCAN_CRON;
  if (env.CYCLE_INPUT_PATH) section(merged, 'scan').input_path = env.CYCLE_INPUT_PATH;
  if (env.SCAN_CONCURRENCY) {
    section(merged, 'scan').concurrency = parseNumberEnv('SCAN_CONCURRENCY', env.SCAN_CONCURRENCY);
  }
  if (env.ALERT_COOLDOWN_MINUTES) {
    section(merged, 'alerts').cooldown_minutes = parseNumberEnv('ALERT_COOLDOWN_MINUTES', env.ALERT_COOLDOWN_MINUTES);
  }
  if (env.ALERT_MIN_CS_DELTA) {
    section(merged, 'alerts').min_cs_delta = parseNumberEnv('ALERT_MIN_CS_DELTA', env.ALERT_MIN_CS_DELTA);
  }

  return merged;
}

function toScannerConfig(parsed: ParsedConfig): ScannerConfig {
  const { alerts, regimes } = parsed;
  const cooldownOverrides: Partial<Record<AlertType, number>> = {};
  for (const type of ALERT_TYPES) {
    const minutes = alerts.cooldown_overrides[type];
    if (minutes !== undefined) cooldownOverrides[type] = minutes;
  }

  return {
    app: { name: parsed.app.name, logLevel: parsed.app.log_level },
    state: { path: parsed.state.path },
    scan: {
      concurrency: parsed.scan.concurrency,
      cron: parsed.scan.cron,
      inputPath: parsed.scan.input_path,
    },
    regimes: {
      bullMinIndex: regimes.bull_min_index,
      bearMaxIndex: regimes.bear_max_index,
      indexWeights: {
        trend: regimes.index_weights.trend,
        breadth: regimes.index_weights.breadth,
        volatilityComfort: regimes.index_weights.volatility_comfort,
        positioning: regimes.index_weights.positioning,
      },
    },
    regimeWeights: {
      bull: { ...parsed.confluence.regime_weights.bull },
      sideways: { ...parsed.confluence.regime_weights.sideways },
      bear: { ...parsed.confluence.regime_weights.bear },
    },
    alerts: {
      enabled: alerts.enabled,
      types: { ...alerts.types },
      minConfluenceScore: alerts.min_confluence_score,
      minTrendScore: alerts.min_trend_score,
      minVolumeScore: alerts.min_volume_score,
      minPositioningScore: alerts.min_positioning_score,
      requireUptrendRegime: alerts.require_uptrend_regime,
      minCsDelta: alerts.min_cs_delta,
      cooldownMinutes: alerts.cooldown_minutes,
      cooldownOverrides,
      minConfidence: alerts.min_confidence,
      volumeSpikeMinVolumeScore: alerts.volume_spike_min_volume_score,
      squeezeMaxVolScore: alerts.squeeze_max_vol_score,
      squeezeMaxBbwPct: alerts.squeeze_max_bbw_pct,
      rsiDivergenceMaxBarsFromLast: alerts.rsi_divergence_max_bars_from_last,
      rsiDivergenceMinStrength: alerts.rsi_divergence_min_strength,
      rsiDivergenceTimeframes: [...alerts.rsi_divergence_timeframes],
      regimeChangeScope: alerts.regime_change_scope,
    },
  };
}

/**
 * Validate a raw (snake_case) configuration object and convert it into an immutable ScannerConfig.
 * Throws ConfigurationError listing every offending path.
 */
export function parseConfig(raw: unknown, env: Env = {}): ScannerConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Configuration root must be a JSON object');
  }

  const result = rawConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError('Invalid configuration', issues);
  }

  return deepFreeze(toScannerConfig(result.data));
}

export class ConfigManager {
  private config: ScannerConfig | null = null;
  private readonly configPath: string;
  private readonly env: Env;

  constructor(configPath?: string, env: Env = process.env) {
    this.env = env;
    // Relative to the working directory, like the state and input paths inside the file
    this.configPath = configPath || env.SCANNER_CONFIG_PATH || path.resolve('config', 'config.json');
  }

  /**
   * Loads and validates on first use. A missing file means defaults;
   * an unreadable or invalid one is fatal.
   */
  public get(): ScannerConfig {
    if (!this.config) {
      this.config = this.loadConfig();
    }
    return this.config;
  }

  public getSection<K extends keyof ScannerConfig>(key: K): ScannerConfig[K] {
    return this.get()[key];
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  private loadConfig(): ScannerConfig {
    let raw: Record<string, unknown> = {};

    if (fs.existsSync(this.configPath)) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
      } catch (error) {
        throw new ConfigurationError(
          `Could not read config file ${this.configPath}`,
          [error instanceof Error ? error.message : String(error)]
        );
      }
      if (!isRecord(parsed)) {
        throw new ConfigurationError(`Config file ${this.configPath} must contain a JSON object`);
      }
      raw = parsed;
    }

    return parseConfig(raw, this.env);
  }
}

const configManager = new ConfigManager();
export default configManager;
