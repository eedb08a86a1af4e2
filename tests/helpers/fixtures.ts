/**
 * Builders for score bundles and alert config used across the test suites
 */

import { AlertConfig, parseConfig } from '../../src/shared/config';
import {
    ComponentName,
    ComponentScore,
    ComponentScores,
    PatternTag,
    Regime,
    RegimeLabel,
    ScoreBundle,
} from '../../src/shared/types';

export function componentScore(name: ComponentName, value: number, available: boolean = true): ComponentScore {
    return { name, value, available, missing: [], details: {} };
}

export function regime(label: RegimeLabel, confidence: number = 0.8, index: number = 70): Regime {
    return { label, confidence, index };
}

export interface BundleOverrides {
    symbol?: string;
    timeframe?: string;
    confluence?: number;
    confidence?: number;
    trend?: number;
    volume?: number;
    volatility?: number;
    relativeStrength?: number;
    positioning?: number;
    trendAvailable?: boolean;
    volatilityAvailable?: boolean;
    volumeAvailable?: boolean;
    relativeStrengthAvailable?: boolean;
    positioningAvailable?: boolean;
    lowConfidence?: boolean;
    bbWidthPct?: number | null;
    patterns?: PatternTag[];
    regime?: Regime;
}

/**
 * Defaults qualify for high_confluence and nothing else.
 */
export function makeBundle(overrides: BundleOverrides = {}): ScoreBundle {
    const components: ComponentScores = {
        trend: componentScore('trend', overrides.trend ?? 60, overrides.trendAvailable ?? true),
        volume: componentScore('volume', overrides.volume ?? 55, overrides.volumeAvailable ?? true),
        volatility: componentScore('volatility', overrides.volatility ?? 50, overrides.volatilityAvailable ?? true),
        relative_strength: componentScore(
            'relative_strength',
            overrides.relativeStrength ?? 50,
            overrides.relativeStrengthAvailable ?? true
        ),
        positioning: componentScore('positioning', overrides.positioning ?? 55, overrides.positioningAvailable ?? true),
    };

    return {
        symbol: overrides.symbol ?? 'BTC',
        timeframe: overrides.timeframe ?? '4h',
        runId: 'run-test',
        components,
        confluence: overrides.confluence ?? 62,
        confidence: overrides.confidence ?? 0.8,
        lowConfidence: overrides.lowConfidence ?? false,
        effectiveWeights: {},
        regime: overrides.regime ?? regime('bull'),
        patterns: overrides.patterns ?? [],
        bbWidthPct: overrides.bbWidthPct === undefined ? 8 : overrides.bbWidthPct,
        createdAt: new Date('2024-03-01T12:00:00.000Z'),
    };
}

export function alertConfig(alerts: Record<string, unknown> = {}): AlertConfig {
    return parseConfig({ alerts }).alerts;
}

export function minutesAfter(base: Date, minutes: number): Date {
    return new Date(base.getTime() + minutes * 60 * 1000);
}
