import { createComponentScorers, scoreComponents } from '../../src/scoring/component-scorers';
import { PositioningScorer } from '../../src/scoring/positioning-scorer';
import { RelativeStrengthScorer } from '../../src/scoring/relative-strength-scorer';
import { TrendScorer } from '../../src/scoring/trend-scorer';
import { VolatilityScorer, contractionRatioScore } from '../../src/scoring/volatility-scorer';
import { VolumeScorer, rvolScore } from '../../src/scoring/volume-scorer';
import { COMPONENT_NAMES } from '../../src/shared/types';

jest.mock('../../src/shared/logger', () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

describe('component scorers', () => {
    describe('TrendScorer', () => {
        const scorer = new TrendScorer();

        it('scores a fully aligned uptrend at 100', () => {
            const score = scorer.score({
                ma_alignment: 1,
                trend_persistence: 1,
                distance_from_ma_pct: 10,
                ma_slope_pct: 5,
            });
            expect(score.available).toBe(true);
            expect(score.value).toBeCloseTo(100, 9);
        });

        it('scores a flat market at 50', () => {
            const score = scorer.score({
                ma_alignment: 0,
                trend_persistence: 0.5,
                distance_from_ma_pct: 0,
                ma_slope_pct: 0,
            });
            expect(score.value).toBeCloseTo(50, 9);
        });

        it('rises with trend persistence', () => {
            const base = { ma_alignment: 1, distance_from_ma_pct: 2, ma_slope_pct: 1 };
            const weak = scorer.score({ ...base, trend_persistence: 0.3 });
            const strong = scorer.score({ ...base, trend_persistence: 0.9 });
            expect(strong.value).toBeGreaterThan(weak.value);
        });

        it('reports missing and non-finite inputs as unavailable with the neutral score', () => {
            const score = scorer.score({ ma_alignment: 1, trend_persistence: Number.NaN, ma_slope_pct: null });
            expect(score).toEqual({
                name: 'trend',
                value: 50,
                available: false,
                missing: ['trend_persistence', 'distance_from_ma_pct', 'ma_slope_pct'],
                details: {},
            });
        });
    });

    describe('VolumeScorer', () => {
        it('follows the relative volume curve', () => {
            expect(rvolScore(0)).toBe(0);
            expect(rvolScore(0.5)).toBe(30);
            expect(rvolScore(1)).toBe(60);
            expect(rvolScore(1.5)).toBe(80);
            expect(rvolScore(3)).toBe(100);
            expect(rvolScore(5)).toBe(85);
            expect(rvolScore(12)).toBe(70);
        });

        it('blends rvol, volume slope and percentile', () => {
            const score = new VolumeScorer().score({
                rvol: 2,
                volume_trend_slope_pct: 0,
                volume_percentile: 0.9,
            });
            // 0.45 * 86.67 + 0.25 * 50 + 0.30 * 90
            expect(score.value).toBeCloseTo(78.5, 6);
        });
    });

    describe('VolatilityScorer', () => {
        const scorer = new VolatilityScorer();

        it('scores compression high', () => {
            expect(scorer.score({ atr_pct: 0, bb_width_pct: 0, contraction_ratio: 0 }).value).toBeCloseTo(100, 9);
        });

        it('scores ranges at their scale midpoints at 50', () => {
            expect(scorer.score({ atr_pct: 5, bb_width_pct: 10, contraction_ratio: 1 }).value).toBeCloseTo(50, 9);
        });

        it('maps the contraction ratio linearly down to zero at 2', () => {
            expect(contractionRatioScore(0.5)).toBe(75);
            expect(contractionRatioScore(2)).toBe(0);
            expect(contractionRatioScore(-1)).toBe(100);
        });
    });

    describe('RelativeStrengthScorer', () => {
        const scorer = new RelativeStrengthScorer();
        const returns = { ret_20_pct: 50, ret_60_pct: 50, ret_120_pct: 50 };

        it('maps returns onto the -50%..150% range', () => {
            expect(scorer.score(returns).value).toBeCloseTo(50, 9);
        });

        it('averages in the cross-sectional rank when supplied', () => {
            const score = scorer.score({ ...returns, rank_pct: 0.9 });
            expect(score.value).toBeCloseTo(70, 9);
            expect(score.details.rank_score).toBeCloseTo(90, 9);
        });

        it('clips extreme returns', () => {
            expect(scorer.score({ ret_20_pct: 500, ret_60_pct: 900, ret_120_pct: 2000 }).value).toBeCloseTo(100, 9);
        });
    });

    describe('PositioningScorer', () => {
        const scorer = new PositioningScorer();

        it('scores crowded longs low and crowded shorts high', () => {
            const longs = scorer.score({ funding_rate: 0.05, open_interest_percentile: 0.9 });
            const shorts = scorer.score({ funding_rate: -0.05, open_interest_percentile: 0.9 });
            expect(longs.value).toBeCloseTo(12, 9);
            expect(shorts.value).toBeCloseTo(88, 9);
        });

        it('prefers the funding z-score over the raw rate', () => {
            const score = scorer.score({ funding_rate: 0.05, funding_z: -3, open_interest_percentile: 1 });
            expect(score.value).toBeCloseTo(90, 9);
        });

        it('damps the tilt when open interest is low', () => {
            const score = scorer.score({ funding_z: 1.5, open_interest_percentile: 0 });
            expect(score.value).toBeCloseTo(40, 9);
        });

        it('needs open interest and some funding input', () => {
            expect(scorer.score({ funding_rate: 0.01 }).missing).toEqual(['open_interest_percentile']);
            expect(scorer.score({ open_interest_percentile: 0.5 }).missing).toEqual(['funding_rate']);
        });
    });

    describe('scoreComponents', () => {
        it('marks components without a feature set unavailable', () => {
            const scores = scoreComponents({ trend: { ma_alignment: 1, trend_persistence: 1, distance_from_ma_pct: 0, ma_slope_pct: 0 } });
            expect(scores.trend.available).toBe(true);
            for (const name of COMPONENT_NAMES.filter((n) => n !== 'trend')) {
                expect(scores[name].available).toBe(false);
                expect(scores[name].value).toBe(50);
            }
        });

        it('keeps every score within [0, 100] for extreme inputs', () => {
            const scorers = createComponentScorers();
            const extremes = [-1e9, -1, 0, 1, 1e9];
            for (const x of extremes) {
                const scores = scoreComponents(
                    {
                        trend: { ma_alignment: x, trend_persistence: x, distance_from_ma_pct: x, ma_slope_pct: x },
                        volume: { rvol: x, volume_trend_slope_pct: x, volume_percentile: x },
                        volatility: { atr_pct: x, bb_width_pct: x, contraction_ratio: x },
                        relative_strength: { ret_20_pct: x, ret_60_pct: x, ret_120_pct: x, rank_pct: x },
                        positioning: { funding_rate: x, funding_z: x, open_interest_percentile: x },
                    },
                    scorers
                );
                for (const name of COMPONENT_NAMES) {
                    expect(scores[name].value).toBeGreaterThanOrEqual(0);
                    expect(scores[name].value).toBeLessThanOrEqual(100);
                }
            }
        });
    });
});
