import fs from 'fs';
import { z } from 'zod';
import { CycleInputError } from '../shared/errors';
import logger from '../shared/logger';
import { CycleInput, SymbolInput } from '../shared/types';

const metric = z.number().finite().nullable().optional();

const marketHealthSchema = z
  .object({
    benchmarkTrend: metric,
    breadth: metric,
    volatilityComfort: metric,
    avgPositioning: metric,
    riskOn: metric,
  })
  .strict();

// JSON has no NaN; null marks a feature the extractor could not compute
const featureSetSchema = z.record(z.string(), z.number().nullable());

const symbolInputSchema = z
  .object({
    symbol: z.string().trim().min(1),
    timeframe: z.string().trim().min(1),
    features: z
      .object({
        trend: featureSetSchema.optional(),
        volume: featureSetSchema.optional(),
        volatility: featureSetSchema.optional(),
        relative_strength: featureSetSchema.optional(),
        positioning: featureSetSchema.optional(),
      })
      .strict(),
    patterns: z
      .array(
        z.object({
          tag: z.string().min(1),
          barsSinceTrigger: z.number().int().min(0),
          strength: z.number().finite().nullable().default(null),
        })
      )
      .default([]),
  })
  .strict();

const cycleInputSchema = z.object({
  marketHealth: marketHealthSchema,
  symbols: z.array(z.unknown()),
});

/**
 * Validate a cycle snapshot. A malformed envelope is an error; a malformed
 * symbol entry is logged and dropped so the rest of the universe still scans.
 */
export function parseCycleInput(raw: unknown): CycleInput {
  const envelope = cycleInputSchema.safeParse(raw);
  if (!envelope.success) {
    const issues = envelope.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CycleInputError(`Invalid cycle input: ${issues.join('; ')}`);
  }

  const symbols: SymbolInput[] = [];
  envelope.data.symbols.forEach((entry, index) => {
    const parsed = symbolInputSchema.safeParse(entry);
    if (parsed.success) {
      symbols.push(parsed.data);
    } else {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      logger.warn(`[CycleInput] Skipping symbols[${index}]: ${issues.join('; ')}`);
    }
  });

  return { marketHealth: envelope.data.marketHealth, symbols };
}

export function loadCycleInput(filePath: string): CycleInput {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new CycleInputError(`Could not read cycle input ${filePath}`, error);
  }
  return parseCycleInput(raw);
}
