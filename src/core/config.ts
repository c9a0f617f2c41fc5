/**
 * Simulator configuration. Everything physical (clock period, skew budget,
 * tier latencies, wavelengths) is configuration; the schema supplies the
 * reference defaults.
 */
import { z } from 'zod';
import {
  DEFAULT_CLOCK_PERIOD_PS, DEFAULT_DATA_WORDS, DEFAULT_SKEW_BASELINE,
  DEFAULT_SKEW_THRESHOLD, DEFAULT_TIERS, REGISTER_BANKS, WDM_TRIPLETS, WEIGHT_WRITE_LATENCY,
} from './constants';
import { ConfigurationError } from './errors';
import { DEFAULT_WORD_TRITS } from './word';
import type { TierId } from './types';

const TIER_IDS: readonly TierId[] = [1, 2, 3];

const WordValue = z.union([z.number().int(), z.string().regex(/^[+0-]+$/, 'balanced-ternary literal')]);

const Triplet = z.object({
  neg: z.number().positive(),
  zero: z.number().positive(),
  pos: z.number().positive(),
});

const Tier = z.object({
  capacity: z.number().int().positive(),
  latency: z.number().nonnegative(),
  accessCycles: z.number().int().positive(),
});

const EncodedInstruction = z
  .tuple([z.array(z.number().int()).length(3)])
  .rest(z.union([z.string(), z.number()]));

export const SimulatorConfigSchema = z
  .object({
    array: z
      .object({
        rows: z.number().int().positive().default(27),
        cols: z.number().int().positive().default(27),
      })
      .default({}),
    wordTrits: z.number().int().min(2).default(DEFAULT_WORD_TRITS),
    lanes: z
      .object({
        count: z.number().int().positive().default(1),
        subChannels: z.number().int().positive().default(1),
        disabled: z.array(z.number().int().positive()).default([]),
        triplets: z.array(Triplet).min(1).optional(),
      })
      .default({}),
    clock: z
      .object({
        periodPs: z.number().positive().default(DEFAULT_CLOCK_PERIOD_PS),
        skewThreshold: z.number().positive().default(DEFAULT_SKEW_THRESHOLD),
        skewBaseline: z
          .object({
            pes: z.number().int().min(2).default(DEFAULT_SKEW_BASELINE.pes),
            fraction: z.number().positive().default(DEFAULT_SKEW_BASELINE.fraction),
          })
          .default({}),
      })
      .default({}),
    tiers: z.array(Tier).length(3).default(() => DEFAULT_TIERS.map(t => ({ ...t }))),
    weightWriteLatency: z.number().nonnegative().default(WEIGHT_WRITE_LATENCY),
    dataWords: z.number().int().positive().default(DEFAULT_DATA_WORDS),
    mispredictPenalty: z.number().int().nonnegative().default(1),
    logDomain: z
      .object({
        enabled: z.boolean().default(false),
        addMultiplier: z.number().positive().default(9),
      })
      .default({}),
    program: z.union([z.string(), z.array(EncodedInstruction)]).default([]),
    data: z.record(z.string().regex(/^\d+$/, 'data address'), WordValue).default({}),
    registers: z.record(z.string(), WordValue).default({}),
    interrupts: z
      .object({
        handler: z.number().int().nonnegative().optional(),
        at: z.array(z.number().int().nonnegative()).default([]),
      })
      .default({}),
    maxCycles: z.number().int().positive().default(100_000),
  })
  .superRefine((cfg, ctx) => {
    const available = (cfg.lanes.triplets ?? WDM_TRIPLETS).length;
    if (cfg.lanes.count > available) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['lanes', 'count'],
        message: `only ${available} wavelength triplets available`,
      });
    }
    for (const id of cfg.lanes.disabled) {
      if (id > cfg.lanes.count) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['lanes', 'disabled'],
          message: `lane ${id} does not exist`,
        });
      }
    }
    // Registers bind in their home tier and spill downward, so every tier
    // together with the tiers below it must hold the banks homed there
    for (const start of TIER_IDS) {
      const below = TIER_IDS.filter(t => t >= start);
      const slots = below.reduce((n, t) => n + cfg.tiers[t - 1].capacity, 0);
      const needed = below.reduce((n, t) => n + REGISTER_BANKS[t].length, 0);
      if (slots < needed) {
        const range = start === 3 ? 'tier 3 holds' : `tiers ${start}-3 hold`;
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tiers'],
          message: `${range} ${slots} slots, registers homed there need ${needed}`,
        });
      }
    }
    for (const key of Object.keys(cfg.data)) {
      if (Number(key) >= cfg.dataWords) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['data', key],
          message: `address outside data memory (${cfg.dataWords} words)`,
        });
      }
    }
  });

export type SimulatorConfig = z.infer<typeof SimulatorConfigSchema>;
export type SimulatorConfigInput = z.input<typeof SimulatorConfigSchema>;

export function parseConfig(input: unknown): SimulatorConfig {
  const parsed = SimulatorConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
    throw new ConfigurationError('Invalid configuration', issues);
  }
  return parsed.data;
}
