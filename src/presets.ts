import { z } from 'zod';

export const NEGATE_EARNED_STARS = 'Negate earned stars';

// ─── Sampler presets ───
// repCharTol: width of the band below the extreme that still counts as representative.
// filterScale: multiplier that pulls the sampled extreme inward to form the threshold.

function samplerPreset(repCharTol: number, filterScale: number) {
  return z.object({
    repCharTol: z.number().min(0).default(repCharTol),
    filterScale: z.number().positive().default(filterScale),
  }).default({});
}

const samplersSchema = z.object({
  colSrcAvg: samplerPreset(0.2, 0.99),
  rowSrcAvg: samplerPreset(0.2, 0.99),
  colMenuMaxAvg: samplerPreset(0.001, 0.99),
  rowMenuMin: samplerPreset(0.001, 0.97),
  colAlLocalMin: samplerPreset(0.01, 0.95),
  colAlGlobalMin: samplerPreset(0.001, 0.99),
  colAlSep: samplerPreset(0.0005, 0.99),
  textMenu: samplerPreset(0.01, 0.99),
  attackBlank: samplerPreset(0.01, 1.0),
  newLine: samplerPreset(0.01, 0.97),
  noStar: samplerPreset(0.01, 1.0),
}).default({});

const backgroundThresholdSchema = z.object({
  name: z.string(),
  bound: z.number().min(0).max(1),
  delta: z.number().min(-1).max(1),
});

// Corner patches are [x0, y0, x1, y1] in pixels.
const patchSchema = z.tuple([z.number().int(), z.number().int(), z.number().int(), z.number().int()]);

const recognitionSchema = z.object({
  outlineUpper: z.number().int().min(0).max(255).default(150),
  blobFraction: z.number().min(0).max(1).default(0.06),
  lineBgSampling: patchSchema.default([50, 20, 60, 30]),
  cornerBgSampling: patchSchema.default([0, 0, 5, 5]),
  backgroundThresholds: z.array(backgroundThresholdSchema).min(1).default([
    { name: 'lowerUser', bound: 0, delta: 0.11 },
    { name: 'upperUser', bound: 0.62, delta: 0.09 },
    { name: 'lowerDark', bound: 0.7, delta: 0.05 },
    { name: 'upperDark', bound: 0.77, delta: 0.03 },
    { name: 'lightRow', bound: 0.8, delta: -0.01 },
  ]),
}).default({});

export const processingSchema = z.object({
  samplers: samplersSchema,
  recognition: recognitionSchema,
  fallbackTolerance: z.number().min(0).max(1).default(0.2),
  pxMargin: z.number().int().nonnegative().default(10),
  outlierMargin: z.number().int().nonnegative().default(15),
  lookAheadMargin: z.number().int().nonnegative().default(100),
  starMargin: z.number().int().nonnegative().default(5),
  blackThreshold: z.number().min(0).max(1).default(0.01),
  whiteThreshold: z.number().min(0).max(1).default(0.99),
  maxWarPlayers: z.number().int().positive().default(50),
  nameConfidence: z.number().min(0).max(100).default(65),
});

// ─── Game rules ───

const penaltySchema = z.union([
  z.number().int(),
  z.string()
    .refine(s => s.trim().toLowerCase() === NEGATE_EARNED_STARS.toLowerCase(), {
      message: `penalty must be an integer or "${NEGATE_EARNED_STARS}"`,
    })
    .transform((): typeof NEGATE_EARNED_STARS => NEGATE_EARNED_STARS),
]);

export const gameRulesSchema = z.object({
  noThreeStarDroppingThreshold: z.number().int().default(-5),
  noThreeStarDroppingPenalty: penaltySchema.default(-1),
  droppingForFirstAttackThreshold: z.number().int().default(-10),
  droppingForFirstAttackPenalty: penaltySchema.default(NEGATE_EARNED_STARS),
  successfulJumpThreshold: z.number().int().default(5),
  successfulJumpBonus: z.number().int().default(1),
});

export type ProcessingPresets = z.infer<typeof processingSchema>;
export type SamplerPreset = ProcessingPresets['samplers']['colSrcAvg'];
export type RecognitionPresets = ProcessingPresets['recognition'];
export type GameRules = z.infer<typeof gameRulesSchema>;
export type Penalty = GameRules['noThreeStarDroppingPenalty'];

/** Merge stored values over the documented defaults. */
export function parseProcessingPresets(stored: unknown = {}): ProcessingPresets {
  return processingSchema.parse(stored ?? {});
}

export function parseGameRules(stored: unknown = {}): GameRules {
  return gameRulesSchema.parse(stored ?? {});
}

export const DEFAULT_PRESETS: ProcessingPresets = parseProcessingPresets();
export const DEFAULT_GAME_RULES: GameRules = parseGameRules();
