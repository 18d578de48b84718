import { z } from "zod";

import { ConfigError } from "../errors.js";
import type { MatchState } from "../types.js";

export type EvaluationWeights = {
  /** Per point of life difference. */
  life: number;
  /** Fraction of a lone field card's attack. */
  fieldPresence: number;
  /** Per point of prospective confrontation margin. */
  fieldMargin: number;
  /** Flat swing when the losing side of that confrontation stands in attack stance. */
  exposedStance: number;
  handPower: number;
  bestAttack: number;
  handSize: number;
  deckSize: number;
  fusionPotential: number;
  /** Attack improvement worth one extra unit of fusion potential. */
  fusionImprovementUnit: number;
  lookahead: number;
  lowLifeThreshold: number;
  lowLife: number;
};

export const DEFAULT_EVALUATION_WEIGHTS: EvaluationWeights = {
  life: 1.5,
  fieldPresence: 0.3,
  fieldMargin: 0.5,
  exposedStance: 200,
  handPower: 0.1,
  bestAttack: 0.15,
  handSize: 75,
  deckSize: 25,
  fusionPotential: 150,
  fusionImprovementUnit: 500,
  lookahead: 0.05,
  lowLifeThreshold: 2000,
  lowLife: 0.5
};

export type Evaluator = (state: MatchState) => number;
export type SearchLogger = (line: string) => void;

export type SearchConfig = {
  depth: number;
  weights: EvaluationWeights;
  /** A fusion is taken without searching when it beats the better material by more than this... */
  fusionShortcutMargin: number;
  /** ...or when its result reaches this attack. */
  fusionShortcutAttack: number;
  /** With an empty opposing field, cards at or above this attack are played in attack stance. */
  attackStanceThreshold: number;
  pruning: boolean;
  evaluate?: Evaluator;
  log?: SearchLogger;
};

export type SearchConfigInput = Partial<Omit<SearchConfig, "weights">> & { weights?: Partial<EvaluationWeights> };

export const DIFFICULTY_DEPTHS = {
  easy: 2,
  normal: 4,
  hard: 6,
  expert: 8
} as const;

export type Difficulty = keyof typeof DIFFICULTY_DEPTHS;

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  depth: DIFFICULTY_DEPTHS.normal,
  weights: DEFAULT_EVALUATION_WEIGHTS,
  fusionShortcutMargin: 500,
  fusionShortcutAttack: 2500,
  attackStanceThreshold: 1500,
  pruning: true
};

export function isDifficulty(value: string): value is Difficulty {
  return Object.hasOwn(DIFFICULTY_DEPTHS, value);
}

export function difficultyForDepth(depth: number): Difficulty {
  if (depth <= DIFFICULTY_DEPTHS.easy) return "easy";
  if (depth <= DIFFICULTY_DEPTHS.normal) return "normal";
  if (depth <= DIFFICULTY_DEPTHS.hard) return "hard";
  return "expert";
}

const w = DEFAULT_EVALUATION_WEIGHTS;
const WeightsZ = z
  .object({
    life: z.number().default(w.life),
    fieldPresence: z.number().default(w.fieldPresence),
    fieldMargin: z.number().default(w.fieldMargin),
    exposedStance: z.number().default(w.exposedStance),
    handPower: z.number().default(w.handPower),
    bestAttack: z.number().default(w.bestAttack),
    handSize: z.number().default(w.handSize),
    deckSize: z.number().default(w.deckSize),
    fusionPotential: z.number().default(w.fusionPotential),
    fusionImprovementUnit: z.number().positive().default(w.fusionImprovementUnit),
    lookahead: z.number().default(w.lookahead),
    lowLifeThreshold: z.number().default(w.lowLifeThreshold),
    lowLife: z.number().default(w.lowLife)
  })
  .default({});

const SearchConfigZ = z.object({
  depth: z.number().int().min(1).default(DEFAULT_SEARCH_CONFIG.depth),
  weights: WeightsZ,
  fusionShortcutMargin: z.number().default(DEFAULT_SEARCH_CONFIG.fusionShortcutMargin),
  fusionShortcutAttack: z.number().default(DEFAULT_SEARCH_CONFIG.fusionShortcutAttack),
  attackStanceThreshold: z.number().default(DEFAULT_SEARCH_CONFIG.attackStanceThreshold),
  pruning: z.boolean().default(DEFAULT_SEARCH_CONFIG.pruning)
});

export function resolveSearchConfig(partial: SearchConfigInput = {}): SearchConfig {
  const parsed = SearchConfigZ.safeParse(partial);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid search config: ${detail}`);
  }
  const config: SearchConfig = parsed.data;
  if (partial.evaluate) config.evaluate = partial.evaluate;
  if (partial.log) config.log = partial.log;
  return config;
}
