import { z } from "zod";

import { ConfigError } from "./errors.js";
import type { MatchConfig } from "./types.js";

export const MIN_DECK_SIZE = 10;
export const MAX_DECK_SIZE = 40;

export const defaultMatchConfig: MatchConfig = {
  seed: 1,
  deckSize: 20,
  startingLife: 8000,
  handLimit: 5,
  openingHand: 5,
  doubleKnockout: "aiWins"
};

const MatchConfigZ = z.object({
  seed: z.number().int().default(defaultMatchConfig.seed),
  deckSize: z
    .number()
    .int()
    .default(defaultMatchConfig.deckSize)
    .transform((n) => Math.max(MIN_DECK_SIZE, Math.min(n, MAX_DECK_SIZE))),
  startingLife: z.number().int().positive().default(defaultMatchConfig.startingLife),
  handLimit: z.number().int().positive().default(defaultMatchConfig.handLimit),
  openingHand: z.number().int().nonnegative().default(defaultMatchConfig.openingHand),
  doubleKnockout: z.enum(["aiWins", "draw"]).default(defaultMatchConfig.doubleKnockout)
});

export function resolveMatchConfig(partial: Partial<MatchConfig> = {}): MatchConfig {
  const parsed = MatchConfigZ.safeParse(partial);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid match config: ${detail}`);
  }
  return parsed.data;
}
