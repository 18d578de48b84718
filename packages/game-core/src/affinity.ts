import type { AffinityToken } from "./types.js";

export const AFFINITY_BONUS = 500;

export const ALL_TOKENS: AffinityToken[] = [
  "sun",
  "moon",
  "venus",
  "mercury",
  "mars",
  "jupiter",
  "saturn",
  "uranus",
  "pluto",
  "neptune"
];

// Each token beats exactly one token and loses to exactly one token.
export const DOMINANCE: Record<AffinityToken, { strong: AffinityToken; weak: AffinityToken }> = {
  sun: { strong: "moon", weak: "mercury" },
  moon: { strong: "venus", weak: "sun" },
  venus: { strong: "mercury", weak: "moon" },
  mercury: { strong: "sun", weak: "venus" },
  mars: { strong: "jupiter", weak: "neptune" },
  jupiter: { strong: "saturn", weak: "mars" },
  saturn: { strong: "uranus", weak: "jupiter" },
  uranus: { strong: "pluto", weak: "saturn" },
  pluto: { strong: "neptune", weak: "uranus" },
  neptune: { strong: "mars", weak: "pluto" }
};

const ELEMENT_TOKENS: Record<string, [AffinityToken, AffinityToken]> = {
  Light: ["sun", "mercury"],
  Dark: ["moon", "venus"],
  Fire: ["mars", "sun"],
  Water: ["neptune", "moon"],
  Earth: ["uranus", "jupiter"],
  Wind: ["saturn", "jupiter"],
  Divine: ["sun", "moon"]
};

const FALLBACK_ELEMENT_TOKENS: [AffinityToken, AffinityToken] = ["uranus", "jupiter"];

const CATEGORY_TOKEN: Record<string, AffinityToken> = {
  Dragon: "moon",
  Spellcaster: "venus",
  Warrior: "sun",
  Beast: "saturn",
  "Beast-Warrior": "uranus",
  "Winged-Beast": "jupiter",
  Fiend: "venus",
  Zombie: "pluto",
  Machine: "uranus",
  Aqua: "moon",
  Fish: "saturn",
  "Sea-Serpent": "mars",
  Reptile: "neptune",
  Pyro: "sun",
  Thunder: "saturn",
  Rock: "mars",
  Plant: "sun",
  Insect: "moon",
  Fairy: "venus",
  Dinosaur: "mars"
};

const FALLBACK_CATEGORY_TOKEN: AffinityToken = "jupiter";

function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

/**
 * Token 1 comes from the element, token 2 from the category. When both land on
 * the same token, token 2 falls back to the element's alternate.
 */
export function assignAffinityTokens(element: string, category: string): [AffinityToken, AffinityToken] {
  const [primary, alternate] = lookup(ELEMENT_TOKENS, element) ?? FALLBACK_ELEMENT_TOKENS;
  const fromCategory = lookup(CATEGORY_TOKEN, category) ?? FALLBACK_CATEGORY_TOKEN;
  return [primary, fromCategory === primary ? alternate : fromCategory];
}

export function dominates(token: AffinityToken, other: AffinityToken): boolean {
  return DOMINANCE[token].strong === other;
}

/** Not symmetric: always pass the token whose value is being adjusted first. */
export function combatBonus(attackerToken: AffinityToken, defenderToken: AffinityToken): number {
  if (dominates(attackerToken, defenderToken)) return AFFINITY_BONUS;
  if (dominates(defenderToken, attackerToken)) return -AFFINITY_BONUS;
  return 0;
}
