import { z } from "zod";

import { createCardInstance } from "./cards.js";
import { CatalogError } from "./errors.js";
import type { CardDefinition, CardInstance, Catalog, FusionRecipe } from "./types.js";

export const FUSION_ID_BASE = 9000;
export const FUSION_LEVEL = 7;

const StatZ = z.number().int().nonnegative();

const CardDefinitionZ = z.object({
  id: z.number().int().nonnegative(),
  name: z.string().min(1),
  category: z.string().min(1),
  attack: StatZ,
  defense: StatZ,
  element: z.string().min(1),
  level: z.number().int().min(1).max(12)
});

const FusionRecipeZ = z.object({
  materials: z.tuple([z.string().min(1), z.string().min(1)]),
  result: CardDefinitionZ.omit({ id: true, level: true })
});

const CardsFileZ = z.object({
  contentVersion: z.string().min(1),
  cards: z.array(CardDefinitionZ).min(1)
});

const FusionsFileZ = z.object({
  contentVersion: z.string().min(1),
  fusions: z.array(FusionRecipeZ)
});

export type CatalogBundle = { cards: unknown; fusions: unknown };

function formatIssues(label: string, error: z.ZodError): string {
  const lines = error.issues.map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`);
  return `loadCatalog: invalid ${label}\n${lines.join("\n")}`;
}

function pairKey(a: string, b: string): string {
  const [x, y] = [a.toLowerCase(), b.toLowerCase()].sort();
  return `${x}\u0000${y}`;
}

export function loadCatalog(bundle: CatalogBundle): Catalog {
  const cardsFile = CardsFileZ.safeParse(bundle.cards);
  if (!cardsFile.success) throw new CatalogError(formatIssues("cards", cardsFile.error));
  const fusionsFile = FusionsFileZ.safeParse(bundle.fusions);
  if (!fusionsFile.success) throw new CatalogError(formatIssues("fusions", fusionsFile.error));

  const cards: CardDefinition[] = cardsFile.data.cards.map((c) => Object.freeze({ ...c }));
  const cardById = new Map<number, CardDefinition>();
  const cardByName = new Map<string, CardDefinition>();
  for (const card of cards) {
    if (cardById.has(card.id)) throw new CatalogError(`loadCatalog: duplicate card id ${card.id}`);
    cardById.set(card.id, card);
    cardByName.set(card.name.toLowerCase(), card);
  }

  const fusions = fusionsFile.data.fusions.map(
    (f): FusionRecipe => ({ materials: [f.materials[0], f.materials[1]], result: { ...f.result } })
  );
  const fusionByPair = new Map<string, { index: number; recipe: FusionRecipe }>();
  fusions.forEach((recipe, index) => {
    for (const material of recipe.materials) {
      if (!cardByName.has(material.toLowerCase())) {
        throw new CatalogError(`loadCatalog: fusion ${index} uses unknown material "${material}"`);
      }
    }
    const key = pairKey(recipe.materials[0], recipe.materials[1]);
    if (!fusionByPair.has(key)) fusionByPair.set(key, { index, recipe });
  });

  return Object.freeze({
    contentVersion: cardsFile.data.contentVersion,
    cards: Object.freeze(cards),
    fusions: Object.freeze(fusions),
    cardById,
    cardByName,
    fusionByPair
  });
}

export function getCardById(catalog: Catalog, id: number): CardInstance | null {
  const definition = catalog.cardById.get(id);
  return definition ? createCardInstance(definition) : null;
}

export function getCardByName(catalog: Catalog, name: string): CardInstance | null {
  const definition = catalog.cardByName.get(name.toLowerCase());
  return definition ? createCardInstance(definition) : null;
}

/** Order of the two names does not matter. */
export function findFusion(catalog: Catalog, first: string, second: string): CardInstance | null {
  const entry = catalog.fusionByPair.get(pairKey(first, second));
  if (!entry) return null;
  return createCardInstance({ ...entry.recipe.result, id: FUSION_ID_BASE + entry.index, level: FUSION_LEVEL });
}

export function listCards(catalog: Catalog): CardInstance[] {
  return catalog.cards.map(createCardInstance);
}
