import { assignAffinityTokens } from "./affinity.js";
import type { CardDefinition, CardInstance } from "./types.js";

export function createCardInstance(definition: CardDefinition): CardInstance {
  const tokens = assignAffinityTokens(definition.element, definition.category);
  return {
    id: definition.id,
    name: definition.name,
    category: definition.category,
    attack: definition.attack,
    defense: definition.defense,
    element: definition.element,
    level: definition.level,
    tokens,
    activeToken: tokens[0],
    stance: "attack"
  };
}

export function copyCard(card: CardInstance): CardInstance {
  return { ...card, tokens: [card.tokens[0], card.tokens[1]] };
}

export function copyCards(cards: readonly CardInstance[]): CardInstance[] {
  return cards.map(copyCard);
}
