import { copyCard, copyCards } from "./cards.js";
import { findFusion } from "./catalog.js";
import type { CardInstance, Catalog, Combination, PlayerState, Side, Stance, TokenSlot } from "./types.js";

export type NewPlayer = {
  side: Side;
  name: string;
  life: number;
  handLimit: number;
  deck?: CardInstance[];
};

export function createPlayer(init: NewPlayer): PlayerState {
  return {
    side: init.side,
    name: init.name,
    isAi: init.side === "ai",
    life: init.life,
    handLimit: init.handLimit,
    deck: init.deck ? [...init.deck] : [],
    hand: [],
    field: null,
    graveyard: [],
    lastSacrificed: null
  };
}

function isHandIndex(player: PlayerState, index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < player.hand.length;
}

/** Moves the top of the deck into the hand; null when the deck is empty or the hand is full. */
export function drawCard(player: PlayerState): CardInstance | null {
  if (player.hand.length >= player.handLimit) return null;
  const card = player.deck.shift();
  if (!card) return null;
  player.hand.push(card);
  return card;
}

export function playCardToField(player: PlayerState, handIndex: number, stance: Stance, token: TokenSlot): boolean {
  if (!isHandIndex(player, handIndex)) return false;

  player.lastSacrificed = null;
  if (player.field) {
    player.graveyard.push(player.field);
    player.lastSacrificed = player.field;
  }

  const [card] = player.hand.splice(handIndex, 1);
  if (!card) return false;
  card.stance = stance;
  card.activeToken = token === 1 ? card.tokens[0] : card.tokens[1];
  player.field = card;
  return true;
}

/** Returns the field card to the hand and restores whatever it displaced. One level only. */
export function undoFieldPlay(player: PlayerState): boolean {
  const card = player.field;
  if (!card) return false;

  player.hand.push(card);
  player.field = null;

  const sacrificed = player.lastSacrificed;
  if (sacrificed) {
    if (player.graveyard[player.graveyard.length - 1] === sacrificed) {
      player.graveyard.pop();
      player.field = sacrificed;
    }
    player.lastSacrificed = null;
  }
  return true;
}

export function canCombine(player: PlayerState, catalog: Catalog, first: number, second: number): CardInstance | null {
  if (first === second) return null;
  if (!isHandIndex(player, first) || !isHandIndex(player, second)) return null;
  const a = player.hand[first];
  const b = player.hand[second];
  if (!a || !b) return null;
  return findFusion(catalog, a.name, b.name);
}

export function combineCards(player: PlayerState, catalog: Catalog, first: number, second: number): CardInstance | null {
  const result = canCombine(player, catalog, first, second);
  if (!result) return null;

  // Higher index first so the lower one stays valid.
  for (const index of first > second ? [first, second] : [second, first]) {
    const [material] = player.hand.splice(index, 1);
    if (material) player.graveyard.push(material);
  }
  player.hand.push(result);
  return result;
}

export function listCombinations(player: PlayerState, catalog: Catalog): Combination[] {
  const out: Combination[] = [];
  for (let i = 0; i < player.hand.length; i += 1) {
    for (let j = i + 1; j < player.hand.length; j += 1) {
      const result = canCombine(player, catalog, i, j);
      if (result) out.push({ first: i, second: j, result });
    }
  }
  return out;
}

export function hasCardsLeft(player: PlayerState): boolean {
  return player.deck.length > 0 || player.hand.length > 0 || player.field !== null;
}

export function copyPlayer(player: PlayerState): PlayerState {
  const graveyard = copyCards(player.graveyard);
  let lastSacrificed: CardInstance | null = null;
  if (player.lastSacrificed) {
    // Keep the undo link pointing at the copied discard top when it is still there.
    const top = player.graveyard.length - 1;
    lastSacrificed = player.graveyard[top] === player.lastSacrificed ? graveyard[top] ?? null : copyCard(player.lastSacrificed);
  }

  return {
    side: player.side,
    name: player.name,
    isAi: player.isAi,
    life: player.life,
    handLimit: player.handLimit,
    deck: copyCards(player.deck),
    hand: copyCards(player.hand),
    field: player.field ? copyCard(player.field) : null,
    graveyard,
    lastSacrificed
  };
}
