import { combatBonus } from "../affinity.js";
import type { CardInstance, MatchAction, MatchState, Stance, TokenSlot } from "../types.js";

/** Token 2 only when it does strictly better against the opposing token. */
export function selectToken(card: CardInstance, opponent: CardInstance | null): TokenSlot {
  if (!opponent) return 1;
  const first = combatBonus(card.tokens[0], opponent.activeToken);
  const second = combatBonus(card.tokens[1], opponent.activeToken);
  return second > first ? 2 : 1;
}

export function selectStance(card: CardInstance, opponent: CardInstance | null, attackThreshold: number): Stance {
  if (!opponent) return card.attack >= attackThreshold ? "attack" : "defense";
  if (card.attack > opponent.attack) return "attack";
  if (card.defense >= opponent.attack) return "defense";
  return card.defense > card.attack ? "defense" : "attack";
}

/**
 * Re-derives stance and token for a searched play from local rules. Search
 * scored all four variants, but the executed one comes from here.
 */
export function refinePlayAction(state: MatchState, action: MatchAction, attackThreshold: number): MatchAction {
  if (action.type !== "PLAY_CARD") return action;
  const card = state.players.ai.hand[action.handIndex];
  if (!card) return action;
  const opponent = state.players.human.field;
  return {
    type: "PLAY_CARD",
    handIndex: action.handIndex,
    stance: selectStance(card, opponent, attackThreshold),
    token: selectToken(card, opponent)
  };
}
