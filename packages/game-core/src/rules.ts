import { combatBonus } from "./affinity.js";
import type { CardInstance } from "./types.js";

export type Confrontation = {
  attackerValue: number;
  defenderValue: number;
  attackerBonus: number;
  defenderBonus: number;
};

export function stanceValue(card: CardInstance): number {
  return card.stance === "attack" ? card.attack : card.defense;
}

/** A card's standing value against an opponent: its stance stat plus its own affinity bonus. */
export function battleValue(card: CardInstance, opponent: CardInstance | null): number {
  if (!opponent) return stanceValue(card);
  return stanceValue(card) + combatBonus(card.activeToken, opponent.activeToken);
}

/** The attacker always strikes with its attack stat; the defender answers with its stance stat. */
export function computeConfrontation(attacker: CardInstance, defender: CardInstance): Confrontation {
  const attackerBonus = combatBonus(attacker.activeToken, defender.activeToken);
  const defenderBonus = combatBonus(defender.activeToken, attacker.activeToken);
  return {
    attackerValue: attacker.attack + attackerBonus,
    defenderValue: stanceValue(defender) + defenderBonus,
    attackerBonus,
    defenderBonus
  };
}
