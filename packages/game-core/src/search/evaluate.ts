import { listCombinations } from "../player.js";
import { battleValue } from "../rules.js";
import type { CardInstance, Catalog, MatchState, PlayerState } from "../types.js";
import { DEFAULT_EVALUATION_WEIGHTS, type EvaluationWeights } from "./config.js";

export const TERMINAL_SCORE = 100_000;

function bestStat(card: CardInstance): number {
  return Math.max(card.attack, card.defense);
}

function handPower(player: PlayerState): number {
  return player.hand.reduce((sum, card) => sum + bestStat(card), 0);
}

function bestAttack(player: PlayerState): number {
  return player.hand.reduce((best, card) => Math.max(best, card.attack), 0);
}

function lookahead(player: PlayerState): number {
  const next = player.deck[0];
  return next ? bestStat(next) : 0;
}

/** Each combinable pair counts once, plus a fraction for how far it out-hits its better material. */
export function fusionPotential(player: PlayerState, catalog: Catalog, improvementUnit = DEFAULT_EVALUATION_WEIGHTS.fusionImprovementUnit): number {
  let total = 0;
  for (const combo of listCombinations(player, catalog)) {
    const a = player.hand[combo.first];
    const b = player.hand[combo.second];
    if (!a || !b) continue;
    const improvement = combo.result.attack - Math.max(a.attack, b.attack);
    total += 1 + Math.max(0, improvement) / improvementUnit;
  }
  return total;
}

function fieldControl(ai: PlayerState, human: PlayerState, w: EvaluationWeights): number {
  const mine = ai.field;
  const theirs = human.field;
  if (mine && !theirs) return w.fieldPresence * mine.attack;
  if (theirs && !mine) return -w.fieldPresence * theirs.attack;
  if (!mine || !theirs) return 0;

  const aiValue = battleValue(mine, theirs);
  const humanValue = battleValue(theirs, mine);
  if (aiValue > humanValue) {
    return (aiValue - humanValue) * w.fieldMargin + (theirs.stance === "attack" ? w.exposedStance : 0);
  }
  return -(humanValue - aiValue) * w.fieldMargin - (mine.stance === "attack" ? w.exposedStance : 0);
}

function lowLifePressure(player: PlayerState, w: EvaluationWeights): number {
  return player.life < w.lowLifeThreshold ? (w.lowLifeThreshold - player.life) * w.lowLife : 0;
}

/** Static score from the AI's point of view: positive favours the AI. */
export function evaluate(state: MatchState, weights: EvaluationWeights = DEFAULT_EVALUATION_WEIGHTS): number {
  if (state.gameOver) {
    if (state.winner === "ai") return TERMINAL_SCORE;
    if (state.winner === "human") return -TERMINAL_SCORE;
    return 0;
  }

  const w = weights;
  const { ai, human } = state.players;
  let score = (ai.life - human.life) * w.life;

  score += fieldControl(ai, human, w);

  score += (handPower(ai) - handPower(human)) * w.handPower;
  score += (bestAttack(ai) - bestAttack(human)) * w.bestAttack;

  score += (ai.hand.length - human.hand.length) * w.handSize;
  score += (ai.deck.length - human.deck.length) * w.deckSize;

  const unit = w.fusionImprovementUnit;
  score += (fusionPotential(ai, state.catalog, unit) - fusionPotential(human, state.catalog, unit)) * w.fusionPotential;

  score += (lookahead(ai) - lookahead(human)) * w.lookahead;

  score -= lowLifePressure(ai, w);
  score += lowLifePressure(human, w);
  return score;
}
