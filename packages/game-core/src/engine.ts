import { copyCards } from "./cards.js";
import { listCards } from "./catalog.js";
import { resolveMatchConfig } from "./config.js";
import {
  copyPlayer,
  createPlayer,
  combineCards,
  drawCard,
  hasCardsLeft,
  listCombinations,
  playCardToField,
  undoFieldPlay
} from "./player.js";
import { Xorshift32 } from "./rng/xorshift32.js";
import { computeConfrontation } from "./rules.js";
import type {
  BattleOutcome,
  BattleResult,
  CardInstance,
  Catalog,
  MatchAction,
  MatchConfig,
  MatchState,
  MatchSummary,
  MatchWinner,
  PlayerState,
  Side,
  Stance,
  TokenSlot
} from "./types.js";

const PLAYER_NAMES: Record<Side, string> = { human: "Player", ai: "AI" };
const PLAY_VARIANTS: Array<{ stance: Stance; token: TokenSlot }> = [
  { stance: "attack", token: 1 },
  { stance: "attack", token: 2 },
  { stance: "defense", token: 1 },
  { stance: "defense", token: 2 }
];

export function opponentOf(side: Side): Side {
  return side === "human" ? "ai" : "human";
}

export function getPlayer(state: MatchState, side: Side): PlayerState {
  return state.players[side];
}

export function getCurrentPlayer(state: MatchState): PlayerState {
  return state.players[state.current];
}

/** Builds a match from explicit decks (front of each array is drawn first) and deals opening hands. */
export function createMatchFromDecks(
  catalog: Catalog,
  overrides: Partial<MatchConfig>,
  decks: Record<Side, CardInstance[]>
): MatchState {
  const config = resolveMatchConfig(overrides);
  const player = (side: Side) =>
    createPlayer({ side, name: PLAYER_NAMES[side], life: config.startingLife, handLimit: config.handLimit, deck: decks[side] });

  const state: MatchState = {
    catalog,
    config,
    phase: "draw",
    turn: 1,
    current: "human",
    players: { human: player("human"), ai: player("ai") },
    playedThisTurn: false,
    gameOver: false,
    winner: null,
    battleLog: [],
    lastBattle: null
  };

  for (let i = 0; i < config.openingHand; i += 1) {
    drawCard(state.players.human);
    drawCard(state.players.ai);
  }
  state.phase = "main";
  return state;
}

/** Deals two seeded decks out of the whole catalog. */
export function createMatch(catalog: Catalog, overrides: Partial<MatchConfig> = {}): MatchState {
  const config = resolveMatchConfig(overrides);
  const rng = new Xorshift32(config.seed);

  // Small catalogs are repeated until both decks can be dealt.
  let pool = rng.shuffle(listCards(catalog));
  while (pool.length < config.deckSize * 2) {
    pool = rng.shuffle(pool.concat(listCards(catalog)));
  }

  const human = rng.shuffle(pool.slice(0, config.deckSize));
  const ai = rng.shuffle(pool.slice(config.deckSize, config.deckSize * 2));
  return createMatchFromDecks(catalog, config, { human, ai });
}

export function getLegalActions(state: MatchState, side: Side): MatchAction[] {
  if (state.gameOver) return [];
  const player = state.players[side];
  const out: MatchAction[] = [];

  for (let handIndex = 0; handIndex < player.hand.length; handIndex += 1) {
    for (const variant of PLAY_VARIANTS) out.push({ type: "PLAY_CARD", handIndex, ...variant });
  }
  for (const combo of listCombinations(player, state.catalog)) {
    out.push({ type: "COMBINE", first: combo.first, second: combo.second });
  }
  // Passing keeps the current field card; with nothing else to do it is the only move.
  if (out.length === 0 || player.field) out.push({ type: "PASS" });
  return out;
}

/** Mutates `state` in place. Returns false when the action did not take effect. */
export function applyAction(state: MatchState, side: Side, action: MatchAction): boolean {
  if (state.gameOver) return false;
  const player = state.players[side];

  switch (action.type) {
    case "PLAY_CARD":
      if (!playCardToField(player, action.handIndex, action.stance, action.token)) return false;
      state.playedThisTurn = true;
      return true;
    case "COMBINE":
      return combineCards(player, state.catalog, action.first, action.second) !== null;
    case "PASS":
      return true;
    default:
      return false;
  }
}

export function drawForPlayer(state: MatchState, side: Side): CardInstance | null {
  if (state.gameOver) return null;
  return drawCard(state.players[side]);
}

/** Takes back the mover's play from this turn, before any battle. */
export function undoLastPlay(state: MatchState, side: Side): boolean {
  if (state.gameOver || side !== state.current) return false;
  if (!state.playedThisTurn || state.phase !== "main") return false;
  if (!undoFieldPlay(state.players[side])) return false;
  state.playedThisTurn = false;
  return true;
}

function destroyField(player: PlayerState) {
  if (!player.field) return;
  player.graveyard.push(player.field);
  player.field = null;
}

function describeBattle(outcome: BattleOutcome, attacker: PlayerState, defender: PlayerState, atk: string, def: string, damage: number) {
  switch (outcome) {
    case "DEFENDER_DESTROYED":
      return damage > 0 ? `${atk} destroys ${def}; ${defender.name} takes ${damage} damage.` : `${atk} destroys ${def} in defense position.`;
    case "ATTACKER_DESTROYED":
      return `${def} destroys ${atk}; ${attacker.name} takes ${damage} damage.`;
    case "REBOUND":
      return `${def} holds; ${attacker.name} takes ${damage} rebound damage.`;
    case "MUTUAL_DESTRUCTION":
      return `${atk} and ${def} destroy each other.`;
    case "STANDOFF":
      return `${atk} cannot break ${def}; nothing happens.`;
  }
}

/**
 * Resolves a confrontation between the two field cards with `attacker` striking.
 * Returns null (and changes nothing) unless both fields are occupied.
 */
export function resolveBattle(state: MatchState, attacker: Side): BattleResult | null {
  if (state.gameOver) return null;
  const attackerPlayer = state.players[attacker];
  const defenderPlayer = state.players[opponentOf(attacker)];
  const attackerCard = attackerPlayer.field;
  const defenderCard = defenderPlayer.field;
  if (!attackerCard || !defenderCard) return null;

  const { attackerValue, defenderValue, attackerBonus, defenderBonus } = computeConfrontation(attackerCard, defenderCard);
  const defenderStance = defenderCard.stance;
  const lifeDelta: Record<Side, number> = { human: 0, ai: 0 };
  let outcome: BattleOutcome;
  let winner: Side | "tie";
  let damage = 0;

  if (attackerValue > defenderValue) {
    if (defenderStance === "attack") {
      damage = attackerValue - defenderValue;
      defenderPlayer.life -= damage;
      lifeDelta[defenderPlayer.side] = -damage;
    }
    destroyField(defenderPlayer);
    outcome = "DEFENDER_DESTROYED";
    winner = attacker;
  } else if (defenderValue > attackerValue) {
    damage = defenderValue - attackerValue;
    attackerPlayer.life -= damage;
    lifeDelta[attacker] = -damage;
    if (defenderStance === "attack") {
      destroyField(attackerPlayer);
      outcome = "ATTACKER_DESTROYED";
    } else {
      outcome = "REBOUND";
    }
    winner = defenderPlayer.side;
  } else {
    if (defenderStance === "attack") {
      destroyField(attackerPlayer);
      destroyField(defenderPlayer);
      outcome = "MUTUAL_DESTRUCTION";
    } else {
      outcome = "STANDOFF";
    }
    winner = "tie";
  }

  const humanCard = attacker === "human" ? attackerCard : defenderCard;
  const aiCard = attacker === "human" ? defenderCard : attackerCard;
  const result: BattleResult = {
    attacker,
    outcome,
    winner,
    humanCard: humanCard.name,
    aiCard: aiCard.name,
    attackerValue,
    defenderValue,
    attackerBonus,
    defenderBonus,
    humanValue: attacker === "human" ? attackerValue : defenderValue,
    aiValue: attacker === "human" ? defenderValue : attackerValue,
    humanToken: humanCard.activeToken,
    aiToken: aiCard.activeToken,
    humanStance: humanCard.stance,
    aiStance: aiCard.stance,
    defenderStance,
    damage,
    lifeDelta,
    description: describeBattle(outcome, attackerPlayer, defenderPlayer, attackerCard.name, defenderCard.name, damage)
  };

  state.battleLog.push(result);
  state.lastBattle = result;
  checkGameOver(state);
  return result;
}

function finish(state: MatchState, winner: MatchWinner): boolean {
  state.gameOver = true;
  state.winner = winner;
  return true;
}

/**
 * Life is checked before deck-out, the human before the AI. Under the default
 * rule a double knockout therefore goes to the AI.
 */
export function checkGameOver(state: MatchState): boolean {
  if (state.gameOver) return true;
  const { human, ai } = state.players;

  if (human.life <= 0 && ai.life <= 0 && state.config.doubleKnockout === "draw") return finish(state, "draw");
  if (human.life <= 0) return finish(state, "ai");
  if (ai.life <= 0) return finish(state, "human");

  if (!hasCardsLeft(human)) return finish(state, "ai");
  if (!hasCardsLeft(ai)) return finish(state, "human");
  return false;
}

/** Hands control to the other side, drawing for it. Field cards stay where they are. */
export function nextTurn(state: MatchState): boolean {
  if (state.gameOver) return false;
  if (state.current === "human") {
    state.current = "ai";
  } else {
    state.current = "human";
    state.turn += 1;
  }
  state.playedThisTurn = false;
  state.players.human.lastSacrificed = null;
  state.players.ai.lastSacrificed = null;
  state.phase = "draw";
  drawCard(state.players[state.current]);
  state.phase = "main";
  checkGameOver(state);
  return true;
}

function copyBattle(result: BattleResult): BattleResult {
  return { ...result, lifeDelta: { ...result.lifeDelta } };
}

/** Fully independent copy; only the immutable catalog is shared. */
export function copyMatch(state: MatchState): MatchState {
  const battleLog = state.battleLog.map(copyBattle);
  const lastIndex = state.battleLog.length - 1;
  let lastBattle: BattleResult | null = null;
  if (state.lastBattle) {
    lastBattle = state.battleLog[lastIndex] === state.lastBattle ? battleLog[lastIndex] ?? null : copyBattle(state.lastBattle);
  }

  return {
    catalog: state.catalog,
    config: { ...state.config },
    phase: state.phase,
    turn: state.turn,
    current: state.current,
    players: { human: copyPlayer(state.players.human), ai: copyPlayer(state.players.ai) },
    playedThisTurn: state.playedThisTurn,
    gameOver: state.gameOver,
    winner: state.winner,
    battleLog,
    lastBattle
  };
}

/** Both decks are open information; this is the next `count` cards `side` will draw. */
export function getUpcomingCards(state: MatchState, side: Side, count = 3): CardInstance[] {
  return copyCards(state.players[side].deck.slice(0, Math.max(0, count)));
}

export function getMatchSummary(state: MatchState): MatchSummary {
  const { human, ai } = state.players;
  return {
    turn: state.turn,
    phase: state.phase,
    current: state.current,
    life: { human: human.life, ai: ai.life },
    handSize: { human: human.hand.length, ai: ai.hand.length },
    deckSize: { human: human.deck.length, ai: ai.deck.length },
    field: { human: human.field?.name ?? null, ai: ai.field?.name ?? null },
    gameOver: state.gameOver,
    winner: state.winner
  };
}
