import { applyAction, nextTurn, resolveBattle, undoLastPlay } from "./engine.js";
import { resolveSearchConfig, type SearchConfigInput } from "./search/config.js";
import { getBestMove, type SearchResult } from "./search/minimax.js";
import type { BattleResult, MatchCommand, MatchState, Side } from "./types.js";

export type AiTurnReport = {
  commands: MatchCommand[];
  searches: SearchResult[];
};

/**
 * Runs the battle phase for the side to move, once per turn. Null when either
 * field is empty.
 */
export function declareBattle(state: MatchState, attacker: Side): BattleResult | null {
  if (state.gameOver || attacker !== state.current || state.phase === "end") return null;
  if (!state.players.human.field || !state.players.ai.field) return null;
  state.phase = "battle";
  const result = resolveBattle(state, attacker);
  state.phase = "end";
  return result;
}

/**
 * Single mutating entry point for presentation layers. Only the side whose
 * turn it is may act, and nothing but END_TURN follows its battle.
 */
export function applyCommand(state: MatchState, command: MatchCommand): boolean {
  if (state.gameOver) return false;
  switch (command.type) {
    case "ACTION":
      if (command.side !== state.current || state.phase === "end") return false;
      return applyAction(state, command.side, command.action);
    case "UNDO":
      return undoLastPlay(state, command.side);
    case "BATTLE":
      return declareBattle(state, command.attacker) !== null;
    case "END_TURN":
      state.phase = "end";
      return nextTurn(state);
    default:
      return false;
  }
}

/**
 * Plays the AI's whole turn: an optional fusion followed by a fresh search,
 * the chosen play, a battle with the AI attacking, then hands control back.
 */
export function runAiTurn(state: MatchState, input: SearchConfigInput = {}): AiTurnReport {
  const report: AiTurnReport = { commands: [], searches: [] };
  if (state.gameOver || state.current !== "ai") return report;

  const config = resolveSearchConfig(input);
  const run = (command: MatchCommand) => {
    if (applyCommand(state, command)) report.commands.push(command);
  };

  let search = getBestMove(state, config);
  report.searches.push(search);

  if (search.action?.type === "COMBINE") {
    run({ type: "ACTION", side: "ai", action: search.action });
    search = getBestMove(state, config);
    report.searches.push(search);
  }

  if (search.action?.type === "PLAY_CARD") run({ type: "ACTION", side: "ai", action: search.action });

  if (state.players.human.field && state.players.ai.field) run({ type: "BATTLE", attacker: "ai" });
  if (!state.gameOver) run({ type: "END_TURN" });
  return report;
}
