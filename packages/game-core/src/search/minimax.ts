import { applyAction, copyMatch, getLegalActions, resolveBattle } from "../engine.js";
import { listCombinations } from "../player.js";
import type { MatchAction, MatchState, Side } from "../types.js";
import { DEFAULT_SEARCH_CONFIG, resolveSearchConfig, type Evaluator, type SearchConfig, type SearchConfigInput } from "./config.js";
import { evaluate } from "./evaluate.js";
import { refinePlayAction } from "./refine.js";

export type SearchStats = {
  /** Leaves handed to the evaluator. */
  nodesEvaluated: number;
  prunings: number;
};

export type SearchNode = { score: number; action: MatchAction | null };

export type SearchSource = "fusion-shortcut" | "minimax";

export type SearchResult = {
  action: MatchAction | null;
  score: number;
  source: SearchSource;
  stats: SearchStats;
};

export function createSearchStats(): SearchStats {
  return { nodesEvaluated: 0, prunings: 0 };
}

function evaluatorFor(config: SearchConfig): Evaluator {
  return config.evaluate ?? ((state) => evaluate(state, config.weights));
}

/** Copies `state`, applies `action` for `mover`, and fights if both fields end up occupied. */
export function simulateAction(state: MatchState, mover: Side, action: MatchAction): MatchState {
  const next = copyMatch(state);
  applyAction(next, mover, action);
  if (next.players.human.field && next.players.ai.field) resolveBattle(next, mover);
  return next;
}

/**
 * Depth-limited minimax with optional alpha-beta pruning. The AI maximizes.
 * A combine keeps the same mover at the same depth; a play or pass hands over
 * and costs one ply. Ties keep the first action in enumeration order.
 */
export function minimax(
  state: MatchState,
  depth: number,
  alpha: number,
  beta: number,
  maximizing: boolean,
  config: SearchConfig = DEFAULT_SEARCH_CONFIG,
  stats: SearchStats = createSearchStats()
): SearchNode {
  const score = evaluatorFor(config);
  const leaf = (): SearchNode => {
    stats.nodesEvaluated += 1;
    return { score: score(state), action: null };
  };

  if (depth <= 0 || state.gameOver) return leaf();

  const mover: Side = maximizing ? "ai" : "human";
  const actions = getLegalActions(state, mover);
  if (actions.length === 0) return leaf();

  let best: SearchNode = { score: maximizing ? -Infinity : Infinity, action: null };
  for (const action of actions) {
    const next = simulateAction(state, mover, action);
    const child =
      action.type === "COMBINE"
        ? minimax(next, depth, alpha, beta, maximizing, config, stats)
        : minimax(next, depth - 1, alpha, beta, !maximizing, config, stats);

    if (maximizing) {
      if (best.action === null || child.score > best.score) best = { score: child.score, action };
      alpha = Math.max(alpha, child.score);
    } else {
      if (best.action === null || child.score < best.score) best = { score: child.score, action };
      beta = Math.min(beta, child.score);
    }

    if (config.pruning && beta <= alpha) {
      stats.prunings += 1;
      break;
    }
  }
  return best;
}

/**
 * The AI combine with the largest attack gain over its better material, among
 * those clearing the margin or reaching the absolute attack threshold.
 */
export function findFusionShortcut(state: MatchState, config: SearchConfig = DEFAULT_SEARCH_CONFIG): MatchAction | null {
  const player = state.players.ai;
  let best: MatchAction | null = null;
  let bestImprovement = 0;

  for (const combo of listCombinations(player, state.catalog)) {
    const a = player.hand[combo.first];
    const b = player.hand[combo.second];
    if (!a || !b) continue;
    const improvement = combo.result.attack - Math.max(a.attack, b.attack);
    const qualifies = improvement > config.fusionShortcutMargin || combo.result.attack >= config.fusionShortcutAttack;
    if (qualifies && improvement > bestImprovement) {
      best = { type: "COMBINE", first: combo.first, second: combo.second };
      bestImprovement = improvement;
    }
  }
  return best;
}

function describeAction(action: MatchAction | null): string {
  if (!action) return "none";
  switch (action.type) {
    case "PLAY_CARD":
      return `play #${action.handIndex} ${action.stance} token${action.token}`;
    case "COMBINE":
      return `combine #${action.first}+#${action.second}`;
    case "PASS":
      return "pass";
  }
}

function report(config: SearchConfig, result: SearchResult): SearchResult {
  config.log?.(
    `search: ${result.source} depth=${config.depth} nodes=${result.stats.nodesEvaluated} prunings=${result.stats.prunings} score=${result.score.toFixed(1)} move=${describeAction(result.action)}`
  );
  return result;
}

/** Picks the AI's next move. Does not modify `state`. */
export function getBestMove(state: MatchState, input: SearchConfigInput = {}): SearchResult {
  const config = resolveSearchConfig(input);
  const stats = createSearchStats();

  const shortcut = findFusionShortcut(state, config);
  if (shortcut) {
    stats.nodesEvaluated += 1;
    const score = evaluatorFor(config)(simulateAction(state, "ai", shortcut));
    return report(config, { action: shortcut, score, source: "fusion-shortcut", stats });
  }

  const node = minimax(state, config.depth, -Infinity, Infinity, true, config, stats);
  const action = node.action ? refinePlayAction(state, node.action, config.attackStanceThreshold) : null;
  return report(config, { action, score: node.score, source: "minimax", stats });
}
