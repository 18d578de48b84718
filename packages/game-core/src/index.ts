export { Xorshift32 } from "./rng/xorshift32.js";
export type {
  AffinityToken,
  BattleOutcome,
  BattleResult,
  CardDefinition,
  CardInstance,
  Catalog,
  Combination,
  DoubleKnockoutRule,
  FusionRecipe,
  MatchAction,
  MatchCommand,
  MatchConfig,
  MatchPhase,
  MatchState,
  MatchSummary,
  MatchWinner,
  PlayerState,
  Side,
  Stance,
  TokenSlot
} from "./types.js";
export { AFFINITY_BONUS, ALL_TOKENS, DOMINANCE, assignAffinityTokens, combatBonus, dominates } from "./affinity.js";
export { copyCard, createCardInstance } from "./cards.js";
export { FUSION_ID_BASE, FUSION_LEVEL, findFusion, getCardById, getCardByName, listCards, loadCatalog } from "./catalog.js";
export type { CatalogBundle } from "./catalog.js";
export { MAX_DECK_SIZE, MIN_DECK_SIZE, defaultMatchConfig, resolveMatchConfig } from "./config.js";
export { CatalogError, ConfigError } from "./errors.js";
export { canCombine, combineCards, drawCard, listCombinations, playCardToField, undoFieldPlay } from "./player.js";
export { battleValue, computeConfrontation, stanceValue } from "./rules.js";
export {
  applyAction,
  checkGameOver,
  copyMatch,
  createMatch,
  createMatchFromDecks,
  drawForPlayer,
  getCurrentPlayer,
  getLegalActions,
  getMatchSummary,
  getPlayer,
  getUpcomingCards,
  nextTurn,
  opponentOf,
  resolveBattle,
  undoLastPlay
} from "./engine.js";
export { applyCommand, declareBattle, runAiTurn } from "./turn.js";
export type { AiTurnReport } from "./turn.js";
export {
  DEFAULT_EVALUATION_WEIGHTS,
  DEFAULT_SEARCH_CONFIG,
  DIFFICULTY_DEPTHS,
  difficultyForDepth,
  isDifficulty,
  resolveSearchConfig
} from "./search/config.js";
export type { Difficulty, EvaluationWeights, Evaluator, SearchConfig, SearchConfigInput, SearchLogger } from "./search/config.js";
export { TERMINAL_SCORE, evaluate, fusionPotential } from "./search/evaluate.js";
export { findFusionShortcut, getBestMove, minimax } from "./search/minimax.js";
export type { SearchResult, SearchSource, SearchStats } from "./search/minimax.js";
export { refinePlayAction, selectStance, selectToken } from "./search/refine.js";
export { buildHashInput, hashMatchState, stableStringify } from "./stateHash.js";
export { replayMatchLog } from "./replay.js";
export type { MatchLog, ReplayResult, StartMatchCommand } from "./replay.js";
