import {
  getUpcomingCards,
  listCombinations,
  type BattleResult,
  type CardInstance,
  type MatchState,
  type MatchWinner,
  type PlayerState,
  type SearchResult,
  type Side
} from "@fusion-duel/game-core";

export function renderCard(card: CardInstance): string {
  const [first, second] = card.tokens;
  const tokens = card.activeToken === first ? `${first}*/${second}` : `${first}/${second}*`;
  return `${card.name} ${card.attack}/${card.defense} ${card.element} ${card.category} [${tokens}]`;
}

function renderField(player: PlayerState): string {
  if (!player.field) return "(empty)";
  return `${renderCard(player.field)} ${player.field.stance === "attack" ? "ATK" : "DEF"}`;
}

export function renderHand(player: PlayerState): string {
  if (player.hand.length === 0) return "  (empty)";
  return player.hand.map((card, i) => `  ${i}: ${renderCard(card)}`).join("\n");
}

export function renderFusions(state: MatchState, side: Side): string {
  const player = state.players[side];
  const combos = listCombinations(player, state.catalog);
  if (combos.length === 0) return "No fusions in hand.";
  return combos
    .map((c) => `  fuse ${c.first} ${c.second}: ${player.hand[c.first]?.name} + ${player.hand[c.second]?.name} -> ${renderCard(c.result)}`)
    .join("\n");
}

export function renderBattle(result: BattleResult): string {
  const who = result.attacker === "human" ? "You attack" : "AI attacks";
  return `${who}: ${result.attackerValue} vs ${result.defenderValue} (bonus ${result.attackerBonus}/${result.defenderBonus}). ${result.description}`;
}

function renderSide(state: MatchState, side: Side, showHand: boolean): string[] {
  const player = state.players[side];
  const upcoming = getUpcomingCards(state, side).map((c) => c.name);
  const lines = [
    `${player.name}  Life ${player.life}  Hand ${player.hand.length}  Deck ${player.deck.length}  Graveyard ${player.graveyard.length}`,
    `  Field: ${renderField(player)}`,
    `  Next: ${upcoming.join(", ") || "(none)"}`
  ];
  if (showHand) lines.push(renderHand(player));
  return lines;
}

export function renderBoard(state: MatchState): string {
  const lines = [
    `Turn ${state.turn} (${state.current === "human" ? "your move" : "AI to move"})`,
    ...renderSide(state, "ai", false),
    ...renderSide(state, "human", true)
  ];
  if (state.lastBattle) lines.push(`Last battle: ${state.lastBattle.description}`);
  return lines.join("\n");
}

export function renderSearch(result: SearchResult): string {
  return `AI ${result.source === "fusion-shortcut" ? "spots a fusion" : "searched"} (${result.stats.nodesEvaluated} positions, ${result.stats.prunings} cutoffs)`;
}

export function renderWinner(winner: MatchWinner | null): string {
  if (winner === "human") return "You win!";
  if (winner === "ai") return "The AI wins.";
  if (winner === "draw") return "Double knockout: it's a draw.";
  return "";
}
