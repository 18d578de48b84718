export type AffinityToken =
  | "sun"
  | "moon"
  | "venus"
  | "mercury"
  | "mars"
  | "jupiter"
  | "saturn"
  | "uranus"
  | "pluto"
  | "neptune";

export type Stance = "attack" | "defense";
export type TokenSlot = 1 | 2;
export type Side = "human" | "ai";
export type MatchPhase = "draw" | "main" | "battle" | "end";
export type MatchWinner = Side | "draw";

export type CardDefinition = {
  id: number;
  name: string;
  category: string;
  attack: number;
  defense: number;
  element: string;
  level: number;
};

export type CardInstance = CardDefinition & {
  tokens: [AffinityToken, AffinityToken];
  activeToken: AffinityToken;
  stance: Stance;
};

export type FusionRecipe = {
  materials: [string, string];
  result: Omit<CardDefinition, "id" | "level">;
};

export type Catalog = {
  contentVersion: string;
  cards: readonly CardDefinition[];
  fusions: readonly FusionRecipe[];
  cardById: ReadonlyMap<number, CardDefinition>;
  // Keyed by lower-cased name.
  cardByName: ReadonlyMap<string, CardDefinition>;
  // Keyed by the sorted, lower-cased material pair.
  fusionByPair: ReadonlyMap<string, { index: number; recipe: FusionRecipe }>;
};

export type Combination = { first: number; second: number; result: CardInstance };

export type PlayerState = {
  side: Side;
  name: string;
  isAi: boolean;
  life: number;
  handLimit: number;
  deck: CardInstance[];
  hand: CardInstance[];
  field: CardInstance | null;
  graveyard: CardInstance[];
  // Single-level undo: the card displaced from the field by the most recent play.
  lastSacrificed: CardInstance | null;
};

export type DoubleKnockoutRule = "aiWins" | "draw";

export type MatchConfig = {
  seed: number;
  deckSize: number;
  startingLife: number;
  handLimit: number;
  openingHand: number;
  doubleKnockout: DoubleKnockoutRule;
};

export type BattleOutcome =
  | "DEFENDER_DESTROYED"
  | "ATTACKER_DESTROYED"
  | "REBOUND"
  | "MUTUAL_DESTRUCTION"
  | "STANDOFF";

export type BattleResult = {
  attacker: Side;
  outcome: BattleOutcome;
  winner: Side | "tie";
  humanCard: string;
  aiCard: string;
  attackerValue: number;
  defenderValue: number;
  attackerBonus: number;
  defenderBonus: number;
  humanValue: number;
  aiValue: number;
  humanToken: AffinityToken;
  aiToken: AffinityToken;
  humanStance: Stance;
  aiStance: Stance;
  defenderStance: Stance;
  damage: number;
  lifeDelta: Record<Side, number>;
  description: string;
};

export type MatchAction =
  | { type: "PLAY_CARD"; handIndex: number; stance: Stance; token: TokenSlot }
  | { type: "COMBINE"; first: number; second: number }
  | { type: "PASS" };

export type MatchCommand =
  | { type: "ACTION"; side: Side; action: MatchAction }
  | { type: "UNDO"; side: Side }
  | { type: "BATTLE"; attacker: Side }
  | { type: "END_TURN" };

export type MatchState = {
  catalog: Catalog;
  config: MatchConfig;
  phase: MatchPhase;
  turn: number;
  current: Side;
  players: Record<Side, PlayerState>;
  // Set by a play on the current turn; undo needs it.
  playedThisTurn: boolean;
  gameOver: boolean;
  winner: MatchWinner | null;
  battleLog: BattleResult[];
  lastBattle: BattleResult | null;
};

export type MatchSummary = {
  turn: number;
  phase: MatchPhase;
  current: Side;
  life: Record<Side, number>;
  handSize: Record<Side, number>;
  deckSize: Record<Side, number>;
  field: Record<Side, string | null>;
  gameOver: boolean;
  winner: MatchWinner | null;
};
