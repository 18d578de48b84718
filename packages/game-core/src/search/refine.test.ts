import { describe, expect, it } from "vitest";

import { createMatchFromDecks } from "../engine.js";
import { loadCatalog } from "../catalog.js";
import type { AffinityToken, CardInstance } from "../types.js";
import { refinePlayAction, selectStance, selectToken } from "./refine.js";

function card(attack: number, defense: number, tokens: [AffinityToken, AffinityToken] = ["pluto", "jupiter"]): CardInstance {
  return {
    id: 0,
    name: "Card",
    category: "Warrior",
    attack,
    defense,
    element: "Earth",
    level: 4,
    tokens,
    activeToken: tokens[0],
    stance: "attack"
  };
}

describe("selectToken", () => {
  it("defaults to token 1 with nobody to face", () => {
    expect(selectToken(card(1000, 1000, ["moon", "sun"]), null)).toBe(1);
  });

  it("switches to token 2 only when it does strictly better", () => {
    const opponent = card(1000, 1000, ["moon", "saturn"]);
    expect(selectToken(card(1000, 1000, ["mars", "sun"]), opponent)).toBe(2);
    expect(selectToken(card(1000, 1000, ["sun", "mars"]), opponent)).toBe(1);
    expect(selectToken(card(1000, 1000, ["mars", "pluto"]), opponent)).toBe(1);
  });

  it("moves off a token the opponent dominates", () => {
    // moon beats venus; mars is neutral to moon.
    const opponent = card(1000, 1000, ["moon", "saturn"]);
    expect(selectToken(card(1000, 1000, ["venus", "mars"]), opponent)).toBe(2);
  });
});

describe("selectStance", () => {
  it("uses the attack threshold against an empty field", () => {
    expect(selectStance(card(1500, 100), null, 1500)).toBe("attack");
    expect(selectStance(card(1499, 100), null, 1500)).toBe("defense");
  });

  it("attacks when it out-hits the opposing card", () => {
    expect(selectStance(card(1600, 100), card(1500, 2500), 1500)).toBe("attack");
  });

  it("blocks when its defense holds", () => {
    expect(selectStance(card(1200, 1500), card(1500, 100), 1500)).toBe("defense");
  });

  it("otherwise uses its own better stat", () => {
    expect(selectStance(card(900, 1400), card(1500, 100), 1500)).toBe("defense");
    expect(selectStance(card(1200, 1000), card(1500, 100), 1500)).toBe("attack");
    expect(selectStance(card(1000, 1000), card(1500, 100), 1500)).toBe("attack");
  });
});

describe("refinePlayAction", () => {
  const catalog = loadCatalog({
    cards: { contentVersion: "test", cards: [{ id: 1, name: "Solo", category: "Warrior", attack: 1000, defense: 1000, element: "Earth", level: 4 }] },
    fusions: { contentVersion: "test", fusions: [] }
  });

  it("rewrites stance and token of a play against the human's field card", () => {
    const state = createMatchFromDecks(catalog, {}, { human: [], ai: [] });
    state.players.ai.hand = [card(1200, 1800, ["venus", "mars"])];
    state.players.human.field = card(1500, 1000, ["moon", "saturn"]);

    const refined = refinePlayAction(state, { type: "PLAY_CARD", handIndex: 0, stance: "attack", token: 1 }, 1500);
    expect(refined).toEqual({ type: "PLAY_CARD", handIndex: 0, stance: "defense", token: 2 });
  });

  it("passes other actions through", () => {
    const state = createMatchFromDecks(catalog, {}, { human: [], ai: [] });
    expect(refinePlayAction(state, { type: "PASS" }, 1500)).toEqual({ type: "PASS" });
    expect(refinePlayAction(state, { type: "COMBINE", first: 0, second: 1 }, 1500)).toEqual({ type: "COMBINE", first: 0, second: 1 });
    expect(refinePlayAction(state, { type: "PLAY_CARD", handIndex: 3, stance: "attack", token: 2 }, 1500)).toEqual({
      type: "PLAY_CARD",
      handIndex: 3,
      stance: "attack",
      token: 2
    });
  });
});
