import { describe, expect, it } from "vitest";

import { ALL_TOKENS, DOMINANCE, assignAffinityTokens, combatBonus, dominates } from "./affinity.js";

describe("affinity dominance", () => {
  it("gives every token exactly one strong and one weak relation", () => {
    for (const token of ALL_TOKENS) {
      const beaten = ALL_TOKENS.filter((other) => dominates(token, other));
      const beatenBy = ALL_TOKENS.filter((other) => dominates(other, token));
      expect(beaten).toEqual([DOMINANCE[token].strong]);
      expect(beatenBy).toEqual([DOMINANCE[token].weak]);
    }
  });

  it("scores +500 for the dominating side and -500 for the dominated one", () => {
    expect(combatBonus("sun", "moon")).toBe(500);
    expect(combatBonus("moon", "sun")).toBe(-500);
    expect(combatBonus("neptune", "mars")).toBe(500);
    expect(combatBonus("mars", "neptune")).toBe(-500);
  });

  it("scores 0 between unrelated tokens and a token against itself", () => {
    expect(combatBonus("sun", "venus")).toBe(0);
    expect(combatBonus("sun", "mars")).toBe(0);
    expect(combatBonus("pluto", "pluto")).toBe(0);
  });

  it("is never symmetric when one side dominates", () => {
    for (const a of ALL_TOKENS) {
      for (const b of ALL_TOKENS) {
        if (!dominates(a, b) && !dominates(b, a)) continue;
        expect(combatBonus(a, b)).not.toBe(combatBonus(b, a));
        expect(combatBonus(a, b)).toBe(-combatBonus(b, a));
      }
    }
  });
});

describe("assignAffinityTokens", () => {
  it("takes token 1 from the element and token 2 from the category", () => {
    expect(assignAffinityTokens("Fire", "Dragon")).toEqual(["mars", "moon"]);
    expect(assignAffinityTokens("Earth", "Rock")).toEqual(["uranus", "mars"]);
  });

  it("swaps in the element's alternate when both tokens coincide", () => {
    expect(assignAffinityTokens("Light", "Warrior")).toEqual(["sun", "mercury"]);
    expect(assignAffinityTokens("Wind", "Thunder")).toEqual(["saturn", "jupiter"]);
  });

  it("falls back for unknown elements and categories", () => {
    expect(assignAffinityTokens("Void", "Mystery")).toEqual(["uranus", "jupiter"]);
    expect(assignAffinityTokens("Fire", "Mystery")).toEqual(["mars", "jupiter"]);
    expect(assignAffinityTokens("Void", "Machine")).toEqual(["uranus", "jupiter"]);
  });

  it("never yields a repeated pair for any known combination", () => {
    const elements = ["Light", "Dark", "Fire", "Water", "Earth", "Wind", "Divine", "Void"];
    const categories = ["Dragon", "Warrior", "Machine", "Thunder", "Pyro", "Aqua", "Zombie", "Unknown"];
    for (const element of elements) {
      for (const category of categories) {
        const [a, b] = assignAffinityTokens(element, category);
        expect(a).not.toBe(b);
      }
    }
  });
});
