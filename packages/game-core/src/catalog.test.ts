import { readFileSync } from "node:fs";

import { describe, expect, it } from "vitest";

import { findFusion, getCardById, getCardByName, listCards, loadCatalog } from "./catalog.js";
import { CatalogError } from "./errors.js";

function readContent(file: string): unknown {
  return JSON.parse(readFileSync(new URL(`../../game-data/content/${file}`, import.meta.url), "utf8"));
}

function card(id: number, name: string) {
  return { id, name, category: "Warrior", attack: 1000, defense: 1000, element: "Light", level: 4 };
}

function bundle(cards: unknown[], fusions: unknown[]) {
  return {
    cards: { contentVersion: "test", cards },
    fusions: { contentVersion: "test", fusions }
  };
}

describe("loadCatalog", () => {
  it("loads the shipped content", () => {
    const catalog = loadCatalog({ cards: readContent("cards.json"), fusions: readContent("fusions.json") });
    expect(catalog.contentVersion).toBe("1.0.0");
    expect(catalog.cards).toHaveLength(30);
    expect(catalog.fusions).toHaveLength(15);
    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.cards[0])).toBe(true);
  });

  it("rejects malformed cards with the offending path", () => {
    const bad = bundle([{ ...card(1, "X"), attack: -5 }], []);
    expect(() => loadCatalog(bad)).toThrow(CatalogError);
    expect(() => loadCatalog(bad)).toThrow(/cards\.0\.attack/);
  });

  it("rejects duplicate ids", () => {
    expect(() => loadCatalog(bundle([card(1, "X"), card(1, "Y")], []))).toThrow("loadCatalog: duplicate card id 1");
  });

  it("rejects recipes with unknown materials", () => {
    const fusions = [{ materials: ["X", "Ghost"], result: { name: "XG", category: "Warrior", attack: 2000, defense: 2000, element: "Light" } }];
    expect(() => loadCatalog(bundle([card(1, "X")], fusions))).toThrow('loadCatalog: fusion 0 uses unknown material "Ghost"');
  });
});

describe("catalog lookups", () => {
  const catalog = loadCatalog({ cards: readContent("cards.json"), fusions: readContent("fusions.json") });

  it("materializes cards by id and by name", () => {
    const byId = getCardById(catalog, 27);
    expect(byId?.name).toBe("Pyre Drake");
    expect(byId?.tokens).toEqual(["mars", "moon"]);
    expect(byId?.activeToken).toBe("mars");
    expect(byId?.stance).toBe("attack");

    expect(getCardByName(catalog, "pyre DRAKE")?.id).toBe(27);
    expect(getCardById(catalog, 999)).toBeNull();
    expect(getCardByName(catalog, "Nobody")).toBeNull();
  });

  it("hands out independent instances", () => {
    const a = getCardById(catalog, 1);
    const b = getCardById(catalog, 1);
    expect(a).not.toBe(b);
    expect(a).toEqual(b);
  });

  it("resolves fusions in either order with the recipe id and level", () => {
    const forward = findFusion(catalog, "Pyre Drake", "Crag Raptor");
    const backward = findFusion(catalog, "Crag Raptor", "Pyre Drake");
    expect(forward?.name).toBe("Magma Tyrannos");
    expect(forward?.id).toBe(9010);
    expect(forward?.level).toBe(7);
    expect(forward?.attack).toBe(2600);
    expect(backward).toEqual(forward);
    expect(findFusion(catalog, "Pyre Drake", "Quartz Totem")).toBeNull();
  });

  it("keeps the first recipe listed for a repeated pair", () => {
    const result = (name: string) => ({ name, category: "Warrior", attack: 2000, defense: 2000, element: "Light" });
    const small = loadCatalog(
      bundle([card(1, "X"), card(2, "Y")], [
        { materials: ["Y", "X"], result: result("First") },
        { materials: ["X", "Y"], result: result("Second") }
      ])
    );
    expect(findFusion(small, "X", "Y")?.name).toBe("First");
    expect(findFusion(small, "X", "Y")?.id).toBe(9000);
  });

  it("lists every card once in catalog order", () => {
    const cards = listCards(catalog);
    expect(cards).toHaveLength(30);
    expect(cards.map((c) => c.id)).toEqual(Array.from({ length: 30 }, (_, i) => i + 1));
  });
});
