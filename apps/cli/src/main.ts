#!/usr/bin/env tsx
import { readFileSync } from "node:fs";
import { stdin as input, stdout as output } from "node:process";
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";

import {
  DIFFICULTY_DEPTHS,
  applyCommand,
  canCombine,
  createMatch,
  difficultyForDepth,
  isDifficulty,
  loadCatalog,
  resolveSearchConfig,
  runAiTurn,
  type Catalog,
  type MatchState,
  type SearchConfig
} from "@fusion-duel/game-core";

import { HELP_TEXT, parseCommand } from "./commands.js";
import { renderBattle, renderBoard, renderFusions, renderHand, renderSearch, renderWinner } from "./render.js";

function readContent(file: string): unknown {
  return JSON.parse(readFileSync(new URL(`../../../packages/game-data/content/${file}`, import.meta.url), "utf8"));
}

function parseInteger(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new Error(`--${name} expects an integer, got "${raw}"`);
  return n;
}

function readOptions() {
  const { values } = parseArgs({
    options: {
      seed: { type: "string" },
      "deck-size": { type: "string" },
      difficulty: { type: "string", short: "d" },
      depth: { type: "string" },
      verbose: { type: "boolean", short: "v", default: false }
    }
  });

  let depth = parseInteger("depth", values.depth);
  if (depth === undefined && values.difficulty !== undefined) {
    if (!isDifficulty(values.difficulty)) {
      throw new Error(`--difficulty must be one of ${Object.keys(DIFFICULTY_DEPTHS).join(", ")}`);
    }
    depth = DIFFICULTY_DEPTHS[values.difficulty];
  }

  return {
    seed: parseInteger("seed", values.seed) ?? Date.now() % 0x7fffffff,
    deckSize: parseInteger("deck-size", values["deck-size"]),
    depth,
    verbose: values.verbose === true
  };
}

function playAiTurn(state: MatchState, search: SearchConfig) {
  console.log("AI is thinking...");
  const report = runAiTurn(state, search);
  for (const result of report.searches) console.log(renderSearch(result));
  for (const command of report.commands) {
    if (command.type === "ACTION" && command.action.type === "COMBINE") console.log("AI fuses two cards.");
    if (command.type === "ACTION" && command.action.type === "PLAY_CARD") {
      console.log(`AI plays ${state.players.ai.field?.name ?? "a card"} in ${command.action.stance} stance.`);
    }
    if (command.type === "BATTLE" && state.lastBattle) console.log(renderBattle(state.lastBattle));
  }
}

async function runSession(catalog: Catalog) {
  const options = readOptions();
  const state = createMatch(catalog, { seed: options.seed, ...(options.deckSize === undefined ? {} : { deckSize: options.deckSize }) });
  const search = resolveSearchConfig({
    ...(options.depth === undefined ? {} : { depth: options.depth }),
    ...(options.verbose ? { log: (line: string) => console.log(line) } : {})
  });

  console.log(`Fusion Duel: seed ${options.seed}, ${difficultyForDepth(search.depth)} AI (depth ${search.depth})`);
  console.log(HELP_TEXT);
  console.log(renderBoard(state));

  const rl = createInterface({ input, output });
  try {
    while (!state.gameOver) {
      const line = await rl.question(`[T${state.turn}] Life ${state.players.human.life} > `);
      const command = parseCommand(line);

      try {
        switch (command.kind) {
          case "empty":
            break;
          case "quit":
            return;
          case "help":
            console.log(HELP_TEXT);
            break;
          case "status":
            console.log(renderBoard(state));
            break;
          case "hand":
            console.log(renderHand(state.players.human));
            break;
          case "fusions":
            console.log(renderFusions(state, "human"));
            break;
          case "play": {
            const { handIndex, stance, token } = command;
            if (state.phase === "end") {
              console.log("You have already battled; type end.");
            } else if (!applyCommand(state, { type: "ACTION", side: "human", action: { type: "PLAY_CARD", handIndex, stance, token } })) {
              console.log(`No card at hand index ${handIndex}.`);
            } else {
              console.log(`You play ${state.players.human.field?.name ?? "a card"} in ${stance} stance.`);
            }
            break;
          }
          case "fuse": {
            const result = canCombine(state.players.human, catalog, command.first, command.second);
            if (!result) {
              console.log("Those cards do not fuse.");
            } else if (!applyCommand(state, { type: "ACTION", side: "human", action: { type: "COMBINE", first: command.first, second: command.second } })) {
              console.log("You have already battled; type end.");
            } else {
              console.log(`Fused into ${result.name} ${result.attack}/${result.defense}.`);
            }
            break;
          }
          case "undo":
            console.log(applyCommand(state, { type: "UNDO", side: "human" }) ? "Play undone." : "Nothing to undo this turn.");
            break;
          case "battle":
            if (state.phase === "end") {
              console.log("You have already battled this turn.");
            } else if (applyCommand(state, { type: "BATTLE", attacker: "human" }) && state.lastBattle) {
              console.log(renderBattle(state.lastBattle));
            } else {
              console.log("Both fields need a card to battle.");
            }
            break;
          case "end":
            applyCommand(state, { type: "END_TURN" });
            if (!state.gameOver) playAiTurn(state, search);
            if (!state.gameOver) console.log(renderBoard(state));
            break;
          case "invalid":
            console.log(command.message);
            break;
        }
      } catch (err) {
        console.error("Error:", err instanceof Error ? err.message : String(err));
      }
    }

    console.log(renderBoard(state));
    console.log(renderWinner(state.winner));
  } finally {
    rl.close();
  }
}

async function main() {
  const catalog = loadCatalog({ cards: readContent("cards.json"), fusions: readContent("fusions.json") });
  await runSession(catalog);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
