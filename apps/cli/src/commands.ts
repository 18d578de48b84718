import type { Stance, TokenSlot } from "@fusion-duel/game-core";

export type CliCommand =
  | { kind: "empty" }
  | { kind: "hand" }
  | { kind: "play"; handIndex: number; stance: Stance; token: TokenSlot }
  | { kind: "fuse"; first: number; second: number }
  | { kind: "fusions" }
  | { kind: "undo" }
  | { kind: "battle" }
  | { kind: "end" }
  | { kind: "status" }
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "invalid"; message: string };

export const HELP_TEXT = `Commands:
  hand                       Show your hand with indices
  play <i> [atk|def] [1|2]   Put hand card i on the field (default: atk, token 1)
  fuse <i> <j>               Fuse hand cards i and j
  fusions                    List fusions available in your hand
  undo                       Take back your last play
  battle                     Attack the AI's field card with yours
  end                        End your turn
  status                     Show the board
  help                       Show this help
  quit                       Exit`;

const STANCES: Record<string, Stance> = { atk: "attack", attack: "attack", def: "defense", defense: "defense" };

function parseIndex(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  return Number(raw);
}

function parsePlay(args: string[]): CliCommand {
  const handIndex = parseIndex(args[0]);
  if (handIndex === null) return { kind: "invalid", message: "Usage: play <i> [atk|def] [1|2]" };

  let stance: Stance = "attack";
  let token: TokenSlot = 1;
  for (const arg of args.slice(1)) {
    const lower = arg.toLowerCase();
    if (Object.hasOwn(STANCES, lower)) {
      stance = STANCES[lower] ?? stance;
    } else if (lower === "1" || lower === "2") {
      token = lower === "1" ? 1 : 2;
    } else {
      return { kind: "invalid", message: `Unknown play option "${arg}"` };
    }
  }
  return { kind: "play", handIndex, stance, token };
}

function parseFuse(args: string[]): CliCommand {
  const first = parseIndex(args[0]);
  const second = parseIndex(args[1]);
  if (first === null || second === null || args.length > 2) return { kind: "invalid", message: "Usage: fuse <i> <j>" };
  return { kind: "fuse", first, second };
}

export function parseCommand(line: string): CliCommand {
  const [cmd, ...args] = line.trim().split(/\s+/);
  if (!cmd) return { kind: "empty" };

  switch (cmd.toLowerCase()) {
    case "hand":
      return { kind: "hand" };
    case "play":
    case "p":
      return parsePlay(args);
    case "fuse":
    case "f":
      return parseFuse(args);
    case "fusions":
      return { kind: "fusions" };
    case "undo":
      return { kind: "undo" };
    case "battle":
    case "b":
      return { kind: "battle" };
    case "end":
      return { kind: "end" };
    case "status":
    case "st":
      return { kind: "status" };
    case "help":
    case "h":
    case "?":
      return { kind: "help" };
    case "quit":
    case "exit":
      return { kind: "quit" };
    default:
      return { kind: "invalid", message: `Unknown command "${cmd}". Type help` };
  }
}
