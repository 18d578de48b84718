import { createMatch } from "./engine.js";
import { hashMatchState } from "./stateHash.js";
import { applyCommand } from "./turn.js";
import type { Catalog, MatchCommand, MatchConfig, MatchState } from "./types.js";

export type StartMatchCommand = { type: "START_MATCH"; config: Partial<MatchConfig> };

export type MatchLog = {
  contentVersion: string;
  commands: Array<StartMatchCommand | MatchCommand>;
};

export type ReplayResult = {
  endState: MatchState;
  /** Step 0 is the freshly dealt match. */
  hashesByStep: Map<number, string>;
  /** Commands the engine refused, by step. */
  rejectedSteps: number[];
};

export function replayMatchLog(catalog: Catalog, log: MatchLog): ReplayResult {
  if (log.contentVersion !== catalog.contentVersion) {
    throw new Error(`Match log was recorded against content ${log.contentVersion}, loaded ${catalog.contentVersion}`);
  }
  const [first, ...rest] = log.commands;
  if (!first) throw new Error("Match log missing commands");
  if (first.type !== "START_MATCH") throw new Error("Match log must start with START_MATCH");

  const state = createMatch(catalog, first.config);
  const hashesByStep = new Map<number, string>();
  const rejectedSteps: number[] = [];
  hashesByStep.set(0, hashMatchState(state));

  rest.forEach((command, i) => {
    const step = i + 1;
    if (command.type === "START_MATCH") throw new Error(`Match log has a second START_MATCH at step ${step}`);
    if (!applyCommand(state, command)) rejectedSteps.push(step);
    hashesByStep.set(step, hashMatchState(state));
  });

  return { endState: state, hashesByStep, rejectedSteps };
}
