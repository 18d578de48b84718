import { createHash } from "node:crypto";

import type { MatchState } from "./types.js";

export type HashableMatchState = Omit<MatchState, "catalog">;

// Match state is plain JSON data with no integer-like keys, so rebuilding each
// object with sorted keys fixes the serialized order.
function sortKeys(_key: string, value: unknown): unknown {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : 1)));
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(value, sortKeys);
}

/** The catalog is shared, immutable and keyed by Maps, so it stays out of the digest. */
export function buildHashInput(state: MatchState): HashableMatchState {
  const { catalog: _catalog, ...rest } = state;
  return rest;
}

export function sha256Hex(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

export function hashMatchState(state: MatchState): string {
  return sha256Hex(stableStringify(buildHashInput(state)));
}
