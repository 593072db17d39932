// ---------------------------------------------------------------------------
// Shared test fixtures: captured logs/broadcasts, fixed clock, sequential ids
// ---------------------------------------------------------------------------

import { sequentialIds } from "../store/ids.js";
import type { ServiceDeps } from "./deps.js";
import { createStores, type TrackerStores } from "./stores.js";

export const FIXED_NOW_MS = 1000;
export const FIXED_NOW_ISO = "1970-01-01T00:00:01.000Z";

export type TestHarness = {
  deps: ServiceDeps;
  stores: TrackerStores;
  logs: string[];
  broadcasts: Array<{ event: string; payload: unknown }>;
  clock: { ms: number };
};

export function createTestHarness(): TestHarness {
  const logs: string[] = [];
  const broadcasts: Array<{ event: string; payload: unknown }> = [];
  const clock = { ms: FIXED_NOW_MS };
  const deps: ServiceDeps = {
    ids: sequentialIds("id"),
    log: {
      info: (msg) => logs.push(msg),
      warn: (msg) => logs.push(msg),
      error: (msg) => logs.push(msg),
    },
    broadcast: (event, payload) => broadcasts.push({ event, payload }),
    nowMs: () => clock.ms,
  };
  return { deps, stores: createStores(), logs, broadcasts, clock };
}
