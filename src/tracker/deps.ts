// ---------------------------------------------------------------------------
// Dependencies shared by every entity service (injected at construction)
// ---------------------------------------------------------------------------

import type { SubsystemLogger } from "../logging/subsystem.js";
import type { IdGenerator } from "../store/ids.js";

export type ServiceDeps = {
  ids: IdGenerator;
  log: SubsystemLogger;
  broadcast?: (event: string, payload: unknown) => void;
  nowMs?: () => number;
};

/** Small base giving services the clock, event and log plumbing. */
export abstract class BaseService {
  protected constructor(protected readonly deps: ServiceDeps) {}

  protected now(): number {
    return this.deps.nowMs?.() ?? Date.now();
  }

  protected nowIso(): string {
    return new Date(this.now()).toISOString();
  }

  protected emit(event: string, payload: unknown): void {
    this.deps.broadcast?.(event, payload);
  }
}
