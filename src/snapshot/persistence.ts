// ---------------------------------------------------------------------------
// SnapshotPersistence – load all six stores at startup, save them at exit
// ---------------------------------------------------------------------------
// load() never throws for a missing or corrupt file: the stores are left
// empty and the outcome says why. save() throws PersistenceError and leaves
// in-memory state as it was. Calls are serialised per data file.
// ---------------------------------------------------------------------------

import type { SubsystemLogger } from "../logging/subsystem.js";
import { PersistenceError } from "../store/errors.js";
import type { TrackerStores } from "../tracker/stores.js";
import { decodeSnapshot, encodeSnapshot, type DecodedSnapshot } from "./codec.js";
import type { SnapshotSection } from "./schema.js";
import { readSnapshotFile, writeSnapshotFile } from "./store.js";

export type SnapshotCounts = Record<SnapshotSection, number>;

export type LoadOutcome =
  | { status: "loaded"; counts: SnapshotCounts }
  | { status: "fresh" }
  | { status: "corrupt"; reason: string };

export type SnapshotPersistenceDeps = {
  filePath: string;
  stores: TrackerStores;
  log: SubsystemLogger;
};

// ---------------------------------------------------------------------------
// Serialised lock
// ---------------------------------------------------------------------------

const fileLocks = new Map<string, Promise<unknown>>();

function resolveChain(p: Promise<unknown>): Promise<void> {
  return p.then(
    () => {},
    () => {},
  );
}

async function locked<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const prev = fileLocks.get(filePath) ?? Promise.resolve();
  const next = resolveChain(prev).then(fn);
  fileLocks.set(filePath, resolveChain(next));
  return next;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const EMPTY_SNAPSHOT: DecodedSnapshot = {
  users: {},
  tasks: {},
  notes: {},
  projects: {},
  reminders: {},
  labels: {},
};

function installSnapshot(stores: TrackerStores, data: DecodedSnapshot): void {
  stores.users.replaceAll(data.users);
  stores.tasks.replaceAll(data.tasks);
  stores.notes.replaceAll(data.notes);
  stores.projects.replaceAll(data.projects);
  stores.reminders.replaceAll(data.reminders);
  stores.labels.replaceAll(data.labels);
}

export function countStores(stores: TrackerStores): SnapshotCounts {
  return {
    users: stores.users.count(),
    tasks: stores.tasks.count(),
    notes: stores.notes.count(),
    projects: stores.projects.count(),
    reminders: stores.reminders.count(),
    labels: stores.labels.count(),
  };
}

// ---------------------------------------------------------------------------
// SnapshotPersistence
// ---------------------------------------------------------------------------

export class SnapshotPersistence {
  constructor(private readonly deps: SnapshotPersistenceDeps) {}

  get filePath(): string {
    return this.deps.filePath;
  }

  async load(): Promise<LoadOutcome> {
    return locked<LoadOutcome>(this.deps.filePath, async () => {
      const { stores, log, filePath } = this.deps;
      installSnapshot(stores, EMPTY_SNAPSHOT);

      const read = await readSnapshotFile(filePath);
      if (read.kind === "missing") {
        log.info(`no data file at ${filePath}; starting fresh`);
        return { status: "fresh" };
      }
      if (read.kind === "unparseable") {
        log.warn(`data file ${filePath} is corrupt (${read.reason}); starting with empty data`);
        return { status: "corrupt", reason: read.reason };
      }

      const decoded = decodeSnapshot(read.value);
      if (!decoded.ok) {
        log.warn(`data file ${filePath} is corrupt (${decoded.reason}); starting with empty data`);
        return { status: "corrupt", reason: decoded.reason };
      }

      installSnapshot(stores, decoded.data);
      const counts = countStores(stores);
      log.info(`data loaded from ${filePath}`);
      return { status: "loaded", counts };
    });
  }

  async save(): Promise<SnapshotCounts> {
    return locked<SnapshotCounts>(this.deps.filePath, async () => {
      const { stores, log, filePath } = this.deps;
      const document = encodeSnapshot(stores);
      try {
        await writeSnapshotFile(filePath, document);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        log.error(`failed to save data to ${filePath}: ${reason}`);
        throw new PersistenceError(`failed to save data: ${reason}`, filePath, err);
      }
      log.info(`data saved to ${filePath}`);
      return countStores(stores);
    });
  }
}
