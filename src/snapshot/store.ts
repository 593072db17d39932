// ---------------------------------------------------------------------------
// Snapshot Store – the data file on disk
// ---------------------------------------------------------------------------
// Storage layout:
//   ~/.tracklet/
//     data.json   – { users, tasks, notes, projects, reminders, labels }
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

const DEFAULT_DIR = ".tracklet";
const DEFAULT_FILE = "data.json";
export const DATA_FILE_ENV = "TRACKLET_DATA_FILE";

export function resolveSnapshotPath(customPath?: string): string {
  if (customPath) {
    return path.resolve(customPath);
  }
  const fromEnv = process.env[DATA_FILE_ENV];
  if (fromEnv) {
    return path.resolve(fromEnv);
  }
  const home = process.env.HOME ?? process.env.USERPROFILE ?? ".";
  return path.join(home, DEFAULT_DIR, DEFAULT_FILE);
}

// ---------------------------------------------------------------------------
// Read
// ---------------------------------------------------------------------------

export type RawSnapshotRead =
  | { kind: "missing" }
  | { kind: "parsed"; value: unknown }
  | { kind: "unparseable"; reason: string };

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Reads and JSON-parses the file. Only a missing file is "missing". */
export async function readSnapshotFile(filePath: string): Promise<RawSnapshotRead> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return { kind: "missing" };
    }
    return { kind: "unparseable", reason: errorMessage(err) };
  }
  try {
    const value: unknown = JSON.parse(raw);
    return { kind: "parsed", value };
  } catch (err) {
    return { kind: "unparseable", reason: errorMessage(err) };
  }
}

// ---------------------------------------------------------------------------
// Atomic write
// ---------------------------------------------------------------------------

export async function writeSnapshotFile(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const tmpPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
  const content = JSON.stringify(data, null, 2);
  await fs.writeFile(tmpPath, content, "utf-8");
  await fs.rename(tmpPath, filePath);
}
