// ---------------------------------------------------------------------------
// Snapshot Store – Tests
// ---------------------------------------------------------------------------

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readSnapshotFile, resolveSnapshotPath, writeSnapshotFile } from "./store.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "snapshot-store-"));
});

afterEach(async () => {
  vi.unstubAllEnvs();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

describe("resolveSnapshotPath", () => {
  it("returns custom path when provided", () => {
    vi.stubEnv("TRACKLET_DATA_FILE", "/from/env.json");
    expect(resolveSnapshotPath("/custom/data.json")).toBe(path.resolve("/custom/data.json"));
  });

  it("falls back to TRACKLET_DATA_FILE", () => {
    vi.stubEnv("TRACKLET_DATA_FILE", "/from/env.json");
    expect(resolveSnapshotPath()).toBe(path.resolve("/from/env.json"));
  });

  it("defaults to HOME/.tracklet/data.json", () => {
    vi.stubEnv("TRACKLET_DATA_FILE", "");
    vi.stubEnv("HOME", "/home/testuser");
    expect(resolveSnapshotPath()).toBe(path.join("/home/testuser", ".tracklet", "data.json"));
  });
});

// ---------------------------------------------------------------------------
// Read / write
// ---------------------------------------------------------------------------

describe("readSnapshotFile / writeSnapshotFile", () => {
  it("round-trips a document", async () => {
    const filePath = path.join(tmpDir, "data.json");
    await writeSnapshotFile(filePath, { users: {}, labels: { l1: { id: "l1", name: "x" } } });
    expect(await readSnapshotFile(filePath)).toEqual({
      kind: "parsed",
      value: { users: {}, labels: { l1: { id: "l1", name: "x" } } },
    });
  });

  it("reports a missing file", async () => {
    expect(await readSnapshotFile(path.join(tmpDir, "nope.json"))).toEqual({ kind: "missing" });
  });

  it("reports invalid JSON as unparseable", async () => {
    const filePath = path.join(tmpDir, "data.json");
    await fs.writeFile(filePath, "{ broken json", "utf-8");
    const result = await readSnapshotFile(filePath);
    expect(result.kind).toBe("unparseable");
  });

  it("reports a directory in place of the file as unparseable", async () => {
    const result = await readSnapshotFile(tmpDir);
    expect(result.kind).toBe("unparseable");
  });

  it("writes pretty-printed JSON", async () => {
    const filePath = path.join(tmpDir, "data.json");
    await writeSnapshotFile(filePath, { a: 1 });
    expect(await fs.readFile(filePath, "utf-8")).toBe('{\n  "a": 1\n}');
  });

  it("leaves no .tmp file behind and creates parent directories", async () => {
    const deepPath = path.join(tmpDir, "a", "b", "data.json");
    await writeSnapshotFile(deepPath, {});
    const files = await fs.readdir(path.dirname(deepPath));
    expect(files).toEqual(["data.json"]);
  });

  it("lets concurrent writers to one path finish without clobbering temp files", async () => {
    const filePath = path.join(tmpDir, "data.json");
    await Promise.all([
      writeSnapshotFile(filePath, { writer: 1 }),
      writeSnapshotFile(filePath, { writer: 2 }),
    ]);
    expect(await fs.readdir(tmpDir)).toEqual(["data.json"]);
    const written: unknown = JSON.parse(await fs.readFile(filePath, "utf-8"));
    expect([{ writer: 1 }, { writer: 2 }]).toContainEqual(written);
  });
});
