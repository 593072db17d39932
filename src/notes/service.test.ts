// ---------------------------------------------------------------------------
// NoteService – Tests
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { NotFoundError, ValidationError } from "../store/errors.js";
import { createTestHarness, FIXED_NOW_ISO } from "../tracker/test-utils.js";
import { NoteService } from "./service.js";

function createTestService() {
  const harness = createTestHarness();
  const service = new NoteService(harness.deps, harness.stores.notes);
  return { service, ...harness };
}

describe("create", () => {
  it("creates a note stamped with the clock", () => {
    const { service } = createTestService();
    const note = service.create({ title: "Ideas", content: "first" });

    expect(note).toEqual({
      id: "id-1",
      title: "Ideas",
      content: "first",
      createdAt: FIXED_NOW_ISO,
      lastModifiedAt: FIXED_NOW_ISO,
      labelIds: [],
    });
  });

  it("coerces null or missing content to an empty string", () => {
    const { service } = createTestService();
    expect(service.create({ title: "a", content: null }).content).toBe("");
    expect(service.create({ title: "b" }).content).toBe("");
  });

  it("rejects an empty title", () => {
    const { service } = createTestService();
    expect(() => service.create({ title: "" })).toThrow(ValidationError);
  });
});

describe("updates", () => {
  it("stamps lastModifiedAt on every mutation and keeps createdAt", () => {
    const { service, clock } = createTestService();
    const note = service.create({ title: "a" });

    clock.ms = 2000;
    service.updateTitle(note.id, "b");
    expect(service.get(note.id)?.lastModifiedAt).toBe("1970-01-01T00:00:02.000Z");

    clock.ms = 3000;
    service.updateContent(note.id, "body");
    const updated = service.get(note.id);
    expect(updated?.lastModifiedAt).toBe("1970-01-01T00:00:03.000Z");
    expect(updated?.createdAt).toBe(FIXED_NOW_ISO);
    expect(updated?.title).toBe("b");
    expect(updated?.content).toBe("body");
  });

  it("updateContent(null) clears the content", () => {
    const { service } = createTestService();
    const note = service.create({ title: "a", content: "x" });
    expect(service.updateContent(note.id, null).content).toBe("");
  });

  it("setLabels collapses duplicates", () => {
    const { service } = createTestService();
    const note = service.create({ title: "a" });
    expect(service.setLabels(note.id, ["l1", "l2", "l1"]).labelIds).toEqual(["l1", "l2"]);
  });

  it("throws NotFoundError for an unknown note", () => {
    const { service } = createTestService();
    expect(() => service.updateTitle("missing", "t")).toThrow(NotFoundError);
  });
});

describe("delete", () => {
  it("removes the note", () => {
    const { service, logs } = createTestService();
    const note = service.create({ title: "a" });
    expect(service.delete(note.id)).toBe(true);
    expect(service.list()).toEqual([]);
    expect(logs).toContain(`note deleted: ${note.id}`);
  });
});
