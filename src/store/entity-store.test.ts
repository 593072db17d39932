// ---------------------------------------------------------------------------
// EntityStore – Tests
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { EntityStore } from "./entity-store.js";
import { ValidationError } from "./errors.js";

type Item = { id: string; name: string; tags: string[] };

function item(id: string, name = "x"): Item {
  return { id, name, tags: [] };
}

// ---------------------------------------------------------------------------
// save / findById
// ---------------------------------------------------------------------------

describe("save", () => {
  it("inserts and returns the entity unchanged", () => {
    const store = new EntityStore<Item>("Item");
    const entity = item("a", "first");
    expect(store.save(entity)).toBe(entity);
    expect(store.findById("a")).toEqual({ id: "a", name: "first", tags: [] });
  });

  it("overwrites an existing id", () => {
    const store = new EntityStore<Item>("Item");
    store.save(item("a", "first"));
    store.save(item("a", "second"));
    expect(store.count()).toBe(1);
    expect(store.findById("a")?.name).toBe("second");
  });

  it("rejects a missing entity", () => {
    const store = new EntityStore<Item>("Item");
    expect(() => store.save(null)).toThrow(ValidationError);
    expect(() => store.save(undefined)).toThrow("Item cannot be empty");
  });

  it("rejects an empty or blank id", () => {
    const store = new EntityStore<Item>("Item");
    expect(() => store.save(item(""))).toThrow("Item id cannot be empty");
    expect(() => store.save(item("   "))).toThrow(ValidationError);
    expect(store.count()).toBe(0);
  });

  it("keeps its own copy of the saved entity", () => {
    const store = new EntityStore<Item>("Item");
    const entity = item("a");
    store.save(entity);
    entity.tags.push("mutated");
    entity.name = "mutated";
    expect(store.findById("a")).toEqual({ id: "a", name: "x", tags: [] });
  });
});

describe("findById", () => {
  it("returns undefined for an unknown id", () => {
    const store = new EntityStore<Item>("Item");
    expect(store.findById("missing")).toBeUndefined();
  });

  it("rejects an empty id", () => {
    const store = new EntityStore<Item>("Item");
    expect(() => store.findById("")).toThrow(ValidationError);
  });

  it("returns a copy that can be mutated freely", () => {
    const store = new EntityStore<Item>("Item");
    store.save(item("a"));
    const found = store.findById("a");
    found?.tags.push("t");
    expect(store.findById("a")?.tags).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// findAll / deleteById
// ---------------------------------------------------------------------------

describe("findAll", () => {
  it("returns every entity", () => {
    const store = new EntityStore<Item>("Item");
    store.save(item("a"));
    store.save(item("b"));
    expect(store.findAll().map((e) => e.id).sort()).toEqual(["a", "b"]);
  });

  it("returns an independent sequence", () => {
    const store = new EntityStore<Item>("Item");
    store.save(item("a"));
    const all = store.findAll();
    all.pop();
    all.push(item("z"));
    expect(store.findAll().map((e) => e.id)).toEqual(["a"]);
  });

  it("returns independent element containers", () => {
    const store = new EntityStore<Item>("Item");
    store.save(item("a"));
    store.findAll()[0]?.tags.push("leak");
    expect(store.findById("a")?.tags).toEqual([]);
  });
});

describe("deleteById", () => {
  it("reports whether an entity was removed", () => {
    const store = new EntityStore<Item>("Item");
    store.save(item("a"));
    expect(store.deleteById("a")).toBe(true);
    expect(store.deleteById("a")).toBe(false);
    expect(store.findById("a")).toBeUndefined();
  });

  it("rejects an empty id", () => {
    const store = new EntityStore<Item>("Item");
    expect(() => store.deleteById("")).toThrow(ValidationError);
  });
});

// ---------------------------------------------------------------------------
// replaceAll / exportAll
// ---------------------------------------------------------------------------

describe("replaceAll", () => {
  it("discards current contents and installs the given set", () => {
    const store = new EntityStore<Item>("Item");
    store.save(item("old"));
    store.replaceAll({ a: item("a"), b: item("b") });
    expect(store.findById("old")).toBeUndefined();
    expect(store.count()).toBe(2);
  });

  it("does not alias the given records", () => {
    const store = new EntityStore<Item>("Item");
    const records = { a: item("a") };
    store.replaceAll(records);
    records.a.tags.push("leak");
    expect(store.findById("a")?.tags).toEqual([]);
  });
});

describe("exportAll", () => {
  it("returns every entry keyed by id", () => {
    const store = new EntityStore<Item>("Item");
    store.save(item("a", "one"));
    expect(store.exportAll()).toEqual({ a: { id: "a", name: "one", tags: [] } });
  });

  it("returns a frozen view", () => {
    const store = new EntityStore<Item>("Item");
    store.save(item("a"));
    const view = store.exportAll();
    expect(Object.isFrozen(view)).toBe(true);
    expect(Object.isFrozen(view.a)).toBe(true);
  });

  it("keeps an entry whose id is __proto__", () => {
    const store = new EntityStore<Item>("Item");
    store.save(item("__proto__", "odd"));
    const view = store.exportAll();
    expect(Object.keys(view)).toEqual(["__proto__"]);
    expect(Object.getPrototypeOf(view)).toBeNull();
  });

  it("does not expose store state through nested containers", () => {
    const store = new EntityStore<Item>("Item");
    store.save(item("a"));
    store.exportAll().a?.tags.push("leak");
    expect(store.findById("a")?.tags).toEqual([]);
  });
});
