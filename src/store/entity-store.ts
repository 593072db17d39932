// ---------------------------------------------------------------------------
// Entity Store – id-keyed in-memory collection, one instance per entity type
// ---------------------------------------------------------------------------
// The store knows nothing about other entity types. It owns its entries:
// values are copied on the way in and on the way out, so no caller holds a
// live alias into store state.
// ---------------------------------------------------------------------------

import { ValidationError } from "./errors.js";
import { isBlank } from "./validate.js";

export type Entity = { id: string };

/** Id-keyed record with no prototype, so an id such as "__proto__" is an ordinary key. */
export function idRecord<T>(): Record<string, T> {
  return Object.create(null);
}

export type EntitySnapshot<T extends Entity> = Readonly<Record<string, Readonly<T>>>;

export class EntityStore<T extends Entity> {
  private entries = new Map<string, T>();

  /** @param entityType used in error messages, e.g. "Task" */
  constructor(readonly entityType: string) {}

  save(entity: T | null | undefined): T {
    if (!entity) {
      throw new ValidationError(`${this.entityType} cannot be empty`);
    }
    if (isBlank(entity.id)) {
      throw new ValidationError(`${this.entityType} id cannot be empty`);
    }
    this.entries.set(entity.id, structuredClone(entity));
    return entity;
  }

  findById(id: string): T | undefined {
    this.assertId(id);
    const entity = this.entries.get(id);
    return entity ? structuredClone(entity) : undefined;
  }

  has(id: string): boolean {
    this.assertId(id);
    return this.entries.has(id);
  }

  findAll(): T[] {
    return [...this.entries.values()].map((entity) => structuredClone(entity));
  }

  deleteById(id: string): boolean {
    this.assertId(id);
    return this.entries.delete(id);
  }

  count(): number {
    return this.entries.size;
  }

  /** Discards current contents and installs `records`. Snapshot loading only. */
  replaceAll(records: Readonly<Record<string, T>>): void {
    const next = new Map<string, T>();
    for (const [id, entity] of Object.entries(records)) {
      next.set(id, structuredClone(entity));
    }
    this.entries = next;
  }

  /** Frozen, independent copy of every entry keyed by id. Snapshot saving only. */
  exportAll(): EntitySnapshot<T> {
    const out = idRecord<Readonly<T>>();
    for (const [id, entity] of this.entries) {
      out[id] = Object.freeze(structuredClone(entity));
    }
    return Object.freeze(out);
  }

  private assertId(id: string): void {
    if (isBlank(id)) {
      throw new ValidationError(`${this.entityType} id cannot be empty`);
    }
  }
}
