import { randomUUID } from "node:crypto";

export type IdGenerator = {
  next: () => string;
};

export const uuidGenerator: IdGenerator = {
  next: () => randomUUID(),
};

/** Deterministic generator for tests and fixtures: `${prefix}-1`, `${prefix}-2`, ... */
export function sequentialIds(prefix = "id"): IdGenerator {
  let counter = 0;
  return {
    next: () => {
      counter += 1;
      return `${prefix}-${counter}`;
    },
  };
}
