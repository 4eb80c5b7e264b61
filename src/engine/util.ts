import type { ID } from "@/models";

export type IdGenerator = () => ID;

export function cloneState<T>(state: T): T {
  return structuredClone(state);
}

export const randomId: IdGenerator = () => crypto.randomUUID();

/** Deterministic ids (`prefix_1`, `prefix_2`, ...) for fixtures and tests. */
export function sequentialIds(prefix: string): IdGenerator {
  let serial = 0;
  return () => {
    serial += 1;
    return `${prefix}_${serial}`;
  };
}

export function normalizeWhitespace(value: string): string {
  return value.trim().split(/\s+/).filter(Boolean).join(" ");
}

function definedEntries(value: object): Map<string, unknown> {
  return new Map<string, unknown>(Object.entries(value).filter(([, entry]) => entry !== undefined));
}

/**
 * Structural equality over plain data (objects, arrays, primitives).
 * Keys holding `undefined` count as absent.
 */
export function isDeepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) {
    return true;
  }
  if (typeof a !== "object" || typeof b !== "object" || a === null || b === null) {
    return false;
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, idx) => isDeepEqual(item, b[idx]));
  }

  const left = definedEntries(a);
  const right = definedEntries(b);
  if (left.size !== right.size) {
    return false;
  }
  for (const [key, value] of left) {
    if (!right.has(key) || !isDeepEqual(value, right.get(key))) {
      return false;
    }
  }
  return true;
}
