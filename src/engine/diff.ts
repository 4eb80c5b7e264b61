import type { ID } from "@/models";
import { cloneState, isDeepEqual } from "@/engine/util";

export type Equality<T> = (a: T, b: T) => boolean;

/**
 * `local` when it is new (no origin) or differs from `origin`, else undefined.
 */
export function diffOptional<T>(local: T | undefined, origin: T | undefined, equals: Equality<T> = isDeepEqual): T | undefined {
  if (local === undefined) {
    return undefined;
  }
  if (origin === undefined || !equals(local, origin)) {
    return cloneState(local);
  }
  return undefined;
}

/**
 * New or modified entries of `local`, restricted to ids in `filter`. Entries
 * only present in `origin` are not reported.
 */
export function diffById<T>(
  local: ReadonlyMap<ID, T>,
  origin: ReadonlyMap<ID, T>,
  filter: ReadonlySet<ID>,
  equals: Equality<T> = isDeepEqual,
): T[] {
  const changed: T[] = [];
  local.forEach((value, id) => {
    if (!filter.has(id)) {
      return;
    }
    const previous = origin.get(id);
    if (previous === undefined || !equals(value, previous)) {
      changed.push(cloneState(value));
    }
  });
  return changed;
}
