import type { ID } from "@/models/base";

/**
 * Object identity shared by every entity of a tournament.
 *
 * - `unassigned`: not created yet, carries no id
 * - `provisional`: id pre-allocated (new object or copy), never saved
 * - `persisted`: saved; `version` is the optimistic concurrency counter
 */
export type Identity =
  | { kind: "unassigned" }
  | { kind: "provisional"; id: ID }
  | { kind: "persisted"; id: ID; version: number };

export type EntityKind = "tournament" | "stage" | "group";
