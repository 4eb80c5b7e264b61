import type { ID } from "@/models/base";
import type { Identity } from "@/models/identity";

export interface Stage {
  identity: Identity;
  /** back-reference only; ownership lives in the dependency graph */
  tournamentId: ID;
  /** zero-based position within the tournament */
  number: number;
  groupCount: number;
}
