import type { ID } from "@/models/base";
import type { Identity } from "@/models/identity";

export interface Group {
  identity: Identity;
  stageId: ID;
  /** zero-based position within the stage */
  number: number;
}
