import type { ID } from "@/models/base";

export type ChangeNotice =
  | { type: "TOURNAMENT_BASE_UPDATED"; id: ID; version: number }
  | { type: "STAGE_UPDATED"; id: ID; version: number }
  | { type: "GROUP_UPDATED"; id: ID; version: number };
