import type { ID } from "@/models/base";
import type { Identity } from "@/models/identity";

export type TournamentType = "scheduled" | "adhoc";

export type TournamentMode =
  | { kind: "single_stage" }
  | { kind: "pool_and_final_stage" }
  | { kind: "two_pool_stages_and_final_stage" }
  | { kind: "swiss_system"; roundCount: number };

export type TournamentLifecycle =
  | { kind: "draft" }
  | { kind: "published" }
  | { kind: "active_stage"; index: number }
  | { kind: "finished" };

export interface TournamentBase {
  identity: Identity;
  name: string;
  sportId: ID;
  /** size of the tournament */
  entrantCount: number;
  type: TournamentType;
  mode: TournamentMode;
  lifecycle: TournamentLifecycle;
}

export type TournamentBasePatch = Partial<Omit<TournamentBase, "identity">>;
