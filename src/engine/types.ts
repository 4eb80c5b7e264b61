import type { DependencyGraphSnapshot } from "@/engine/graph";
import type { ValidationIssue } from "@/engine/validation";
import type { Group, Stage, TournamentBase } from "@/models";

export type MutationResult<T> = { ok: true; value: T } | { ok: false; issue: ValidationIssue };

export interface SetChildOptions {
  /** Soft unlink a different linked child holding the same number instead of rejecting. */
  replaceConflicting?: boolean;
}

export interface TournamentSnapshot {
  base: TournamentBase | null;
  structure: DependencyGraphSnapshot;
  stages: Stage[];
  groups: Group[];
}

export interface TournamentDiff {
  base?: TournamentBase;
  stages: Stage[];
  groups: Group[];
}

/** Entities as delivered by a persistence collaborator. */
export interface LoadedTournament {
  base: TournamentBase;
  stages: Stage[];
  groups: Group[];
}

export type EditorState = "none" | "new" | "edit";

export interface EditorSnapshot {
  stateSchemaVersion: number;
  local: TournamentSnapshot;
  origin: TournamentSnapshot;
  activeStageId: string | null;
  activeGroupId: string | null;
}
