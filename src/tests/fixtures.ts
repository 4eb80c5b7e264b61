import type { Group, Stage, TournamentBase, TournamentBasePatch, TournamentMode } from "@/models";
import { persistedIdentity, sequentialIds, Tournament, type MutationResult } from "@/engine";

export function unwrap<T>(result: MutationResult<T>): T {
  if (!result.ok) {
    throw new Error(`${result.issue.code}: ${result.issue.message}`);
  }
  return result.value;
}

export function persistedBase(patch: TournamentBasePatch = {}, id = "t-1", version = 0): TournamentBase {
  return {
    identity: persistedIdentity(id, version),
    name: "Club Open",
    sportId: "sport-1",
    entrantCount: 8,
    type: "scheduled",
    mode: { kind: "pool_and_final_stage" },
    lifecycle: { kind: "draft" },
    ...patch,
  };
}

export function persistedStage(id: string, number: number, groupCount = 1, tournamentId = "t-1", version = 0): Stage {
  return { identity: persistedIdentity(id, version), tournamentId, number, groupCount };
}

export function persistedGroup(id: string, stageId: string, number: number, version = 0): Group {
  return { identity: persistedIdentity(id, version), stageId, number };
}

/** Draft tournament with ids `id_1` (base), `id_2`, ... */
export function draftTournament(mode: TournamentMode, entrantCount = 8): Tournament {
  const tournament = new Tournament({ idGenerator: sequentialIds("id") });
  unwrap(tournament.newBase("sport-1"));
  unwrap(tournament.updateBase({ name: "Club Open", entrantCount, mode }));
  return tournament;
}
