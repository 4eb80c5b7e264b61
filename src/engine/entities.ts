import type { Group, ID, Identity, Stage, TournamentBase } from "@/models";

export function createTournamentBase(identity: Identity, sportId: ID): TournamentBase {
  return {
    identity,
    name: "",
    sportId,
    entrantCount: 0,
    type: "scheduled",
    mode: { kind: "single_stage" },
    lifecycle: { kind: "draft" },
  };
}

export function createStage(identity: Identity, tournamentId: ID, number: number): Stage {
  return {
    identity,
    tournamentId,
    number,
    groupCount: 1,
  };
}

export function createGroup(identity: Identity, stageId: ID, number: number): Group {
  return {
    identity,
    stageId,
    number,
  };
}
