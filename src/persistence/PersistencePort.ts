import type { Group, ID, Stage, TournamentBase } from "@/models";

/**
 * Storage collaborator. Saves return the value with a persisted identity:
 * a new id for unassigned entities, version 0 for new ones and the bumped
 * version for updates. A stale version fails with
 * `OptimisticLockConflictError`.
 */
export interface PersistencePort {
  saveTournamentBase(base: TournamentBase): Promise<TournamentBase>;
  saveStage(stage: Stage): Promise<Stage>;
  saveGroup(group: Group): Promise<Group>;
  getTournamentBase(id: ID): Promise<TournamentBase | undefined>;
  listStagesOfTournament(tournamentId: ID): Promise<Stage[]>;
  listGroupsOfStage(stageId: ID): Promise<Group[]>;
}
