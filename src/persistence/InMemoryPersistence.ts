import type { EntityKind, Group, ID, Identity, Stage, TournamentBase } from "@/models";
import { identityVersion, persistedIdentity } from "@/engine/identity";
import { cloneState, randomId, type IdGenerator } from "@/engine/util";
import { DuplicateEntityError, EntityNotFoundError, OptimisticLockConflictError } from "@/persistence/errors";
import type { PersistencePort } from "@/persistence/PersistencePort";

interface Identified {
  identity: Identity;
}

/** Process local storage with optimistic locking. */
export class InMemoryPersistence implements PersistencePort {
  private readonly bases = new Map<ID, TournamentBase>();
  private readonly stages = new Map<ID, Stage>();
  private readonly groups = new Map<ID, Group>();

  constructor(private readonly nextId: IdGenerator = randomId) {}

  async saveTournamentBase(base: TournamentBase): Promise<TournamentBase> {
    return this.save(this.bases, base, "tournament");
  }

  async saveStage(stage: Stage): Promise<Stage> {
    return this.save(this.stages, stage, "stage");
  }

  async saveGroup(group: Group): Promise<Group> {
    return this.save(this.groups, group, "group");
  }

  async getTournamentBase(id: ID): Promise<TournamentBase | undefined> {
    const base = this.bases.get(id);
    return base ? cloneState(base) : undefined;
  }

  async listStagesOfTournament(tournamentId: ID): Promise<Stage[]> {
    return [...this.stages.values()]
      .filter((stage) => stage.tournamentId === tournamentId)
      .sort((a, b) => a.number - b.number)
      .map((stage) => cloneState(stage));
  }

  async listGroupsOfStage(stageId: ID): Promise<Group[]> {
    return [...this.groups.values()]
      .filter((group) => group.stageId === stageId)
      .sort((a, b) => a.number - b.number)
      .map((group) => cloneState(group));
  }

  private save<T extends Identified>(store: Map<ID, T>, entity: T, kind: EntityKind): T {
    const { id, version } = this.nextIdentity(store, entity.identity, kind);
    const saved: T = { ...entity, identity: persistedIdentity(id, version) };
    store.set(id, cloneState(saved));
    return cloneState(saved);
  }

  private nextIdentity(store: ReadonlyMap<ID, Identified>, identity: Identity, kind: EntityKind): { id: ID; version: number } {
    switch (identity.kind) {
      case "unassigned":
        return { id: this.nextId(), version: 0 };
      case "provisional":
        if (store.has(identity.id)) {
          throw new DuplicateEntityError(kind, identity.id);
        }
        return { id: identity.id, version: 0 };
      case "persisted": {
        const existing = store.get(identity.id);
        if (!existing) {
          throw new EntityNotFoundError(kind, identity.id);
        }
        const storedVersion = identityVersion(existing.identity) ?? 0;
        if (storedVersion !== identity.version) {
          throw new OptimisticLockConflictError(kind, identity.id, identity.version, storedVersion);
        }
        return { id: identity.id, version: storedVersion + 1 };
      }
    }
  }
}
