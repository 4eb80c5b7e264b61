import type { LogLayer } from "loglayer";

import type { Group, ID, Stage, TournamentBase, TournamentBasePatch } from "@/models";
import { createGroup, createStage, createTournamentBase } from "@/engine/entities";
import { DependencyGraph, type DependencyEdge, type DependencyKind } from "@/engine/graph";
import { identityId, provisionalIdentity } from "@/engine/identity";
import { logger as defaultLogger } from "@/engine/logger";
import { stageCount } from "@/engine/rules/modes";
import type { MutationResult, SetChildOptions, TournamentSnapshot } from "@/engine/types";
import { cloneState, normalizeWhitespace, randomId, type IdGenerator } from "@/engine/util";
import { rejection, type ValidationIssue } from "@/engine/validation";

export interface TournamentOptions {
  idGenerator?: IdGenerator;
  logger?: LogLayer;
}

interface Numbered {
  number: number;
}

function ok<T>(value: T): MutationResult<T> {
  return { ok: true, value };
}

function isPosition(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function fitsCapacity(number: number, capacity: number): boolean {
  return isPosition(number) && number < capacity;
}

function stageOutOfRange(number: number, base: TournamentBase, id?: ID): ValidationIssue {
  return rejection(
    "STAGE_NUMBER_OUT_OF_RANGE",
    `Stage number ${number} is out of range for a tournament with ${stageCount(base.mode)} stage(s)`,
    { kind: "stage", id },
  );
}

function groupOutOfRange(number: number, stage: Stage, id?: ID): ValidationIssue {
  return rejection(
    "GROUP_NUMBER_OUT_OF_RANGE",
    `Group number ${number} is out of range for a stage with ${stage.groupCount} group(s)`,
    { kind: "group", id },
  );
}

function byNumber(a: Numbered, b: Numbered): number {
  return a.number - b.number;
}

/**
 * Aggregate of a tournament base and its dependent stages and groups.
 *
 * The dependency graph is the truth about structure, the id keyed stores only
 * carry payload. Children reference their parent by id; linking them into the
 * graph is what makes them part of the tournament. Invalidation unlinks an
 * edge and leaves the payload in its store, so an entity may be stored but
 * unreachable ("orphaned"). Orphans are never validated nor diffed, and they
 * may be linked again later, e.g. when a child arrives before its parent.
 */
export class Tournament {
  private base: TournamentBase | undefined;
  private readonly structure: DependencyGraph;
  private readonly stages = new Map<ID, Stage>();
  private readonly groups = new Map<ID, Group>();
  private readonly nextId: IdGenerator;
  private readonly log: LogLayer;

  constructor(options: TournamentOptions = {}, structure: DependencyGraph = new DependencyGraph()) {
    this.nextId = options.idGenerator ?? randomId;
    this.log = options.logger ?? defaultLogger;
    this.structure = structure;
  }

  // --- factories ---

  newBase(sportId: ID): MutationResult<TournamentBase> {
    const base = createTournamentBase(provisionalIdentity(this.nextId()), sportId);
    const result = this.setBase(base);
    return result.ok ? ok(cloneState(base)) : result;
  }

  /** Returns the linked stage holding `number`, or creates and links a new one. */
  newStage(number: number): MutationResult<Stage> {
    const existing = this.getStageByNumber(number);
    if (existing) {
      return ok(existing);
    }
    const base = this.base;
    const rootId = this.rootId();
    if (!base || rootId === undefined) {
      return this.reject(rejection("BASE_MISSING", "Cannot create a stage without a tournament base", { kind: "stage" }));
    }
    if (!fitsCapacity(number, stageCount(base.mode))) {
      return this.reject(stageOutOfRange(number, base));
    }
    return this.setStage(createStage(provisionalIdentity(this.nextId()), rootId, number));
  }

  newGroup(stageId: ID, number: number): MutationResult<Group> {
    const existing = this.getGroupByNumber(stageId, number);
    if (existing) {
      return ok(existing);
    }
    const stage = this.stages.get(stageId);
    if (!stage) {
      return this.reject(rejection("STAGE_NOT_FOUND", `Stage '${stageId}' not found`, { kind: "stage", id: stageId }));
    }
    if (!fitsCapacity(number, stage.groupCount)) {
      return this.reject(groupOutOfRange(number, stage));
    }
    return this.setGroup(createGroup(provisionalIdentity(this.nextId()), stageId, number));
  }

  // --- setters ---

  /** Replaces the base slot; `value` holds the previous base. */
  setBase(base: TournamentBase): MutationResult<TournamentBase | undefined> {
    const id = identityId(base.identity);
    if (id === undefined) {
      return this.reject(
        rejection("IDENTITY_UNASSIGNED", "Tournament base needs an id before it can be linked", { kind: "tournament" }),
      );
    }
    const previous = this.base;
    this.base = cloneState(base);
    this.structure.addNode(id);
    this.unlinkExcessStages(id);
    return ok(previous);
  }

  updateBase(patch: TournamentBasePatch): MutationResult<TournamentBase> {
    const current = this.base;
    if (!current) {
      return this.reject(rejection("BASE_MISSING", "No tournament base to update", { kind: "tournament" }));
    }
    const next: TournamentBase = {
      identity: current.identity,
      name: patch.name === undefined ? current.name : normalizeWhitespace(patch.name),
      sportId: patch.sportId ?? current.sportId,
      entrantCount: patch.entrantCount ?? current.entrantCount,
      type: patch.type ?? current.type,
      mode: patch.mode ?? current.mode,
      lifecycle: patch.lifecycle ?? current.lifecycle,
    };
    const result = this.setBase(next);
    return result.ok ? ok(cloneState(next)) : result;
  }

  clearBase(): TournamentBase | undefined {
    const previous = this.base;
    this.base = undefined;
    return previous;
  }

  /**
   * Stores the stage and links it below its tournament. A number beyond the
   * capacity of the current base rejects the call, as does a different stage
   * already linked at the same number unless `replaceConflicting` is set.
   * Without the parent base only the number's shape is checked; `setBase`
   * unlinks what does not fit once it arrives.
   */
  setStage(stage: Stage, options: SetChildOptions = {}): MutationResult<Stage> {
    const stageId = identityId(stage.identity);
    if (stageId === undefined) {
      return this.reject(rejection("IDENTITY_UNASSIGNED", "Stage needs an id before it can be linked", { kind: "stage" }));
    }
    const parent = this.base && this.rootId() === stage.tournamentId ? this.base : undefined;
    const capacity = parent ? stageCount(parent.mode) : Number.POSITIVE_INFINITY;
    if (!fitsCapacity(stage.number, capacity)) {
      return this.reject(
        parent
          ? stageOutOfRange(stage.number, parent, stageId)
          : rejection("STAGE_NUMBER_OUT_OF_RANGE", `Stage number ${stage.number} is not a position`, { kind: "stage", id: stageId }),
      );
    }

    const conflicting = this.findLinkedChild(stage.tournamentId, "stage", this.stages, stage.number);
    if (conflicting !== undefined && conflicting !== stageId) {
      if (!options.replaceConflicting) {
        return this.reject(
          rejection("STAGE_NUMBER_CONFLICT", `Stage number ${stage.number} is already taken by stage '${conflicting}'`, {
            kind: "stage",
            id: stageId,
          }),
        );
      }
      this.structure.removeEdge(stage.tournamentId, conflicting);
      this.log.withMetadata({ stageId: conflicting, number: stage.number }).debug("Unlinked conflicting stage");
    }

    this.detachFromOtherParents(stageId, stage.tournamentId, "stage");
    this.structure.addEdge(stage.tournamentId, stageId, "stage");
    this.stages.set(stageId, cloneState(stage));
    this.unlinkExcessGroups(stageId);
    return ok(cloneState(stage));
  }

  setStageNumberOfGroups(stageId: ID, groupCount: number): MutationResult<Stage> {
    const stage = this.stages.get(stageId);
    if (!stage) {
      return this.reject(rejection("STAGE_NOT_FOUND", `Stage '${stageId}' not found`, { kind: "stage", id: stageId }));
    }
    if (!Number.isInteger(groupCount)) {
      return this.reject(
        rejection("GROUP_COUNT_NOT_INTEGER", `Number of groups ${groupCount} is not a whole number`, { kind: "stage", id: stageId }),
      );
    }
    const next: Stage = { ...stage, groupCount };
    this.stages.set(stageId, next);
    this.unlinkExcessGroups(stageId);
    return ok(cloneState(next));
  }

  setGroup(group: Group, options: SetChildOptions = {}): MutationResult<Group> {
    const groupId = identityId(group.identity);
    if (groupId === undefined) {
      return this.reject(rejection("IDENTITY_UNASSIGNED", "Group needs an id before it can be linked", { kind: "group" }));
    }
    const parent = this.stages.get(group.stageId);
    const capacity = parent ? parent.groupCount : Number.POSITIVE_INFINITY;
    if (!fitsCapacity(group.number, capacity)) {
      return this.reject(
        parent
          ? groupOutOfRange(group.number, parent, groupId)
          : rejection("GROUP_NUMBER_OUT_OF_RANGE", `Group number ${group.number} is not a position`, { kind: "group", id: groupId }),
      );
    }

    const conflicting = this.findLinkedChild(group.stageId, "group", this.groups, group.number);
    if (conflicting !== undefined && conflicting !== groupId) {
      if (!options.replaceConflicting) {
        return this.reject(
          rejection("GROUP_NUMBER_CONFLICT", `Group number ${group.number} is already taken by group '${conflicting}'`, {
            kind: "group",
            id: groupId,
          }),
        );
      }
      this.structure.removeEdge(group.stageId, conflicting);
      this.log.withMetadata({ groupId: conflicting, number: group.number }).debug("Unlinked conflicting group");
    }

    this.detachFromOtherParents(groupId, group.stageId, "group");
    this.structure.addEdge(group.stageId, groupId, "group");
    this.groups.set(groupId, cloneState(group));
    return ok(cloneState(group));
  }

  // --- explicit unlinking and removal ---

  /** Soft unlink; the stage payload stays available by id. */
  unlinkStage(stageId: ID): boolean {
    return this.unlinkFromParents(stageId, "stage");
  }

  unlinkGroup(groupId: ID): boolean {
    return this.unlinkFromParents(groupId, "group");
  }

  /** Hard removal of node, edges and payload. Groups of the stage become orphans. */
  removeStage(stageId: ID): boolean {
    this.structure.removeNode(stageId);
    return this.stages.delete(stageId);
  }

  removeGroup(groupId: ID): boolean {
    this.structure.removeNode(groupId);
    return this.groups.delete(groupId);
  }

  reset(): void {
    this.base = undefined;
    this.structure.clear();
    this.stages.clear();
    this.groups.clear();
  }

  // --- getters ---

  getBase(): TournamentBase | undefined {
    return this.base ? cloneState(this.base) : undefined;
  }

  getRootId(): ID | undefined {
    return this.rootId();
  }

  /** Raw store lookup, linked or not. */
  getStageById(stageId: ID): Stage | undefined {
    const stage = this.stages.get(stageId);
    return stage ? cloneState(stage) : undefined;
  }

  getGroupById(groupId: ID): Group | undefined {
    const group = this.groups.get(groupId);
    return group ? cloneState(group) : undefined;
  }

  /** Only stages linked below the current base are visible here. */
  getStageByNumber(number: number): Stage | undefined {
    const rootId = this.rootId();
    if (rootId === undefined) {
      return undefined;
    }
    const stageId = this.findLinkedChild(rootId, "stage", this.stages, number);
    return stageId === undefined ? undefined : this.getStageById(stageId);
  }

  getGroupByNumber(stageId: ID, number: number): Group | undefined {
    const groupId = this.findLinkedChild(stageId, "group", this.groups, number);
    return groupId === undefined ? undefined : this.getGroupById(groupId);
  }

  /** Linked stages ordered by number. */
  getStages(): Stage[] {
    const rootId = this.rootId();
    if (rootId === undefined) {
      return [];
    }
    return this.linkedChildren(rootId, "stage", this.stages).sort(byNumber);
  }

  getGroupsOfStage(stageId: ID): Group[] {
    return this.linkedChildren(stageId, "group", this.groups).sort(byNumber);
  }

  stageStore(): ReadonlyMap<ID, Stage> {
    return this.stages;
  }

  groupStore(): ReadonlyMap<ID, Group> {
    return this.groups;
  }

  hasLink(parent: ID, child: ID): boolean {
    return this.structure.hasEdge(parent, child);
  }

  // --- traversal ---

  /** Every id reachable from the base, base included. */
  collectIdsInStructure(): Set<ID> {
    const rootId = this.rootId();
    return new Set(rootId === undefined ? [] : this.structure.bfs(rootId));
  }

  /** Outgoing edges of every reachable node, in breadth-first order. */
  reachableEdges(): DependencyEdge[] {
    const rootId = this.rootId();
    if (rootId === undefined) {
      return [];
    }
    return this.structure.bfs(rootId).flatMap((node) => this.structure.edgesFrom(node, "out"));
  }

  /**
   * Checks a stage/group number path against the current structure.
   *
   * Returns `undefined` when every supplied number is valid. Otherwise returns
   * the numbers validated before the first failure, so a caller can fall back
   * to the closest valid path. Without a base the result is empty.
   */
  validateObjectNumbers(stageNumber?: number, groupNumber?: number): number[] | undefined {
    const valid: number[] = [];
    const base = this.base;
    const rootId = this.rootId();
    if (!base || rootId === undefined) {
      return valid;
    }

    let invalid = false;
    const queue: { id: ID; level: DependencyKind }[] = [{ id: rootId, level: "stage" }];
    while (queue.length > 0) {
      const current = queue.shift();
      if (!current) {
        break;
      }
      if (current.level === "stage") {
        if (stageNumber === undefined) {
          break;
        }
        if (!isPosition(stageNumber) || stageNumber >= stageCount(base.mode)) {
          invalid = true;
          break;
        }
        valid.push(stageNumber);
        const stageId = this.findLinkedChild(current.id, "stage", this.stages, stageNumber);
        if (stageId !== undefined) {
          queue.push({ id: stageId, level: "group" });
        }
      } else {
        if (groupNumber === undefined) {
          break;
        }
        const stage = this.stages.get(current.id);
        if (!isPosition(groupNumber) || (stage && groupNumber >= stage.groupCount)) {
          invalid = true;
          break;
        }
        valid.push(groupNumber);
      }
    }
    return invalid ? valid : undefined;
  }

  // --- snapshots ---

  toSnapshot(): TournamentSnapshot {
    return {
      base: this.base ? cloneState(this.base) : null,
      structure: this.structure.toJSON(),
      stages: [...this.stages.values()].map((stage) => cloneState(stage)),
      groups: [...this.groups.values()].map((group) => cloneState(group)),
    };
  }

  /** Restores stores and edges exactly, orphans included. */
  static fromSnapshot(snapshot: TournamentSnapshot, options: TournamentOptions = {}): Tournament {
    const tournament = new Tournament(options, DependencyGraph.fromJSON(snapshot.structure));
    tournament.base = snapshot.base ? cloneState(snapshot.base) : undefined;
    snapshot.stages.forEach((stage) => {
      const id = identityId(stage.identity);
      if (id !== undefined) {
        tournament.stages.set(id, cloneState(stage));
      }
    });
    snapshot.groups.forEach((group) => {
      const id = identityId(group.identity);
      if (id !== undefined) {
        tournament.groups.set(id, cloneState(group));
      }
    });
    return tournament;
  }

  clone(): Tournament {
    return Tournament.fromSnapshot(this.toSnapshot(), { idGenerator: this.nextId, logger: this.log });
  }

  // --- helpers ---

  private rootId(): ID | undefined {
    return this.base ? identityId(this.base.identity) : undefined;
  }

  private reject(issue: ValidationIssue): { ok: false; issue: ValidationIssue } {
    this.log.withMetadata({ code: issue.code, entity: issue.entity }).debug(issue.message);
    return { ok: false, issue };
  }

  private linkedChildren<T>(parent: ID, kind: DependencyKind, store: ReadonlyMap<ID, T>): T[] {
    return this.structure.childrenOf(parent, kind).flatMap((childId) => {
      const child = store.get(childId);
      return child ? [cloneState(child)] : [];
    });
  }

  private findLinkedChild<T extends Numbered>(parent: ID, kind: DependencyKind, store: ReadonlyMap<ID, T>, number: number): ID | undefined {
    return this.structure.childrenOf(parent, kind).find((childId) => store.get(childId)?.number === number);
  }

  private detachFromOtherParents(child: ID, parent: ID, kind: DependencyKind): void {
    this.structure
      .edgesFrom(child, "in")
      .filter((edge) => edge.kind === kind && edge.source !== parent)
      .forEach((edge) => this.structure.removeEdge(edge.source, child));
  }

  private unlinkFromParents(child: ID, kind: DependencyKind): boolean {
    const parents = this.structure.edgesFrom(child, "in").filter((edge) => edge.kind === kind);
    parents.forEach((edge) => this.structure.removeEdge(edge.source, child));
    return parents.length > 0;
  }

  private unlinkExcessStages(rootId: ID): void {
    if (!this.base) {
      return;
    }
    this.unlinkExcess(rootId, "stage", this.stages, stageCount(this.base.mode));
  }

  private unlinkExcessGroups(stageId: ID): void {
    const stage = this.stages.get(stageId);
    if (!stage) {
      return;
    }
    this.unlinkExcess(stageId, "group", this.groups, stage.groupCount);
  }

  /** Soft unlinks children whose number no longer fits the parent's capacity. */
  private unlinkExcess<T extends Numbered>(parent: ID, kind: DependencyKind, store: ReadonlyMap<ID, T>, limit: number): void {
    const excess = this.structure.childrenOf(parent, kind).filter((childId) => {
      const child = store.get(childId);
      return child !== undefined && child.number >= limit;
    });
    excess.forEach((childId) => this.structure.removeEdge(parent, childId));
    if (excess.length > 0) {
      this.log.withMetadata({ parent, kind, limit, unlinked: excess }).debug("Unlinked children beyond parent capacity");
    }
  }
}
