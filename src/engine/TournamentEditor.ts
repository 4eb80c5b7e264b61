import type { Group, ID, Stage, TournamentBase, TournamentBasePatch } from "@/models";
import { diffById, diffOptional } from "@/engine/diff";
import { identityId } from "@/engine/identity";
import { Tournament, type TournamentOptions } from "@/engine/Tournament";
import type { EditorSnapshot, EditorState, LoadedTournament, MutationResult, TournamentDiff } from "@/engine/types";
import { isDeepEqual } from "@/engine/util";
import { rejection, validateTournament, type ValidationResult } from "@/engine/validation";

export const LATEST_STATE_SCHEMA_VERSION = 1;

/**
 * Editing session over a tournament.
 *
 * `origin` mirrors the last known persisted state and is assumed valid,
 * `local` is the side under edit. Changes are detected by comparing both
 * sides by value, limited to what is reachable in `local`.
 */
export class TournamentEditor {
  private readonly localTournament: Tournament;
  private readonly originTournament: Tournament;
  private activeStageId: ID | undefined;
  private activeGroupId: ID | undefined;

  constructor(options: TournamentOptions = {}, local?: Tournament, origin?: Tournament) {
    this.localTournament = local ?? new Tournament(options);
    this.originTournament = origin ?? new Tournament(options);
  }

  getState(): EditorState {
    if (this.originTournament.getBase()) {
      return "edit";
    }
    return this.localTournament.getBase() ? "new" : "none";
  }

  /** Side under edit. Use the editor setters for data loaded from persistence. */
  get local(): Tournament {
    return this.localTournament;
  }

  get origin(): Tournament {
    return this.originTournament;
  }

  // --- new objects ---

  /** Starts a new tournament: both sides are reset and only local gets the base. */
  newBase(sportId: ID): MutationResult<TournamentBase> {
    this.reset();
    return this.localTournament.newBase(sportId);
  }

  /**
   * Activates the stage at `number`, taking it from local, then origin, and
   * creating it in local as a last resort.
   */
  newStage(number: number): MutationResult<Stage> {
    const baseId = this.localTournament.getRootId();
    if (baseId === undefined) {
      return { ok: false, issue: rejection("BASE_MISSING", "Cannot create a stage without a tournament base", { kind: "stage" }) };
    }

    const originStage = this.localTournament.getStageByNumber(number)
      ? undefined
      : this.originTournament.getStageByNumber(number);
    const result =
      originStage && originStage.tournamentId === baseId
        ? this.localTournament.setStage(originStage)
        : this.localTournament.newStage(number);
    if (result.ok) {
      this.activeStageId = identityId(result.value.identity);
      this.activeGroupId = undefined;
    }
    return result;
  }

  newGroup(stageId: ID, number: number): MutationResult<Group> {
    const originGroup = this.localTournament.getGroupByNumber(stageId, number)
      ? undefined
      : this.originTournament.getGroupByNumber(stageId, number);
    const result = originGroup
      ? this.localTournament.setGroup(originGroup)
      : this.localTournament.newGroup(stageId, number);
    if (result.ok) {
      this.activeGroupId = identityId(result.value.identity);
    }
    return result;
  }

  // --- persisted objects ---

  /**
   * Sets a persisted base on both sides. A base with another id than the
   * current one starts over from an empty structure. `value` holds the
   * previous origin base.
   */
  setBase(base: TournamentBase): MutationResult<TournamentBase | undefined> {
    const id = identityId(base.identity);
    const roots = [this.localTournament.getRootId(), this.originTournament.getRootId()];
    if (id !== undefined && roots.some((root) => root !== undefined && root !== id)) {
      this.reset();
    }
    const result = this.originTournament.setBase(base);
    if (result.ok) {
      this.localTournament.setBase(base);
    }
    return result;
  }

  /** Persisted values win over local position conflicts. */
  setStage(stage: Stage): MutationResult<Stage> {
    const result = this.originTournament.setStage(stage, { replaceConflicting: true });
    if (!result.ok) {
      return result;
    }
    this.activeStageId = identityId(stage.identity);
    return this.localTournament.setStage(stage, { replaceConflicting: true });
  }

  setGroup(group: Group): MutationResult<Group> {
    const result = this.originTournament.setGroup(group, { replaceConflicting: true });
    if (!result.ok) {
      return result;
    }
    return this.localTournament.setGroup(group, { replaceConflicting: true });
  }

  /** Replaces both sides with a freshly loaded tournament. */
  loadSnapshot(loaded: LoadedTournament): void {
    this.reset();
    this.setBase(loaded.base);
    loaded.stages.forEach((stage) => this.setStage(stage));
    loaded.groups.forEach((group) => this.setGroup(group));
    this.activeStageId = undefined;
  }

  reset(): void {
    this.localTournament.reset();
    this.originTournament.reset();
    this.activeStageId = undefined;
    this.activeGroupId = undefined;
  }

  // --- editing ---

  updateBase(patch: TournamentBasePatch): MutationResult<TournamentBase> {
    return this.localTournament.updateBase(patch);
  }

  setStageNumberOfGroups(stageId: ID, groupCount: number): MutationResult<Stage> {
    return this.localTournament.setStageNumberOfGroups(stageId, groupCount);
  }

  // --- getters ---

  getBase(): TournamentBase | undefined {
    return this.localTournament.getBase();
  }

  getActiveStageId(): ID | undefined {
    return this.activeStageId;
  }

  getActiveStage(): Stage | undefined {
    return this.activeStageId === undefined ? undefined : this.localTournament.getStageById(this.activeStageId);
  }

  getActiveGroupId(): ID | undefined {
    return this.activeGroupId;
  }

  getActiveGroup(): Group | undefined {
    return this.activeGroupId === undefined ? undefined : this.localTournament.getGroupById(this.activeGroupId);
  }

  // --- change detection ---

  isChanged(): boolean {
    if (this.localTournament.getRootId() === undefined) {
      return false;
    }
    if (!isDeepEqual(this.localTournament.getBase(), this.originTournament.getBase())) {
      return true;
    }
    const localStages = this.localTournament.stageStore();
    const originStages = this.originTournament.stageStore();
    const localGroups = this.localTournament.groupStore();
    const originGroups = this.originTournament.groupStore();
    return this.localTournament.reachableEdges().some((edge) =>
      edge.kind === "stage"
        ? !isDeepEqual(localStages.get(edge.target), originStages.get(edge.target))
        : !isDeepEqual(localGroups.get(edge.target), originGroups.get(edge.target)),
    );
  }

  diffBase(): TournamentBase | undefined {
    return diffOptional(this.localTournament.getBase(), this.originTournament.getBase());
  }

  diffStages(): Stage[] {
    return diffById(
      this.localTournament.stageStore(),
      this.originTournament.stageStore(),
      this.localTournament.collectIdsInStructure(),
    );
  }

  diffGroups(): Group[] {
    return diffById(
      this.localTournament.groupStore(),
      this.originTournament.groupStore(),
      this.localTournament.collectIdsInStructure(),
    );
  }

  diff(): TournamentDiff {
    return {
      base: this.diffBase(),
      stages: this.diffStages(),
      groups: this.diffGroups(),
    };
  }

  // --- validation ---

  /** Only local is validated; origin stems from persistence. */
  validate(): ValidationResult {
    return validateTournament(this.localTournament);
  }

  validateObjectNumbers(stageNumber?: number, groupNumber?: number): number[] | undefined {
    return this.localTournament.validateObjectNumbers(stageNumber, groupNumber);
  }

  // --- snapshots ---

  toSnapshot(): EditorSnapshot {
    return {
      stateSchemaVersion: LATEST_STATE_SCHEMA_VERSION,
      local: this.localTournament.toSnapshot(),
      origin: this.originTournament.toSnapshot(),
      activeStageId: this.activeStageId ?? null,
      activeGroupId: this.activeGroupId ?? null,
    };
  }

  static fromSnapshot(snapshot: EditorSnapshot, options: TournamentOptions = {}): TournamentEditor {
    const editor = new TournamentEditor(
      options,
      Tournament.fromSnapshot(snapshot.local, options),
      Tournament.fromSnapshot(snapshot.origin, options),
    );
    editor.activeStageId = snapshot.activeStageId ?? undefined;
    editor.activeGroupId = snapshot.activeGroupId ?? undefined;
    return editor;
  }
}
