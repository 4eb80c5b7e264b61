import type { EntityKind, Group, ID, Stage, TournamentBase } from "@/models";
import { identityId } from "@/engine/identity";
import { activeStageCapacity, modeLabel, stageCount } from "@/engine/rules/modes";
import type { Tournament } from "@/engine/Tournament";

export interface ValidationIssue {
  level: "error" | "warning" | "info";
  code: string;
  message: string;
  field?: string;
  entity?: { kind: EntityKind; id?: ID };
}

export interface ValidationResult {
  ok: boolean;
  issues: ValidationIssue[];
}

export type RejectionCode =
  | "IDENTITY_UNASSIGNED"
  | "BASE_MISSING"
  | "STAGE_NOT_FOUND"
  | "STAGE_NUMBER_CONFLICT"
  | "STAGE_NUMBER_OUT_OF_RANGE"
  | "GROUP_NUMBER_CONFLICT"
  | "GROUP_NUMBER_OUT_OF_RANGE"
  | "GROUP_COUNT_NOT_INTEGER";

export function rejection(code: RejectionCode, message: string, entity?: ValidationIssue["entity"]): ValidationIssue {
  return { level: "error", code, message, entity };
}

function fieldError(kind: EntityKind, id: ID | undefined, field: string, code: string, message: string): ValidationIssue {
  return { level: "error", code, field, message, entity: { kind, id } };
}

export function validateBase(base: TournamentBase): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const id = identityId(base.identity);

  if (base.name.trim().length === 0) {
    issues.push(fieldError("tournament", id, "name", "required", "Tournament name is required"));
  }

  if (base.entrantCount < 2) {
    issues.push(fieldError("tournament", id, "entrantCount", "min_entrants", "Number of entrants must be at least 2"));
  }

  if (base.mode.kind === "swiss_system" && base.mode.roundCount <= 0) {
    issues.push(fieldError("tournament", id, "mode.roundCount", "min_rounds", "Number of rounds must be greater than 0"));
  }

  if (base.lifecycle.kind === "active_stage" && base.lifecycle.index >= activeStageCapacity(base.mode)) {
    issues.push(
      fieldError(
        "tournament",
        id,
        "lifecycle",
        "active_stage_out_of_range",
        "Active stage exceeds maximum number of stages for the tournament mode",
      ),
    );
  }

  return issues;
}

function groupCountIssue(stage: Stage, base: TournamentBase): string | undefined {
  if (!Number.isInteger(stage.groupCount)) {
    return "Number of groups must be a whole number";
  }
  if (stage.groupCount < 1) {
    return "Number of groups must be at least 1";
  }
  if (stage.groupCount > Math.floor(base.entrantCount / 2)) {
    return "Number of groups cannot exceed half the number of entrants";
  }
  if (base.mode.kind === "single_stage" && stage.groupCount !== 1) {
    return "Single Stage mode must have exactly 1 group (the whole field)";
  }
  if (base.mode.kind === "swiss_system" && stage.groupCount > 1) {
    return "Swiss System has 1 group in stage (the whole field)";
  }
  return undefined;
}

/** Validates a stage in the context of its parent tournament. */
export function validateStage(stage: Stage, base: TournamentBase): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const id = identityId(stage.identity);
  const tournamentId = identityId(base.identity);

  if (tournamentId !== undefined && stage.tournamentId !== tournamentId) {
    issues.push(
      fieldError("stage", id, "tournamentId", "parent_mismatch", "Stage tournament id does not match the provided tournament"),
    );
  }

  const groupMessage = groupCountIssue(stage, base);
  if (groupMessage) {
    issues.push(fieldError("stage", id, "groupCount", "invalid_group_count", groupMessage));
  }

  const maxStages = stageCount(base.mode);
  if (stage.number >= maxStages) {
    issues.push(
      fieldError(
        "stage",
        id,
        "number",
        "stage_number_out_of_range",
        `Stage number ${stage.number} exceeds maximum allowed stages (${maxStages}) for mode ${modeLabel(base.mode)}`,
      ),
    );
  }

  return issues;
}

/** Validates a group in the context of its parent stage. */
export function validateGroup(group: Group, stage: Stage): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const id = identityId(group.identity);
  const stageId = identityId(stage.identity);

  if (stageId !== undefined && group.stageId !== stageId) {
    issues.push(fieldError("group", id, "stageId", "parent_mismatch", "Group stage id does not match the provided stage"));
  }

  if (group.number >= stage.groupCount) {
    issues.push(
      fieldError(
        "group",
        id,
        "number",
        "group_number_out_of_range",
        `Group number ${group.number} exceeds number of groups (${stage.groupCount}) of stage ${stage.number}`,
      ),
    );
  }

  return issues;
}

/**
 * Validates every entity reachable from the tournament base against its
 * resolved parent. Orphaned entities are skipped. Never stops at the first
 * failure.
 */
export function validateTournament(tournament: Tournament): ValidationResult {
  const base = tournament.getBase();
  if (!base) {
    return { ok: true, issues: [] };
  }

  const issues: ValidationIssue[] = [...validateBase(base)];

  tournament.reachableEdges().forEach((edge) => {
    if (edge.kind === "stage") {
      const stage = tournament.getStageById(edge.target);
      if (stage) {
        issues.push(...validateStage(stage, base));
      }
      return;
    }
    const group = tournament.getGroupById(edge.target);
    const parent = tournament.getStageById(edge.source);
    if (group && parent) {
      issues.push(...validateGroup(group, parent));
    }
  });

  return {
    ok: !issues.some((issue) => issue.level === "error"),
    issues,
  };
}
