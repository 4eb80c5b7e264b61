import type { TournamentMode } from "@/models";

export function stageCount(mode: TournamentMode): number {
  switch (mode.kind) {
    case "single_stage":
      return 1;
    case "pool_and_final_stage":
      return 2;
    case "two_pool_stages_and_final_stage":
      return 3;
    case "swiss_system":
      return 1;
  }
}

/** Upper bound (exclusive) for the active stage index of a running tournament. */
export function activeStageCapacity(mode: TournamentMode): number {
  // each swiss round is played as its own stage
  return mode.kind === "swiss_system" ? mode.roundCount : stageCount(mode);
}

export function stageName(mode: TournamentMode, stageNumber: number): string | undefined {
  switch (mode.kind) {
    case "single_stage":
      return stageNumber === 0 ? "Single Stage" : undefined;
    case "pool_and_final_stage":
      return ["Pool Stage", "Final Stage"][stageNumber];
    case "two_pool_stages_and_final_stage":
      return ["First Pool Stage", "Second Pool Stage", "Final Stage"][stageNumber];
    case "swiss_system":
      return stageNumber === 0 ? "Swiss System" : undefined;
  }
}

export function modeLabel(mode: TournamentMode): string {
  switch (mode.kind) {
    case "single_stage":
      return "Single Stage";
    case "pool_and_final_stage":
      return "Pool and Final Stage";
    case "two_pool_stages_and_final_stage":
      return "Two Pool Stages and Final Stage";
    case "swiss_system":
      return `Swiss System (${mode.roundCount} rounds)`;
  }
}
