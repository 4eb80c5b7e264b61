import * as z from "zod";

export const identitySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("unassigned") }),
  z.object({ kind: z.literal("provisional"), id: z.string().min(1) }),
  z.object({ kind: z.literal("persisted"), id: z.string().min(1), version: z.number().int().nonnegative() }),
]);

const position = z.number().int().nonnegative();

export const tournamentModeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("single_stage") }),
  z.object({ kind: z.literal("pool_and_final_stage") }),
  z.object({ kind: z.literal("two_pool_stages_and_final_stage") }),
  z.object({ kind: z.literal("swiss_system"), roundCount: z.number().int().nonnegative() }),
]);

export const tournamentLifecycleSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("draft") }),
  z.object({ kind: z.literal("published") }),
  z.object({ kind: z.literal("active_stage"), index: position }),
  z.object({ kind: z.literal("finished") }),
]);

export const tournamentBaseSchema = z.object({
  identity: identitySchema,
  name: z.string(),
  sportId: z.string(),
  entrantCount: z.number().int().nonnegative(),
  type: z.enum(["scheduled", "adhoc"]),
  mode: tournamentModeSchema,
  lifecycle: tournamentLifecycleSchema,
});

export const stageSchema = z.object({
  identity: identitySchema,
  tournamentId: z.string(),
  number: position,
  groupCount: z.number().int().nonnegative(),
});

export const groupSchema = z.object({
  identity: identitySchema,
  stageId: z.string(),
  number: position,
});

export const dependencyGraphSchema = z.object({
  nodes: z.array(z.string()),
  edges: z.array(
    z.object({
      source: z.string(),
      target: z.string(),
      kind: z.enum(["stage", "group"]),
    }),
  ),
});

export const tournamentSnapshotSchema = z.object({
  base: tournamentBaseSchema.nullable(),
  structure: dependencyGraphSchema,
  stages: z.array(stageSchema),
  groups: z.array(groupSchema),
});

export const editorSnapshotSchema = z.object({
  stateSchemaVersion: z.number().int(),
  local: tournamentSnapshotSchema,
  origin: tournamentSnapshotSchema,
  activeStageId: z.string().nullable(),
  activeGroupId: z.string().nullable(),
});
