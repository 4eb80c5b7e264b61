export * from "@/engine/diff";
export * from "@/engine/entities";
export * from "@/engine/errors";
export * from "@/engine/graph";
export * from "@/engine/identity";
export * from "@/engine/rules/modes";
export * from "@/engine/serialization";
export * from "@/engine/Tournament";
export * from "@/engine/TournamentEditor";
export * from "@/engine/types";
export * from "@/engine/util";
export * from "@/engine/validation";
