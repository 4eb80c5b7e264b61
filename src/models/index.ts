export * from "@/models/base";
export * from "@/models/identity";
export * from "@/models/tournament";
export * from "@/models/stage";
export * from "@/models/group";
export * from "@/models/events";
