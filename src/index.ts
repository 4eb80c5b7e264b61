export * from "@/config";
export * from "@/engine";
export * from "@/engine/logger";
export * from "@/models";
export * from "@/persistence";
export * from "@/realtime";
export * from "@/store";
