export * from "@/persistence/errors";
export * from "@/persistence/InMemoryPersistence";
export * from "@/persistence/PersistencePort";
export * from "@/persistence/sync";
