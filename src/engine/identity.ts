import type { ID, Identity } from "@/models";

export type PersistedIdentity = Extract<Identity, { kind: "persisted" }>;

export function unassignedIdentity(): Identity {
  return { kind: "unassigned" };
}

export function provisionalIdentity(id: ID): Identity {
  return { kind: "provisional", id };
}

export function persistedIdentity(id: ID, version: number): Identity {
  return { kind: "persisted", id, version };
}

export function identityId(identity: Identity): ID | undefined {
  return identity.kind === "unassigned" ? undefined : identity.id;
}

export function identityVersion(identity: Identity): number | undefined {
  return identity.kind === "persisted" ? identity.version : undefined;
}

export function isPersisted(identity: Identity): identity is PersistedIdentity {
  return identity.kind === "persisted";
}
