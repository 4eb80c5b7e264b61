import { describe, expect, it } from "vitest";

import { sequentialIds, SnapshotFormatError } from "@/engine";
import { InMemoryPersistence } from "@/persistence";
import { MockAdapter } from "@/realtime";
import { createEditorStore } from "@/store";

function createStore(port = new InMemoryPersistence()) {
  return createEditorStore({ port, idGenerator: sequentialIds("id") });
}

describe("editor store", () => {
  it("refreshes derived state after each mutation", () => {
    const store = createStore();
    store.getState().newBase("sport-1");

    const state = store.getState();
    expect(state.revision).toBe(1);
    expect(state.isChanged).toBe(true);
    expect(state.issues.map((issue) => issue.code)).toEqual(["required", "min_entrants"]);
    expect(state.lastRejection).toBeUndefined();
  });

  it("records the last rejection", () => {
    const store = createStore();
    store.getState().newBase("sport-1");

    const result = store.getState().newStage(5);

    expect(result.ok).toBe(false);
    expect(store.getState().lastRejection?.code).toBe("STAGE_NUMBER_OUT_OF_RANGE");
    expect(store.getState().revision).toBe(2);
  });

  it("keeps state and records the error when saving fails", async () => {
    const store = createStore();
    store.getState().newBase("sport-1");

    const report = await store.getState().save();

    expect(report).toBeUndefined();
    expect(store.getState().error).toBe("Tournament has 2 validation issue(s)");
    expect(store.getState().saving).toBe(false);
    expect(store.getState().isChanged).toBe(true);
  });

  it("saves and becomes clean", async () => {
    const store = createStore();
    store.getState().newBase("sport-1");
    store.getState().updateBase({ name: "Club Open", entrantCount: 8 });
    store.getState().newStage(0);

    const report = await store.getState().save();

    expect(report?.notices).toEqual([
      { type: "TOURNAMENT_BASE_UPDATED", id: "id_1", version: 0 },
      { type: "STAGE_UPDATED", id: "id_2", version: 0 },
    ]);
    expect(store.getState().isChanged).toBe(false);
    expect(store.getState().error).toBeUndefined();
  });

  it("flags origin as outdated on newer remote versions", async () => {
    const db = new InMemoryPersistence();
    const adapter = new MockAdapter();
    const writer = createStore(db);
    const reader = createEditorStore({ port: db });
    writer.getState().connectAdapter(adapter);
    reader.getState().connectAdapter(adapter);

    writer.getState().newBase("sport-1");
    writer.getState().updateBase({ name: "Club Open", entrantCount: 8 });
    await writer.getState().save();
    expect(await reader.getState().load("id_1")).toBe(true);
    expect(reader.getState().outdated).toBe(false);

    writer.getState().updateBase({ name: "Club Open Finals" });
    await writer.getState().save();

    expect(writer.getState().outdated).toBe(false);
    expect(reader.getState().outdated).toBe(true);
    expect(reader.getState().remoteNotices).toEqual([{ type: "TOURNAMENT_BASE_UPDATED", id: "id_1", version: 1 }]);

    expect(await reader.getState().reload()).toBe(true);
    expect(reader.getState().outdated).toBe(false);
    expect(reader.getState().editor.getBase()?.name).toBe("Club Open Finals");
  });

  it("stops listening after disconnecting", async () => {
    const db = new InMemoryPersistence();
    const adapter = new MockAdapter();
    const writer = createStore(db);
    const reader = createEditorStore({ port: db });
    writer.getState().connectAdapter(adapter);
    reader.getState().connectAdapter(adapter);
    writer.getState().newBase("sport-1");
    writer.getState().updateBase({ name: "Club Open", entrantCount: 8 });
    await writer.getState().save();
    await reader.getState().load("id_1");

    reader.getState().disconnectAdapter();
    writer.getState().connectAdapter(adapter);
    writer.getState().updateBase({ name: "Club Open Finals" });
    await writer.getState().save();

    expect(reader.getState().adapter).toBeUndefined();
    expect(reader.getState().outdated).toBe(false);
  });

  it("reports unknown tournaments on load", async () => {
    const store = createStore();

    expect(await store.getState().load("missing")).toBe(false);
    expect(store.getState().error).toBe("Tournament 'missing' not found");
    expect(await store.getState().reload()).toBe(false);
  });

  it("unlinks stages", () => {
    const store = createStore();
    store.getState().newBase("sport-1");
    store.getState().newStage(0);

    expect(store.getState().unlinkStage("id_2")).toBe(true);
    expect(store.getState().editor.local.getStages()).toEqual([]);
  });

  it("round trips through json and keeps state on bad input", () => {
    const store = createStore();
    store.getState().newBase("sport-1");
    store.getState().newStage(0);
    const json = store.getState().exportJSON();

    const copy = createStore();
    copy.getState().importJSON(json);
    expect(copy.getState().editor.toSnapshot()).toEqual(store.getState().editor.toSnapshot());
    expect(copy.getState().revision).toBe(1);

    expect(() => copy.getState().importJSON("nope")).toThrow(SnapshotFormatError);
    expect(copy.getState().revision).toBe(1);
  });
});
