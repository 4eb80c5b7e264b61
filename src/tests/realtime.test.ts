import { describe, expect, it } from "vitest";

import type { ChangeNotice } from "@/models";
import { MockAdapter } from "@/realtime";

const notice: ChangeNotice = { type: "STAGE_UPDATED", id: "stage-0", version: 2 };

describe("mock adapter", () => {
  it("queues notices until connected", () => {
    const adapter = new MockAdapter();
    const received: ChangeNotice[] = [];
    adapter.onNotice((next) => received.push(next));

    adapter.broadcast(notice);
    expect(received).toEqual([]);

    adapter.connect();
    expect(received).toEqual([notice]);
  });

  it("stops delivering after unsubscribe", () => {
    const adapter = new MockAdapter();
    const received: ChangeNotice[] = [];
    const unsubscribe = adapter.onNotice((next) => received.push(next));
    adapter.connect();

    unsubscribe();
    adapter.broadcast(notice);

    expect(received).toEqual([]);
  });

  it("keeps only the newest held notice per entity", () => {
    const adapter = new MockAdapter();
    const received: ChangeNotice[] = [];
    adapter.onNotice((next) => received.push(next));

    adapter.broadcast({ type: "STAGE_UPDATED", id: "stage-0", version: 3 });
    adapter.broadcast(notice);
    adapter.broadcast({ type: "GROUP_UPDATED", id: "stage-0", version: 0 });
    expect(adapter.pendingCount()).toBe(2);

    adapter.connect();

    expect(received).toEqual([
      { type: "STAGE_UPDATED", id: "stage-0", version: 3 },
      { type: "GROUP_UPDATED", id: "stage-0", version: 0 },
    ]);
    expect(adapter.pendingCount()).toBe(0);
  });
});
