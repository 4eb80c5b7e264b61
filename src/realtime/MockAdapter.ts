import type { ChangeNotice } from "@/models";
import type { RealtimeAdapter } from "@/realtime/RealtimeAdapter";

function noticeKey(notice: ChangeNotice): string {
  return `${notice.type}:${notice.id}`;
}

/**
 * In-process notice bus.
 *
 * While disconnected, notices are held back per entity and only the highest
 * version is kept: a listener only needs to learn that origin is behind, not
 * every intermediate save. Held notices are delivered on `connect`, in the
 * order their entities were first seen.
 */
export class MockAdapter implements RealtimeAdapter {
  private connected = false;
  private readonly listeners = new Set<(notice: ChangeNotice) => void>();
  private readonly pending = new Map<string, ChangeNotice>();

  connect(): void {
    this.connected = true;
    this.flush();
  }

  disconnect(): void {
    this.connected = false;
  }

  onNotice(cb: (notice: ChangeNotice) => void): () => void {
    this.listeners.add(cb);
    return () => {
      this.listeners.delete(cb);
    };
  }

  broadcast(notice: ChangeNotice): void {
    if (this.connected) {
      this.deliver(notice);
      return;
    }
    const key = noticeKey(notice);
    const held = this.pending.get(key);
    if (!held || held.version < notice.version) {
      this.pending.set(key, notice);
    }
  }

  /** Notices held back while disconnected. */
  pendingCount(): number {
    return this.pending.size;
  }

  private flush(): void {
    const held = [...this.pending.values()];
    this.pending.clear();
    held.forEach((notice) => this.deliver(notice));
  }

  private deliver(notice: ChangeNotice): void {
    this.listeners.forEach((listener) => listener(notice));
  }
}
