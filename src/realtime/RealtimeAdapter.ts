import type { ChangeNotice } from "@/models";

export interface RealtimeAdapter {
  connect(): void;
  disconnect(): void;
  onNotice(cb: (notice: ChangeNotice) => void): () => void;
  broadcast(notice: ChangeNotice): void;
}
