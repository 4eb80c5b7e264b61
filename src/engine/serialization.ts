import { SnapshotFormatError } from "@/engine/errors";
import { editorSnapshotSchema } from "@/engine/schemas";
import type { TournamentOptions } from "@/engine/Tournament";
import { LATEST_STATE_SCHEMA_VERSION, TournamentEditor } from "@/engine/TournamentEditor";
import type { EditorSnapshot } from "@/engine/types";

export function toJSON(editor: TournamentEditor): string {
  return JSON.stringify(editor.toSnapshot());
}

export function parseSnapshot(json: string): EditorSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new SnapshotFormatError("Editor snapshot is not valid JSON", error instanceof SyntaxError ? error : undefined);
  }

  const parsed = editorSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotFormatError(`Editor snapshot is malformed: ${parsed.error.issues[0]?.message ?? "unknown issue"}`, parsed.error);
  }
  if (parsed.data.stateSchemaVersion !== LATEST_STATE_SCHEMA_VERSION) {
    throw new SnapshotFormatError(
      `Unsupported editor snapshot version ${parsed.data.stateSchemaVersion} (expected ${LATEST_STATE_SCHEMA_VERSION})`,
    );
  }
  return parsed.data;
}

export function fromJSON(json: string, options: TournamentOptions = {}): TournamentEditor {
  return TournamentEditor.fromSnapshot(parseSnapshot(json), options);
}
