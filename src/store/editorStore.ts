import type { LogLayer } from "loglayer";
import { createStore } from "zustand/vanilla";

import type { ChangeNotice, Group, ID, Identity, Stage, TournamentBase, TournamentBasePatch } from "@/models";
import { identityVersion } from "@/engine/identity";
import { logger as defaultLogger } from "@/engine/logger";
import { fromJSON, toJSON } from "@/engine/serialization";
import { TournamentEditor } from "@/engine/TournamentEditor";
import type { TournamentOptions } from "@/engine/Tournament";
import type { MutationResult } from "@/engine/types";
import type { ValidationIssue } from "@/engine/validation";
import { loadTournament, saveTournament, type SaveReport } from "@/persistence/sync";
import type { PersistencePort } from "@/persistence/PersistencePort";
import type { RealtimeAdapter } from "@/realtime/RealtimeAdapter";

export interface EditorStoreState {
  editor: TournamentEditor;
  /** Bumped on every change of the editor. */
  revision: number;
  isChanged: boolean;
  issues: ValidationIssue[];
  lastRejection?: ValidationIssue;
  /** Notices about versions newer than origin. */
  remoteNotices: ChangeNotice[];
  outdated: boolean;
  saving: boolean;
  error?: string;
  adapter?: RealtimeAdapter;

  newBase(sportId: ID): MutationResult<TournamentBase>;
  updateBase(patch: TournamentBasePatch): MutationResult<TournamentBase>;
  newStage(number: number): MutationResult<Stage>;
  newGroup(stageId: ID, number: number): MutationResult<Group>;
  setStageNumberOfGroups(stageId: ID, groupCount: number): MutationResult<Stage>;
  unlinkStage(stageId: ID): boolean;
  save(): Promise<SaveReport | undefined>;
  load(id: ID): Promise<boolean>;
  reload(): Promise<boolean>;
  connectAdapter(adapter: RealtimeAdapter): void;
  disconnectAdapter(): void;
  exportJSON(): string;
  importJSON(json: string): void;
}

export interface EditorStoreOptions extends TournamentOptions {
  port: PersistencePort;
  editor?: TournamentEditor;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function originVersion(editor: TournamentEditor, notice: ChangeNotice): number | undefined {
  let identity: Identity | undefined;
  switch (notice.type) {
    case "TOURNAMENT_BASE_UPDATED": {
      const base = editor.origin.getBase();
      identity = base && editor.origin.getRootId() === notice.id ? base.identity : undefined;
      break;
    }
    case "STAGE_UPDATED":
      identity = editor.origin.getStageById(notice.id)?.identity;
      break;
    case "GROUP_UPDATED":
      identity = editor.origin.getGroupById(notice.id)?.identity;
      break;
  }
  return identity ? identityVersion(identity) : undefined;
}

/** Single writer around a tournament editor. Every mutation goes through an action. */
export function createEditorStore(options: EditorStoreOptions) {
  const { port, editor: initialEditor, ...tournamentOptions } = options;
  const log: LogLayer = options.logger ?? defaultLogger;
  let unsubscribe: (() => void) | undefined;

  return createStore<EditorStoreState>((set, get) => {
    const derive = (editor: TournamentEditor) => ({
      editor,
      isChanged: editor.isChanged(),
      issues: editor.validate().issues,
    });

    const refresh = (editor: TournamentEditor = get().editor) => {
      set((state) => ({ ...derive(editor), revision: state.revision + 1 }));
    };

    const commit = <T>(result: MutationResult<T>): MutationResult<T> => {
      refresh();
      set({ lastRejection: result.ok ? undefined : result.issue });
      return result;
    };

    const startEditor = initialEditor ?? new TournamentEditor(tournamentOptions);

    return {
      ...derive(startEditor),
      revision: 0,
      lastRejection: undefined,
      remoteNotices: [],
      outdated: false,
      saving: false,
      error: undefined,
      adapter: undefined,

      newBase(sportId) {
        set({ remoteNotices: [], outdated: false, error: undefined });
        return commit(get().editor.newBase(sportId));
      },

      updateBase(patch) {
        return commit(get().editor.updateBase(patch));
      },

      newStage(number) {
        return commit(get().editor.newStage(number));
      },

      newGroup(stageId, number) {
        return commit(get().editor.newGroup(stageId, number));
      },

      setStageNumberOfGroups(stageId, groupCount) {
        return commit(get().editor.setStageNumberOfGroups(stageId, groupCount));
      },

      unlinkStage(stageId) {
        const unlinked = get().editor.local.unlinkStage(stageId);
        refresh();
        return unlinked;
      },

      async save() {
        set({ saving: true, error: undefined });
        try {
          const report = await saveTournament(get().editor, port, { adapter: get().adapter, logger: log });
          refresh();
          set({ saving: false });
          return report;
        } catch (error) {
          refresh();
          set({ saving: false, error: errorMessage(error) });
          return undefined;
        }
      },

      async load(id) {
        try {
          const found = await loadTournament(get().editor, port, id, { logger: log });
          refresh();
          set({ remoteNotices: [], outdated: false, error: found ? undefined : `Tournament '${id}' not found` });
          return found;
        } catch (error) {
          set({ error: errorMessage(error) });
          return false;
        }
      },

      async reload() {
        const id = get().editor.origin.getRootId();
        if (id === undefined) {
          return false;
        }
        return get().load(id);
      },

      connectAdapter(adapter) {
        unsubscribe?.();
        unsubscribe = adapter.onNotice((notice) => {
          const known = originVersion(get().editor, notice);
          if (known === undefined || notice.version <= known) {
            return;
          }
          log.withMetadata({ notice }).debug("Origin outdated by remote change");
          set((state) => ({ remoteNotices: [...state.remoteNotices, notice].slice(-50), outdated: true }));
        });
        adapter.connect();
        set({ adapter });
      },

      disconnectAdapter() {
        unsubscribe?.();
        unsubscribe = undefined;
        get().adapter?.disconnect();
        set({ adapter: undefined });
      },

      exportJSON() {
        return toJSON(get().editor);
      },

      importJSON(json) {
        const editor = fromJSON(json, tournamentOptions);
        refresh(editor);
        set({ lastRejection: undefined, remoteNotices: [], outdated: false, error: undefined });
      },
    };
  });
}

export type EditorStore = ReturnType<typeof createEditorStore>;
