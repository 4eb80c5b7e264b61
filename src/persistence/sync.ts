import type { LogLayer } from "loglayer";

import type { ChangeNotice, Group, ID, Identity, Stage, TournamentBase } from "@/models";
import { isPersisted } from "@/engine/identity";
import { logger as defaultLogger } from "@/engine/logger";
import type { TournamentEditor } from "@/engine/TournamentEditor";
import { InvalidTournamentError, PersistenceError } from "@/persistence/errors";
import type { PersistencePort } from "@/persistence/PersistencePort";
import type { RealtimeAdapter } from "@/realtime/RealtimeAdapter";

export interface SyncOptions {
  adapter?: RealtimeAdapter;
  logger?: LogLayer;
}

export interface SaveReport {
  base?: TournamentBase;
  stages: Stage[];
  groups: Group[];
  notices: ChangeNotice[];
}

function noticeFor(type: ChangeNotice["type"], identity: Identity): ChangeNotice {
  if (!isPersisted(identity)) {
    throw new PersistenceError("UNEXPECTED", "Persistence returned an entity without a persisted identity");
  }
  return { type, id: identity.id, version: identity.version };
}

/**
 * Persists the editor diff: base first, then stages, then groups, so parents
 * always exist before their children. Every saved value is synced back into
 * both sides of the editor. Notices are broadcast once the whole diff is
 * stored.
 */
export async function saveTournament(
  editor: TournamentEditor,
  port: PersistencePort,
  options: SyncOptions = {},
): Promise<SaveReport> {
  const log = options.logger ?? defaultLogger;
  const report: SaveReport = { stages: [], groups: [], notices: [] };

  const validation = editor.validate();
  if (!validation.ok) {
    log.withMetadata({ issues: validation.issues.map((issue) => issue.code) }).warn("Refusing to save invalid tournament");
    throw new InvalidTournamentError(validation.issues);
  }

  const diff = editor.diff();
  try {
    if (diff.base) {
      const saved = await port.saveTournamentBase(diff.base);
      editor.setBase(saved);
      report.base = saved;
      report.notices.push(noticeFor("TOURNAMENT_BASE_UPDATED", saved.identity));
    }
    for (const stage of diff.stages) {
      const saved = await port.saveStage(stage);
      editor.setStage(saved);
      report.stages.push(saved);
      report.notices.push(noticeFor("STAGE_UPDATED", saved.identity));
    }
    for (const group of diff.groups) {
      const saved = await port.saveGroup(group);
      editor.setGroup(saved);
      report.groups.push(saved);
      report.notices.push(noticeFor("GROUP_UPDATED", saved.identity));
    }
  } catch (error) {
    log
      .withError(error)
      .withMetadata({ tournamentId: editor.local.getRootId(), saved: report.notices.length })
      .error("Saving tournament failed");
    throw error;
  }

  report.notices.forEach((notice) => options.adapter?.broadcast(notice));
  log
    .withMetadata({
      tournamentId: editor.local.getRootId(),
      base: report.base !== undefined,
      stages: report.stages.length,
      groups: report.groups.length,
    })
    .info("Saved tournament");
  return report;
}

/** Replaces the editor content with the stored tournament. */
export async function loadTournament(
  editor: TournamentEditor,
  port: PersistencePort,
  id: ID,
  options: Pick<SyncOptions, "logger"> = {},
): Promise<boolean> {
  const log = options.logger ?? defaultLogger;
  const base = await port.getTournamentBase(id);
  if (!base) {
    log.withMetadata({ tournamentId: id }).warn("Tournament not found");
    return false;
  }
  const stages = await port.listStagesOfTournament(id);
  const groupLists = await Promise.all(
    stages.flatMap((stage) => (isPersisted(stage.identity) ? [port.listGroupsOfStage(stage.identity.id)] : [])),
  );
  editor.loadSnapshot({ base, stages, groups: groupLists.flat() });
  log.withMetadata({ tournamentId: id, stages: stages.length }).info("Loaded tournament");
  return true;
}
