import path from 'node:path';
import { parseArgs } from 'node:util';

import {
  addSession,
  removeSession,
  resolveSelection,
} from '@/lib/calendar/selection';
import type { CalendarStore } from '@/lib/calendar/store-file';
import { conflictsBySession, findConflicts } from '@/lib/conflicts/find';
import type { Config } from '@/lib/env';
import { ConfschedError } from '@/lib/errors';
import { exportCalendar, writeCalendarExport } from '@/lib/export/calendar';
import { writeSnapshotJson } from '@/lib/export/snapshot-json';
import type { Logger } from '@/lib/log';
import { describeRating, type SpeakerRatings } from '@/lib/ratings/load';
import { loadSchedule, type LoadedSchedule } from '@/lib/schedule/fallback';
import { formatSlotRange } from '@/lib/schedule/slot';
import type { ScheduleStore } from '@/lib/schedule/store';
import type { Session, Snapshot } from '@/lib/schedule/types';
import { runSync, type SyncReport } from '@/lib/sync/run';
import type { ScheduleSource } from '@/lib/sync/types';

export type CommandContext = {
  config: Config;
  logger: Logger;
  store: ScheduleStore;
  calendarStore: CalendarStore;
  createSource: () => ScheduleSource;
  out: (line: string) => void;
  signal?: AbortSignal;
  bundledPath?: string;
};

export const USAGE = [
  'usage: confsched <command> [args]',
  '',
  '  sync                  fetch the conference schedule and store it',
  '  status                show where the schedule comes from and its size',
  '  select <session-id>   add a session to your calendar',
  '  deselect <session-id> remove a session from your calendar',
  '  calendar              list your sessions with conflicts',
  '  export                write your calendar as an .ics file',
  '  export-json <path>    write the current schedule as JSON',
];

function load(ctx: CommandContext): Promise<LoadedSchedule> {
  return loadSchedule({
    store: ctx.store,
    ratingsFile: ctx.config.ratingsFile,
    logger: ctx.logger,
    bundledPath: ctx.bundledPath,
  });
}

function printSyncReport(report: SyncReport, out: (line: string) => void) {
  out(`Synced schedule fetched at ${report.fetchedAt}`);
  out(
    `  ${report.counts.sessions} sessions, ${report.counts.speakers} speakers, ` +
      `${report.counts.tracks} tracks, ${report.counts.specialEvents} other events`,
  );
  for (const session of report.partialSessions) {
    out(`  partial session ${session.id} (${session.title}): ${session.reason}`);
  }
  for (const speaker of report.partialSpeakers) {
    out(`  partial speaker ${speaker.slug} (${speaker.name}): ${speaker.reason}`);
  }
  if (report.danglingSelections.length > 0) {
    out(
      `  selected sessions no longer in the schedule: ${report.danglingSelections.join(', ')}`,
    );
  }
}

function speakerLine(
  session: Session,
  snapshot: Snapshot,
  ratings: SpeakerRatings,
): string | null {
  const bySlug = new Map(snapshot.speakers.map((s) => [s.slug, s]));
  const names = session.speakers.map((slug) => {
    const name = bySlug.get(slug)?.name ?? slug;
    const rating = ratings.get(slug);
    if (!rating) return name;
    const { display, badge } = describeRating(rating);
    return `${name} [${display} ${badge}]`;
  });
  return names.length > 0 ? names.join(', ') : null;
}

async function syncCommand(ctx: CommandContext): Promise<number> {
  const outcome = await runSync({
    config: ctx.config,
    source: ctx.createSource(),
    store: ctx.store,
    calendarStore: ctx.calendarStore,
    logger: ctx.logger,
    signal: ctx.signal,
  });
  if (!outcome.ok) {
    ctx.out(`Sync failed (${outcome.error.code}): ${outcome.error.message}`);
    ctx.out('The previously stored schedule was left unchanged.');
    return 1;
  }
  printSyncReport(outcome.report, ctx.out);
  return 0;
}

async function statusCommand(ctx: CommandContext): Promise<number> {
  const { snapshot, source } = await load(ctx);
  const selection = await ctx.calendarStore.loadCalendar();
  const { sessions, missing } = resolveSelection(snapshot, selection);

  ctx.out(
    source === 'database'
      ? `Schedule: synced data (last sync ${(await ctx.store.lastSyncedAt()) ?? 'unknown'})`
      : 'Schedule: bundled data (run "confsched sync" to refresh)',
  );
  ctx.out(
    `  ${snapshot.sessions.length} sessions, ${snapshot.speakers.length} speakers, ` +
      `${snapshot.tracks.length} tracks`,
  );
  ctx.out(`Calendar: ${sessions.length} sessions selected`);
  if (missing.length > 0) {
    ctx.out(`  no longer in the schedule: ${missing.join(', ')}`);
  }
  return 0;
}

async function selectCommand(
  ctx: CommandContext,
  sessionId: string | undefined,
  selected: boolean,
): Promise<number> {
  if (!sessionId) {
    ctx.out(`usage: confsched ${selected ? 'select' : 'deselect'} <session-id>`);
    return 2;
  }
  const selection = await ctx.calendarStore.loadCalendar();
  const next = selected
    ? addSession(selection, sessionId)
    : removeSession(selection, sessionId);
  if (next === selection) {
    ctx.out(
      selected
        ? `${sessionId} is already in your calendar`
        : `${sessionId} is not in your calendar`,
    );
    return 0;
  }
  await ctx.calendarStore.saveCalendar(next);

  if (!selected) {
    ctx.out(`Removed ${sessionId}`);
    return 0;
  }
  const { snapshot } = await load(ctx);
  const session = snapshot.sessions.find((s) => s.id === sessionId);
  ctx.out(
    session
      ? `Added ${session.id}: ${session.title} (${formatSlotRange(session.slot)})`
      : `Added ${sessionId} (not in the current schedule)`,
  );
  return 0;
}

async function calendarCommand(ctx: CommandContext): Promise<number> {
  const { snapshot, ratings } = await load(ctx);
  const selection = await ctx.calendarStore.loadCalendar();
  const { sessions, missing } = resolveSelection(snapshot, selection);
  const conflicts = conflictsBySession(findConflicts(sessions));

  if (sessions.length === 0) ctx.out('Your calendar is empty.');
  for (const session of sessions) {
    const room = session.room ? ` [${session.room}]` : '';
    ctx.out(`${formatSlotRange(session.slot)}  ${session.id}  ${session.title}${room}`);
    const speakers = speakerLine(session, snapshot, ratings);
    if (speakers) ctx.out(`    ${speakers}`);
    for (const other of conflicts.get(session.id) ?? []) {
      ctx.out(`    conflicts with ${other.id}: ${other.title}`);
    }
  }
  if (missing.length > 0) {
    ctx.out(`No longer in the schedule: ${missing.join(', ')}`);
  }
  return 0;
}

async function exportCommand(ctx: CommandContext): Promise<number> {
  const { snapshot } = await load(ctx);
  const selection = await ctx.calendarStore.loadCalendar();
  const result = exportCalendar(selection, snapshot);
  const filePath = await writeCalendarExport(ctx.config.exportDir, result.ics);
  ctx.out(`Wrote ${result.eventCount} events to ${filePath}`);
  if (result.missing.length > 0) {
    ctx.out(`Skipped, no longer in the schedule: ${result.missing.join(', ')}`);
  }
  return 0;
}

async function exportJsonCommand(
  ctx: CommandContext,
  target: string | undefined,
): Promise<number> {
  if (!target) {
    ctx.out('usage: confsched export-json <path>');
    return 2;
  }
  const { snapshot } = await load(ctx);
  const filePath = path.resolve(target);
  await writeSnapshotJson(snapshot, filePath);
  ctx.out(`Wrote ${snapshot.sessions.length} sessions to ${filePath}`);
  return 0;
}

/** Runs one command line and returns the process exit code. */
export async function runCommand(
  argv: readonly string[],
  ctx: CommandContext,
): Promise<number> {
  let positionals: string[];
  let help: boolean | undefined;
  try {
    const parsed = parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: { help: { type: 'boolean', short: 'h' } },
    });
    positionals = parsed.positionals;
    help = parsed.values.help;
  } catch (err) {
    ctx.out(err instanceof Error ? err.message : String(err));
    USAGE.forEach((line) => ctx.out(line));
    return 2;
  }

  const [command, arg] = positionals;
  if (help || !command) {
    USAGE.forEach((line) => ctx.out(line));
    return help ? 0 : 2;
  }

  try {
    switch (command) {
      case 'sync':
        return await syncCommand(ctx);
      case 'status':
        return await statusCommand(ctx);
      case 'select':
        return await selectCommand(ctx, arg, true);
      case 'deselect':
        return await selectCommand(ctx, arg, false);
      case 'calendar':
        return await calendarCommand(ctx);
      case 'export':
        return await exportCommand(ctx);
      case 'export-json':
        return await exportJsonCommand(ctx, arg);
      default:
        ctx.out(`unknown command "${command}"`);
        USAGE.forEach((line) => ctx.out(line));
        return 2;
    }
  } catch (err) {
    if (!(err instanceof ConfschedError)) throw err;
    ctx.out(`error (${err.code}): ${err.message}`);
    return 1;
  }
}
