import { FileCalendarStore } from '@/lib/calendar/store-file';
import { runCommand } from '@/lib/cli/commands';
import { getConfig } from '@/lib/env';
import { createLogger } from '@/lib/log';
import { SqliteScheduleStore } from '@/lib/schedule/store-sqlite';
import { HtmlScheduleSource } from '@/lib/sync/html';

const config = getConfig();
const logger = createLogger('confsched', { debug: config.debug });

const controller = new AbortController();
process.once('SIGINT', () => {
  logger.warn('interrupted, stopping');
  controller.abort();
});

try {
  process.exitCode = await runCommand(process.argv.slice(2), {
    config,
    logger,
    store: new SqliteScheduleStore(config.dataDir, logger),
    calendarStore: new FileCalendarStore(config.dataDir),
    createSource: () =>
      new HtmlScheduleSource({
        scheduleUrl: config.scheduleUrl,
        userAgent: config.userAgent,
        requestTimeoutMs: config.requestTimeoutMs,
      }),
    out: (line) => console.log(line),
    signal: controller.signal,
  });
} catch (err) {
  logger.error('unexpected failure', {
    error: err instanceof Error ? (err.stack ?? err.message) : String(err),
  });
  process.exitCode = 1;
}
