import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { StorageError, isErrnoException } from '@/lib/errors';
import { writeFileAtomic } from '@/lib/fs/write-atomic';
import {
  calendarSelectionSchema,
  type CalendarSelection,
} from '@/lib/schedule/types';
import { emptySelection } from '@/lib/calendar/selection';

export const CALENDAR_FILENAME = 'my-calendar.json';

export interface CalendarStore {
  loadCalendar(): Promise<CalendarSelection>;
  saveCalendar(selection: CalendarSelection): Promise<void>;
}

function serializeCalendarFile(selection: CalendarSelection): string {
  return JSON.stringify(selection, null, 2) + '\n';
}

/** Personal selection in a small JSON file; writes are serialized and atomic. */
export class FileCalendarStore implements CalendarStore {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly dataDir: string) {}

  get filePath(): string {
    return path.join(this.dataDir, CALENDAR_FILENAME);
  }

  async loadCalendar(): Promise<CalendarSelection> {
    const filePath = this.filePath;
    let contents: string;
    try {
      contents = await readFile(filePath, 'utf8');
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) return emptySelection();
      throw err;
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(contents);
    } catch {
      throw new StorageError(`Invalid calendar file format at ${filePath}`, {
        filePath,
      });
    }
    const parsed = calendarSelectionSchema.safeParse(parsedJson);
    if (!parsed.success) {
      throw new StorageError(`Invalid calendar file format at ${filePath}`, {
        filePath,
      });
    }
    return parsed.data;
  }

  async saveCalendar(selection: CalendarSelection): Promise<void> {
    const parsed = calendarSelectionSchema.safeParse(selection);
    if (!parsed.success) {
      throw new StorageError('Refusing to write an invalid calendar selection.');
    }

    await this.withWriteLock(() =>
      writeFileAtomic(this.filePath, serializeCalendarFile(parsed.data)),
    );
  }

  private async withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.writeChain;
    let release: (() => void) | undefined;
    this.writeChain = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await fn();
    } finally {
      release?.();
    }
  }
}
