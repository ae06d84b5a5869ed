import { DateTime } from 'luxon';

import type { Session, SpecialEvent, TimeSlot } from '@/lib/schedule/types';

export type SlotBounds = { startMs: number; endMs: number };

export function slotStart(slot: TimeSlot): DateTime {
  return DateTime.fromISO(slot.start, { zone: slot.timezone });
}

export function slotEnd(slot: TimeSlot): DateTime {
  return slotStart(slot).plus({ minutes: slot.durationMinutes });
}

export function slotBounds(slot: TimeSlot): SlotBounds {
  const start = slotStart(slot);
  return {
    startMs: start.toMillis(),
    endMs: start.plus({ minutes: slot.durationMinutes }).toMillis(),
  };
}

/** Builds a slot from a local wall-clock start; null when the inputs do not form a valid instant. */
export function createSlot(params: {
  day: string;
  time: string;
  durationMinutes: number;
  timezone: string;
}): TimeSlot | null {
  const start = DateTime.fromISO(`${params.day}T${params.time}`, {
    zone: params.timezone,
  });
  if (!start.isValid) return null;
  const iso = start.toISO();
  if (!iso) return null;
  return {
    day: params.day,
    start: iso,
    durationMinutes: params.durationMinutes,
    timezone: params.timezone,
  };
}

/**
 * True when the slot starts on `slot.day` and ends no later than midnight of
 * that day, both in the slot's own timezone.
 */
export function slotStaysWithinDay(slot: TimeSlot): boolean {
  const start = slotStart(slot);
  if (!start.isValid || slot.durationMinutes <= 0) return false;
  const lastInstant = start.plus({
    minutes: slot.durationMinutes,
    milliseconds: -1,
  });
  return start.toISODate() === slot.day && lastInstant.toISODate() === slot.day;
}

export function formatSlotRange(slot: TimeSlot): string {
  return `${slot.day} ${slotStart(slot).toFormat('HH:mm')}-${slotEnd(slot).toFormat('HH:mm')}`;
}

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareSlots(a: TimeSlot, b: TimeSlot): number {
  const byDay = compareText(a.day, b.day);
  if (byDay !== 0) return byDay;
  return slotStart(a).toMillis() - slotStart(b).toMillis();
}

/** Schedule order: day, then start instant, then session id. */
export function compareSessions(a: Session, b: Session): number {
  return compareSlots(a.slot, b.slot) || compareText(a.id, b.id);
}

export function compareSpecialEvents(a: SpecialEvent, b: SpecialEvent): number {
  return compareSlots(a.slot, b.slot) || compareText(a.name, b.name);
}
