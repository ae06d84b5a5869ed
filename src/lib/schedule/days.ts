import { DateTime } from 'luxon';

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const WEEKDAYS: Record<string, number> = {
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
  sunday: 7,
};

// full names or abbreviations of at least three letters ("Feb", "Sept")
function parseMonthName(value: string): number | null {
  const token = value.trim().toLowerCase();
  if (token.length < 3) return null;
  const index = MONTH_NAMES.findIndex((name) => name.startsWith(token));
  return index === -1 ? null : index + 1;
}

function toIsoDate(year: number, month: number, day: number): string | null {
  const date = DateTime.fromObject({ year, month, day });
  return date.isValid ? date.toISODate() : null;
}

/**
 * Resolves a schedule day heading to an ISO date. Accepts an embedded ISO
 * date, "February 25" / "25 February" (with `year`), or a bare weekday name
 * matched against `knownDays` when exactly one of them falls on it.
 */
export function parseDayLabel(
  label: string,
  context: { year: number; knownDays?: readonly string[] },
): string | null {
  const trimmed = label.trim();

  const iso = trimmed.match(/\b(\d{4})-(\d{2})-(\d{2})\b/);
  if (iso) return toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const monthFirst = trimmed.match(/\b([A-Za-z]{3,9})\.?\s+(\d{1,2})\b/);
  if (monthFirst) {
    const month = parseMonthName(monthFirst[1]);
    if (month !== null) {
      return toIsoDate(context.year, month, Number(monthFirst[2]));
    }
  }

  const dayFirst = trimmed.match(/\b(\d{1,2})\s+([A-Za-z]{3,9})\b/);
  if (dayFirst) {
    const month = parseMonthName(dayFirst[2]);
    if (month !== null) {
      return toIsoDate(context.year, month, Number(dayFirst[1]));
    }
  }

  const lower = trimmed.toLowerCase();
  const weekday = Object.entries(WEEKDAYS).find(([name]) =>
    lower.includes(name),
  )?.[1];
  if (weekday !== undefined && context.knownDays) {
    const matches = [...new Set(context.knownDays)].filter(
      (day) => DateTime.fromISO(day).weekday === weekday,
    );
    if (matches.length === 1) return matches[0];
  }

  return null;
}

/** Parses "9:00", "09:00", "9h00", "2:15pm" or "2:15 p.m." into 24-hour "HH:mm". */
export function parseClockTime(raw: string): string | null {
  const cleaned = raw.toLowerCase().replaceAll(/[\s.]/g, '');
  const match = cleaned.match(/^(\d{1,2})[:h](\d{2})([ap]m?)?$/);
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const meridiem = match[3];
  if (minutes > 59) return null;

  let hh = hours;
  if (meridiem) {
    if (hours < 1 || hours > 12) return null;
    hh = hours % 12;
    if (meridiem.startsWith('p')) hh += 12;
  } else if (hours > 23) {
    return null;
  }

  return `${String(hh).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}
