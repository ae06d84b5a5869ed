import type { DateTime } from 'luxon';

export type IcsEvent = {
  uid: string;
  stamp: DateTime;
  start: DateTime;
  end: DateTime;
  summary: string;
  location: string | null;
  description: string | null;
  categories: string[];
};

const MAX_LINE_OCTETS = 75;

export function escapeIcsText(value: string): string {
  return value
    .replaceAll('\\', '\\\\')
    .replaceAll('\r\n', '\\n')
    .replaceAll('\n', '\\n')
    .replaceAll('\r', '\\n')
    .replaceAll(',', '\\,')
    .replaceAll(';', '\\;');
}

/**
 * Splits a content line into 75-octet pieces joined by CRLF and a space.
 * Breaks only between code points so multi-byte characters stay whole.
 */
export function foldIcsLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_OCTETS) return line;

  const out: string[] = [];
  let current = '';
  let currentOctets = 0;
  // continuation lines lose one octet to the leading space
  let limit = MAX_LINE_OCTETS;
  for (const char of line) {
    const size = Buffer.byteLength(char, 'utf8');
    if (currentOctets + size > limit) {
      out.push(current);
      current = '';
      currentOctets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    currentOctets += size;
  }
  out.push(current);
  return out.join('\r\n ');
}

export function formatUtc(dt: DateTime): string {
  return dt.toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'");
}

function textProperty(name: string, value: string): string {
  return foldIcsLine(`${name}:${escapeIcsText(value)}`);
}

/** Renders a VCALENDAR with one VEVENT per entry, in the order given. */
export function generateIcs(params: {
  events: readonly IcsEvent[];
  calendarName: string;
  prodId?: string;
}): string {
  const prodId = params.prodId ?? '-//confsched//EN';

  const lines: string[] = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    textProperty('PRODID', prodId),
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    textProperty('X-WR-CALNAME', params.calendarName),
  ];

  for (const ev of params.events) {
    lines.push(
      'BEGIN:VEVENT',
      textProperty('UID', ev.uid),
      `DTSTAMP:${formatUtc(ev.stamp)}`,
      `DTSTART:${formatUtc(ev.start)}`,
      `DTEND:${formatUtc(ev.end)}`,
      textProperty('SUMMARY', ev.summary),
    );
    if (ev.location) lines.push(textProperty('LOCATION', ev.location));
    if (ev.description) lines.push(textProperty('DESCRIPTION', ev.description));
    if (ev.categories.length > 0) {
      lines.push(
        foldIcsLine(`CATEGORIES:${ev.categories.map(escapeIcsText).join(',')}`),
      );
    }
    lines.push('END:VEVENT');
  }

  lines.push('END:VCALENDAR');
  return lines.join('\r\n') + '\r\n';
}
