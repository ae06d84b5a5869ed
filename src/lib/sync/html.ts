import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';

import { FetchError, SyncAbortedError } from '@/lib/errors';
import type { SocialLink } from '@/lib/schedule/types';
import type {
  RawDetailSpeaker,
  RawGridContent,
  RawGridSession,
  RawGridSpecialEvent,
  RawSessionDetail,
  RawSpeakerProfile,
  RawSpeakerRef,
  ScheduleSource,
  SessionRef,
} from '@/lib/sync/types';

const SOCIAL_HOSTS: ReadonlyArray<[host: string, label: string]> = [
  ['twitter.com', 'Twitter'],
  ['x.com', 'X'],
  ['linkedin.com', 'LinkedIn'],
  ['github.com', 'GitHub'],
  ['bsky.app', 'Bluesky'],
  ['youtube.com', 'YouTube'],
];

function textOf<T extends AnyNode>(node: cheerio.Cheerio<T>): string {
  return node.text().replaceAll(/\s+/g, ' ').trim();
}

function nonEmpty(value: string): string | null {
  return value.length > 0 ? value : null;
}

function absoluteUrl(href: string | undefined, pageUrl: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, pageUrl).toString();
  } catch {
    return null;
  }
}

function sessionIdFromUrl(url: string): string | null {
  const match = new URL(url).pathname.match(/\/session\/([^/]+)\/?$/);
  return match ? decodeURIComponent(match[1]) : null;
}

function speakerRefs<T extends AnyNode>(
  $: cheerio.CheerioAPI,
  links: cheerio.Cheerio<T>,
  pageUrl: string,
): RawSpeakerRef[] {
  return links
    .toArray()
    .map((link) => ({
      name: textOf($(link)),
      profileUrl: absoluteUrl($(link).attr('href'), pageUrl),
    }))
    .filter((ref) => ref.name.length > 0);
}

/**
 * Extracts every session occurrence and non-session row (lunch, breaks) from
 * the schedule page. Each `.schedule-day` block is preceded by its day heading.
 */
export function parseGridHtml(html: string, pageUrl: string): RawGridContent {
  const $ = cheerio.load(html);
  const sessions: RawGridSession[] = [];
  const specialEvents: RawGridSpecialEvent[] = [];

  $('.schedule-day').each((dayIndex, dayElement) => {
    const day = $(dayElement);
    const dayLabel = textOf(day.prev()) || `Day ${dayIndex + 1}`;
    const headerRooms = day
      .find('.row')
      .first()
      .find('.room')
      .toArray()
      .map((room) => textOf($(room)));

    day.find('.row').each((_, rowElement) => {
      const row = $(rowElement);
      const timeText = textOf(row.find('.time').first());
      if (!timeText) return;
      const times = timeText.match(/\d{1,2}[:h]\d{2}(?:\s*[ap]\.?m\b\.?)?/gi) ?? [];
      const startTime = times[0] ?? '';
      const endTime = times[1] ?? null;

      const lunch = row.find('.lunch').first();
      if (lunch.length > 0) {
        specialEvents.push({
          dayLabel,
          startTime,
          endTime,
          name: textOf(lunch),
        });
        return;
      }

      row.find('.slot').each((slotIndex, slotElement) => {
        const slot = $(slotElement);
        const link = slot.find('.session a').first();
        const url = absoluteUrl(link.attr('href'), pageUrl);
        if (!url) return;
        const sessionId = sessionIdFromUrl(url);
        if (!sessionId) return;

        const sessionType = nonEmpty(textOf(slot.find('.session-type').first()));
        const roomText = textOf(slot.find('.room').first());

        sessions.push({
          sessionId,
          url,
          title: textOf(link),
          dayLabel,
          startTime,
          endTime,
          room: roomText || headerRooms[slotIndex] || '',
          speakers: speakerRefs($, slot.find('.speaker a'), pageUrl),
          trackLabels: slot
            .find('.tag')
            .toArray()
            .map((tag) => ($(tag).attr('title') ?? '').trim())
            .filter((label) => label.length > 0),
          sessionType,
          isKeynote:
            slot.hasClass('keynote') || sessionType?.toLowerCase() === 'keynote',
        });
      });
    });
  });

  return { sessions, specialEvents };
}

const BOILERPLATE = ['View all', 'Share on', 'Other training', 'Home /', 'Sponsored by'];

function looksLikeProse(text: string, minLength: number): boolean {
  return (
    text.length > minLength && !BOILERPLATE.some((marker) => text.includes(marker))
  );
}

function findAbstract($: cheerio.CheerioAPI): string | null {
  const explicit = textOf($('.abstract, [itemprop="description"]').first());
  if (explicit) return explicit;

  for (const selector of [
    '.content > div > div > div > div',
    '.col-md-12 > div > div > div > div',
  ]) {
    for (const element of $(selector).toArray()) {
      const div = $(element);
      if (div.find('h2').length > 0) continue;
      if (div.find('a[href*="share"]').length > 0) continue;
      const text = textOf(div);
      if (looksLikeProse(text, 50)) return text;
    }
  }

  for (const element of $('.content div').toArray()) {
    const div = $(element);
    if (div.children().length > 3 || div.find('h2').length > 0) continue;
    const text = textOf(div);
    if (looksLikeProse(text, 80)) return text;
  }

  return null;
}

export function parseSessionDetailHtml(
  html: string,
  ref: SessionRef,
): RawSessionDetail {
  const $ = cheerio.load(html);

  let language: string | null = null;
  let level: string | null = null;
  for (const element of $('p').toArray()) {
    const text = textOf($(element));
    if (!/(English|French)\s+(session|training)/i.test(text)) continue;
    language = text.match(/English|French/i)?.[0] ?? null;
    level = text.match(/Beginner|Intermediate|Advanced/i)?.[0] ?? null;
    break;
  }

  const speakers: RawDetailSpeaker[] = [];
  $('h2').each((_, headingElement) => {
    const section = $(headingElement).parent();
    const link = section.find('a[href*="/speaker/"]').first();
    if (link.length === 0) return;
    const [speaker] = speakerRefs($, link, ref.url);
    if (!speaker) return;

    let company: string | null = null;
    let bio: string | null = null;
    for (const paragraph of section.find('p').toArray()) {
      const text = textOf($(paragraph));
      if (text.includes('Read More') || text.length < 3) continue;
      if (company === null && text.length < 120) {
        company = text;
      } else if (bio === null && text.length > 50) {
        bio = text;
      }
    }
    speakers.push({ ...speaker, company, bio });
  });

  return {
    sessionId: ref.sessionId,
    abstract: findAbstract($),
    language,
    level,
    speakers,
  };
}

function socialLabel(url: URL): string | null {
  const host = url.hostname.replace(/^www\./, '');
  for (const [domain, label] of SOCIAL_HOSTS) {
    if (host === domain || host.endsWith(`.${domain}`)) return label;
  }
  if (host.includes('mastodon')) return 'Mastodon';
  return null;
}

function isShareLink(url: URL): boolean {
  return /\/(intent|share|sharer|shareArticle)\b/i.test(url.pathname);
}

export function parseSpeakerProfileHtml(
  html: string,
  profileUrl: string,
): RawSpeakerProfile {
  const $ = cheerio.load(html);
  const name = nonEmpty(textOf($('h1').first()));
  const content = $('.content').length > 0 ? $('.content').first() : $('main').first();

  let country: string | null = null;
  for (const element of content.find('p span').toArray()) {
    const text = textOf($(element));
    if (text.length > 2 && text.length < 50 && !/session|training/i.test(text)) {
      country = text;
      break;
    }
  }

  let bio: string | null = null;
  for (const element of content.find('p').toArray()) {
    const text = textOf($(element));
    if (!looksLikeProse(text, 50)) continue;
    if (/session\s*-|training\s*-/i.test(text) || text.includes('Read More')) continue;
    if (country !== null && text.includes(country)) continue;
    bio = text;
    break;
  }

  const photo = name
    ? $('img')
        .toArray()
        .find((img) => $(img).attr('alt') === name)
    : undefined;
  const photoUrl = photo ? absoluteUrl($(photo).attr('src'), profileUrl) : null;

  const links: SocialLink[] = [];
  const seen = new Set<string>();
  for (const element of content.find('a[href]').toArray()) {
    const href = absoluteUrl($(element).attr('href'), profileUrl);
    if (!href || seen.has(href)) continue;
    const url = new URL(href);
    const label = socialLabel(url);
    if (!label || isShareLink(url)) continue;
    seen.add(href);
    links.push({ label, url: href });
  }

  return {
    profileUrl,
    name,
    bio,
    company: null,
    country,
    photoUrl,
    links,
  };
}

function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const date = Date.parse(header);
  return Number.isNaN(date) ? null : Math.max(0, date - Date.now());
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export type HtmlScheduleSourceOptions = {
  scheduleUrl: string;
  userAgent: string;
  requestTimeoutMs: number;
  fetchImpl?: typeof fetch;
};

/** Reads the conference website over plain HTTP. */
export class HtmlScheduleSource implements ScheduleSource {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HtmlScheduleSourceOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchGrid(signal: AbortSignal): Promise<RawGridContent> {
    const html = await this.getHtml(this.options.scheduleUrl, signal);
    return parseGridHtml(html, this.options.scheduleUrl);
  }

  async fetchSessionDetail(
    ref: SessionRef,
    signal: AbortSignal,
  ): Promise<RawSessionDetail> {
    const html = await this.getHtml(ref.url, signal);
    return parseSessionDetailHtml(html, ref);
  }

  async fetchSpeakerProfile(
    profileUrl: string,
    signal: AbortSignal,
  ): Promise<RawSpeakerProfile> {
    const html = await this.getHtml(profileUrl, signal);
    return parseSpeakerProfileHtml(html, profileUrl);
  }

  private async getHtml(url: string, signal: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const abort = () => controller.abort();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.requestTimeoutMs);
    signal.addEventListener('abort', abort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          accept: 'text/html',
          'user-agent': this.options.userAgent,
        },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new FetchError(
          `GET ${url} returned ${response.status}`,
          isTransientStatus(response.status),
          { url, status: response.status },
          parseRetryAfter(response.headers.get('retry-after')),
        );
      }
      return await response.text();
    } catch (err) {
      if (signal.aborted) throw new SyncAbortedError();
      if (err instanceof FetchError) throw err;
      throw new FetchError(
        timedOut ? `GET ${url} timed out` : `GET ${url} failed: ${String(err)}`,
        true,
        { url },
      );
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', abort);
    }
  }
}
