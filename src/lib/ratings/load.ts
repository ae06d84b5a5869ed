import { readFile } from 'node:fs/promises';

import { errorMessage, isErrnoException } from '@/lib/errors';
import type { Logger } from '@/lib/log';
import {
  speakerRatingsFileSchema,
  type SpeakerRating,
  type SpeakerTier,
} from '@/lib/schedule/types';

export type SpeakerRatings = ReadonlyMap<string, SpeakerRating>;

const TIER_STARS: Record<SpeakerTier, string> = {
  S: '★★★★★',
  A: '★★★★',
  B: '★★★',
  C: '★★',
};

const TIER_BADGES: Record<SpeakerTier, string> = {
  S: 'Exceptional',
  A: 'Excellent',
  B: 'Good',
  C: 'Average',
};

/**
 * Reads the hand-maintained speaker ratings file. The file is never written
 * here; a missing or unreadable one leaves every speaker unrated.
 */
export async function loadSpeakerRatings(
  filePath: string,
  logger: Logger,
): Promise<SpeakerRatings> {
  let contents: string;
  try {
    contents = await readFile(filePath, 'utf8');
  } catch (err) {
    if (isErrnoException(err, 'ENOENT')) return new Map();
    throw err;
  }

  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (err) {
    logger.warn('ignoring unreadable ratings file', {
      filePath,
      error: errorMessage(err),
    });
    return new Map();
  }

  const parsed = speakerRatingsFileSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn('ignoring invalid ratings file', {
      filePath,
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
    return new Map();
  }
  return new Map(Object.entries(parsed.data));
}

export function describeRating(rating: SpeakerRating): {
  display: string;
  badge: string;
} {
  return {
    display: `${rating.tier} ${TIER_STARS[rating.tier]}`,
    badge: TIER_BADGES[rating.tier],
  };
}
