import { z } from 'zod';

const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');
const isoTimestampSchema = z.string().datetime({ offset: true });

export const timeSlotSchema = z.object({
  day: isoDateSchema,
  start: isoTimestampSchema,
  durationMinutes: z.number().int().positive(),
  timezone: z.string().min(1),
});

export type TimeSlot = z.infer<typeof timeSlotSchema>;

export const trackSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
});

export type Track = z.infer<typeof trackSchema>;

export const socialLinkSchema = z.object({
  label: z.string().min(1),
  url: z.string().url(),
});

export type SocialLink = z.infer<typeof socialLinkSchema>;

export const speakerSchema = z.object({
  slug: z.string().min(1),
  name: z.string().min(1),
  bio: z.string().nullable(),
  company: z.string().nullable(),
  country: z.string().nullable(),
  photoUrl: z.string().nullable(),
  links: z.array(socialLinkSchema),
  // profile fetch failed; only slug and name are known
  partial: z.boolean(),
});

export type Speaker = z.infer<typeof speakerSchema>;

export const sessionSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  abstract: z.string().nullable(),
  slot: timeSlotSchema,
  room: z.string(),
  language: z.string().nullable(),
  level: z.string().nullable(),
  isKeynote: z.boolean(),
  speakers: z.array(z.string().min(1)),
  tracks: z.array(z.string().min(1)),
  // detail fetch failed; built from grid data only
  partial: z.boolean(),
});

export type Session = z.infer<typeof sessionSchema>;

export const specialEventSchema = z.object({
  name: z.string().min(1),
  slot: timeSlotSchema,
});

export type SpecialEvent = z.infer<typeof specialEventSchema>;

export const snapshotSchema = z.object({
  version: z.literal(1),
  fetchedAt: isoTimestampSchema,
  tracks: z.array(trackSchema),
  speakers: z.array(speakerSchema),
  sessions: z.array(sessionSchema),
  specialEvents: z.array(specialEventSchema),
});

export type Snapshot = z.infer<typeof snapshotSchema>;

export const speakerTierSchema = z.enum(['S', 'A', 'B', 'C']);

export type SpeakerTier = z.infer<typeof speakerTierSchema>;

export const speakerRatingSchema = z.object({
  tier: speakerTierSchema,
  note: z.string().default(''),
});

export type SpeakerRating = z.infer<typeof speakerRatingSchema>;

export const speakerRatingsFileSchema = z.record(
  z.string().min(1),
  speakerRatingSchema,
);

export const calendarSelectionSchema = z.object({
  version: z.literal(1),
  selected: z
    .array(z.string().min(1))
    .transform((ids) => [...new Set(ids)]),
});

export type CalendarSelection = z.infer<typeof calendarSelectionSchema>;
