import type { SocialLink } from '@/lib/schedule/types';

export type FetchPhase = 'grid' | 'detail' | 'speaker';

/** Speaker as named on a schedule or session page, before slug derivation. */
export type RawSpeakerRef = {
  name: string;
  profileUrl: string | null;
};

export type SessionRef = {
  sessionId: string;
  url: string;
};

/** One session occurrence in the schedule grid, text kept as displayed. */
export type RawGridSession = SessionRef & {
  title: string;
  dayLabel: string;
  startTime: string;
  endTime: string | null;
  room: string;
  speakers: RawSpeakerRef[];
  trackLabels: string[];
  sessionType: string | null;
  isKeynote: boolean;
};

export type RawGridSpecialEvent = {
  dayLabel: string;
  startTime: string;
  endTime: string | null;
  name: string;
};

export type RawGridContent = {
  sessions: RawGridSession[];
  specialEvents: RawGridSpecialEvent[];
};

export type RawDetailSpeaker = RawSpeakerRef & {
  company: string | null;
  bio: string | null;
};

export type RawSessionDetail = {
  sessionId: string;
  abstract: string | null;
  language: string | null;
  level: string | null;
  speakers: RawDetailSpeaker[];
};

export type RawSpeakerProfile = {
  profileUrl: string;
  name: string | null;
  bio: string | null;
  company: string | null;
  country: string | null;
  photoUrl: string | null;
  links: SocialLink[];
};

export type ItemFailure = {
  phase: FetchPhase;
  ref: string;
  attempts: number;
  message: string;
};

export type GridBatch = {
  readonly phase: 'grid';
  readonly fetchedAt: string;
  readonly sessions: readonly RawGridSession[];
  readonly specialEvents: readonly RawGridSpecialEvent[];
};

export type ItemBatch<TPhase extends FetchPhase, TRecord> = {
  readonly phase: TPhase;
  readonly fetchedAt: string;
  readonly records: readonly TRecord[];
  readonly failures: readonly ItemFailure[];
};

export type DetailBatch = ItemBatch<'detail', RawSessionDetail>;
export type ProfileBatch = ItemBatch<'speaker', RawSpeakerProfile>;

export type FetchedBatches = {
  grid: GridBatch;
  details: DetailBatch;
  profiles: ProfileBatch;
};

/** Raw retrieval of the three schedule sources. Implementations throw `FetchError`. */
export interface ScheduleSource {
  fetchGrid(signal: AbortSignal): Promise<RawGridContent>;
  fetchSessionDetail(
    ref: SessionRef,
    signal: AbortSignal,
  ): Promise<RawSessionDetail>;
  fetchSpeakerProfile(
    profileUrl: string,
    signal: AbortSignal,
  ): Promise<RawSpeakerProfile>;
}
