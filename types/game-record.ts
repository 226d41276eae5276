export const TIME_KEYS = [
  'main_story',
  'main_plus_sides',
  'completionist',
  'all_styles',
  'single_player',
  'co_op',
  'versus'
] as const;

export type TimeKey = (typeof TIME_KEYS)[number];

export const EXTRA_TIME_KEYS = ['single_player', 'co_op', 'versus'] as const satisfies readonly TimeKey[];

export type PolledKey = `${TimeKey}_polled`;

export type TimeStats = Record<TimeKey, number | null>;

export type PollCounts = Record<PolledKey, number | null>;

export type KnownContentType = 'game' | 'dlc/expansion' | 'multiplayer focused';

// Joined multi-label values ("dlc/expansion; multiplayer focused") land in the open branch.
export type ContentType = KnownContentType | (string & {});

export type ReleaseInfo =
  | { precision: 'day'; date: string; year: string; month: string; day: string }
  | { precision: 'month'; date: string; year: string; month: string; day: null }
  | { precision: 'year'; date: string; year: string; month: null; day: null }
  | { precision: 'none'; date: null; year: null; month: null; day: null };

export interface GameRecord {
  id: number;
  name: string;
  contentType: ContentType;
  release: ReleaseInfo;
  times: TimeStats;
  polled: PollCounts;
  sourceUrl: string;
  crawledAt: string;
}

export function polledKey(key: TimeKey): PolledKey {
  return `${key}_polled`;
}

export function emptyTimeStats(): TimeStats {
  return {
    main_story: null,
    main_plus_sides: null,
    completionist: null,
    all_styles: null,
    single_player: null,
    co_op: null,
    versus: null
  };
}

export function emptyPollCounts(): PollCounts {
  return {
    main_story_polled: null,
    main_plus_sides_polled: null,
    completionist_polled: null,
    all_styles_polled: null,
    single_player_polled: null,
    co_op_polled: null,
    versus_polled: null
  };
}
