import type { CheerioAPI } from 'cheerio';
import {
  EXTRA_TIME_KEYS,
  TIME_KEYS,
  emptyPollCounts,
  emptyTimeStats,
  polledKey,
  type PollCounts,
  type TimeKey,
  type TimeStats
} from '../../types/game-record';
import { parseDuration, parsePollCount } from './duration';
import { SELECTORS, joinedText, normalizeText } from './dom';

export type TimeTableLayout = 'table' | 'list';

export interface TimeTableResult {
  times: TimeStats;
  polled: PollCounts;
}

/** Reads the seven playstyle keys from a page, however the page lays them out. */
export interface TimeTableReader {
  readonly layout: TimeTableLayout;
  read($: CheerioAPI): TimeTableResult;
}

const LABELS: Record<string, TimeKey> = {
  'main story': 'main_story',
  'main + sides': 'main_plus_sides',
  'main + extras': 'main_plus_sides',
  completionist: 'completionist',
  'all styles': 'all_styles',
  'all playstyles': 'all_styles',
  'single-player': 'single_player',
  'single player': 'single_player',
  singleplayer: 'single_player',
  'co-op': 'co_op',
  coop: 'co_op',
  competitive: 'versus',
  'vs.': 'versus',
  versus: 'versus'
};

const EXTRA_KEYS: ReadonlySet<TimeKey> = new Set(EXTRA_TIME_KEYS);

export function normalizeTimeLabel(label: string): TimeKey | null {
  return LABELS[normalizeText(label).toLowerCase()] ?? null;
}

export function hasAnyAverage(times: TimeStats) {
  return TIME_KEYS.some((key) => times[key] !== null);
}

/**
 * Current layout: one table per section ("Single-Player", "Multi-Player"),
 * data rows of (label, polled, average).
 */
export const tableLayoutReader: TimeTableReader = {
  layout: 'table',
  read($) {
    const times = emptyTimeStats();
    const polled = emptyPollCounts();

    $(SELECTORS.timeTable).each((_, table) => {
      const section = normalizeText($(table).find('thead td').first().text()).toLowerCase();
      const body = $(table).find('tbody').first();
      if (body.length === 0) return;

      body.find(SELECTORS.dataRow).each((__, row) => {
        const cells = $(row).find('td');
        if (cells.length < 3) return;
        const key = normalizeTimeLabel(joinedText($, cells.eq(0)));
        if (!key) return;

        const average = parseAverage(joinedText($, cells.eq(2)));
        const count = parsePollCount(joinedText($, cells.eq(1)));

        // Main Story of the single-player section doubles as the single_player figure.
        if (section === 'single-player' && key === 'main_story') {
          if (average !== null) times.single_player = average;
          if (count !== null) polled.single_player_polled = count;
        }

        if (average !== null) times[key] = average;
        if (count !== null) polled[polledKey(key)] = count;
      });
    });

    return { times, polled };
  }
};

/** Legacy layout: list items with an h4 label and an h5 value, no poll counts. */
export const listLayoutReader: TimeTableReader = {
  layout: 'list',
  read($) {
    const times = emptyTimeStats();
    const extras = new Map<TimeKey, number | null>();
    const stats = $(SELECTORS.listStats).first();

    stats.find('li').each((_, item) => {
      const label = $(item).find('h4').first();
      const value = $(item).find('h5').first();
      if (label.length === 0 || value.length === 0) return;
      const key = normalizeTimeLabel(joinedText($, label));
      if (!key) return;
      const hours = parseDuration(joinedText($, value));
      if (EXTRA_KEYS.has(key)) {
        extras.set(key, hours);
      } else {
        times[key] = hours;
      }
    });

    const singlePlayer = extras.get('single_player') ?? null;
    if (times.main_story === null && singlePlayer !== null) {
      times.main_story = singlePlayer;
    }
    for (const [key, hours] of extras) {
      times[key] = hours;
    }

    return { times, polled: emptyPollCounts() };
  }
};

export interface TimeTableSelection extends TimeTableResult {
  layout: TimeTableLayout;
}

/** Prefers the primary reader; when it finds no average at all, the fallback reader's result is used whole. */
export function readTimeTable(
  $: CheerioAPI,
  primary: TimeTableReader = tableLayoutReader,
  fallback: TimeTableReader = listLayoutReader
): TimeTableSelection {
  const preferred = primary.read($);
  if (hasAnyAverage(preferred.times)) {
    return { layout: primary.layout, ...preferred };
  }
  return { layout: fallback.layout, ...fallback.read($) };
}

function parseAverage(text: string): number | null {
  const trimmed = text.trim();
  if (!trimmed || trimmed === '--' || trimmed === '-') return null;
  return parseDuration(trimmed);
}
