import type { CheerioAPI } from 'cheerio';
import type { ContentType, ReleaseInfo } from '../../types/game-record';
import { SELECTORS, joinedText, normalizeText, summaryTexts } from './dom';

const MONTHS: Record<string, number> = {
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12
};

const NOTE_TOKEN = 'note:';

// Sub-tokens looked for once a summary block carries a note.
const CONTENT_TAGS = [
  { token: 'dlc/expansion', label: 'dlc/expansion' },
  { token: 'multiplayer focused', label: 'multiplayer focused' }
] as const;

const DAY_PATTERN = /[A-Z]{2,3}:\s*([A-Za-z]+)\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})/gi;
const MONTH_PATTERN = /[A-Z]{2,3}:\s*([A-Za-z]+)\s+(\d{4})\b/gi;
const YEAR_PATTERN = /[A-Z]{2,3}:\s*(\d{4})\b/;
const LEGACY_DAY_PATTERN = /([A-Z]{2,3}):\s*([A-Za-z]+)\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})/i;

export const NO_RELEASE: ReleaseInfo = { precision: 'none', date: null, year: null, month: null, day: null };

export function extractTitle($: CheerioAPI): string | null {
  const header = normalizeText($(SELECTORS.header).first().text());
  if (header) return header;
  return titleFromStructuredData($);
}

function titleFromStructuredData($: CheerioAPI): string | null {
  const payloads: unknown[] = [];
  $(SELECTORS.structuredData).each((_, element) => {
    const text = $(element).text();
    if (!text) return;
    try {
      payloads.push(JSON.parse(text));
    } catch {
      return;
    }
  });

  for (const payload of payloads) {
    const entries: unknown[] = Array.isArray(payload) ? payload : [payload];
    for (const entry of entries) {
      if (!entry || typeof entry !== 'object' || !('name' in entry)) continue;
      if (typeof entry.name === 'string') {
        const normalised = normalizeText(entry.name);
        if (normalised) return normalised;
      }
    }
  }
  return null;
}

export function matchContentTags(text: string): string[] {
  const lower = text.toLowerCase();
  if (!lower.includes(NOTE_TOKEN)) return [];
  return CONTENT_TAGS.filter(({ token }) => lower.includes(token)).map(({ label }) => label);
}

export function extractContentType($: CheerioAPI): ContentType {
  const labels = new Set<string>();
  for (const text of summaryTexts($)) {
    for (const label of matchContentTags(text)) {
      labels.add(label);
    }
  }
  if (labels.size === 0) return 'game';
  return Array.from(labels).sort().join('; ');
}

export function extractReleaseInfo($: CheerioAPI): ReleaseInfo {
  return parseReleaseTexts(summaryTexts($));
}

/**
 * Day precision wins over month, month over year; within a tier the first
 * block with a usable match wins. A match naming an unknown month is skipped.
 */
export function parseReleaseTexts(texts: string[]): ReleaseInfo {
  for (const text of texts) {
    for (const match of text.matchAll(DAY_PATTERN)) {
      const month = monthNumber(match[1]);
      if (month === null) continue;
      return dayRelease(Number(match[3]), month, Number(match[2]));
    }
  }

  for (const text of texts) {
    for (const match of text.matchAll(MONTH_PATTERN)) {
      const month = monthNumber(match[1]);
      if (month === null) continue;
      const year = pad(Number(match[2]), 4);
      const monthText = pad(month, 2);
      return { precision: 'month', date: `${year}-${monthText}`, year, month: monthText, day: null };
    }
  }

  for (const text of texts) {
    const match = text.match(YEAR_PATTERN);
    if (match) {
      const year = pad(Number(match[1]), 4);
      return { precision: 'year', date: year, year, month: null, day: null };
    }
  }

  return NO_RELEASE;
}

/** Older single-pattern detector: the first "XX: Month Day, Year" per block, as a date string. */
export function extractLegacyReleaseDate($: CheerioAPI): string | null {
  let found: string | null = null;
  $(SELECTORS.summary).each((_, element) => {
    const match = joinedText($, $(element)).match(LEGACY_DAY_PATTERN);
    if (!match) return;
    const month = monthNumber(match[2]);
    if (month === null) return;
    found = `${pad(Number(match[4]), 4)}-${pad(month, 2)}-${pad(Number(match[3]), 2)}`;
    return false;
  });
  return found;
}

export function mergeReleaseInfo(primary: ReleaseInfo, legacyDate: string | null): ReleaseInfo {
  if (primary.precision !== 'none' || !legacyDate) return primary;
  const [year, month, day] = legacyDate.split('-');
  if (!year || !month || !day) return primary;
  return { precision: 'day', date: legacyDate, year, month, day };
}

function dayRelease(yearValue: number, monthValue: number, dayValue: number): ReleaseInfo {
  const year = pad(yearValue, 4);
  const month = pad(monthValue, 2);
  const day = pad(dayValue, 2);
  return { precision: 'day', date: `${year}-${month}-${day}`, year, month, day };
}

function monthNumber(name: string): number | null {
  return MONTHS[name.toLowerCase()] ?? null;
}

function pad(value: number, width: number) {
  return String(value).padStart(width, '0');
}
