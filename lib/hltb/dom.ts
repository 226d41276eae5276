import type { Cheerio, CheerioAPI } from 'cheerio';
import { isTag, isText } from 'domhandler';
import type { AnyNode } from 'domhandler';

// Class names on the site carry a build hash suffix ("GameStats_game_times__5LFEc").
export const SELECTORS = {
  header: 'div[class*="GameHeader_profile_header__"]',
  summary: 'div[class*="GameSummary_profile_info__"]',
  structuredData: 'script[type="application/ld+json"]',
  listStats: 'div[class*="GameStats_game_times__"]',
  timeTable: 'table[class*="GameTimeTable_game_main_table__"]',
  dataRow: 'tr[class*="spreadsheet"]'
} as const;

export function normalizeText(value: string) {
  return value.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim();
}

/** Trimmed text nodes of the subtree, in document order, joined by single spaces. */
export function joinedText($: CheerioAPI, selection: Cheerio<AnyNode>): string {
  const parts: string[] = [];
  selection.contents().each((_, node) => {
    if (isText(node)) {
      const text = normalizeText(node.data);
      if (text) parts.push(text);
    } else if (isTag(node)) {
      const nested = joinedText($, $(node));
      if (nested) parts.push(nested);
    }
  });
  return parts.join(' ');
}

export function summaryTexts($: CheerioAPI): string[] {
  const texts: string[] = [];
  $(SELECTORS.summary).each((_, element) => {
    const text = joinedText($, $(element));
    if (text) texts.push(text);
  });
  return texts;
}
