import { load } from 'cheerio';
import type { GameRecord } from '../../types/game-record';
import { extractContentType, extractLegacyReleaseDate, extractReleaseInfo, extractTitle, mergeReleaseInfo } from './fields';
import { hasAnyAverage, readTimeTable } from './time-table';

export const DEFAULT_URL_TEMPLATE = 'https://howlongtobeat.com/game/{id}';

export interface AssembleOptions {
  now?: () => Date;
}

export class AssemblyError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'AssemblyError';
  }
}

export function buildPageUrl(id: number, template = DEFAULT_URL_TEMPLATE) {
  return template.replace('{id}', String(id));
}

export function extractIdFromUrl(url: string): number {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch (error) {
    throw new AssemblyError(`Not a valid page URL: ${url}`, { cause: error });
  }
  const match = pathname.match(/\/game\/(\d+)\/?$/);
  if (!match) {
    throw new AssemblyError(`Could not find a game id in ${url}`);
  }
  return Number(match[1]);
}

/**
 * Builds the catalog record for one game page. Returns null when the page has
 * no title or no average completion time.
 */
export function assembleRecord(html: string, url: string, options: AssembleOptions = {}): GameRecord | null {
  const id = extractIdFromUrl(url);
  const $ = load(html);

  const name = extractTitle($);
  if (!name) return null;

  const { times, polled } = readTimeTable($);
  if (!hasAnyAverage(times)) return null;

  return {
    id,
    name,
    contentType: extractContentType($),
    release: mergeReleaseInfo(extractReleaseInfo($), extractLegacyReleaseDate($)),
    times,
    polled,
    sourceUrl: url,
    crawledAt: formatCrawledAt((options.now ?? (() => new Date()))())
  };
}

function formatCrawledAt(date: Date) {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
