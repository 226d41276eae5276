import type { FetchOutcome, PageFetcher } from '../lib/hltb/fetcher';
import type { CrawlLogger } from '../lib/logger';
import type { RecordStore, StoredIdSource } from '../lib/store';
import type { GameRecord } from '../types/game-record';

export interface MemoryLogger extends CrawlLogger {
  lines: string[];
}

export function memoryLogger(): MemoryLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (line) => lines.push(line),
    warn: (line) => lines.push(line),
    error: (line) => lines.push(line),
    close: async () => {}
  };
}

/** Minimal page in the current table layout. */
export function gamePage(name: string, mainStory = '10 Hours') {
  return `<html><body>
    <div class="GameHeader_profile_header__test">${name}</div>
    <table class="GameTimeTable_game_main_table__test">
      <thead><tr><td>Single-Player</td><td>Polled</td><td>Average</td></tr></thead>
      <tbody>
        <tr class="spreadsheet"><td>Main Story</td><td>12</td><td>${mainStory}</td></tr>
      </tbody>
    </table>
  </body></html>`;
}

export function pageUrl(id: number) {
  return `https://howlongtobeat.com/game/${id}`;
}

type Responder = (url: string) => FetchOutcome | Promise<FetchOutcome>;

/** In-process stand-in for the retrying fetcher; unknown ids answer 404. */
export class FakeFetcher implements PageFetcher {
  readonly requested: string[] = [];

  constructor(private readonly respond: Responder) {}

  static fromPages(pages: Record<number, string>) {
    return new FakeFetcher((url) => {
      const id = Number(url.split('/').pop());
      const html = pages[id];
      return html === undefined ? { status: 'not_found' } : { status: 'html', html };
    });
  }

  async fetchPage(url: string) {
    this.requested.push(url);
    return this.respond(url);
  }

  async politeSleep() {}
}

/** Store kept in memory; seeded ids stand in for rows already on disk. */
export class MemoryStore implements RecordStore, StoredIdSource {
  readonly records: GameRecord[] = [];
  closed = false;

  constructor(private readonly seededIds: number[] = []) {}

  readIds() {
    return [...this.seededIds, ...this.records.map((record) => record.id)];
  }

  async append(record: GameRecord) {
    this.records.push(record);
  }

  async close() {
    this.closed = true;
  }
}
