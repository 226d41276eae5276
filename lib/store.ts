import fs from 'node:fs';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { TIME_KEYS, polledKey, type GameRecord } from '../types/game-record';

export const STORE_COLUMNS = [
  'id',
  'name',
  'type',
  'release_date',
  'release_precision',
  'release_year',
  'release_month',
  'release_day',
  ...TIME_KEYS,
  ...TIME_KEYS.map(polledKey)
];

export type StoreRow = Record<string, string>;

const StoreRowsSchema = z.array(z.record(z.string(), z.string()));
const StoredIdSchema = z.coerce.number().int().positive();

export interface RecordStore {
  append(record: GameRecord): Promise<void>;
  close(): Promise<void>;
}

export interface StoredIdSource {
  readIds(): number[];
}

export function toStoreRow(record: GameRecord): StoreRow {
  const row: StoreRow = {
    id: String(record.id),
    name: record.name,
    type: record.contentType,
    release_date: record.release.date ?? '',
    release_precision: record.release.precision === 'none' ? '' : record.release.precision,
    release_year: record.release.year ?? '',
    release_month: record.release.month ?? '',
    release_day: record.release.day ?? ''
  };
  for (const key of TIME_KEYS) {
    row[key] = formatNumber(record.times[key]);
  }
  for (const key of TIME_KEYS) {
    row[polledKey(key)] = formatNumber(record.polled[polledKey(key)]);
  }
  return row;
}

/** Everything up to the last record terminator; a row cut short by a crash is dropped. */
export function completeRecords(content: string) {
  if (content === '' || content.endsWith('\n')) return content;
  return content.slice(0, content.lastIndexOf('\n') + 1);
}

/**
 * Append-only CSV table. Every field is quoted, absent values are empty
 * strings, and the header (with a UTF-8 BOM) is written only when the file
 * is new or empty.
 */
export class CsvRecordStore implements RecordStore, StoredIdSource {
  private stream: fs.WriteStream | null = null;
  private streamError: Error | null = null;

  constructor(readonly filePath: string) {}

  exists() {
    return fs.existsSync(this.filePath) && fs.statSync(this.filePath).size > 0;
  }

  readRows(): StoreRow[] {
    if (!this.exists()) return [];
    const content = completeRecords(fs.readFileSync(this.filePath, 'utf-8'));
    const parsed: unknown = parse(content, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      skip_records_with_error: true,
      relax_column_count: true
    });
    return StoreRowsSchema.parse(parsed);
  }

  readIds(): number[] {
    const ids: number[] = [];
    for (const row of this.readRows()) {
      const result = StoredIdSchema.safeParse(row.id);
      if (result.success) ids.push(result.data);
    }
    return ids;
  }

  async append(record: GameRecord) {
    if (this.streamError) throw this.streamError;
    const { stream, writeHeader } = this.open();
    const chunk = stringify([toStoreRow(record)], {
      header: writeHeader,
      bom: writeHeader,
      columns: STORE_COLUMNS,
      quoted: true,
      quoted_empty: true
    });
    await new Promise<void>((resolve, reject) => {
      stream.write(chunk, (error) => (error ? reject(error) : resolve()));
    });
  }

  async close() {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    if (this.streamError) {
      stream.destroy();
      throw this.streamError;
    }
    await new Promise<void>((resolve, reject) => {
      stream.once('close', () => (this.streamError ? reject(this.streamError) : resolve()));
      stream.end();
    });
  }

  private open() {
    if (this.stream) return { stream: this.stream, writeHeader: false };

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    this.dropPartialRecord();
    const writeHeader = !this.exists();
    const stream = fs.createWriteStream(this.filePath, { flags: 'a', encoding: 'utf-8' });
    stream.on('error', (error) => {
      this.streamError ??= error;
    });
    this.stream = stream;
    return { stream, writeHeader };
  }

  private dropPartialRecord() {
    if (!this.exists()) return;
    const content = fs.readFileSync(this.filePath, 'utf-8');
    const complete = completeRecords(content);
    if (complete.length < content.length) {
      fs.truncateSync(this.filePath, Buffer.byteLength(complete, 'utf-8'));
    }
  }
}

function formatNumber(value: number | null) {
  return value === null ? '' : String(value);
}
