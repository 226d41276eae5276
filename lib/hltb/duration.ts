const MISSING_MARKERS = new Set(['', '-', '--']);
const RANGE_SPLIT = /\s*[-–—]\s*/;

/**
 * Parses the duration text shown next to a playstyle ("43½ Hours", "1h 30m",
 * "90 Mins", "10 - 12 Hours") into hours. Returns null for "--", empty text
 * and anything the grammar does not recognise.
 */
export function parseDuration(text: string | null | undefined): number | null {
  if (text === null || text === undefined) return null;
  const raw = normalizeDurationText(text);
  if (MISSING_MARKERS.has(raw)) return null;

  const range = parseRange(raw);
  if (range !== null) return range;

  const halfHours = raw.match(/^(\d+)\s*½\s*h(?:our)?s?\b/);
  if (halfHours) return Number(halfHours[1]) + 0.5;

  if (/^½\s*h(?:our)?s?\b/.test(raw)) return 0.5;

  const combined = raw.match(/^(\d+)\s*h\s*(\d+)\s*m\b/);
  if (combined) return round2(Number(combined[1]) + Number(combined[2]) / 60);

  const shortHours = raw.match(/^(\d+)\s*h\b/);
  if (shortHours) return Number(shortHours[1]);

  const minutes = raw.match(/^(\d+)\s*(?:m|mins?|minutes?)\b/);
  if (minutes) return round2(Number(minutes[1]) / 60);

  const hours = raw.match(/^(\d+)\s*hours?\b/);
  if (hours) return Number(hours[1]);

  return null;
}

/** First run of digits, thousands separators allowed: "1,204 Polled" -> 1204. */
export function parsePollCount(text: string | null | undefined): number | null {
  if (!text) return null;
  const match = text.match(/\d[\d,]*/);
  if (!match) return null;
  const value = Number.parseInt(match[0].replace(/,/g, ''), 10);
  return Number.isFinite(value) ? value : null;
}

export function normalizeDurationText(text: string) {
  return text.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ').trim().toLowerCase();
}

function parseRange(raw: string): number | null {
  if (!RANGE_SPLIT.test(raw)) return null;
  const parts = raw.split(RANGE_SPLIT);
  if (parts.length !== 2) return null;

  let [low, high] = parts;
  // "10 - 12 hours": the bare side takes the other side's unit.
  const lowUnit = trailingUnit(low);
  const highUnit = trailingUnit(high);
  if (!lowUnit && highUnit) low = `${low} ${highUnit}`;
  if (!highUnit && lowUnit) high = `${high} ${lowUnit}`;

  const a = parseDuration(low);
  const b = parseDuration(high);
  if (a === null || b === null) return null;
  return round2((a + b) / 2);
}

function trailingUnit(value: string): string | null {
  if (!/^[\d½\s]+[a-z]/.test(value)) return null;
  const match = value.match(/[a-z]+$/);
  return match ? match[0] : null;
}

function round2(value: number) {
  return Math.round(value * 100) / 100;
}
