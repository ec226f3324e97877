// src/utils/value-parser.ts

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?Z?)?$/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function buildUtcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0
): Date | null {
  if (month < 1 || month > 12 || day < 1 || hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  // Rejects 2024-02-30 and friends, which Date.UTC silently rolls over
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

/**
 * Parses `YYYY-MM-DD[ T]HH:mm[:ss]` or US `M/D/YYYY` as a UTC date.
 * Returns null for anything else.
 */
export function parseDate(raw: string): Date | null {
  const text = raw.trim();

  const iso = ISO_DATE.exec(text);
  if (iso) {
    return buildUtcDate(
      Number(iso[1]),
      Number(iso[2]),
      Number(iso[3]),
      iso[4] ? Number(iso[4]) : 0,
      iso[5] ? Number(iso[5]) : 0,
      iso[6] ? Number(iso[6]) : 0
    );
  }

  const us = US_DATE.exec(text);
  if (us) {
    return buildUtcDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }

  return null;
}

/**
 * Parses a decimal number, ignoring thousands separators ("48,500" → 48500).
 */
export function parseNumber(raw: string): number | null {
  const compact = raw.trim().replace(/,/g, '');
  if (!NUMERIC.test(compact)) {
    return null;
  }
  const value = Number(compact);
  return Number.isFinite(value) ? value : null;
}

/**
 * Turns a column name into a rule-id slug: "Primary Reference" → "primary_reference".
 */
export function slugify(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function formatDate(date: Date): string {
  const iso = date.toISOString();
  return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
}
