import { DAY_SECONDS, TIME_FIELDS, type TimeField } from '@firetiles/config';
import type { FireProperties } from '@firetiles/schema';
import { InvalidDateError } from './errors.js';

export type ParsedTime = { raw?: string; epoch?: number };
export type ResolvedTime = ParsedTime & { field?: TimeField };
export type DayBucket = { label: string; start: number; end: number };
export type DateWindow = { start?: number; end?: number };

const ISO_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?(Z|z|[+-]\d{2}(?::?\d{2})?)?)?$/;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

function utcMillis(y: number, mo: number, d: number, h = 0, mi = 0, s = 0): number | undefined {
  if (mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59) return undefined;
  const dt = new Date(Date.UTC(y, mo - 1, d, h, mi, s));
  dt.setUTCFullYear(y);
  // Date.UTC rolls 2023-02-30 over into March; reject instead.
  if (dt.getUTCMonth() !== mo - 1 || dt.getUTCDate() !== d) return undefined;
  return dt.getTime();
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone === 'Z' || zone === 'z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO-8601 date or date-time into epoch seconds.
 * Values without an offset are read as UTC. Anything unparseable comes back
 * with `epoch` unset; this never throws.
 */
export function parseTimestamp(raw: string | undefined): ParsedTime {
  if (!raw) return {};
  const m = raw.trim().match(ISO_RE);
  if (!m) return { raw };
  const [, y, mo, d, h, mi, s, frac, zone] = m;
  const ms = utcMillis(Number(y), Number(mo), Number(d), Number(h ?? 0), Number(mi ?? 0), Number(s ?? 0));
  if (ms === undefined) return { raw };
  const fraction = frac ? Number(`0.${frac}`) : 0;
  return { raw, epoch: ms / 1000 + fraction - offsetMinutes(zone) * 60 };
}

/** First non-empty time field in priority order: time_floor, time, timestamp. */
export function timestampCandidate(props: FireProperties): { field: TimeField; raw: string } | undefined {
  for (const field of TIME_FIELDS) {
    const raw = props[field];
    if (raw) return { field, raw };
  }
  return undefined;
}

export function resolveTimestamp(props: FireProperties): ResolvedTime {
  const candidate = timestampCandidate(props);
  if (!candidate) return {};
  return { field: candidate.field, ...parseTimestamp(candidate.raw) };
}

export function dayBucket(epoch: number): DayBucket {
  const start = Math.floor(epoch / DAY_SECONDS) * DAY_SECONDS;
  return {
    label: new Date(start * 1000).toISOString().slice(0, 10),
    start,
    end: start + DAY_SECONDS
  };
}

export function isoFromEpoch(epoch: number): string {
  return new Date(epoch * 1000).toISOString().replace('.000Z', 'Z');
}

/** `YYYY-MM-DD` (UTC) to the epoch seconds of that midnight. */
export function parseDateOption(value: string): number {
  const m = value.match(DATE_RE);
  const ms = m ? utcMillis(Number(m[1]), Number(m[2]), Number(m[3])) : undefined;
  if (ms === undefined) throw new InvalidDateError(value);
  return ms / 1000;
}

// Both dates are inclusive; the end becomes the following midnight.
export function dateWindow(startDate?: string, endDate?: string): DateWindow {
  const window: DateWindow = {};
  if (startDate) window.start = parseDateOption(startDate);
  if (endDate) window.end = parseDateOption(endDate) + DAY_SECONDS;
  return window;
}

export function inWindow(epoch: number, window: DateWindow): boolean {
  if (window.start !== undefined && epoch < window.start) return false;
  if (window.end !== undefined && epoch >= window.end) return false;
  return true;
}
