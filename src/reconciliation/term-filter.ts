import { isValid, parseISO } from 'date-fns';
import { KNESSET_CONFIG } from '../constants';

export interface TermScoped {
  knessetNum: number | null;
}

export interface DatedRecord {
  startDate: string | null;
  finishDate: string | null;
}

export type Activity = 'active' | 'inactive' | 'undated';

export function filterByTerm<T extends TermScoped>(records: readonly T[], knessetNum: number): T[] {
  return records.filter((record) => record.knessetNum === knessetNum);
}

// Z, +02, +0200 or +02:00 after a time of day
const OFFSET_SUFFIX = /[T ]\d{2}.*(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

const zoneFormats = new Map<string, Intl.DateTimeFormat>();

// Milliseconds the zone's wall clock is ahead of UTC at `instant`
function zoneOffset(instant: number, timeZone: string): number {
  let format = zoneFormats.get(timeZone);
  if (!format) {
    format = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
    });
    zoneFormats.set(timeZone, format);
  }

  const fields = new Map(format.formatToParts(instant).map((part) => [part.type, part.value]));
  const field = (type: Intl.DateTimeFormatPartTypes): number => Number(fields.get(type) ?? 0);
  const wallClock = Date.UTC(
    field('year'),
    field('month') - 1,
    field('day'),
    field('hour'),
    field('minute'),
    field('second')
  );
  return wallClock - Math.floor(instant / 1000) * 1000;
}

// The instant at which the zone's clock shows the fields of `local`
function fromWallClock(local: Date, timeZone: string): Date {
  const wallClock = Date.UTC(
    local.getFullYear(),
    local.getMonth(),
    local.getDate(),
    local.getHours(),
    local.getMinutes(),
    local.getSeconds(),
    local.getMilliseconds()
  );
  const guess = wallClock - zoneOffset(wallClock, timeZone);
  return new Date(wallClock - zoneOffset(guess, timeZone));
}

/**
 * Parses an ISO-8601 date string; null for missing or unparsable input.
 * Values without an offset are read as wall-clock time in `timeZone`.
 */
export function parseDate(
  value: string | null | undefined,
  timeZone: string = KNESSET_CONFIG.TIME_ZONE
): Date | null {
  const trimmed = value?.trim();
  if (!trimmed) return null;

  const parsed = parseISO(trimmed);
  if (!isValid(parsed)) return null;
  return OFFSET_SUFFIX.test(trimmed) ? parsed : fromWallClock(parsed, timeZone);
}

export function assertValidInstant(at: Date): void {
  if (!isValid(at)) {
    throw new RangeError(`Invalid point in time: ${String(at)}`);
  }
}

/**
 * Where a record stands at `at`. A record without a readable start date, or
 * with an unreadable finish date, is 'undated'.
 */
export function activityAt(record: DatedRecord, at: Date): Activity {
  assertValidInstant(at);
  const start = parseDate(record.startDate);
  if (!start) return 'undated';

  const hasFinish = !!record.finishDate?.trim();
  const finish = hasFinish ? parseDate(record.finishDate) : null;
  if (hasFinish && !finish) return 'undated';

  if (start.getTime() > at.getTime()) return 'inactive';
  if (finish && finish.getTime() < at.getTime()) return 'inactive';
  return 'active';
}

export function isActiveAt(record: DatedRecord, at: Date): boolean {
  return activityAt(record, at) === 'active';
}

export function filterActiveAt<T extends DatedRecord>(
  records: readonly T[],
  at: Date,
  label = 'record'
): T[] {
  assertValidInstant(at);

  const active: T[] = [];
  for (const record of records) {
    const activity = activityAt(record, at);
    if (activity === 'active') {
      active.push(record);
    } else if (activity === 'undated') {
      const start = record.startDate ?? 'none';
      const finish = record.finishDate ?? 'none';
      console.warn(`Skipping ${label} with unusable dates (start: ${start}, finish: ${finish})`);
    }
  }
  return active;
}
