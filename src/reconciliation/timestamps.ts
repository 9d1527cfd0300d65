import { DateParseFailure } from '../errors';
import { log, LogLevel } from '../logger';
import { StoredTask, TaskStatus, TaskTimestamps } from '../types/task';

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/;
const ISO_PREFIX = /^\d{4}-\d{2}-\d{2}T/;

function localDate(parts: string[]): Date {
  const [year, month, day, hour = '0', minute = '0', second = '0'] = parts;
  const date = new Date(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second));
  // Reject rollovers such as 2025-02-31.
  if (date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
    throw new DateParseFailure(parts.join('-'));
  }
  return date;
}

/**
 * Parses the textual timestamp forms found in stored documents and OCR output:
 * ISO 8601 (with or without offset), `YYYY-MM-DD HH:MM:SS` and `YYYY-MM-DD`.
 * The last two are read as local wall-clock time.
 * @throws DateParseFailure when the text matches none of them.
 */
export function parseTimestamp(value: string): Date {
  const trimmed = value.trim();

  const dateTime = DATE_TIME.exec(trimmed);
  if (dateTime) return localDate(dateTime.slice(1));

  const dateOnly = DATE_ONLY.exec(trimmed);
  if (dateOnly) return localDate(dateOnly.slice(1));

  if (ISO_PREFIX.test(trimmed)) {
    const parsed = new Date(trimmed);
    if (!Number.isNaN(parsed.getTime())) return parsed;
  }

  throw new DateParseFailure(value);
}

/**
 * Coerces a stored or extracted timestamp into a Date. Absent values, the
 * legacy "N/A" marker and unparseable text all yield null.
 */
export function toTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string' || value === '' || value === 'N/A' || value === 'null') {
    return null;
  }
  try {
    return parseTimestamp(value);
  } catch (error) {
    if (error instanceof DateParseFailure) {
      log(LogLevel.WARN, `[Timestamps] ${error.message}, treating it as absent`);
      return null;
    }
    throw error;
  }
}

export function toIsoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

const TIME_PATTERNS: ReadonlyArray<{ pattern: RegExp; read: (m: RegExpExecArray) => [number, number] }> = [
  // 6:30 pm
  { pattern: /(\d{1,2}):(\d{2})\s*(am|pm)/i, read: (m) => [to24Hour(Number(m[1]), m[3]), Number(m[2])] },
  // 14:30
  { pattern: /(\d{1,2}):(\d{2})/, read: (m) => [Number(m[1]), Number(m[2])] },
  // 9 am
  { pattern: /(\d{1,2})\s*(am|pm)/i, read: (m) => [to24Hour(Number(m[1]), m[2]), 0] },
];

function to24Hour(hour: number, period: string): number {
  const pm = period.toLowerCase() === 'pm';
  if (pm && hour !== 12) return hour + 12;
  if (!pm && hour === 12) return 0;
  return hour;
}

/**
 * Finds a time of day in a task name and returns it on the same calendar day
 * as `currentDate`.
 *
 * "6:30 pm - Counseling session" → today 18:30:00; "Meeting with client" → null.
 */
export function parseTimeFromTaskName(taskName: string, currentDate: Date): Date | null {
  if (!taskName) return null;

  for (const { pattern, read } of TIME_PATTERNS) {
    const match = pattern.exec(taskName);
    if (!match) continue;
    const [hour, minute] = read(match);
    if (hour > 23 || minute > 59) continue;

    const scheduled = new Date(currentDate.getTime());
    scheduled.setHours(hour, minute, 0, 0);
    return scheduled;
  }
  return null;
}

/** The fields of a freshly observed task that the timestamp rule reads. */
export interface TimestampSubject {
  name: string;
  status: TaskStatus;
  startedAt?: string | null;
  completedAt?: string | null;
}

function hasExplicitValue(value: string | null | undefined): value is string {
  return value !== null && value !== undefined && value !== 'null';
}

/**
 * Computes plannedAt/startedAt/completedAt for a task from its new status and
 * its previously stored record.
 *
 * plannedAt is taken from the previous record when there is one. startedAt and
 * completedAt are stamped with `now` only on the first transition into
 * IN_PROGRESS / COMPLETED and are never cleared afterwards. MEETING tasks keep
 * startedAt as the scheduled time: an explicit value, or a time parsed from the name.
 */
export function processTaskTimestamps(
  task: TimestampSubject,
  prevTask: StoredTask | undefined,
  now: Date,
): TaskTimestamps {
  const plannedAt = prevTask ? toTimestamp(prevTask.plannedAt) ?? now : now;

  let startedAt = toTimestamp(prevTask ? prevTask.startedAt : task.startedAt);
  let completedAt = toTimestamp(prevTask ? prevTask.completedAt : task.completedAt);

  if (task.status === TaskStatus.MEETING) {
    startedAt = hasExplicitValue(task.startedAt)
      ? toTimestamp(task.startedAt)
      : parseTimeFromTaskName(task.name, now);
    return { plannedAt, startedAt, completedAt };
  }

  if (!prevTask) {
    if (task.status === TaskStatus.IN_PROGRESS) {
      startedAt = now;
    }
    if (task.status === TaskStatus.COMPLETED) {
      startedAt = now;
      completedAt = now;
    }
    return { plannedAt, startedAt, completedAt };
  }

  if (!startedAt && prevTask.status !== TaskStatus.IN_PROGRESS && task.status === TaskStatus.IN_PROGRESS) {
    startedAt = now;
  }
  if (!completedAt && prevTask.status !== TaskStatus.COMPLETED && task.status === TaskStatus.COMPLETED) {
    completedAt = now;
  }
  return { plannedAt, startedAt, completedAt };
}

/** Calendar day of `date` in the process time zone, as YYYY-MM-DD. */
export function toLocalDateId(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
