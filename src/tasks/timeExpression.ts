import { DateTime } from "luxon";
import type { CalendarDate, ClockTime } from "./schema";

export interface TimeExpressionResult {
  description: string;
  at: DateTime | null;
}

/**
 * A time-extraction pattern. `resolve` returns null when the match is
 * structurally right but its numbers are not (hour 27, 31.02...).
 */
export interface TimePattern {
  name: string;
  regex: RegExp;
  resolve: (groups: string[], now: DateTime) => DateTime | null;
}

const STOP_WORDS = ["tomorrow", "today", "in", "at", "hour", "hours", "minute", "minutes"];

function isValidClock(hour: number, minute: number): boolean {
  return Number.isInteger(hour) && Number.isInteger(minute) && hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59;
}

function atClock(day: DateTime, hour: number, minute: number): DateTime | null {
  if (!isValidClock(hour, minute)) return null;
  return day.set({ hour, minute, second: 0, millisecond: 0 });
}

function rollIfPast(target: DateTime | null, now: DateTime): DateTime | null {
  if (!target) return null;
  return target.toMillis() <= now.toMillis() ? target.plus({ days: 1 }) : target;
}

/**
 * Ordered by priority: the first regex that matches wins, later ones are never tried.
 */
export const TIME_PATTERNS: readonly TimePattern[] = [
  {
    name: "timeOnly",
    regex: /(\d{1,2}):(\d{2})/,
    resolve: ([h, m], now) => rollIfPast(atClock(now, Number(h), Number(m)), now),
  },
  {
    name: "relative",
    regex: /\bin\s+(\d+)\s+(hours?|minutes?)\b/,
    resolve: ([amount, unit], now) => {
      const dt = unit.startsWith("hour")
        ? now.plus({ hours: Number(amount) })
        : now.plus({ minutes: Number(amount) });
      return dt.isValid ? dt : null;
    },
  },
  {
    name: "fullDateTime",
    regex: /(\d{1,2})\.(\d{1,2})\.(\d{4})\s+(\d{1,2}):(\d{2})/,
    resolve: ([d, mo, y, h, m]) => {
      const dt = DateTime.fromObject({
        year: Number(y),
        month: Number(mo),
        day: Number(d),
        hour: Number(h),
        minute: Number(m),
      });
      return dt.isValid ? dt : null;
    },
  },
  {
    name: "tomorrow",
    regex: /tomorrow\s+at\s+(\d{1,2}):(\d{2})/,
    resolve: ([h, m], now) => atClock(now.plus({ days: 1 }), Number(h), Number(m)),
  },
  {
    name: "today",
    regex: /today\s+at\s+(\d{1,2}):(\d{2})/,
    resolve: ([h, m], now) => rollIfPast(atClock(now, Number(h), Number(m)), now),
  },
];

function stripStopWords(text: string): string {
  let result = text;
  for (const word of STOP_WORDS) {
    result = result.replace(new RegExp(`\\b${word}\\b`, "gi"), "");
  }
  return result.split(/\s+/).filter(Boolean).join(" ");
}

/**
 * Extracts an event description and an absolute instant from free text.
 * Supports:
 * - "buy bread 18:00"
 * - "call mom in 2 hours"
 * - "team sync 25.12.2026 14:00"
 * - "meeting tomorrow at 15:30"
 * - "gym today at 19:00"
 */
export function parseTimeExpression(text: string, now: DateTime = DateTime.local()): TimeExpressionResult {
  const lowered = text.toLowerCase();
  let eventText = text.trim();
  let at: DateTime | null = null;

  for (const pattern of TIME_PATTERNS) {
    const match = pattern.regex.exec(lowered);
    if (!match) continue;

    at = pattern.resolve(match.slice(1), now);
    if (at) {
      eventText = text.replace(new RegExp(pattern.regex.source, "gi"), "").trim();
    }
    break;
  }

  return { description: stripStopWords(eventText), at };
}

/**
 * Resolves a date-only reply: "today", "tomorrow", "DD.MM" or "DD.MM.YYYY".
 * A DD.MM date already behind us this year means next year.
 */
export function parseDateReply(text: string, now: DateTime = DateTime.local()): CalendarDate | null {
  const value = text.trim().toLowerCase();

  if (value === "today") {
    return { year: now.year, month: now.month, day: now.day };
  }
  if (value === "tomorrow") {
    const tomorrow = now.plus({ days: 1 });
    return { year: tomorrow.year, month: tomorrow.month, day: tomorrow.day };
  }

  const match = /^(\d{1,2})\.(\d{1,2})(?:\.(\d{4}))?$/.exec(value);
  if (!match) return null;

  const day = Number(match[1]);
  const month = Number(match[2]);
  let year = match[3] ? Number(match[3]) : now.year;

  let date = DateTime.fromObject({ year, month, day });
  if (!date.isValid) return null;

  if (!match[3] && date.toMillis() < now.startOf("day").toMillis()) {
    year += 1;
    date = DateTime.fromObject({ year, month, day });
    if (!date.isValid) return null;
  }

  return { year, month, day };
}

/**
 * Resolves a time-only reply: "HH:MM".
 */
export function parseTimeReply(text: string): ClockTime | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(text.trim());
  if (!match) return null;

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  return isValidClock(hour, minute) ? { hour, minute } : null;
}
