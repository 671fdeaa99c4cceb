import { DateTime } from "luxon";
import {
  COMMAND_KINDS,
  type CalendarDate,
  type ClockTime,
  type CommandKind,
  type StructuredCommand,
} from "../tasks/schema";

export type ValidationResult =
  | { ok: true; command: StructuredCommand }
  | { ok: false; reason: string };

const NEEDS_NEW_DATETIME: readonly CommandKind[] = ["change_time", "change_date", "change_full"];
const NEEDS_NEW_DESCRIPTION: readonly CommandKind[] = ["change_description", "change_full"];

function isCommandKind(value: unknown): value is CommandKind {
  return COMMAND_KINDS.some((kind) => kind === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string): string | null {
  const value = raw[key];
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function parseInstant(value: string): DateTime | null {
  const iso = DateTime.fromISO(value);
  if (iso.isValid) return iso;
  const plain = DateTime.fromFormat(value, "yyyy-MM-dd HH:mm");
  return plain.isValid ? plain : null;
}

/**
 * Moves a past instant minimally into the future: a past year becomes the
 * current one (or the next), anything else moves forward by one day.
 */
export function correctToFuture(at: DateTime, now: DateTime): DateTime {
  if (at.toMillis() > now.toMillis()) return at;

  if (at.year < now.year) {
    const thisYear = at.set({ year: now.year });
    return thisYear.toMillis() > now.toMillis() ? thisYear : at.set({ year: now.year + 1 });
  }

  return at.plus({ days: 1 });
}

function parseDateField(value: string): CalendarDate | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const date = DateTime.fromISO(value);
  return date.isValid ? { year: date.year, month: date.month, day: date.day } : null;
}

function parseTimeField(value: string): ClockTime | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value);
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  return hour <= 23 && minute <= 59 ? { hour, minute } : null;
}

/**
 * Validates and normalizes an extraction payload into a StructuredCommand.
 */
export function validateCommand(raw: unknown, now: DateTime): ValidationResult {
  if (!isRecord(raw)) {
    return { ok: false, reason: "Command is not an object" };
  }

  const kind = raw.command;
  if (!isCommandKind(kind)) {
    return { ok: false, reason: `Unknown command: ${String(kind)}` };
  }

  const query = readString(raw, "event");
  if (kind !== "list" && !query) {
    return {
      ok: false,
      reason: kind === "create" ? "Missing event description" : "Missing event reference",
    };
  }

  const instants: Record<"datetime" | "new_datetime", DateTime | null> = { datetime: null, new_datetime: null };
  for (const field of ["datetime", "new_datetime"] as const) {
    if (raw[field] === undefined || raw[field] === null) continue;

    const value = readString(raw, field);
    const parsed = value ? parseInstant(value) : null;
    if (!parsed) {
      return { ok: false, reason: `Invalid ${field}: ${String(raw[field])}` };
    }
    instants[field] = correctToFuture(parsed, now);
  }

  if (NEEDS_NEW_DATETIME.includes(kind) && !instants.new_datetime) {
    return { ok: false, reason: `Missing new_datetime for ${kind}` };
  }

  const newDescription = readString(raw, "new_description");
  if (NEEDS_NEW_DESCRIPTION.includes(kind) && !newDescription) {
    return { ok: false, reason: `Missing new_description for ${kind}` };
  }

  const dateValue = readString(raw, "date");
  const date = dateValue ? parseDateField(dateValue) : null;
  if (dateValue && !date) {
    return { ok: false, reason: `Invalid date: ${dateValue}` };
  }

  const timeValue = readString(raw, "time");
  const time = timeValue ? parseTimeField(timeValue) : null;
  if (timeValue && !time) {
    return { ok: false, reason: `Invalid time: ${timeValue}` };
  }

  return {
    ok: true,
    command: {
      kind,
      query: query ?? "",
      at: instants.datetime,
      newAt: instants.new_datetime,
      newDescription,
      date,
      time,
    },
  };
}
