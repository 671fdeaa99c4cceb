import type { DateTime } from "luxon";

/**
 * One scheduled occurrence for one user
 */
export type CalendarEvent = {
  id: string; // stable identifier, evt_ prefix
  userId: number; // Telegram user id, also the private chat id
  description: string;
  scheduledAtIso: string; // local wall-clock instant as ISO string
  createdAtIso: string;
};

/**
 * A reminder attached to exactly one event
 */
export type EventNotification = {
  id: string; // ntf_ prefix
  eventId: string;
  leadMinutes: number; // minutes before the event, never 0 for a stored record
  sent: boolean; // false -> true once, never reset
  createdAtIso: string;
};

/**
 * A notification joined with its owning event
 */
export type NotificationWithEvent = {
  notification: EventNotification;
  event: CalendarEvent;
};

/**
 * The store file structure
 */
export type StoreFile = {
  version: number;
  events: CalendarEvent[];
  notifications: EventNotification[];
};

export const CURRENT_STORE_VERSION = 1;

export const COMMAND_KINDS = [
  "create",
  "delete",
  "change_time",
  "change_date",
  "change_description",
  "change_full",
  "list",
] as const;

export type CommandKind = (typeof COMMAND_KINDS)[number];

export type CalendarDate = { year: number; month: number; day: number };

export type ClockTime = { hour: number; minute: number };

/**
 * Validated command produced from a raw extraction payload.
 * For "create" the query is the event description.
 */
export type StructuredCommand = {
  kind: CommandKind;
  query: string;
  at: DateTime | null;
  newAt: DateTime | null;
  newDescription: string | null;
  date: CalendarDate | null; // partial create: date known, time missing
  time: ClockTime | null; // partial create: time known, date missing
};
