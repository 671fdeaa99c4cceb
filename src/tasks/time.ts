import { DateTime } from "luxon";

/**
 * Gets the current local time.
 * All users share this single wall clock.
 */
export function getNow(): DateTime {
  return DateTime.local();
}

/**
 * Gets the current local time as ISO string.
 */
export function getNowIso(): string {
  return toIso(getNow());
}

/**
 * Serializes a DateTime for storage.
 */
export function toIso(dt: DateTime): string {
  const iso = dt.toISO();
  if (iso === null) {
    throw new Error(`Cannot serialize invalid DateTime: ${dt.invalidExplanation}`);
  }
  return iso;
}

/**
 * Converts a stored ISO string to a local DateTime.
 */
export function toLocalDateTime(isoString: string): DateTime {
  return DateTime.fromISO(isoString);
}

/**
 * Formats an ISO datetime for display.
 * Shows: dd.MM.yyyy HH:mm
 */
export function formatForUser(isoString: string): string {
  return toLocalDateTime(isoString).toFormat("dd.MM.yyyy HH:mm");
}

/**
 * Formats an ISO datetime without the year.
 * Shows: today HH:mm, tomorrow HH:mm or ccc dd/MM HH:mm
 */
export function formatForUserNoYear(isoString: string, now: DateTime = getNow()): string {
  const dt = toLocalDateTime(isoString);
  const time = dt.toFormat("HH:mm");

  if (dt.hasSame(now, "day")) {
    return `today ${time}`;
  }

  if (dt.hasSame(now.plus({ days: 1 }), "day")) {
    return `tomorrow ${time}`;
  }

  return `${dt.toFormat("ccc dd/MM")} ${time}`;
}

/**
 * Formats an ISO datetime for display with relative terms (today/tomorrow).
 * - same local day as now => "today at HH:mm"
 * - next local day => "tomorrow at HH:mm"
 * - otherwise => "on weekday dd.MM.yyyy at HH:mm"
 */
export function formatForUserRelative(isoString: string, now: DateTime = getNow()): string {
  const dt = toLocalDateTime(isoString);
  const time = dt.toFormat("HH:mm");

  if (dt.hasSame(now, "day")) {
    return `today at ${time}`;
  }

  if (dt.hasSame(now.plus({ days: 1 }), "day")) {
    return `tomorrow at ${time}`;
  }

  return `on ${dt.toFormat("cccc dd.MM.yyyy")} at ${time}`;
}

/**
 * Formats just the time portion (HH:mm).
 */
export function formatTimeOnly(isoString: string): string {
  return toLocalDateTime(isoString).toFormat("HH:mm");
}

/**
 * Checks if an ISO datetime is strictly after now.
 */
export function isFuture(isoString: string, now: DateTime = getNow()): boolean {
  return toLocalDateTime(isoString).toMillis() > now.toMillis();
}

/**
 * Computes the milliseconds delay until a future ISO datetime.
 * Returns 0 or negative if the time is in the past.
 */
export function getDelayMs(isoString: string): number {
  return toLocalDateTime(isoString).toMillis() - Date.now();
}
