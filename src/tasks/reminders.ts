import { toIso, toLocalDateTime } from "./time";

/**
 * Lead-time options offered after an event's date and time are known.
 * 0 means no notification record is created.
 */
export const LEAD_TIME_OPTIONS = [0, 5, 15, 30, 60, 1440] as const;

export type LeadTime = (typeof LEAD_TIME_OPTIONS)[number];

export function isLeadTime(minutes: number): minutes is LeadTime {
  return LEAD_TIME_OPTIONS.some((option) => option === minutes);
}

/**
 * Computes the fire instant of a notification: scheduled instant minus lead time.
 */
export function computeFireAt(scheduledAtIso: string, leadMinutes: number): string {
  return toIso(toLocalDateTime(scheduledAtIso).minus({ minutes: leadMinutes }));
}

/**
 * Returns a human-readable label for a lead time.
 */
export function getLeadTimeLabel(minutes: number): string {
  switch (minutes) {
    case 0:
      return "No reminder";
    case 60:
      return "1 hour before";
    case 1440:
      return "1 day before";
    default:
      return `${minutes} minutes before`;
  }
}
