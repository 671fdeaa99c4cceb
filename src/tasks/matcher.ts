import type { DateTime } from "luxon";
import type { CalendarEvent } from "./schema";
import { toLocalDateTime } from "./time";

export const DEFAULT_MATCH_THRESHOLD = 0.3;

export type MatchOptions = {
  userId: number;
  now: DateTime;
  threshold?: number;
};

function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Edit-distance ratio in [0, 1]; 1 means identical.
 */
export function stringSimilarity(a: string, b: string): number {
  const left = a.trim().toLowerCase();
  const right = b.trim().toLowerCase();
  const longest = Math.max(left.length, right.length);
  if (longest === 0) return 1;
  return 1 - levenshtein(left, right) / longest;
}

function toWordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

/**
 * |shared words| / max(|query words|, |description words|), 0 when both are empty.
 */
export function wordOverlap(a: string, b: string): number {
  const wordsA = toWordSet(a);
  const wordsB = toWordSet(b);
  const largest = Math.max(wordsA.size, wordsB.size);
  if (largest === 0) return 0;

  let shared = 0;
  for (const word of wordsA) {
    if (wordsB.has(word)) shared += 1;
  }
  return shared / largest;
}

export function similarityScore(query: string, description: string): number {
  return Math.max(stringSimilarity(query, description), wordOverlap(query, description));
}

/**
 * Resolves a free-text reference to the user's upcoming events.
 * Results are ordered by scheduled time, not by score; the caller decides
 * what to do with zero, one or several matches.
 */
export function matchEvents(
  query: string,
  candidates: CalendarEvent[],
  options: MatchOptions,
): CalendarEvent[] {
  const threshold = options.threshold ?? DEFAULT_MATCH_THRESHOLD;
  const nowMs = options.now.toMillis();

  return candidates
    .filter((event) => event.userId === options.userId)
    .filter((event) => toLocalDateTime(event.scheduledAtIso).toMillis() > nowMs)
    .filter((event) => similarityScore(query, event.description) >= threshold)
    .sort((a, b) => Date.parse(a.scheduledAtIso) - Date.parse(b.scheduledAtIso));
}
