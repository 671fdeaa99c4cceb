import type { DateTime } from "luxon";

const ISO_MINUTES = "yyyy-MM-dd'T'HH:mm:ss";

/**
 * Builds the command-extraction prompt. Example dates are derived from now
 * so they agree with the "current date" line.
 */
export function buildCommandPrompt(text: string, now: DateTime): string {
  const tomorrowAt = (hour: number, minute = 0) =>
    now.plus({ days: 1 }).set({ hour, minute, second: 0, millisecond: 0 }).toFormat(ISO_MINUTES);
  const nextWeek = now.plus({ days: 7 }).set({ hour: 10, minute: 0, second: 0, millisecond: 0 });

  const examples: Array<[string, Record<string, string>]> = [
    [
      "buy groceries tomorrow at 18:00",
      { command: "create", event: "buy groceries", datetime: tomorrowAt(18) },
    ],
    [
      `dentist on ${nextWeek.toFormat("dd.MM")}`,
      { command: "create", event: "dentist", date: nextWeek.toFormat("yyyy-MM-dd") },
    ],
    ["call the bank at 9:30", { command: "create", event: "call the bank", time: "09:30" }],
    ["delete the meeting with Anna", { command: "delete", event: "meeting with Anna" }],
    [
      "move the dentist to 16:00",
      { command: "change_time", event: "dentist", new_datetime: tomorrowAt(16) },
    ],
    [
      `move the gym to ${nextWeek.toFormat("dd.MM")}`,
      { command: "change_date", event: "gym", new_datetime: nextWeek.toFormat(ISO_MINUTES) },
    ],
    [
      "rename buy groceries to buy groceries and milk",
      { command: "change_description", event: "buy groceries", new_description: "buy groceries and milk" },
    ],
    [
      "replace the gym with swimming tomorrow at 7:00",
      { command: "change_full", event: "gym", new_description: "swimming", new_datetime: tomorrowAt(7) },
    ],
    ["what do I have planned?", { command: "list" }],
  ];

  const exampleLines = examples
    .map(([input, output]) => `Input: "${input}"\nOutput: ${JSON.stringify(output)}`)
    .join("\n\n");

  return `You turn scheduling messages into commands.

Current date and time: ${now.toFormat("yyyy-MM-dd HH:mm")} (${now.toFormat("cccc")}).

Commands:
- create: new event. "event" is the description. Use "datetime" when both date and time are known,
  "date" (YYYY-MM-DD) when only the date is known, "time" (HH:MM) when only the time is known.
- delete: remove an event. "event" names it.
- change_time: new time of day for an event, in "new_datetime".
- change_date: new day for an event, in "new_datetime".
- change_description: new text for an event, in "new_description".
- change_full: new text and new date/time, in "new_description" and "new_datetime".
- list: show upcoming events.

Rules:
- Datetimes are local ISO strings without timezone: YYYY-MM-DDTHH:mm:ss.
- Never put date or time words in "event" or "new_description".
- Return STRICT JSON only, one object, no extra text.

${exampleLines}

Input: "${text}"
Output:`;
}
