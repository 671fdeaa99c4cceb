import type { EventChanges } from "../tasks/events";
import { matchEvents } from "../tasks/matcher";
import type { CalendarEvent, StructuredCommand } from "../tasks/schema";
import { formatForUserNoYear, formatForUserRelative, getNow, getNowIso, toLocalDateTime } from "../tasks/time";
import type { AppContext, ChatContext } from "./context";

/**
 * Computes the changes a change_* command makes to an event.
 * change_time keeps the day, change_date keeps the time of day.
 */
export function computeChanges(command: StructuredCommand, event: CalendarEvent): EventChanges | null {
  const current = toLocalDateTime(event.scheduledAtIso);

  switch (command.kind) {
    case "change_time":
      return command.newAt
        ? { at: current.set({ hour: command.newAt.hour, minute: command.newAt.minute, second: 0, millisecond: 0 }) }
        : null;
    case "change_date":
      return command.newAt
        ? { at: current.set({ year: command.newAt.year, month: command.newAt.month, day: command.newAt.day }) }
        : null;
    case "change_description":
      return command.newDescription ? { description: command.newDescription } : null;
    case "change_full":
      return command.newAt && command.newDescription
        ? { at: command.newAt.set({ second: 0, millisecond: 0 }), description: command.newDescription }
        : null;
    default:
      return null;
  }
}

/**
 * Resolves the event a delete/change command refers to.
 * Several matches put the user in front of a choice and return null.
 */
export async function resolveTarget(
  ctx: ChatContext,
  app: AppContext,
  command: StructuredCommand,
): Promise<CalendarEvent | null> {
  const candidates = await app.store.getUpcomingEvents(ctx.userId, getNowIso());
  const matches = matchEvents(command.query, candidates, { userId: ctx.userId, now: getNow() });

  if (matches.length === 0) {
    app.pending.clear(ctx.userId);
    await ctx.reply(`🔍 No upcoming event matches "${command.query}".`);
    return null;
  }

  if (matches.length === 1) {
    app.pending.clear(ctx.userId);
    return matches[0];
  }

  app.pending.set(ctx.userId, {
    state: "awaitingEventChoice",
    command,
    eventIds: matches.map((event) => event.id),
  });

  const buttons = matches.map((event) => [
    {
      text: `${formatForUserNoYear(event.scheduledAtIso)} — ${event.description.substring(0, 30)}`,
      data: `pick:${event.id}`,
    },
  ]);
  await ctx.reply(`Several events match "${command.query}". Which one?`, buttons);
  return null;
}

/**
 * Runs a delete or change command against one resolved event.
 */
export async function applyToEvent(
  ctx: ChatContext,
  app: AppContext,
  command: StructuredCommand,
  event: CalendarEvent,
): Promise<void> {
  if (command.kind === "delete") {
    await app.events.deleteEvent(event.id);
    await ctx.reply(`🗑 Deleted: ${formatForUserNoYear(event.scheduledAtIso)} — ${event.description}`);
    return;
  }

  const changes = computeChanges(command, event);
  if (!changes) {
    await ctx.reply("❌ I couldn't work out what to change.");
    return;
  }

  if (changes.at && changes.at.toMillis() <= getNow().toMillis()) {
    await ctx.reply("❌ The new time can't be in the past. Nothing was changed.");
    return;
  }

  const updated = await app.events.updateEvent(event.id, changes);
  if (!updated) {
    await ctx.reply("Event not found.");
    return;
  }

  await ctx.reply(`✏️ Updated: ${updated.description}\n⏰ ${formatForUserRelative(updated.scheduledAtIso)}`);
}

/**
 * Handles the button picked after an ambiguous delete/change.
 */
export async function handleEventChoice(
  ctx: ChatContext,
  app: AppContext,
  eventId: string,
): Promise<void> {
  const task = app.pending.get(ctx.userId);
  if (task?.state !== "awaitingEventChoice" || !task.eventIds.includes(eventId)) {
    await ctx.reply("That choice is no longer available.");
    return;
  }

  app.pending.clear(ctx.userId);

  const event = await app.store.getEvent(eventId);
  if (!event) {
    await ctx.reply("Event not found.");
    return;
  }

  await applyToEvent(ctx, app, task.command, event);
}
