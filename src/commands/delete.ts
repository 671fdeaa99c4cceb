import { formatForUserNoYear, getNowIso } from "../tasks/time";
import type { AppContext, ChatContext } from "./context";

/**
 * Handles the /delete command.
 * Shows inline keyboard to select an event to delete.
 */
export async function handleDelete(ctx: ChatContext, app: AppContext) {
  const events = await app.store.getUpcomingEvents(ctx.userId, getNowIso());

  if (events.length === 0) {
    await ctx.reply("No upcoming events to delete.");
    return;
  }

  const buttons = events.map((event) => {
    const label = `${formatForUserNoYear(event.scheduledAtIso)} — ${event.description.substring(0, 30)}`;
    return [{ text: `❌ ${label}`, data: `delete:${event.id}` }];
  });

  await ctx.reply("Select an event to delete:", buttons);
}

/**
 * Handles callback query for deleting an event.
 */
export async function handleDeleteCallback(
  ctx: ChatContext,
  app: AppContext,
  eventId: string,
): Promise<void> {
  const event = await app.store.getEvent(eventId);

  if (!event || event.userId !== ctx.userId) {
    await ctx.reply("Event not found or already deleted.");
    return;
  }

  await app.events.deleteEvent(eventId);
  await ctx.reply(`🗑 Deleted: ${formatForUserNoYear(event.scheduledAtIso)} — ${event.description}`);
}
