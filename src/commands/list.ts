import { formatTimeOnly, getNowIso, toLocalDateTime } from "../tasks/time";
import type { AppContext, ChatContext } from "./context";

/**
 * Handles the /tasks command and the "list" command kind.
 * Shows the user's upcoming events grouped by day.
 */
export async function handleList(ctx: ChatContext, app: AppContext) {
  const events = await app.store.getUpcomingEvents(ctx.userId, getNowIso());

  if (events.length === 0) {
    await ctx.reply("You have no upcoming events.");
    return;
  }

  const lines: string[] = ["📋 Your upcoming events:"];
  let currentDay = "";

  for (const event of events) {
    const dayLabel = toLocalDateTime(event.scheduledAtIso).toFormat("cccc dd.MM.yyyy");

    if (dayLabel !== currentDay) {
      currentDay = dayLabel;
      lines.push("");
      lines.push(dayLabel);
    }

    lines.push(`- ${formatTimeOnly(event.scheduledAtIso)} — ${event.description}`);
  }

  await ctx.reply(lines.join("\n"));
}
