import type { PendingTask, PendingUpdate } from "../conversation/pending";
import { LEAD_TIME_OPTIONS, getLeadTimeLabel, isLeadTime } from "../tasks/reminders";
import type { StructuredCommand } from "../tasks/schema";
import { formatForUser, getNow, toIso } from "../tasks/time";
import { parseDateReply, parseTimeReply } from "../tasks/timeExpression";
import type { AppContext, ChatContext, InlineKeyboard } from "./context";

const PAST_TIME_MESSAGE = "❌ The time can't be in the past.";

function notificationKeyboard(): InlineKeyboard {
  return LEAD_TIME_OPTIONS.map((minutes) => [
    { text: getLeadTimeLabel(minutes), data: `notify:${minutes}` },
  ]);
}

/**
 * Asks the question matching the pending state.
 */
async function promptFor(ctx: ChatContext, task: PendingTask): Promise<void> {
  switch (task.state) {
    case "awaitingDate":
      await ctx.reply(`📅 On which date is "${task.description}"? (e.g. tomorrow, 25.12 or 25.12.2026)`);
      return;
    case "awaitingTime":
      await ctx.reply(`⏰ At what time is "${task.description}"? (e.g. 18:30)`);
      return;
    case "awaitingNotificationChoice":
      await ctx.reply(
        `📝 ${task.description}\n⏰ ${formatForUser(toIso(task.at))}\n\nWhen should I remind you?`,
        notificationKeyboard(),
      );
      return;
    case "awaitingEventChoice":
      return;
  }
}

async function replyToUpdate(ctx: ChatContext, update: PendingUpdate): Promise<void> {
  if (update.ok) {
    await promptFor(ctx, update.task);
    return;
  }

  if (update.reason === "past") {
    await ctx.reply(update.task ? `${PAST_TIME_MESSAGE} Please send another one.` : PAST_TIME_MESSAGE);
  }
}

/**
 * Starts a create command: full date and time go straight to the
 * notification choice, anything less waits for the missing parts.
 */
export async function startCreate(
  ctx: ChatContext,
  app: AppContext,
  command: StructuredCommand,
): Promise<void> {
  const now = getNow();

  if (command.at) {
    if (command.at.toMillis() <= now.toMillis()) {
      app.pending.clear(ctx.userId);
      await ctx.reply(PAST_TIME_MESSAGE);
      return;
    }
    await promptFor(ctx, app.pending.awaitNotificationChoice(ctx.userId, command.query, command.at));
    return;
  }

  await replyToUpdate(ctx, app.pending.begin(ctx.userId, command.query, { date: command.date, time: command.time }, now));
}

/**
 * Routes a bare date or time reply to the open question that needs it.
 * Returns false for anything else, which is then handled as a new command.
 */
export async function handlePendingReply(
  ctx: ChatContext,
  app: AppContext,
  text: string,
): Promise<boolean> {
  const need = app.pending.needs(ctx.userId);
  if (!need) return false;

  const now = getNow();

  if (need === "date") {
    const date = parseDateReply(text, now);
    if (!date) return false;
    await replyToUpdate(ctx, app.pending.supplyDate(ctx.userId, date, now));
    return true;
  }

  const time = parseTimeReply(text);
  if (!time) return false;
  await replyToUpdate(ctx, app.pending.supplyTime(ctx.userId, time, now));
  return true;
}

/**
 * Handles the lead-time button: creates the event and, unless "No reminder"
 * was picked, its notification.
 */
export async function handleNotificationChoice(
  ctx: ChatContext,
  app: AppContext,
  leadMinutes: number,
): Promise<void> {
  const task = app.pending.get(ctx.userId);
  if (task?.state !== "awaitingNotificationChoice") {
    await ctx.reply("There is nothing waiting for a reminder choice.");
    return;
  }

  if (!isLeadTime(leadMinutes)) {
    await ctx.reply("Unknown reminder option.");
    return;
  }

  if (task.at.toMillis() <= getNow().toMillis()) {
    app.pending.clear(ctx.userId);
    await ctx.reply(PAST_TIME_MESSAGE);
    return;
  }

  const result = await app.events.createEvent(ctx.userId, task.description, task.at, leadMinutes);
  app.pending.clear(ctx.userId);

  let response =
    `✅ Event created!\n\n📝 ${result.event.description}\n⏰ ${formatForUser(result.event.scheduledAtIso)}`;

  if (result.notification) {
    response += `\n🔔 ${getLeadTimeLabel(leadMinutes)}`;
  } else if (result.notificationSkipped) {
    response += "\n\nThat reminder time has already passed, so no reminder was set.";
  }

  await ctx.reply(response);
}
