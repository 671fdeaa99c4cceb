import { validateCommand } from "../ai/validate";
import { getNow } from "../tasks/time";
import { applyToEvent, handleEventChoice, resolveTarget } from "./change";
import type { AppContext, ChatContext } from "./context";
import { handleNotificationChoice, handlePendingReply, startCreate } from "./create";
import { handleDeleteCallback } from "./delete";
import { handleList } from "./list";

const TIME_NOT_RECOGNIZED = `❌ I couldn't recognize the time in your message.

Try one of these formats:
• meeting tomorrow at 15:30
• call mom in 2 hours
• team sync 25.12.2026 14:00
• reminder 18:00`;

const COMMAND_NOT_RECOGNIZED = "❌ I couldn't understand that. Please rephrase and try again.";

/**
 * Handles the /cancel command: drops whatever the bot was waiting for.
 */
export async function handleCancel(ctx: ChatContext, app: AppContext) {
  const hadPending = app.pending.clear(ctx.userId);
  await ctx.reply(hadPending ? "Okay, cancelled." : "Nothing to cancel.");
}

/**
 * Handles a free-text message: an answer to an open question, or a new command.
 */
export async function handleText(ctx: ChatContext, app: AppContext, text: string): Promise<void> {
  try {
    if (await handlePendingReply(ctx, app, text)) {
      return;
    }

    const now = getNow();
    const extraction = await app.extractor.extract(text, now);
    if (!extraction.ok) {
      await ctx.reply(extraction.reason === "time_not_recognized" ? TIME_NOT_RECOGNIZED : COMMAND_NOT_RECOGNIZED);
      return;
    }

    const validation = validateCommand(extraction.payload, now);
    if (!validation.ok) {
      console.log(`[Bot] Rejected command from ${ctx.userId}: ${validation.reason}`);
      await ctx.reply(COMMAND_NOT_RECOGNIZED);
      return;
    }

    const command = validation.command;
    switch (command.kind) {
      case "create":
        await startCreate(ctx, app, command);
        return;
      case "list":
        app.pending.clear(ctx.userId);
        await handleList(ctx, app);
        return;
      default: {
        const event = await resolveTarget(ctx, app, command);
        if (event) {
          await applyToEvent(ctx, app, command, event);
        }
      }
    }
  } catch (e) {
    console.error("[Bot] Error processing message:", e);
    await ctx.reply("❌ Something went wrong. Please try again.");
  }
}

/**
 * Handles inline button presses.
 */
export async function handleCallback(ctx: ChatContext, app: AppContext, data: string): Promise<void> {
  try {
    if (data.startsWith("notify:")) {
      await handleNotificationChoice(ctx, app, Number(data.slice(7)));
    } else if (data.startsWith("pick:")) {
      await handleEventChoice(ctx, app, data.slice(5));
    } else if (data.startsWith("delete:")) {
      await handleDeleteCallback(ctx, app, data.slice(7));
    }
  } catch (e) {
    console.error("[Bot] Error processing button:", e);
    await ctx.reply("❌ Something went wrong. Please try again.");
  }
}
