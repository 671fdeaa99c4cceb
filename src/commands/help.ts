import type { ChatContext } from "./context";

const EXAMPLES = `Examples:
• meeting tomorrow at 15:30
• call mom in 2 hours
• team sync 25.12.2026 14:00
• buy groceries 18:00`;

/**
 * Handles the /start command.
 */
export async function handleStart(ctx: ChatContext) {
  await ctx.reply(
    `Hi! I'm your personal calendar assistant 📅

Tell me what to remember and when, and I'll remind you.

${EXAMPLES}

Send /help to see all commands.`,
  );
}

/**
 * Handles the /help command.
 * Lists all available slash commands and their descriptions.
 */
export async function handleHelp(ctx: ChatContext) {
  await ctx.reply(`Available commands:

/help - Show this list of commands
/tasks - Show upcoming events
/delete - Delete an event
/cancel - Abort the current question

You can also just write, e.g. "delete the dentist" or "move the gym to 19:00".

${EXAMPLES}`);
}
