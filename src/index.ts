import { Context, Markup, Telegraf } from "telegraf";
import { AssistedCommandExtractor, SimpleCommandExtractor, type CommandExtractor } from "./ai/intent";
import { handleCallback, handleCancel, handleText } from "./commands/assistant";
import type { AppContext, ChatContext, InlineKeyboard } from "./commands/context";
import { handleDelete } from "./commands/delete";
import { handleHelp, handleStart } from "./commands/help";
import { handleList } from "./commands/list";
import { loadConfig } from "./config";
import { PendingTasks } from "./conversation/pending";
import { createOpenRouterCompleter } from "./openrouter/client";
import { EventService } from "./tasks/events";
import { NotificationScheduler, type ReminderSender } from "./tasks/scheduler";
import { EventStore } from "./tasks/store";

const config = loadConfig();

const bot = new Telegraf(config.telegramBotToken);

function toReplyMarkup(keyboard: InlineKeyboard) {
  return Markup.inlineKeyboard(
    keyboard.map((row) => row.map((button) => Markup.button.callback(button.text, button.data))),
  ).reply_markup;
}

/**
 * Creates a ReminderSender from the bot instance.
 */
function createReminderSender(): ReminderSender {
  return {
    sendMessage: async (chatId, text, keyboard) => {
      await bot.telegram.sendMessage(
        chatId,
        text,
        keyboard ? { reply_markup: toReplyMarkup(keyboard) } : undefined,
      );
    },
  };
}

function createExtractor(): CommandExtractor {
  if (config.extractionMode === "assisted" && config.openRouterApiKey) {
    return new AssistedCommandExtractor(
      createOpenRouterCompleter({
        apiKey: config.openRouterApiKey,
        model: config.openRouterModel ?? undefined,
        timeoutMs: config.completionTimeoutMs,
      }),
    );
  }
  return new SimpleCommandExtractor();
}

const store = new EventStore(config.dataFile);
const scheduler = new NotificationScheduler(store, createReminderSender());

const app: AppContext = {
  store,
  scheduler,
  events: new EventService(store, scheduler),
  pending: new PendingTasks(),
  extractor: createExtractor(),
};

/**
 * Adapts a Telegraf update to the transport-agnostic handler context.
 */
function toChatContext(ctx: Context): ChatContext | null {
  if (!ctx.from) return null;
  return {
    userId: ctx.from.id,
    reply: async (text, keyboard) => {
      await ctx.reply(text, keyboard ? { reply_markup: toReplyMarkup(keyboard) } : undefined);
    },
  };
}

// Command handlers
bot.command("start", async (ctx) => {
  const chat = toChatContext(ctx);
  if (chat) await handleStart(chat);
});

bot.command("help", async (ctx) => {
  const chat = toChatContext(ctx);
  if (chat) await handleHelp(chat);
});

bot.command("tasks", async (ctx) => {
  const chat = toChatContext(ctx);
  if (chat) await handleList(chat, app);
});

bot.command("delete", async (ctx) => {
  const chat = toChatContext(ctx);
  if (chat) await handleDelete(chat, app);
});

bot.command("cancel", async (ctx) => {
  const chat = toChatContext(ctx);
  if (chat) await handleCancel(chat, app);
});

// Handle text messages
bot.on("text", async (ctx, next) => {
  const text = ctx.message.text;

  // Leave commands to the command handlers
  if (text.startsWith("/")) {
    return next();
  }

  const chat = toChatContext(ctx);
  if (chat) await handleText(chat, app, text);
});

// Callback query handler for inline buttons
bot.on("callback_query", async (ctx) => {
  const callbackQuery = ctx.callbackQuery;

  // Handle only callback queries with data (not game queries)
  if (!("data" in callbackQuery) || !callbackQuery.data) {
    return;
  }

  await ctx.answerCbQuery();
  const chat = toChatContext(ctx);
  if (chat) await handleCallback(chat, app, callbackQuery.data);
});

/**
 * Wraps a promise with a timeout.
 * @param label Description for error message
 * @throws Error if timeout is reached
 */
function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${ms}ms`));
    }, ms);

    p.then(
      (result) => {
        clearTimeout(timer);
        resolve(result);
      },
      (err) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/**
 * Starts the bot, then recovers pending notifications from the store.
 */
async function main() {
  console.log(`[Bot] Starting (extraction: ${config.extractionMode})...`);

  const botInfo = await withTimeout(bot.telegram.getMe(), 15000, "getMe");
  console.log("[Bot] Token validated");

  // Polling never resolves, so it is not awaited
  bot.launch({ dropPendingUpdates: true }).catch((err) => {
    console.error("[Bot] Failed to launch polling:", err);
    console.error("Hint: Check network/proxy/firewall settings. Telegram API may be unreachable.");
    process.exit(1);
  });

  console.log(`[Bot] Started as @${botInfo.username}`);

  await scheduler.scheduleAll();
  console.log("[Bot] Scheduler initialized");
}

/**
 * Catches middleware errors that aren't caught by specific handlers.
 */
bot.catch((err, ctx) => {
  console.error("[Bot] Telegraf error", err);
  if (ctx.from) {
    ctx.reply("An error occurred while processing your request.").catch(console.error);
  }
});

function shutdown(signal: string) {
  console.log(`[Bot] ${signal} received, stopping`);
  scheduler.stop();
  bot.stop(signal);
}

process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

main().catch((err) => {
  console.error("[Bot] Fatal error during startup:", err);
  process.exit(1);
});
