import type { CommandExtractor } from "../ai/intent";
import type { PendingTasks } from "../conversation/pending";
import type { EventService } from "../tasks/events";
import type { NotificationScheduler } from "../tasks/scheduler";
import type { EventStore } from "../tasks/store";

export type InlineButton = { text: string; data: string };

export type InlineKeyboard = InlineButton[][];

/**
 * What a handler needs from the chat transport for one inbound update.
 */
export interface ChatContext {
  userId: number;
  reply(text: string, keyboard?: InlineKeyboard): Promise<void>;
}

/**
 * Process-wide collaborators, passed explicitly to every handler.
 */
export type AppContext = {
  store: EventStore;
  scheduler: NotificationScheduler;
  events: EventService;
  pending: PendingTasks;
  extractor: CommandExtractor;
};
