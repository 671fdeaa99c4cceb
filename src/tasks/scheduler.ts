import type { InlineKeyboard } from "../commands/context";
import { computeFireAt, getLeadTimeLabel } from "./reminders";
import type { EventStore } from "./store";
import { formatForUserRelative, getDelayMs, getNowIso } from "./time";

// Maximum delay for setTimeout (24 hours to avoid 32-bit overflow)
const MAX_DELAY_MS = 1000 * 60 * 60 * 24;

// Delivery is at-most-once: a failed send is logged and the notification still counts as sent.
export const MAX_DELIVERY_ATTEMPTS = 1;

/**
 * Interface for sending messages to a user.
 * Abstracts away Telegram-specific details.
 */
export interface ReminderSender {
  sendMessage(chatId: number, text: string, keyboard?: InlineKeyboard): Promise<void>;
}

type ScheduledTimeout = {
  notificationId: string;
  eventId: string;
  handle: ReturnType<typeof setTimeout>;
  fireAtMs: number;
};

/**
 * Keeps one timer per pending notification.
 * The store is the source of truth; the registry can always be rebuilt with scheduleAll().
 */
export class NotificationScheduler {
  private readonly scheduledTimeouts = new Map<string, ScheduledTimeout>();

  constructor(
    private readonly store: EventStore,
    private readonly sender: ReminderSender,
  ) {}

  get size(): number {
    return this.scheduledTimeouts.size;
  }

  isScheduled(notificationId: string): boolean {
    return this.scheduledTimeouts.has(notificationId);
  }

  /**
   * (Re)registers a timer for every unsent notification whose fire instant is still ahead.
   * Safe to call repeatedly: an existing timer under the same key is replaced.
   */
  async scheduleAll(): Promise<number> {
    const pending = await this.store.getPendingNotifications(getNowIso());
    let scheduled = 0;

    for (const { notification, event } of pending) {
      const fireAtIso = computeFireAt(event.scheduledAtIso, notification.leadMinutes);
      if (this.schedule(notification.id, event.id, fireAtIso)) {
        scheduled++;
      }
    }

    console.log(`[Scheduler] ${scheduled} notifications scheduled`);
    return scheduled;
  }

  /**
   * Schedules a notification using setTimeout with chunking for long delays.
   */
  private schedule(notificationId: string, eventId: string, fireAtIso: string): boolean {
    const delayMs = getDelayMs(fireAtIso);

    if (delayMs <= 0) {
      console.log(`[Scheduler] Skipping past notification: ${notificationId}`);
      return false;
    }

    this.cancel(notificationId);

    const fireAtMs = Date.now() + delayMs;

    const scheduleChunk = () => {
      const remainingMs = fireAtMs - Date.now();

      if (remainingMs <= 0) {
        this.fire(notificationId).catch((e) => {
          console.error(`[Scheduler] Notification ${notificationId} failed:`, e);
        });
        return;
      }

      this.scheduledTimeouts.set(notificationId, {
        notificationId,
        eventId,
        handle: setTimeout(scheduleChunk, Math.min(remainingMs, MAX_DELAY_MS)),
        fireAtMs,
      });
    };

    this.scheduledTimeouts.set(notificationId, {
      notificationId,
      eventId,
      handle: setTimeout(scheduleChunk, Math.min(delayMs, MAX_DELAY_MS)),
      fireAtMs,
    });

    return true;
  }

  /**
   * Delivers a notification. The event is read at fire time so the message
   * reflects its latest description and time.
   */
  async fire(notificationId: string): Promise<void> {
    // Once firing has started it can no longer be cancelled
    this.scheduledTimeouts.delete(notificationId);

    const pair = await this.store.getNotificationWithEvent(notificationId);
    if (!pair) {
      console.log(`[Scheduler] Notification ${notificationId} not found, skipping`);
      return;
    }

    const { notification, event } = pair;
    if (notification.sent) {
      console.log(`[Scheduler] Notification ${notificationId} already sent`);
      return;
    }

    const text =
      `⏰ Reminder (${getLeadTimeLabel(notification.leadMinutes)})\n\n` +
      `${event.description}\n${formatForUserRelative(event.scheduledAtIso)}`;

    for (let attempt = 1; attempt <= MAX_DELIVERY_ATTEMPTS; attempt++) {
      try {
        await this.sender.sendMessage(event.userId, text);
        console.log(`[Scheduler] Sent notification ${notificationId} for event ${event.id}`);
        break;
      } catch (e) {
        console.error(`[Scheduler] Failed to send notification ${notificationId} (attempt ${attempt}): ${e}`);
      }
    }

    await this.store.markNotificationSent(notificationId);
  }

  /**
   * Removes a timer. Unknown ids are ignored.
   */
  cancel(notificationId: string): boolean {
    const existing = this.scheduledTimeouts.get(notificationId);
    if (!existing) {
      return false;
    }

    clearTimeout(existing.handle);
    this.scheduledTimeouts.delete(notificationId);
    return true;
  }

  /**
   * Cancels all scheduled timers for an event.
   */
  cancelForEvent(eventId: string): number {
    let cancelled = 0;

    for (const timeout of [...this.scheduledTimeouts.values()]) {
      if (timeout.eventId === eventId && this.cancel(timeout.notificationId)) {
        cancelled++;
      }
    }

    console.log(`[Scheduler] Cancelled ${cancelled} timeouts for event ${eventId}`);
    return cancelled;
  }

  stop(): void {
    for (const timeout of this.scheduledTimeouts.values()) {
      clearTimeout(timeout.handle);
    }
    this.scheduledTimeouts.clear();
  }
}
