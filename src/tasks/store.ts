import fs from "fs";
import {
  CURRENT_STORE_VERSION,
  type CalendarEvent,
  type EventNotification,
  type NotificationWithEvent,
  type StoreFile,
} from "./schema";
import { computeFireAt } from "./reminders";
import { toLocalDateTime } from "./time";

function emptyStore(): StoreFile {
  return { version: CURRENT_STORE_VERSION, events: [], notifications: [] };
}

/**
 * Durable store for events and their notifications, kept as one JSON file.
 * Deleting an event cascades to its notifications.
 * Without a file path the data only lives in memory.
 */
export class EventStore {
  private data: StoreFile;

  constructor(private readonly filePath: string | null = null) {
    this.data = this.load();
  }

  /**
   * Loads the store file, creating it if missing.
   */
  private load(): StoreFile {
    if (!this.filePath) {
      return emptyStore();
    }

    if (!fs.existsSync(this.filePath)) {
      const initial = emptyStore();
      this.write(initial);
      return initial;
    }

    try {
      const content = fs.readFileSync(this.filePath, "utf8");
      const parsed = JSON.parse(content) as Partial<StoreFile>;
      return {
        version: parsed.version ?? CURRENT_STORE_VERSION,
        events: parsed.events ?? [],
        notifications: parsed.notifications ?? [],
      };
    } catch (e) {
      console.error(`[Store] Failed to load ${this.filePath}:`, e);
      return emptyStore();
    }
  }

  private write(data: StoreFile): void {
    if (!this.filePath) return;
    fs.writeFileSync(this.filePath, JSON.stringify(data, null, 2), "utf8");
  }

  private save(): void {
    this.write(this.data);
  }

  async insertEvent(event: CalendarEvent): Promise<void> {
    this.data.events.push({ ...event });
    this.save();
  }

  async insertNotification(notification: EventNotification): Promise<void> {
    if (!this.data.events.some((e) => e.id === notification.eventId)) {
      throw new Error(`Cannot attach notification to unknown event ${notification.eventId}`);
    }
    this.data.notifications.push({ ...notification });
    this.save();
  }

  async getEvent(eventId: string): Promise<CalendarEvent | null> {
    const event = this.data.events.find((e) => e.id === eventId);
    return event ? { ...event } : null;
  }

  /**
   * Updates an existing event by ID.
   */
  async updateEvent(
    eventId: string,
    updates: Partial<Pick<CalendarEvent, "description" | "scheduledAtIso">>,
  ): Promise<CalendarEvent | null> {
    const index = this.data.events.findIndex((e) => e.id === eventId);
    if (index === -1) {
      return null;
    }

    this.data.events[index] = { ...this.data.events[index], ...updates };
    this.save();
    return { ...this.data.events[index] };
  }

  /**
   * Events of one user scheduled strictly after now, soonest first.
   */
  async getUpcomingEvents(userId: number, nowIso: string): Promise<CalendarEvent[]> {
    const nowMs = toLocalDateTime(nowIso).toMillis();
    return this.data.events
      .filter((e) => e.userId === userId && toLocalDateTime(e.scheduledAtIso).toMillis() > nowMs)
      .sort((a, b) => Date.parse(a.scheduledAtIso) - Date.parse(b.scheduledAtIso))
      .map((e) => ({ ...e }));
  }

  async getNotificationsForEvent(eventId: string): Promise<EventNotification[]> {
    return this.data.notifications.filter((n) => n.eventId === eventId).map((n) => ({ ...n }));
  }

  /**
   * Unsent notifications whose fire instant is after now, joined with their event.
   */
  async getPendingNotifications(nowIso: string): Promise<NotificationWithEvent[]> {
    const nowMs = toLocalDateTime(nowIso).toMillis();
    const result: NotificationWithEvent[] = [];

    for (const notification of this.data.notifications) {
      if (notification.sent) continue;
      const event = this.data.events.find((e) => e.id === notification.eventId);
      if (!event) continue;

      const fireAtMs = toLocalDateTime(computeFireAt(event.scheduledAtIso, notification.leadMinutes)).toMillis();
      if (fireAtMs > nowMs) {
        result.push({ notification: { ...notification }, event: { ...event } });
      }
    }

    return result;
  }

  async getNotificationWithEvent(notificationId: string): Promise<NotificationWithEvent | null> {
    const notification = this.data.notifications.find((n) => n.id === notificationId);
    if (!notification) return null;

    const event = this.data.events.find((e) => e.id === notification.eventId);
    if (!event) return null;

    return { notification: { ...notification }, event: { ...event } };
  }

  /**
   * Marks a notification as sent. Returns false if it was missing or already sent.
   */
  async markNotificationSent(notificationId: string): Promise<boolean> {
    const notification = this.data.notifications.find((n) => n.id === notificationId);
    if (!notification || notification.sent) {
      return false;
    }

    notification.sent = true;
    this.save();
    return true;
  }

  /**
   * Removes every notification of an event. Returns the removed ids.
   */
  async deleteNotificationsForEvent(eventId: string): Promise<string[]> {
    const removed = this.data.notifications.filter((n) => n.eventId === eventId).map((n) => n.id);
    if (removed.length > 0) {
      this.data.notifications = this.data.notifications.filter((n) => n.eventId !== eventId);
      this.save();
    }
    return removed;
  }

  /**
   * Removes an event and, by cascade, its notifications.
   * Returns the removed notification ids, or null if the event was not found.
   */
  async deleteEvent(eventId: string): Promise<string[] | null> {
    const index = this.data.events.findIndex((e) => e.id === eventId);
    if (index === -1) {
      return null;
    }

    this.data.events.splice(index, 1);
    const removed = this.data.notifications.filter((n) => n.eventId === eventId).map((n) => n.id);
    this.data.notifications = this.data.notifications.filter((n) => n.eventId !== eventId);
    this.save();
    return removed;
  }
}
