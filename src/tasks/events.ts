import { nanoid } from "nanoid";
import type { DateTime } from "luxon";
import { computeFireAt } from "./reminders";
import type { NotificationScheduler } from "./scheduler";
import type { CalendarEvent, EventNotification } from "./schema";
import type { EventStore } from "./store";
import { getNow, getNowIso, isFuture, toIso } from "./time";

export type CreateEventResult = {
  event: CalendarEvent;
  notification: EventNotification | null;
  // lead time was requested but its fire instant is already behind us
  notificationSkipped: boolean;
};

export type EventChanges = {
  description?: string;
  at?: DateTime;
};

/**
 * Applies event mutations to the store and keeps the scheduler in step.
 */
export class EventService {
  constructor(
    private readonly store: EventStore,
    private readonly scheduler: NotificationScheduler,
  ) {}

  private async attachNotification(event: CalendarEvent, leadMinutes: number): Promise<EventNotification | null> {
    if (leadMinutes <= 0) return null;
    if (!isFuture(computeFireAt(event.scheduledAtIso, leadMinutes))) return null;

    const notification: EventNotification = {
      id: `ntf_${nanoid(12)}`,
      eventId: event.id,
      leadMinutes,
      sent: false,
      createdAtIso: getNowIso(),
    };
    await this.store.insertNotification(notification);
    return notification;
  }

  async createEvent(
    userId: number,
    description: string,
    at: DateTime,
    leadMinutes: number,
  ): Promise<CreateEventResult> {
    if (at.toMillis() <= getNow().toMillis()) {
      throw new Error("Event time must be in the future");
    }

    const event: CalendarEvent = {
      id: `evt_${nanoid(12)}`,
      userId,
      description,
      scheduledAtIso: toIso(at),
      createdAtIso: getNowIso(),
    };
    await this.store.insertEvent(event);

    const notification = await this.attachNotification(event, leadMinutes);
    if (notification) {
      await this.scheduler.scheduleAll();
    }

    console.log(`[Events] Created ${event.id} for user ${userId}`);
    return { event, notification, notificationSkipped: leadMinutes > 0 && !notification };
  }

  /**
   * Deletes an event; its notifications go with it.
   */
  async deleteEvent(eventId: string): Promise<CalendarEvent | null> {
    const event = await this.store.getEvent(eventId);
    if (!event) return null;

    const removed = (await this.store.deleteEvent(eventId)) ?? [];
    for (const notificationId of removed) {
      this.scheduler.cancel(notificationId);
    }

    console.log(`[Events] Deleted ${eventId} with ${removed.length} notifications`);
    return event;
  }

  /**
   * Updates description and/or time. A new time drops the old notifications
   * and recreates them with the same lead times against the new instant.
   */
  async updateEvent(eventId: string, changes: EventChanges): Promise<CalendarEvent | null> {
    const existing = await this.store.getEvent(eventId);
    if (!existing) return null;

    if (changes.at && changes.at.toMillis() <= getNow().toMillis()) {
      throw new Error("Event time must be in the future");
    }

    const scheduledAtIso = changes.at ? toIso(changes.at) : existing.scheduledAtIso;
    const timeChanged = scheduledAtIso !== existing.scheduledAtIso;

    const updated = await this.store.updateEvent(eventId, {
      description: changes.description ?? existing.description,
      scheduledAtIso,
    });
    if (!updated) return null;

    if (timeChanged) {
      const previous = await this.store.getNotificationsForEvent(eventId);
      this.scheduler.cancelForEvent(eventId);
      await this.store.deleteNotificationsForEvent(eventId);

      for (const leadMinutes of new Set(previous.map((n) => n.leadMinutes))) {
        await this.attachNotification(updated, leadMinutes);
      }
      await this.scheduler.scheduleAll();
    }

    console.log(`[Events] Updated ${eventId}${timeChanged ? " (rescheduled)" : ""}`);
    return updated;
  }
}
