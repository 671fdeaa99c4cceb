import fs from "fs";
import os from "os";
import path from "path";
import { DateTime } from "luxon";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CalendarEvent, EventNotification } from "./schema";
import { EventStore } from "./store";

const now = DateTime.local(2026, 6, 10, 12, 0);
const nowIso = now.toISO() ?? "";

function event(id: string, at: DateTime, userId = 1): CalendarEvent {
  return { id, userId, description: `event ${id}`, scheduledAtIso: at.toISO() ?? "", createdAtIso: nowIso };
}

function notification(id: string, eventId: string, leadMinutes: number, sent = false): EventNotification {
  return { id, eventId, leadMinutes, sent, createdAtIso: nowIso };
}

describe("EventStore", () => {
  let store: EventStore;

  beforeEach(() => {
    store = new EventStore();
  });

  it("deletes an event together with its notifications", async () => {
    await store.insertEvent(event("e1", now.plus({ days: 1 })));
    await store.insertNotification(notification("n1", "e1", 15));
    await store.insertNotification(notification("n2", "e1", 60));

    expect(await store.deleteEvent("e1")).toEqual(["n1", "n2"]);
    expect(await store.getEvent("e1")).toBeNull();
    expect(await store.getNotificationsForEvent("e1")).toEqual([]);
    expect(await store.deleteEvent("e1")).toBeNull();
  });

  it("refuses notifications for unknown events", async () => {
    await expect(store.insertNotification(notification("n1", "missing", 15))).rejects.toThrow(
      "Cannot attach notification to unknown event missing",
    );
  });

  it("lists a user's future events soonest first", async () => {
    await store.insertEvent(event("later", now.plus({ days: 2 })));
    await store.insertEvent(event("sooner", now.plus({ hours: 1 })));
    await store.insertEvent(event("past", now.minus({ hours: 1 })));
    await store.insertEvent(event("other", now.plus({ hours: 1 }), 2));

    const upcoming = await store.getUpcomingEvents(1, nowIso);

    expect(upcoming.map((e) => e.id)).toEqual(["sooner", "later"]);
  });

  it("returns only unsent notifications that are still due", async () => {
    await store.insertEvent(event("e1", now.plus({ hours: 2 })));
    await store.insertNotification(notification("due", "e1", 15));
    await store.insertNotification(notification("sent", "e1", 30, true));
    await store.insertNotification(notification("missed", "e1", 180));

    const pending = await store.getPendingNotifications(nowIso);

    expect(pending.map((p) => p.notification.id)).toEqual(["due"]);
    expect(pending[0].event.id).toBe("e1");
  });

  it("marks a notification sent only once", async () => {
    await store.insertEvent(event("e1", now.plus({ hours: 2 })));
    await store.insertNotification(notification("n1", "e1", 15));

    expect(await store.markNotificationSent("n1")).toBe(true);
    expect(await store.markNotificationSent("n1")).toBe(false);
    expect((await store.getNotificationWithEvent("n1"))?.notification.sent).toBe(true);
  });

  it("returns copies, not live records", async () => {
    await store.insertEvent(event("e1", now.plus({ hours: 2 })));
    const copy = await store.getEvent("e1");
    if (copy) copy.description = "changed";
    expect((await store.getEvent("e1"))?.description).toBe("event e1");
  });

  describe("with a file", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "event-store-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("survives a restart", async () => {
      const file = path.join(dir, "events.json");
      const first = new EventStore(file);
      await first.insertEvent(event("e1", now.plus({ days: 1 })));
      await first.insertNotification(notification("n1", "e1", 15));

      const second = new EventStore(file);

      expect((await second.getEvent("e1"))?.description).toBe("event e1");
      expect(await second.getNotificationsForEvent("e1")).toEqual([notification("n1", "e1", 15)]);
    });
  });
});
