import { DateTime } from "luxon";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { AssistedCommandExtractor, SimpleCommandExtractor, type CommandExtractor } from "../ai/intent";
import { PendingTasks } from "../conversation/pending";
import type { CompletionResult } from "../openrouter/client";
import { EventService } from "../tasks/events";
import { computeFireAt } from "../tasks/reminders";
import { NotificationScheduler } from "../tasks/scheduler";
import { EventStore } from "../tasks/store";
import { getNowIso } from "../tasks/time";
import { handleCallback, handleCancel, handleText } from "./assistant";
import type { AppContext, ChatContext, InlineKeyboard } from "./context";

const USER = 42;
const MINUTE = 60 * 1000;

type Reply = { text: string; keyboard?: InlineKeyboard };

async function flushPromises() {
  for (let i = 0; i < 50; i++) {
    await Promise.resolve();
  }
}

describe("assistant", () => {
  let replies: Reply[];
  let completions: CompletionResult[];
  let sendMessage: Mock<[number, string], void>;
  let ctx: ChatContext;
  let app: AppContext;

  function buildApp(extractor: CommandExtractor): AppContext {
    const store = new EventStore();
    const scheduler = new NotificationScheduler(store, {
      sendMessage: async (chatId, text) => {
        sendMessage(chatId, text);
      },
    });
    return {
      store,
      scheduler,
      events: new EventService(store, scheduler),
      pending: new PendingTasks(),
      extractor,
    };
  }

  function completeWith(json: string) {
    completions.push({ ok: true, text: json });
  }

  function lastReply(): Reply {
    const reply = replies[replies.length - 1];
    if (!reply) throw new Error("no reply yet");
    return reply;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2026, 5, 10, 12, 0, 0));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    replies = [];
    completions = [];
    sendMessage = vi.fn<[number, string], void>();
    ctx = {
      userId: USER,
      reply: async (text, keyboard) => {
        replies.push({ text, keyboard });
      },
    };
    app = buildApp(
      new AssistedCommandExtractor({
        complete: async () => completions.shift() ?? { ok: false, error: new Error("no stubbed completion") },
      }),
    );
  });

  afterEach(() => {
    app.scheduler.stop();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("creates an event and a 15 minute notification from one message", async () => {
    completeWith('{"command":"create","event":"buy groceries","datetime":"2026-06-11T18:00:00"}');

    await handleText(ctx, app, "buy groceries tomorrow at 18:00");

    expect(lastReply().keyboard?.map((row) => row[0].data)).toEqual([
      "notify:0",
      "notify:5",
      "notify:15",
      "notify:30",
      "notify:60",
      "notify:1440",
    ]);

    await handleCallback(ctx, app, "notify:15");

    const [event] = await app.store.getUpcomingEvents(USER, getNowIso());
    expect(event.description).toBe("buy groceries");
    expect(event.scheduledAtIso).toBe(DateTime.local(2026, 6, 11, 18, 0).toISO());

    const notifications = await app.store.getNotificationsForEvent(event.id);
    expect(notifications).toHaveLength(1);
    expect(computeFireAt(event.scheduledAtIso, notifications[0].leadMinutes)).toBe(
      DateTime.local(2026, 6, 11, 17, 45).toISO(),
    );
    expect(app.scheduler.isScheduled(notifications[0].id)).toBe(true);
    expect(app.pending.get(USER)).toBeNull();
    expect(lastReply().text).toBe("✅ Event created!\n\n📝 buy groceries\n⏰ 11.06.2026 18:00\n🔔 15 minutes before");
  });

  it("creates the same event with the regex extractor once 18:00 has passed", async () => {
    vi.setSystemTime(new Date(2026, 5, 10, 20, 0, 0));
    app = buildApp(new SimpleCommandExtractor());

    await handleText(ctx, app, "buy groceries tomorrow at 18:00");
    await handleCallback(ctx, app, "notify:15");

    const [event] = await app.store.getUpcomingEvents(USER, getNowIso());
    expect(event.description).toBe("buy groceries");
    expect(event.scheduledAtIso).toBe(DateTime.local(2026, 6, 11, 18, 0).toISO());
    expect(await app.store.getNotificationsForEvent(event.id)).toHaveLength(1);
  });

  it("tells the user when the regex extractor finds no time", async () => {
    app = buildApp(new SimpleCommandExtractor());

    await handleText(ctx, app, "buy groceries");

    expect(lastReply().text.startsWith("❌ I couldn't recognize the time")).toBe(true);
    expect(await app.store.getUpcomingEvents(USER, getNowIso())).toEqual([]);
  });

  it("asks for the missing time and creates the event without a reminder", async () => {
    completeWith('{"command":"create","event":"dentist","date":"2026-06-12"}');

    await handleText(ctx, app, "dentist on 12.06");
    expect(lastReply().text).toBe('⏰ At what time is "dentist"? (e.g. 18:30)');

    await handleText(ctx, app, "10:30");
    expect(lastReply().keyboard).toHaveLength(6);

    await handleCallback(ctx, app, "notify:0");

    const [event] = await app.store.getUpcomingEvents(USER, getNowIso());
    expect(event.scheduledAtIso).toBe(DateTime.local(2026, 6, 12, 10, 30).toISO());
    expect(await app.store.getNotificationsForEvent(event.id)).toEqual([]);
  });

  it("handles text that is not a bare time as a new message and keeps the question open", async () => {
    completeWith('{"command":"create","event":"dentist","date":"2026-06-12"}');
    await handleText(ctx, app, "dentist on 12.06");

    await handleText(ctx, app, "later");

    expect(lastReply().text).toBe("❌ I couldn't understand that. Please rephrase and try again.");
    expect(app.pending.needs(USER)).toBe("time");
  });

  it("replaces an open date question with a new create command", async () => {
    app = buildApp(new SimpleCommandExtractor());
    app.pending.begin(USER, "dentist", { date: null, time: null }, DateTime.local());

    await handleText(ctx, app, "buy groceries tomorrow at 18:00");

    const task = app.pending.get(USER);
    expect(task?.state).toBe("awaitingNotificationChoice");
    if (task?.state === "awaitingNotificationChoice") {
      expect(task.description).toBe("buy groceries");
      expect(task.at.toISO()).toBe(DateTime.local(2026, 6, 10, 18, 0).toISO());
    }
    expect(lastReply().keyboard).toHaveLength(6);
  });

  it("drops the pending question on /cancel", async () => {
    completeWith('{"command":"create","event":"dentist"}');
    await handleText(ctx, app, "dentist");
    expect(app.pending.needs(USER)).toBe("date");

    await handleCancel(ctx, app);

    expect(app.pending.get(USER)).toBeNull();
    expect(lastReply().text).toBe("Okay, cancelled.");
  });

  it("deletes the single matching event and cancels its notification", async () => {
    const dentist = await app.events.createEvent(USER, "dentist appointment", DateTime.local(2026, 6, 12, 10, 0), 30);
    await app.events.createEvent(USER, "gym", DateTime.local(2026, 6, 11, 18, 0), 15);
    completeWith('{"command":"delete","event":"dentist"}');

    await handleText(ctx, app, "delete the dentist");

    expect(await app.store.getEvent(dentist.event.id)).toBeNull();
    expect(dentist.notification && app.scheduler.isScheduled(dentist.notification.id)).toBe(false);
    expect((await app.store.getUpcomingEvents(USER, getNowIso())).map((e) => e.description)).toEqual(["gym"]);
    expect(lastReply().text.startsWith("🗑 Deleted:")).toBe(true);
  });

  it("reports not found and leaves the store alone", async () => {
    await app.events.createEvent(USER, "dentist appointment", DateTime.local(2026, 6, 12, 10, 0), 30);
    await app.events.createEvent(USER, "gym", DateTime.local(2026, 6, 11, 18, 0), 15);
    completeWith('{"command":"delete","event":"zoo"}');

    await handleText(ctx, app, "delete the zoo");

    expect(lastReply().text).toBe('🔍 No upcoming event matches "zoo".');
    expect(await app.store.getUpcomingEvents(USER, getNowIso())).toHaveLength(2);
    expect(app.scheduler.size).toBe(2);
  });

  it("asks which event is meant when several match", async () => {
    const team = await app.events.createEvent(USER, "team meeting", DateTime.local(2026, 6, 11, 9, 0), 0);
    const anna = await app.events.createEvent(USER, "meeting with Anna", DateTime.local(2026, 6, 12, 9, 0), 0);
    completeWith('{"command":"delete","event":"meeting"}');

    await handleText(ctx, app, "delete the meeting");

    expect(lastReply().keyboard?.map((row) => row[0].data)).toEqual([`pick:${team.event.id}`, `pick:${anna.event.id}`]);
    expect(await app.store.getUpcomingEvents(USER, getNowIso())).toHaveLength(2);

    await handleCallback(ctx, app, `pick:${anna.event.id}`);

    expect((await app.store.getUpcomingEvents(USER, getNowIso())).map((e) => e.id)).toEqual([team.event.id]);
    expect(app.pending.get(USER)).toBeNull();
  });

  it("moves an event to a new time of day and reminds at the new offset only", async () => {
    const gym = await app.events.createEvent(USER, "gym", DateTime.local(2026, 6, 11, 18, 0), 60);
    completeWith('{"command":"change_time","event":"gym","new_datetime":"2026-06-10T19:30:00"}');

    await handleText(ctx, app, "move the gym to 19:30");

    const updated = await app.store.getEvent(gym.event.id);
    expect(updated?.scheduledAtIso).toBe(DateTime.local(2026, 6, 11, 19, 30).toISO());
    const [notification] = await app.store.getNotificationsForEvent(gym.event.id);
    expect(notification.id).not.toBe(gym.notification?.id);
    expect(notification.leadMinutes).toBe(60);

    // past the old fire instant (11.06 17:00)
    await vi.advanceTimersByTimeAsync((29 * 60 + 30) * MINUTE);
    await flushPromises();
    expect(sendMessage).not.toHaveBeenCalled();

    // past the new one (11.06 18:30)
    await vi.advanceTimersByTimeAsync(61 * MINUTE);
    await flushPromises();
    expect(sendMessage).toHaveBeenCalledTimes(1);
    expect(sendMessage).toHaveBeenCalledWith(USER, "⏰ Reminder (1 hour before)\n\ngym\ntoday at 19:30");
  });

  it("changes the day but keeps the time of day", async () => {
    const gym = await app.events.createEvent(USER, "gym", DateTime.local(2026, 6, 11, 18, 0), 0);
    completeWith('{"command":"change_date","event":"gym","new_datetime":"2026-06-15T09:00:00"}');

    await handleText(ctx, app, "move the gym to 15.06");

    expect((await app.store.getEvent(gym.event.id))?.scheduledAtIso).toBe(DateTime.local(2026, 6, 15, 18, 0).toISO());
  });

  it("renames an event", async () => {
    const gym = await app.events.createEvent(USER, "gym", DateTime.local(2026, 6, 11, 18, 0), 0);
    completeWith('{"command":"change_description","event":"gym","new_description":"swimming"}');

    await handleText(ctx, app, "rename gym to swimming");

    expect((await app.store.getEvent(gym.event.id))?.description).toBe("swimming");
  });

  it("answers a failing completer with a generic message", async () => {
    await handleText(ctx, app, "gym tomorrow");

    expect(lastReply().text).toBe("❌ I couldn't understand that. Please rephrase and try again.");
    expect(await app.store.getUpcomingEvents(USER, getNowIso())).toEqual([]);
  });

  it("lists upcoming events", async () => {
    await app.events.createEvent(USER, "gym", DateTime.local(2026, 6, 11, 18, 0), 0);
    completeWith('{"command":"list"}');

    await handleText(ctx, app, "what is planned?");

    const lines = lastReply().text.split("\n");
    expect(lines[0]).toBe("📋 Your upcoming events:");
    expect(lines).toContain("- 18:00 — gym");
  });
});
