import { DateTime } from "luxon";
import type { CalendarDate, ClockTime, StructuredCommand } from "../tasks/schema";

/**
 * A command awaiting more input from its user
 */
export type PendingTask =
  | { state: "awaitingDate"; description: string; time: ClockTime | null }
  | { state: "awaitingTime"; description: string; date: CalendarDate }
  | { state: "awaitingNotificationChoice"; description: string; at: DateTime }
  | { state: "awaitingEventChoice"; command: StructuredCommand; eventIds: string[] };

export type PendingUpdate =
  | { ok: true; task: PendingTask }
  | { ok: false; reason: "no_pending" | "past"; task: PendingTask | null };

function combine(date: CalendarDate, time: ClockTime): DateTime {
  return DateTime.fromObject({ ...date, ...time });
}

/**
 * Per-user pending tasks, at most one per user.
 * Any new top-level command replaces the current one.
 */
export class PendingTasks {
  private readonly tasks = new Map<number, PendingTask>();

  get(userId: number): PendingTask | null {
    return this.tasks.get(userId) ?? null;
  }

  set(userId: number, task: PendingTask): PendingTask {
    this.tasks.set(userId, task);
    return task;
  }

  clear(userId: number): boolean {
    return this.tasks.delete(userId);
  }

  /**
   * Which piece of a partial create the user still owes, if any.
   */
  needs(userId: number): "date" | "time" | null {
    const task = this.get(userId);
    if (task?.state === "awaitingDate") return "date";
    if (task?.state === "awaitingTime") return "time";
    return null;
  }

  /**
   * Starts a create flow. Date is asked before time.
   * When both are known the instant must be in the future.
   */
  begin(
    userId: number,
    description: string,
    parts: { date: CalendarDate | null; time: ClockTime | null },
    now: DateTime,
  ): PendingUpdate {
    this.clear(userId);

    if (!parts.date) {
      return { ok: true, task: this.set(userId, { state: "awaitingDate", description, time: parts.time }) };
    }
    if (!parts.time) {
      return { ok: true, task: this.set(userId, { state: "awaitingTime", description, date: parts.date }) };
    }

    const at = combine(parts.date, parts.time);
    if (at.toMillis() <= now.toMillis()) {
      return { ok: false, reason: "past", task: null };
    }
    return { ok: true, task: this.set(userId, { state: "awaitingNotificationChoice", description, at }) };
  }

  /**
   * Starts the notification choice for a fully specified create.
   */
  awaitNotificationChoice(userId: number, description: string, at: DateTime): PendingTask {
    return this.set(userId, { state: "awaitingNotificationChoice", description, at });
  }

  supplyDate(userId: number, date: CalendarDate, now: DateTime): PendingUpdate {
    const task = this.get(userId);
    if (task?.state !== "awaitingDate") {
      return { ok: false, reason: "no_pending", task };
    }

    if (!task.time) {
      return { ok: true, task: this.set(userId, { state: "awaitingTime", description: task.description, date }) };
    }

    const at = combine(date, task.time);
    if (at.toMillis() <= now.toMillis()) {
      return { ok: false, reason: "past", task };
    }
    return { ok: true, task: this.set(userId, { state: "awaitingNotificationChoice", description: task.description, at }) };
  }

  supplyTime(userId: number, time: ClockTime, now: DateTime): PendingUpdate {
    const task = this.get(userId);
    if (task?.state !== "awaitingTime") {
      return { ok: false, reason: "no_pending", task };
    }

    const at = combine(task.date, time);
    if (at.toMillis() <= now.toMillis()) {
      return { ok: false, reason: "past", task };
    }
    return { ok: true, task: this.set(userId, { state: "awaitingNotificationChoice", description: task.description, at }) };
  }
}
