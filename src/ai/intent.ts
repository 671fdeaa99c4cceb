import type { DateTime } from "luxon";
import type { TextCompleter } from "../openrouter/client";
import { parseTimeExpression } from "../tasks/timeExpression";
import { buildCommandPrompt } from "./prompt";

export type ExtractionFailure = "time_not_recognized" | "command_not_recognized";

/**
 * Raw, unvalidated payload on success; see validateCommand.
 */
export type ExtractionResult =
  | { ok: true; payload: unknown }
  | { ok: false; reason: ExtractionFailure };

export interface CommandExtractor {
  extract(rawText: string, now: DateTime): Promise<ExtractionResult>;
}

/**
 * Regex-only extraction. Always a create command.
 */
export class SimpleCommandExtractor implements CommandExtractor {
  async extract(rawText: string, now: DateTime): Promise<ExtractionResult> {
    const { description, at } = parseTimeExpression(rawText, now);
    const datetime = at?.isValid ? at.toISO() : null;
    if (!datetime) {
      return { ok: false, reason: "time_not_recognized" };
    }

    return {
      ok: true,
      payload: {
        command: "create",
        event: description || "Reminder",
        datetime,
      },
    };
  }
}

/**
 * Pulls a JSON object out of a completion, with or without a code fence.
 */
export function parseCompletionJson(text: string): unknown {
  const unfenced = text.replace(/```(?:json)?/gi, "").trim();
  const jsonMatch = unfenced.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new Error(`Could not find JSON in: ${text}`);
  }
  return JSON.parse(jsonMatch[0]);
}

/**
 * LLM-assisted extraction covering every command kind.
 */
export class AssistedCommandExtractor implements CommandExtractor {
  constructor(private readonly completer: TextCompleter) {}

  async extract(rawText: string, now: DateTime): Promise<ExtractionResult> {
    const result = await this.completer.complete(buildCommandPrompt(rawText, now));

    if (!result.ok) {
      console.error("[Intent] Completion failed:", result.error.message);
      return { ok: false, reason: "command_not_recognized" };
    }

    try {
      return { ok: true, payload: parseCompletionJson(result.text) };
    } catch (e) {
      console.error("[Intent] Failed to parse command JSON:", e);
      return { ok: false, reason: "command_not_recognized" };
    }
  }
}
