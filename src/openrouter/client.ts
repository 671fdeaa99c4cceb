export const aiModels = {
  "Claude 3.7 Sonnet": "anthropic/claude-3.7-sonnet",
  "GPT 4.1": "openai/gpt-4.1",
  "GPT 4.1 Nano": "openai/gpt-4.1-nano",
  "Gemini Flash 2.0": "google/gemini-2.0-flash-001",
} as const;

export type AiModels = (typeof aiModels)[keyof typeof aiModels];

export type AiMessage = {
  role: "user" | "assistant" | "system";
  content: string;
};

export type OpenRouterResponse = {
  id: string;
  model: string;
  choices?: {
    finish_reason: string;
    index: number;
    message?: {
      role: string;
      content: string | null;
    };
  }[];
  error?: { message: string; code?: number };
};

export type CompletionResult =
  | { ok: true; text: string }
  | { ok: false; error: Error };

/**
 * Text in, free-form text out. Failures come back as values, never thrown.
 */
export interface TextCompleter {
  complete(prompt: string): Promise<CompletionResult>;
}

export type OpenRouterOptions = {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
};

/**
 * Sends a chat completion request to OpenRouter.
 */
export async function askAi(messages: AiMessage[], options: OpenRouterOptions): Promise<string> {
  const res = await fetch("https://openrouter.ai/api/v1/chat/completions", {
    method: "POST",
    headers: {
      Authorization: "Bearer " + options.apiKey,
      "Content-Type": "application/json",
    },
    body: JSON.stringify({
      model: options.model ?? aiModels["Gemini Flash 2.0"],
      messages,
    }),
    signal: AbortSignal.timeout(options.timeoutMs ?? 15000),
  });

  const body = (await res.json()) as OpenRouterResponse;

  if (!res.ok) {
    throw new Error(`OpenRouter error ${res.status}: ${body.error?.message ?? "unknown error"}`);
  }

  const content = body.choices?.[0]?.message?.content;
  if (!content) {
    console.error("No content in response:", JSON.stringify(body, null, 2));
    throw new Error("No content in OpenRouter response");
  }

  return content;
}

/**
 * TextCompleter backed by OpenRouter. The prompt is sent as a single user message.
 */
export function createOpenRouterCompleter(options: OpenRouterOptions): TextCompleter {
  return {
    complete: async (prompt) => {
      try {
        const text = await askAi([{ role: "user", content: prompt }], options);
        return { ok: true, text };
      } catch (e) {
        return { ok: false, error: e instanceof Error ? e : new Error(String(e)) };
      }
    },
  };
}
