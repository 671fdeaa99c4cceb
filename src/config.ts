import env, { loadDotEnv } from "./env";

export type ExtractionMode = "simple" | "assisted";

export type AppConfig = {
  telegramBotToken: string;
  openRouterApiKey: string | null;
  openRouterModel: string | null;
  extractionMode: ExtractionMode;
  dataFile: string;
  completionTimeoutMs: number;
};

/**
 * Reads configuration from the environment (and any .env file above cwd).
 * Assisted extraction is the default whenever an OpenRouter key is present.
 */
export function loadConfig(): AppConfig {
  loadDotEnv();

  const openRouterApiKey = env("OPENROUTER_API_KEY", null);
  const mode = env("EXTRACTION_MODE", openRouterApiKey ? "assisted" : "simple");

  if (mode !== "simple" && mode !== "assisted") {
    throw new Error(`EXTRACTION_MODE must be 'simple' or 'assisted', got '${mode}'`);
  }
  if (mode === "assisted" && !openRouterApiKey) {
    throw new Error("EXTRACTION_MODE=assisted needs OPENROUTER_API_KEY");
  }

  return {
    telegramBotToken: env("TELEGRAM_BOT_TOKEN"),
    openRouterApiKey,
    openRouterModel: env("OPENROUTER_MODEL", null),
    extractionMode: mode,
    dataFile: env("DATA_FILE", "./events.json"),
    completionTimeoutMs: env("COMPLETION_TIMEOUT_MS", 15000),
  };
}
