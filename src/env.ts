import fs from "fs";
import path from "path";

/**
 * Reads an env var. Without a fallback the variable is required; an unset or
 * empty variable gives the fallback, and a numeric fallback makes the value a number.
 */
export default function env(varName: string): string;
export default function env(varName: string, fallback: string): string;
export default function env(varName: string, fallback: number): number;
export default function env(varName: string, fallback: null): string | null;
export default function env(
  varName: string,
  fallback?: number | string | null,
): number | string | null {
  const value = process.env[varName]?.trim();
  if (!value) {
    if (fallback === undefined) throw new Error(`Could not find env var '${varName}'`);
    return fallback;
  }

  if (typeof fallback === "number") {
    const numValue = Number(value);
    if (Number.isNaN(numValue)) {
      throw new Error(`Expected '${varName}' to be a number, but it's not: '${value}'`);
    }
    return numValue;
  }
  return value;
}

function unquote(value: string): string {
  const quoted = /^(["'])(.*)\1$/.exec(value);
  return quoted ? quoted[2] : value;
}

/**
 * KEY=value pairs; `export ` prefixes and surrounding quotes are accepted.
 */
export function parseDotEnv(content: string): Map<string, string> {
  const entries = new Map<string, string>();

  content.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim().replace(/^export\s+/, "");
    if (!line || line.startsWith("#")) return;

    const equalIdx = line.indexOf("=");
    if (equalIdx <= 0) {
      throw new Error(`Invalid line ${index + 1} in .env file: ${raw}`);
    }
    entries.set(line.slice(0, equalIdx).trim(), unquote(line.slice(equalIdx + 1).trim()));
  });

  return entries;
}

/**
 * Loads every .env file from startDir up to the filesystem root.
 * Variables already set, or set by a nearer file, win.
 */
export function loadDotEnv(startDir: string = process.cwd()): void {
  let dir = path.resolve(startDir);
  for (;;) {
    const envFile = path.join(dir, ".env");
    if (fs.existsSync(envFile)) {
      console.log("Loading .env file", envFile);
      for (const [key, value] of parseDotEnv(fs.readFileSync(envFile, "utf8"))) {
        if (!process.env[key]) process.env[key] = value;
      }
    }

    const parent = path.dirname(dir);
    if (parent === dir) return;
    dir = parent;
  }
}
