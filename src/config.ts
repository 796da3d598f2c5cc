// src/config.ts
import { parseArgs } from "node:util";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type Config = {
  username: string;
  password: string;
  baseUrl: string;
  telegramToken: string;
  telegramChannelId: string;
  outputJson: string;
  archiveDir: string;
  /** null = 1回だけ実行 */
  periodMs: number | null;
  departmentDelayMs: number;
  departments: number[];
  restoreFile: string | null;
};

const DEFAULT_PERIOD_MS = 60_000;

/** "500ms", "30s", "5m", "2h" or bare seconds. */
export function parseDuration(s: string): number {
  const m = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/.exec(s.trim());
  if (!m) throw new ConfigError(`invalid duration: ${s}`);
  const value = Number(m[1]);
  switch (m[2]) {
    case "ms": return value;
    case "m": return value * 60_000;
    case "h": return value * 3_600_000;
    default: return value * 1000;
  }
}

function parseCodes(s: string | undefined): number[] {
  if (!s) return [];
  return s.split(",").map(v => v.trim()).filter(Boolean).map(v => {
    if (!/^\d+$/.test(v)) throw new ConfigError(`invalid department code: ${v}`);
    return Number(v);
  });
}

export function loadConfig(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Config {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      username: { type: "string", short: "u" },
      password: { type: "string", short: "p" },
      once: { type: "boolean", default: false },
    },
  });

  const username = values.username ?? env.EDU_USERNAME ?? "";
  const password = values.password ?? env.EDU_PASSWORD ?? "";
  if (!username || !password) {
    throw new ConfigError("EDU_USERNAME / EDU_PASSWORD are required");
  }

  let periodMs: number | null = null;
  if (env.PERIOD && !values.once) {
    try {
      periodMs = parseDuration(env.PERIOD);
    } catch (e) {
      console.error(`Invalid PERIOD format: ${env.PERIOD}, using default 60 seconds`, e);
      periodMs = DEFAULT_PERIOD_MS;
    }
  }

  return {
    username,
    password,
    baseUrl: (env.EDU_BASE_URL ?? "https://edu.sharif.edu").replace(/\/+$/, ""),
    telegramToken: env.TELEGRAM_TOKEN ?? "",
    telegramChannelId: env.TELEGRAM_CHANNEL_ID ?? "",
    outputJson: values.output ?? env.OUTPUT_JSON ?? "courses_output.json",
    archiveDir: env.ARCHIVE_DIR ?? "archive",
    periodMs,
    departmentDelayMs: parseDuration(env.DEPARTMENT_DELAY ?? "25s"),
    departments: parseCodes(env.DEPARTMENTS),
    restoreFile: positionals[0] ?? null,
  };
}
