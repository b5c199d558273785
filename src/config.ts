import { readFileSync } from "fs";
import { join } from "path";
import { homedir } from "os";
import { z } from "zod";
import { ConfigError } from "./errors";

export interface Config {
  host: string;
  port: number;
  timeoutMs: number;
  apiKey: string;
  userAgent?: string;
  headless: boolean;
  persistCookies: boolean;
  storagePath?: string;
  browserPath?: string;
  probePdf: boolean;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG_PATH = join(
  homedir(),
  ".config",
  "headless-extractor",
  "config.toml",
);

const booleanString = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const optionalText = z
  .string()
  .transform((value) => value.trim() || undefined)
  .optional();

const configSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.coerce.number().int().min(0).max(65535).default(8766),
  timeoutMs: z.coerce.number().int().positive().default(30000),
  apiKey: z.string().default(""),
  userAgent: optionalText,
  headless: booleanString.default("true"),
  persistCookies: booleanString.default("false"),
  storagePath: optionalText,
  browserPath: optionalText,
  probePdf: booleanString.default("false"),
});

type RawConfig = Partial<Record<keyof Config, string>>;

type TomlTables = Record<string, Record<string, string>>;

function tomlValue(raw: string): string | null {
  const quote = raw[0];
  if (quote === '"' || quote === "'") {
    const close = raw.indexOf(quote, 1);
    if (close < 0) return null;
    const rest = raw.slice(close + 1).trim();
    return rest === "" || rest.startsWith("#") ? raw.slice(1, close) : null;
  }
  const bare = raw.split("#")[0]?.trim() ?? "";
  return bare || null;
}

/**
 * The TOML subset this config uses: `[section]` headers and `key = value`
 * lines, values quoted or bare, `#` comments. Values stay strings; the
 * schema coerces numbers and booleans. Anything else is a ConfigError
 * naming the line.
 */
export function parseToml(content: string, source: string = "config"): TomlTables {
  const tables: TomlTables = {};
  let table: Record<string, string> | undefined;

  for (const [index, line] of content.split(/\r?\n/).entries()) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const header = /^\[\s*([\w.-]+)\s*\]\s*(#.*)?$/.exec(trimmed);
    if (header?.[1]) {
      table = tables[header[1]] ??= {};
      continue;
    }

    const pair = /^([\w-]+)\s*=\s*(.*)$/.exec(trimmed);
    const value = pair?.[2] === undefined ? null : tomlValue(pair[2]);
    if (!pair?.[1] || value === null) {
      throw new ConfigError(`${source}:${index + 1}: expected "[section]" or "key = value"`);
    }
    if (!table) {
      throw new ConfigError(`${source}:${index + 1}: "${pair[1]}" is outside any [section]`);
    }
    table[pair[1]] = value;
  }

  return tables;
}

function readConfigFile(path: string, explicit: boolean): RawConfig {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    if (!explicit && (error as NodeJS.ErrnoException).code === "ENOENT") {
      return {};
    }
    throw new ConfigError(
      `Cannot read config file at ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const toml = parseToml(content, path);
  const server = toml.server ?? {};
  const engine = toml.engine ?? {};
  return {
    host: server.host,
    port: server.port,
    timeoutMs: server.timeout_ms,
    apiKey: server.api_key,
    probePdf: server.probe_pdf,
    userAgent: engine.user_agent,
    headless: engine.headless,
    persistCookies: engine.persist_cookies,
    storagePath: engine.storage_path,
    browserPath: engine.executable_path,
  };
}

function fromEnv(env: Env): RawConfig {
  return {
    host: env.HOST,
    port: env.PORT,
    timeoutMs: env.TIMEOUT_MS,
    apiKey: env.API_KEY,
    userAgent: env.USER_AGENT,
    headless: env.HEADLESS,
    persistCookies: env.PERSIST_COOKIES,
    storagePath: env.STORAGE_PATH,
    browserPath: env.BROWSER_PATH,
    probePdf: env.PROBE_PDF,
  };
}

function withoutUnset(raw: RawConfig): Record<string, string> {
  const set: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined && value !== "") set[key] = value;
  }
  return set;
}

/**
 * Load configuration.
 * Precedence: env vars > config file > defaults. The config file is
 * EXTRACTOR_CONFIG when set (and must exist), otherwise
 * ~/.config/headless-extractor/config.toml when present.
 */
export function loadConfig(options: { env?: Env; configPath?: string } = {}): Config {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? env.EXTRACTOR_CONFIG;
  const file = readConfigFile(explicitPath ?? DEFAULT_CONFIG_PATH, explicitPath !== undefined);

  const parsed = configSchema.safeParse({
    ...withoutUnset(file),
    ...withoutUnset(fromEnv(env)),
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
