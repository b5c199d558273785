import { readFileSync, writeFileSync } from "fs";
import { stdin } from "process";
import { ExtractorClient } from "./api-client";
import { PlaywrightEngine, type EngineOptions, type RenderEngine } from "./browser";
import { loadConfig, type Config } from "./config";
import { ExtractionTimeoutError, errorMessage } from "./errors";
import { logger } from "./logger";
import { formatResults, formatText, RESULT_SEPARATOR } from "./output";
import { startServer } from "./server";
import { ExtractionService } from "./service";
import type { ExtractionResult, OutputFormat } from "./types";

export interface ExtractCommand {
  command: "extract";
  urls: string[];
  input?: string;
  output?: string;
  format: OutputFormat;
  html: boolean;
  pdf: boolean;
  readable: boolean;
  timeout?: number;
  userAgent?: string;
  server?: string;
  apiKey?: string;
}

export interface ServeCommand {
  command: "serve";
  host?: string;
  port?: number;
  timeout?: number;
  userAgent?: string;
  apiKey?: string;
}

export interface HelpCommand {
  command: "help";
}

export type CliCommand = ExtractCommand | ServeCommand | HelpCommand;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  launchEngine: (options: EngineOptions) => Promise<RenderEngine>;
  readStdin: () => Promise<string>;
}

export const USAGE = `Usage:
  headless-extractor extract <url...> [options]
  headless-extractor serve [options]
  headless-extractor <url...> [options]

Extract options:
  --timeout <ms>       page load timeout (default 30000)
  --user-agent <ua>    browser user agent
  --json               print JSON (one object, or an array for several URLs)
  --format <fmt>       text | json | jsonl (default text)
  --html               print rendered HTML instead of text
  --pdf                force PDF extraction
  --readable           keep only the main article text
  --input <file>       read URLs from a file, one per line
  --output <file>      also write the results to a file
  --server <url>       use a running extraction server instead of a local browser
  --api-key <key>      bearer token for --server

Serve options:
  --host <host>        listen address (default 127.0.0.1, env HOST)
  --port <port>        listen port (default 8766, env PORT)
  --timeout <ms>       page load timeout (env TIMEOUT_MS)
  --user-agent <ua>    browser user agent (env USER_AGENT)
  --api-key <key>      require this bearer token (env API_KEY)
`;

const COMMANDS = new Set(["extract", "serve"]);

function parseNumber(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid value for ${flag}: ${value ?? "(missing)"}`);
  }
  return parsed;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseExtract(args: string[]): ExtractCommand {
  const options: ExtractCommand = {
    command: "extract",
    urls: [],
    format: "text",
    html: false,
    pdf: false,
    readable: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    switch (arg) {
      case "--json":
        options.format = "json";
        break;
      case "--html":
        options.html = true;
        break;
      case "--pdf":
        options.pdf = true;
        break;
      case "--readable":
        options.readable = true;
        break;
      case "--format": {
        const format = requireValue(arg, args[++i]);
        if (format !== "text" && format !== "json" && format !== "jsonl") {
          throw new Error(`Unknown format: ${format}`);
        }
        options.format = format;
        break;
      }
      case "--timeout":
        options.timeout = parseNumber(arg, args[++i]);
        break;
      case "--user-agent":
        options.userAgent = requireValue(arg, args[++i]);
        break;
      case "--input":
        options.input = requireValue(arg, args[++i]);
        break;
      case "--output":
        options.output = requireValue(arg, args[++i]);
        break;
      case "--server":
        options.server = requireValue(arg, args[++i]);
        break;
      case "--api-key":
        options.apiKey = requireValue(arg, args[++i]);
        break;
      default:
        if (arg.startsWith("--")) {
          throw new Error(`Unknown option: ${arg}`);
        }
        options.urls.push(arg);
    }
  }

  return options;
}

function parseServe(args: string[]): ServeCommand {
  const options: ServeCommand = { command: "serve" };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    switch (arg) {
      case "--host":
        options.host = requireValue(arg, args[++i]);
        break;
      case "--port":
        options.port = parseNumber(arg, args[++i]);
        break;
      case "--timeout":
        options.timeout = parseNumber(arg, args[++i]);
        break;
      case "--user-agent":
        options.userAgent = requireValue(arg, args[++i]);
        break;
      case "--api-key":
        options.apiKey = requireValue(arg, args[++i]);
        break;
      default:
        throw new Error(`Unknown option for serve: ${arg}`);
    }
  }

  return options;
}

/**
 * A first positional argument that is not a command is a URL, so
 * `headless-extractor https://example.com` works like `extract`.
 */
export function parseArgs(argv: string[]): CliCommand {
  const position = argv.findIndex((arg) => !arg.startsWith("-"));
  const first = argv[position];
  if (first === undefined) {
    return { command: "help" };
  }
  if (!COMMANDS.has(first)) {
    return parseExtract(argv);
  }

  const rest = argv.filter((_, index) => index !== position);
  return first === "serve" ? parseServe(rest) : parseExtract(rest);
}

function readUrlsFromStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: string[] = [];
    stdin.setEncoding("utf8");
    stdin.on("data", (chunk: string) => chunks.push(chunk));
    stdin.on("end", () => resolve(chunks.join("")));
    stdin.on("error", reject);
  });
}

export function parseUrlList(content: string): string[] {
  return content
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

async function getUrls(command: ExtractCommand, io: CliIO): Promise<string[]> {
  const urls = [...command.urls];
  if (command.input) {
    urls.push(...parseUrlList(readFileSync(command.input, "utf-8")));
  }
  if (urls.length === 0 && !process.stdin.isTTY) {
    urls.push(...parseUrlList(await io.readStdin()));
  }
  return urls;
}

function failedResult(url: string, error: string): ExtractionResult {
  return { url, title: "", text: "", html: "", error };
}

async function extractRemote(command: ExtractCommand, urls: string[]): Promise<ExtractionResult[]> {
  const client = new ExtractorClient({
    serverUrl: command.server ?? "",
    apiKey: command.apiKey,
  });
  const results: ExtractionResult[] = [];
  for (const url of urls) {
    try {
      results.push(
        await client.extract(url, {
          pdf: command.pdf ? true : undefined,
          readable: command.readable,
        }),
      );
    } catch (error) {
      results.push(failedResult(url, errorMessage(error)));
    }
  }
  return results;
}

async function extractLocal(
  command: ExtractCommand,
  config: Config,
  urls: string[],
  io: CliIO,
): Promise<ExtractionResult[]> {
  const userAgent = command.userAgent ?? config.userAgent;
  const engine = await io.launchEngine({
    userAgent,
    headless: config.headless,
    persistCookies: config.persistCookies,
    storagePath: config.storagePath,
    executablePath: config.browserPath,
  });
  const service = new ExtractionService(engine, {
    timeoutMs: command.timeout ?? config.timeoutMs,
    userAgent,
    probePdf: config.probePdf,
  });
  service.start();

  const results: ExtractionResult[] = [];
  try {
    for (const url of urls) {
      try {
        results.push(
          await service.extract(url, {
            pdf: command.pdf ? true : undefined,
            readable: command.readable,
          }),
        );
      } catch (error) {
        if (!(error instanceof ExtractionTimeoutError)) throw error;
        results.push(failedResult(url, error.message));
      }
    }
  } finally {
    await service.shutdown();
  }
  return results;
}

export async function runExtract(
  command: ExtractCommand,
  config: Config,
  io: CliIO,
): Promise<number> {
  const urls = await getUrls(command, io);
  if (urls.length === 0) {
    io.stderr("No URLs given.\n");
    io.stdout(USAGE);
    return 1;
  }

  const results = command.server
    ? await extractRemote(command, urls)
    : await extractLocal(command, config, urls, io);

  if (command.format === "text") {
    results.forEach((result, index) => {
      if (result.error) {
        io.stderr(`[ERROR] ${result.error}\n`);
      }
      io.stdout(`${formatText(result, command.html)}\n`);
      if (results.length > 1 && index < results.length - 1) {
        io.stdout(`\n${RESULT_SEPARATOR}\n\n`);
      }
    });
  } else {
    io.stdout(`${formatResults(results, command.format, command.html)}\n`);
  }

  if (command.output) {
    writeFileSync(command.output, formatResults(results, command.format, command.html), "utf-8");
  }

  // advisory errors still come with a result, so they do not fail the run
  return 0;
}

export const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  launchEngine: (options) => PlaywrightEngine.launch(options),
  readStdin: readUrlsFromStdin,
};

export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let command: CliCommand;
  try {
    command = parseArgs(argv);
  } catch (error) {
    io.stderr(`${errorMessage(error)}\n\n`);
    io.stdout(USAGE);
    return 1;
  }

  if (command.command === "help") {
    io.stdout(USAGE);
    return 1;
  }

  const config = loadConfig();

  if (command.command === "serve") {
    await startServer({
      ...config,
      host: command.host ?? config.host,
      port: command.port ?? config.port,
      timeoutMs: command.timeout ?? config.timeoutMs,
      userAgent: command.userAgent ?? config.userAgent,
      apiKey: command.apiKey ?? config.apiKey,
    });
    return 0;
  }

  logger.debug("One-shot extraction", { urls: command.urls.length, format: command.format });
  return runExtract(command, config, io);
}
