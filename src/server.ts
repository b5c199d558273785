import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import { PlaywrightEngine } from "./browser";
import type { Config } from "./config";
import { ExtractionTimeoutError, ServiceClosedError } from "./errors";
import { logger } from "./logger";
import { ExtractionService, type Extractor } from "./service";
import type { ExtractionResult, HealthStatus } from "./types";

const extractBody = z.object({
  url: z.string().trim().min(1),
  pdf: z.boolean().optional(),
  readable: z.boolean().optional(),
});

const batchBody = z.object({
  urls: z.array(z.string().trim().min(1)),
  pdf: z.boolean().optional(),
  readable: z.boolean().optional(),
});

const FIELD_ERRORS: Record<string, string> = {
  url: "url is required",
  urls: "urls must be an array",
  pdf: "pdf must be a boolean",
  readable: "readable must be a boolean",
};

// Names the first field that failed validation
function invalidBody(error: z.ZodError): string {
  const field = error.issues[0]?.path[0];
  return (typeof field === "string" ? FIELD_ERRORS[field] : undefined) ?? "invalid request body";
}

// Helper to send JSON response
function sendJSON(res: Response, data: unknown, status: number = 200): void {
  res.status(status).json(data);
}

function toResponse(result: ExtractionResult): Required<ExtractionResult> {
  return {
    url: result.url,
    title: result.title,
    text: result.text,
    html: result.html,
    error: result.error ?? "",
  };
}

function hasBody(body: unknown): boolean {
  return typeof body === "object" && body !== null && Object.keys(body).length > 0;
}

// Request logging middleware
function logRequest(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  logger.info("Request received", {
    method: req.method,
    path: req.path,
    userAgent: req.get("user-agent") || undefined,
  });

  res.on("finish", () => {
    logger.info("Request completed", {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
    });
  });

  next();
}

function requireApiKey(apiKey: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }
    const auth = req.get("authorization") ?? "";
    if (auth.startsWith("Bearer ") && auth.slice(7).trim() === apiKey) {
      next();
      return;
    }
    logger.warn("Unauthorized request", { method: req.method, path: req.path });
    sendJSON(res, { error: "unauthorized" }, 401);
  };
}

function failureResponse(res: Response, error: unknown, url: string): void {
  if (error instanceof ExtractionTimeoutError) {
    sendJSON(res, { error: "extraction timed out" }, 504);
    return;
  }
  if (error instanceof ServiceClosedError) {
    sendJSON(res, { error: "service shutting down" }, 503);
    return;
  }
  logger.error("Extraction failed", error, { url });
  sendJSON(res, { error: "extraction failed" }, 500);
}

export function createApp(service: Extractor, options: { apiKey?: string } = {}): Express {
  const app = express();

  app.use(logRequest);

  // Health check
  app.get("/health", (_req: Request, res: Response) => {
    const health: HealthStatus = {
      status: "ok",
      queued: service.queued,
      timestamp: new Date().toISOString(),
    };
    sendJSON(res, health);
  });

  app.use(requireApiKey(options.apiKey ?? ""));
  // bodies are JSON whatever Content-Type the client sent
  app.use(express.json({ limit: "1mb", strict: false, type: () => true }));

  // Single extraction
  app.post("/extract", async (req: Request, res: Response) => {
    if (!hasBody(req.body)) {
      sendJSON(res, { error: "empty body" }, 400);
      return;
    }
    const parsed = extractBody.safeParse(req.body);
    if (!parsed.success) {
      const message = invalidBody(parsed.error);
      logger.warn("Invalid extract request", { error: message });
      sendJSON(res, { error: message }, 400);
      return;
    }

    const { url, pdf, readable } = parsed.data;
    logger.info("Extract request", { url, pdf, readable });

    try {
      const result = await service.extract(url, { pdf, readable });
      sendJSON(res, toResponse(result));
    } catch (error) {
      failureResponse(res, error, url);
    }
  });

  // Batch extraction; the jobs still run one at a time behind the queue
  app.post("/extract/batch", async (req: Request, res: Response) => {
    if (!hasBody(req.body)) {
      sendJSON(res, { error: "empty body" }, 400);
      return;
    }
    const parsed = batchBody.safeParse(req.body);
    if (!parsed.success) {
      sendJSON(res, { error: invalidBody(parsed.error) }, 400);
      return;
    }

    const { urls, pdf, readable } = parsed.data;
    logger.info("Starting batch extraction", { urlCount: urls.length });

    try {
      const results = await Promise.all(
        urls.map(async (url): Promise<ExtractionResult> => {
          try {
            return await service.extract(url, { pdf, readable });
          } catch (error) {
            if (error instanceof ExtractionTimeoutError) {
              return { url, title: "", text: "", html: "", error: error.message };
            }
            throw error;
          }
        }),
      );
      sendJSON(res, { results: results.map(toResponse) });
    } catch (error) {
      failureResponse(res, error, urls.join(","));
    }
  });

  app.use((_req: Request, res: Response) => {
    sendJSON(res, { error: "not found" }, 404);
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      sendJSON(res, { error: "invalid JSON" }, 400);
      return;
    }
    logger.error("Request failed", error, { method: req.method, path: req.path });
    sendJSON(res, { error: "internal error" }, 500);
  });

  return app;
}

export function listen(app: Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => resolve(server));
    server.once("error", reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

// Launch the browser, start the dispatcher and serve until a signal arrives
export async function startServer(config: Config): Promise<void> {
  logger.info("Initializing browser");
  const engine = await PlaywrightEngine.launch({
    userAgent: config.userAgent,
    headless: config.headless,
    persistCookies: config.persistCookies,
    storagePath: config.storagePath,
    executablePath: config.browserPath,
  });

  const service = new ExtractionService(engine, {
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    probePdf: config.probePdf,
  });
  service.start();

  const server = await listen(createApp(service, { apiKey: config.apiKey }), config.host, config.port);
  logger.info("Extraction service started", {
    url: `http://${config.host}:${config.port}`,
    timeoutMs: config.timeoutMs,
    auth: config.apiKey ? "on" : "off",
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully`);

    server.closeIdleConnections();
    Promise.all([closeServer(server), service.shutdown()])
      .then(() => {
        logger.info("Shutdown complete");
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
