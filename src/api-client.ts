import { ApiError } from "./errors";
import type { ExtractionResult, ExtractOptions, HealthStatus } from "./types";

export interface ClientConfig {
  serverUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function stringField(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  return typeof value === "string" ? value : "";
}

function toResult(body: unknown, url: string): ExtractionResult {
  if (!isRecord(body)) {
    throw new ApiError("Malformed response from extraction server", 502);
  }
  const error = stringField(body, "error");
  return {
    url: stringField(body, "url") || url,
    title: stringField(body, "title"),
    text: stringField(body, "text"),
    html: stringField(body, "html"),
    ...(error ? { error } : {}),
  };
}

// the server answers {"error": "..."}; anything else is reported verbatim
function errorDetail(text: string): string {
  try {
    const body: unknown = JSON.parse(text);
    return isRecord(body) && typeof body.error === "string" ? body.error : text;
  } catch {
    return text;
  }
}

function withTitle(result: ExtractionResult): string {
  return result.title ? `# ${result.title}\n\n${result.text}` : result.text;
}

/** Client for a running extraction server. */
export class ExtractorClient {
  private baseUrl: string;
  private apiKey: string;
  private timeoutMs: number;

  constructor(config: ClientConfig) {
    // Ensure baseUrl doesn't end with a slash
    this.baseUrl = config.serverUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey ?? "";
    this.timeoutMs = config.timeoutMs ?? 60000;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }

  private async failure(response: Response, action: string): Promise<ApiError> {
    if (response.status === 401) {
      return new ApiError("Unauthorized: invalid API key", 401);
    }
    const errorText = await response.text().catch(() => "Unknown error");
    return new ApiError(
      `Failed to ${action}: ${response.status} ${errorDetail(errorText)}`,
      response.status,
    );
  }

  /**
   * Extract one URL. Leaving `pdf` unset lets the server decide from the URL.
   */
  async extract(url: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const response = await fetch(`${this.baseUrl}/extract`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify({ url, ...options }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw await this.failure(response, "extract");
    }

    return toResult(await response.json(), url);
  }

  /** Rendered page text, headed by its title. */
  async fetchPage(url: string): Promise<string> {
    return withTitle(await this.extract(url));
  }

  /** Rendered HTML after scripts have run; the server still decides on PDFs. */
  async fetchPageHtml(url: string): Promise<string> {
    return (await this.extract(url)).html;
  }

  async fetchPdf(url: string): Promise<string> {
    return withTitle(await this.extract(url, { pdf: true }));
  }

  async health(): Promise<HealthStatus> {
    const response = await fetch(`${this.baseUrl}/health`, {
      method: "GET",
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw await this.failure(response, "check health");
    }

    const body: unknown = await response.json();
    if (!isRecord(body) || body.status !== "ok" || typeof body.queued !== "number") {
      throw new ApiError("Malformed health response", 502);
    }
    return {
      status: "ok",
      queued: body.queued,
      timestamp: stringField(body, "timestamp"),
    };
  }
}
