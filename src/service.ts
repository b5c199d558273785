import type { RenderEngine } from "./browser";
import { Dispatcher } from "./dispatcher";
import { ExtractionTimeoutError, ServiceClosedError } from "./errors";
import { toReadable } from "./extractor";
import { JobQueue, SHUTDOWN } from "./job-queue";
import { logger } from "./logger";
import { PageJob } from "./page-job";
import { DEFAULT_TIMEOUT_MS } from "./page-lifecycle";
import { detectPdf, hasPdfSuffix, type PdfTextReader } from "./pdf";
import type { ExtractionMode, ExtractionResult, ExtractOptions } from "./types";

/** Extra wait on top of the job timeout so the job's own timeout fires first. */
export const DEFAULT_GRACE_MS = 10000;

export interface ServiceOptions {
  timeoutMs?: number;
  graceMs?: number;
  userAgent?: string;
  /** HEAD-probe URLs without a .pdf suffix for a PDF content type. */
  probePdf?: boolean;
  pdfReader?: PdfTextReader;
}

/** What the HTTP layer needs from an extraction backend. */
export interface Extractor {
  readonly queued: number;
  extract(url: string, options?: ExtractOptions): Promise<ExtractionResult>;
}

/**
 * Front door to the dispatcher. `submit` is safe to call from any number of
 * concurrent requests; the jobs still run one at a time.
 */
export class ExtractionService implements Extractor {
  readonly timeoutMs: number;
  readonly graceMs: number;
  private readonly queue = new JobQueue();
  private readonly dispatcher: Dispatcher;
  private closing: Promise<void> | null = null;

  constructor(
    engine: RenderEngine,
    private readonly options: ServiceOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
    this.dispatcher = new Dispatcher(engine, this.queue, {
      timeoutMs: this.timeoutMs,
      userAgent: options.userAgent,
      pdfReader: options.pdfReader,
    });
  }

  get queued(): number {
    return this.queue.pendingJobs;
  }

  get isClosing(): boolean {
    return this.closing !== null;
  }

  start(): void {
    this.dispatcher.run().catch((error: unknown) => {
      logger.error("Dispatcher loop crashed", error);
    });
  }

  async resolveMode(url: string, pdf?: boolean): Promise<ExtractionMode> {
    if (pdf !== undefined) return pdf ? "pdf" : "page";
    if (hasPdfSuffix(url)) return "pdf";
    if (!this.options.probePdf) return "page";
    const isPdf = await detectPdf(url, {
      userAgent: this.options.userAgent,
      timeoutMs: Math.min(this.timeoutMs, 10000),
    });
    return isPdf ? "pdf" : "page";
  }

  /**
   * Queue one extraction and wait for it, at most timeoutMs + graceMs.
   * Rejects with ExtractionTimeoutError when that bound elapses first.
   */
  async submit(url: string, mode: ExtractionMode = "page"): Promise<ExtractionResult> {
    if (this.closing) {
      throw new ServiceClosedError();
    }

    const job = new PageJob(url, mode);
    this.queue.push(job);
    logger.debug("Job queued", { jobId: job.id, url, mode, queued: this.queue.length });

    const waitMs = this.timeoutMs + this.graceMs;
    let timer: NodeJS.Timeout | undefined;
    const outer = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ExtractionTimeoutError(url, waitMs)), waitMs);
    });

    try {
      return await Promise.race([job.completion, outer]);
    } catch (error) {
      if (error instanceof ExtractionTimeoutError) {
        logger.warn("Extraction timed out waiting for dispatcher", {
          jobId: job.id,
          url,
          state: job.state,
          waitedMs: waitMs,
        });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /** Mode resolution, submit, and the optional article pass. */
  async extract(url: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const mode = await this.resolveMode(url, options.pdf);
    const result = await this.submit(url, mode);
    return options.readable && mode === "page" ? toReadable(result) : result;
  }

  /**
   * Stops accepting work and lets the dispatcher finish the job in flight,
   * then the engine is closed.
   */
  shutdown(): Promise<void> {
    if (!this.closing) {
      logger.info("Shutting down extraction service", { queued: this.queued });
      this.queue.push(SHUTDOWN);
      this.closing = this.dispatcher.run();
    }
    return this.closing;
  }
}
