import type { RenderEngine } from "./browser";
import { errorMessage } from "./errors";
import { JobQueue, SHUTDOWN } from "./job-queue";
import { logger } from "./logger";
import { DEFAULT_TIMEOUT_MS, runPageJob } from "./page-lifecycle";
import type { PageJob } from "./page-job";
import { extractPdf, type PdfTextReader } from "./pdf";

export interface DispatcherOptions {
  timeoutMs?: number;
  userAgent?: string;
  pdfReader?: PdfTextReader;
}

/**
 * The single consumer of the job queue and the only code that touches the
 * render engine. Jobs run one at a time, in submission order; the loop ends
 * only on the shutdown sentinel, after which the engine is closed.
 */
export class Dispatcher {
  private readonly timeoutMs: number;
  private running: Promise<void> | null = null;

  constructor(
    private readonly engine: RenderEngine,
    private readonly queue: JobQueue,
    private readonly options: DispatcherOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Starts the loop once; later calls return the same promise. */
  run(): Promise<void> {
    this.running ??= this.loop();
    return this.running;
  }

  private async loop(): Promise<void> {
    logger.debug("Dispatcher started", { timeoutMs: this.timeoutMs });
    for (;;) {
      const item = await this.queue.pop();
      if (item === SHUTDOWN) break;
      await this.process(item);
    }

    const abandoned = this.queue.pendingJobs;
    if (abandoned > 0) {
      logger.warn("Jobs left queued behind shutdown", { abandoned });
    }

    try {
      await this.engine.close();
    } catch (error) {
      logger.error("Failed to close render engine", error);
    }
    logger.debug("Dispatcher stopped");
  }

  private async process(job: PageJob): Promise<void> {
    const started = Date.now();
    logger.debug("Job started", { jobId: job.id, url: job.url, mode: job.mode });

    try {
      if (job.mode === "pdf") {
        job.complete(
          await extractPdf(job.url, {
            timeoutMs: this.timeoutMs,
            userAgent: this.options.userAgent,
            reader: this.options.pdfReader,
          }),
        );
      } else {
        await this.processPage(job);
      }
    } catch (error) {
      // the job must reach done whatever happened
      job.complete({
        url: job.url,
        title: "",
        text: "",
        html: "",
        error: `Extraction failed: ${errorMessage(error)}`,
      });
    }

    logger.info("Job finished", {
      jobId: job.id,
      url: job.url,
      mode: job.mode,
      duration: `${Date.now() - started}ms`,
      error: job.result?.error || undefined,
    });
  }

  private async processPage(job: PageJob): Promise<void> {
    const page = await this.engine.newPage();
    try {
      await runPageJob(job, page, this.timeoutMs);
    } finally {
      try {
        await page.close();
      } catch (error) {
        logger.warn("Failed to close page", { jobId: job.id, error: errorMessage(error) });
      }
    }
  }
}
