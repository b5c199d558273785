import type { RenderPage } from "./browser";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import type { PageJob } from "./page-job";
import type { ExtractionResult } from "./types";

export const DEFAULT_TIMEOUT_MS = 30000;

/** Grace window after load-finished for client-side rendering to land. */
export const SETTLE_DELAY_MS = 2000;

export const TIMEOUT_ERROR = "Timed out (partial content may be available)";
export const LOAD_FAILURE_ERROR = "Page load reported failure (content may be incomplete)";

/**
 * Drives a page-mode job from pending to done on `page`.
 *
 * Three independent sources race to advance the job: the engine's
 * load-finished signal, the settle timer and the load timeout. The first to
 * reach extracting wins; the other timer is cancelled and any late signal
 * finds the job past the state it expects and is dropped. Engine callbacks
 * arriving after done are ignored.
 *
 * Resolves with the job's result once it is done. Never rejects.
 */
export function runPageJob(
  job: PageJob,
  page: RenderPage,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<ExtractionResult> {
  const draft: ExtractionResult = { url: job.url, title: "", text: "", html: "" };
  let settled = false;
  let loadOk = false;
  let settleTimer: NodeJS.Timeout | undefined;
  let loadTimer: NodeJS.Timeout | undefined;

  const clearTimers = () => {
    clearTimeout(settleTimer);
    clearTimeout(loadTimer);
    settleTimer = undefined;
    loadTimer = undefined;
  };

  const finish = () => {
    if (settled) return;
    settled = true;
    clearTimers();
    job.complete(draft);
  };

  const fail = (error: unknown) => {
    if (settled) return;
    // keep the timeout or load-failure advisory already recorded
    draft.error = [draft.error, `Extraction failed: ${errorMessage(error)}`]
      .filter(Boolean)
      .join("; ");
    logger.warn("Extraction step failed", { jobId: job.id, url: job.url, error: draft.error });
    finish();
  };

  const onHtml = (html: string) => {
    if (settled) return;
    draft.html = html;
    finish();
  };

  const onText = (text: string) => {
    if (settled) return;
    draft.text = text;
    if (job.mode !== "page") {
      finish();
      return;
    }
    page.html().then(onHtml, fail);
  };

  const onTitle = (title: string) => {
    if (settled) return;
    draft.title = title;
    draft.url = page.url() || draft.url;
    page.text().then(onText, fail);
  };

  const extract = (timedOut: boolean) => {
    if (settled || !job.transition("extracting")) return;
    clearTimers();
    if (timedOut) {
      draft.error = TIMEOUT_ERROR;
    } else if (!loadOk) {
      draft.error = LOAD_FAILURE_ERROR;
    }
    logger.debug("Extracting", { jobId: job.id, url: job.url, timedOut, loadOk });
    page.title().then(onTitle, fail);
  };

  const onLoadFinished = (ok: boolean) => {
    if (settled || !job.transition("settling")) return;
    // a failed load may be a script-driven redirect still on its way
    loadOk = ok;
    settleTimer = setTimeout(() => extract(false), SETTLE_DELAY_MS);
  };

  if (!job.transition("loading")) {
    return job.completion;
  }
  loadTimer = setTimeout(() => extract(true), timeoutMs);
  page.load(job.url).then(onLoadFinished, () => onLoadFinished(false));

  return job.completion;
}
