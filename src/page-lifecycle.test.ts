import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { PageJob } from "./page-job";
import {
  LOAD_FAILURE_ERROR,
  runPageJob,
  SETTLE_DELAY_MS,
  TIMEOUT_ERROR,
} from "./page-lifecycle";
import { FakePage, type PageScript } from "./testing/fake-engine";

const URL_ = "https://example.com/app";

function pageWith(script: PageScript): FakePage {
  return new FakePage(() => script);
}

describe("runPageJob", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("extracts text and html after the settle delay", async () => {
    const page = pageWith({
      loadDelayMs: 100,
      title: "App",
      finalUrl: "https://example.com/app/home",
      text: "Rendered text",
      html: "<html><body>Rendered text</body></html>",
    });
    const job = new PageJob(URL_);
    const done = runPageJob(job, page);

    expect(job.state).toBe("loading");

    await vi.advanceTimersByTimeAsync(100);
    expect(job.state).toBe("settling");

    await vi.advanceTimersByTimeAsync(SETTLE_DELAY_MS - 1);
    expect(job.state).toBe("settling");
    expect(page.count("text")).toBe(0);

    await vi.advanceTimersByTimeAsync(1);
    const result = await done;

    expect(result).toEqual({
      url: "https://example.com/app/home",
      title: "App",
      text: "Rendered text",
      html: "<html><body>Rendered text</body></html>",
    });
    expect(result.error).toBeUndefined();
    expect(job.state).toBe("done");

    const loadFinishedAt = page.at("loadFinished") ?? NaN;
    const textAt = page.at("text") ?? NaN;
    expect(textAt - loadFinishedAt).toBeGreaterThanOrEqual(SETTLE_DELAY_MS);
  });

  test("times out after the configured timeout when load never finishes", async () => {
    const page = pageWith({ loadOk: "never", text: "partial", html: "<p>partial</p>" });
    const job = new PageJob(URL_);
    const done = runPageJob(job, page, 500);

    await vi.advanceTimersByTimeAsync(499);
    expect(job.state).toBe("loading");

    await vi.advanceTimersByTimeAsync(1);
    const result = await done;

    expect(result.error).toBe(TIMEOUT_ERROR);
    expect(result.text).toBe("partial");
    expect(result.html).toBe("<p>partial</p>");
    expect(job.state).toBe("done");
    expect((job.finishedAt ?? 0) - (job.startedAt ?? 0)).toBe(500);
  });

  test("keeps going after a failed load and marks the result", async () => {
    const page = pageWith({ loadOk: false, text: "challenge passed", html: "<p>ok</p>" });
    const job = new PageJob(URL_);
    const done = runPageJob(job, page);

    await vi.advanceTimersByTimeAsync(SETTLE_DELAY_MS);
    const result = await done;

    expect(result.error).toBe(LOAD_FAILURE_ERROR);
    expect(result.text).toBe("challenge passed");
  });

  test("the load timeout wins over a settle timer still running", async () => {
    const page = pageWith({ loadDelayMs: 29_000, text: "late" });
    const job = new PageJob(URL_);
    const done = runPageJob(job, page, 30_000);

    await vi.advanceTimersByTimeAsync(29_000);
    expect(job.state).toBe("settling");

    await vi.advanceTimersByTimeAsync(1_000);
    const result = await done;
    expect(result.error).toBe(TIMEOUT_ERROR);

    await vi.advanceTimersByTimeAsync(5_000);
    expect(page.count("text")).toBe(1);
    expect(page.count("html")).toBe(1);
  });

  test("ignores a load signal that arrives after the job is done", async () => {
    const page = pageWith({ loadOk: "never", text: "first" });
    const job = new PageJob(URL_);
    const done = runPageJob(job, page, 500);

    await vi.advanceTimersByTimeAsync(500);
    const result = await done;

    page.finishLoad(true);
    await vi.advanceTimersByTimeAsync(SETTLE_DELAY_MS * 2);

    expect(job.state).toBe("done");
    expect(job.result).toEqual(result);
    expect(page.count("title")).toBe(1);
    expect(page.count("text")).toBe(1);
    expect(page.count("html")).toBe(1);
  });

  test("finishes with an error when the engine fails mid-extraction", async () => {
    const page = pageWith({ title: "Broken", textError: new Error("Target crashed") });
    const job = new PageJob(URL_);
    const done = runPageJob(job, page);

    await vi.advanceTimersByTimeAsync(SETTLE_DELAY_MS);
    const result = await done;

    expect(result).toEqual({
      url: URL_,
      title: "Broken",
      text: "",
      html: "",
      error: "Extraction failed: Target crashed",
    });
    expect(page.count("html")).toBe(0);
  });

  test("keeps the timeout error when extraction then fails", async () => {
    const page = pageWith({
      loadOk: "never",
      title: "Half loaded",
      textError: new Error("Execution context was destroyed"),
    });
    const job = new PageJob(URL_);
    const done = runPageJob(job, page, 500);

    await vi.advanceTimersByTimeAsync(500);
    const result = await done;

    expect(result.error).toBe(`${TIMEOUT_ERROR}; Extraction failed: Execution context was destroyed`);
    expect(result.title).toBe("Half loaded");
    expect(job.state).toBe("done");
  });

  test("keeps the load failure error when extraction then fails", async () => {
    const page = pageWith({ loadOk: false, textError: new Error("Target closed") });
    const job = new PageJob(URL_);
    const done = runPageJob(job, page);

    await vi.advanceTimersByTimeAsync(SETTLE_DELAY_MS);

    await expect(done).resolves.toMatchObject({
      error: `${LOAD_FAILURE_ERROR}; Extraction failed: Target closed`,
    });
  });

  test("leaves no timers behind once done", async () => {
    const page = pageWith({ text: "x" });
    const job = new PageJob(URL_);
    const done = runPageJob(job, page);

    await vi.advanceTimersByTimeAsync(SETTLE_DELAY_MS);
    await done;

    expect(vi.getTimerCount()).toBe(0);
  });
});
