import { describe, expect, test, vi } from "vitest";
import { PageJob } from "./page-job";

const result = { url: "https://example.com/", title: "Example", text: "hello", html: "<p>hello</p>" };

describe("PageJob", () => {
  test("starts pending with no result", () => {
    const job = new PageJob("https://example.com/");
    expect(job.state).toBe("pending");
    expect(job.mode).toBe("page");
    expect(job.result).toBeNull();
    expect(job.startedAt).toBeNull();
  });

  test("walks the page path forward", () => {
    const job = new PageJob("https://example.com/");
    expect(job.transition("loading")).toBe(true);
    expect(job.transition("settling")).toBe(true);
    expect(job.transition("extracting")).toBe(true);
    expect(job.complete(result)).toBe(true);
    expect(job.state).toBe("done");
    expect(job.result).toEqual(result);
  });

  test("goes from loading straight to extracting on timeout", () => {
    const job = new PageJob("https://example.com/");
    job.transition("loading");
    expect(job.transition("extracting")).toBe(true);
    expect(job.state).toBe("extracting");
  });

  test("rejects backward and skipping moves without changing state", () => {
    const job = new PageJob("https://example.com/");
    expect(job.transition("settling")).toBe(false);
    expect(job.transition("extracting")).toBe(false);
    expect(job.state).toBe("pending");

    job.transition("loading");
    job.transition("settling");
    expect(job.transition("loading")).toBe(false);
    expect(job.state).toBe("settling");
  });

  test("cannot complete while loading or settling", () => {
    const job = new PageJob("https://example.com/");
    job.transition("loading");
    expect(job.complete(result)).toBe(false);
    job.transition("settling");
    expect(job.complete(result)).toBe(false);
    expect(job.result).toBeNull();
    expect(job.state).toBe("settling");
  });

  test("pdf jobs complete straight from pending", async () => {
    const job = new PageJob("https://example.com/doc.pdf", "pdf");
    const pdfResult = { url: job.url, title: "doc.pdf", text: "one", html: "" };
    expect(job.complete(pdfResult)).toBe(true);
    await expect(job.completion).resolves.toEqual(pdfResult);
  });

  test("completion is write-once", async () => {
    const job = new PageJob("https://example.com/");
    const listener = vi.fn();
    void job.completion.then(listener);

    job.transition("loading");
    job.transition("extracting");
    expect(job.complete(result)).toBe(true);
    expect(job.complete({ ...result, text: "overwritten" })).toBe(false);
    expect(job.transition("extracting")).toBe(false);

    await expect(job.completion).resolves.toEqual(result);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(job.result?.text).toBe("hello");
    expect(job.state).toBe("done");
  });

  test("records start and finish times", () => {
    vi.useFakeTimers();
    try {
      vi.setSystemTime(1_000);
      const job = new PageJob("https://example.com/");
      job.transition("loading");
      vi.setSystemTime(1_750);
      job.transition("extracting");
      job.complete(result);
      expect(job.startedAt).toBe(1_000);
      expect(job.finishedAt).toBe(1_750);
    } finally {
      vi.useRealTimers();
    }
  });

  test("gives each job its own id", () => {
    const first = new PageJob("https://example.com/a");
    const second = new PageJob("https://example.com/b");
    expect(second.id).toBeGreaterThan(first.id);
  });
});
