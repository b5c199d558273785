import { describe, expect, test } from "vitest";
import { JobQueue, SHUTDOWN } from "./job-queue";
import { PageJob } from "./page-job";

describe("JobQueue", () => {
  test("preserves FIFO order", () => {
    const queue = new JobQueue();
    const first = new PageJob("https://example.com/1");
    const second = new PageJob("https://example.com/2");

    queue.push(first);
    queue.push(second);

    expect(queue.length).toBe(2);
    expect(queue.tryPop()).toBe(first);
    expect(queue.tryPop()).toBe(second);
    expect(queue.tryPop()).toBeUndefined();
  });

  test("pop waits for the next push", async () => {
    const queue = new JobQueue();
    const job = new PageJob("https://example.com/");

    const popped = queue.pop();
    queue.push(job);

    await expect(popped).resolves.toBe(job);
    expect(queue.length).toBe(0);
  });

  test("waiting consumers are served in order", async () => {
    const queue = new JobQueue();
    const first = queue.pop();
    const second = queue.pop();
    const job = new PageJob("https://example.com/");

    queue.push(job);
    queue.push(SHUTDOWN);

    await expect(first).resolves.toBe(job);
    await expect(second).resolves.toBe(SHUTDOWN);
  });

  test("counts pending jobs without the shutdown sentinel", () => {
    const queue = new JobQueue();
    queue.push(new PageJob("https://example.com/1"));
    queue.push(SHUTDOWN);
    queue.push(new PageJob("https://example.com/2"));

    expect(queue.length).toBe(3);
    expect(queue.pendingJobs).toBe(2);
  });

  test("compacts and keeps order", () => {
    const queue = new JobQueue();
    const jobs = Array.from({ length: 200 }, (_, i) => new PageJob(`https://example.com/${i}`));
    jobs.forEach((job) => queue.push(job));

    for (let i = 0; i < 150; i += 1) {
      expect(queue.tryPop()).toBe(jobs[i]);
    }

    expect(queue.length).toBe(50);
    expect(queue.tryPop()).toBe(jobs[150]);
  });
});
