import { Hono } from "hono";
import { streamSSE } from "hono/streaming";

import { isTerminal, jobStore } from "../../app/lib/jobs";
import type { JobProgress } from "../../app/lib/jobs";

const app = new Hono();

app.get("/api/jobs/:id", (c) => {
  const job = jobStore.get(c.req.param("id"));
  if (!job) {
    return c.json({ success: false, error: "job_not_found" }, 404);
  }
  return c.json({ success: true, job });
});

/**
 * GET /api/jobs/:id/progress
 * One SSE event per snapshot, starting with the current one. The stream ends
 * after the first terminal snapshot or when the client goes away.
 */
app.get("/api/jobs/:id/progress", (c) => {
  const id = c.req.param("id");
  const current = jobStore.get(id);
  if (!current) {
    return c.json({ success: false, error: "job_not_found" }, 404);
  }

  return streamSSE(c, async (stream) => {
    const queue: JobProgress[] = [current];
    let wake: (() => void) | null = null;

    const unsubscribe = jobStore.subscribe(id, (job) => {
      queue.push(job);
      wake?.();
    });
    stream.onAbort(() => wake?.());

    try {
      while (!stream.aborted) {
        const job = queue.shift();
        if (!job) {
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
          wake = null;
          continue;
        }
        await stream.writeSSE({ data: JSON.stringify(job) });
        if (isTerminal(job.status)) break;
      }
    } finally {
      unsubscribe();
    }
  });
});

export { app as jobsRoutes };
