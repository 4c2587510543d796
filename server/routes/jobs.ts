import { Hono } from "hono";
import { getJob, isJobActive, subscribeToJob } from "../../app/lib/jobs";

const app = new Hono();

// GET /api/jobs/:id - current job state
app.get("/api/jobs/:id", (c) => {
  const job = getJob(c.req.param("id"));
  if (!job) {
    return c.json({ success: false, error: "job_not_found" }, 404);
  }
  return c.json({ success: true, job });
});

// GET /api/jobs/:id/progress - SSE endpoint for job progress
app.get("/api/jobs/:id/progress", async (c) => {
  const jobId = c.req.param("id");

  // Check if job exists
  const job = getJob(jobId);
  if (!job) {
    return c.json({ success: false, error: "job_not_found" }, 404);
  }

  // Create SSE response
  const encoder = new TextEncoder();
  let isClosed = false;
  let unsubscribe: (() => void) | null = null;

  const stream = new ReadableStream({
    start(controller) {
      const sendEvent = (data: unknown) => {
        if (isClosed) return;
        try {
          controller.enqueue(encoder.encode(`data: ${JSON.stringify(data)}\n\n`));
        } catch {
          isClosed = true;
          unsubscribe?.();
        }
      };

      // Current state first; a finished job gets one event and no stream
      sendEvent(job);
      if (!isJobActive(job)) {
        isClosed = true;
        controller.close();
        return;
      }

      unsubscribe = subscribeToJob(jobId, (updatedJob) => {
        if (isClosed) return;
        sendEvent(updatedJob);

        if (!isJobActive(updatedJob)) {
          isClosed = true;
          unsubscribe?.();
          try {
            controller.close();
          } catch {
            // Already closed
          }
        }
      });
    },
    cancel() {
      isClosed = true;
      unsubscribe?.();
    },
  });

  return new Response(stream, {
    headers: {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    },
  });
});

export { app as jobsRoutes };
