import { Hono } from "hono";
import { createHash } from "crypto";
import { createJob, getJob, isJobActive, runJob, updateJobProgress } from "../../app/lib/jobs";
import { exportNovelToEpub } from "../../app/lib/processing/chapter-loader";
import { scratchDirFor } from "../../app/lib/processing/epub-export";
import { isRecord } from "../../app/lib/config";

const app = new Hono();

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

/**
 * Exports sharing an output directory share a scratch directory, so the job id
 * is keyed on it and only one can run at a time.
 */
function exportJobId(outputPath: string): string {
  const digest = createHash("sha1").update(scratchDirFor(outputPath)).digest("hex");
  return `export-${digest.slice(0, 16)}`;
}

/**
 * POST /api/export
 * Body: { novelDir, outputPath, title, author?, language? }
 * Starts the export as a background job and returns its id immediately.
 */
app.post("/api/export", async (c) => {
  const body: unknown = await c.req.json().catch(() => ({}));
  const fields = isRecord(body) ? body : {};

  const novelDir = optionalString(fields.novelDir);
  const outputPath = optionalString(fields.outputPath);
  const title = optionalString(fields.title);

  if (!novelDir || !outputPath || !title) {
    return c.json({
      success: false,
      error: "invalid_request",
      message: "novelDir, outputPath and title are required",
    }, 400);
  }

  const jobId = exportJobId(outputPath);
  if (isJobActive(getJob(jobId))) {
    return c.json({
      success: false,
      error: "export_in_progress",
      message: "Another export is writing to the same directory",
      jobId,
    }, 409);
  }

  createJob(jobId, "export");

  runJob(jobId, async () => {
    console.log(`[Export] Exporting ${novelDir} → ${outputPath}`);
    const ok = await exportNovelToEpub(
      {
        novelDir,
        outputPath,
        title,
        author: optionalString(fields.author),
        language: optionalString(fields.language),
      },
      {
        onProgress: (percent, message) => {
          updateJobProgress(jobId, { status: "running", progress: percent, message });
        },
      },
    );

    return ok
      ? { success: true, outputPath }
      : { success: false, error: "Export failed, see server log for details" };
  });

  return c.json({ success: true, jobId, pending: true });
});

export { app as exportRoutes };
