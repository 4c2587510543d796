import { Hono } from "hono";
import { v4 as uuid } from "uuid";
import {
  configFilePath,
  getEmbeddingProfile,
  getLlmProfile,
  isRecord,
  loadConfig,
  parseEmbeddingProfile,
  parseLlmProfile,
  saveConfig,
} from "../../app/lib/config";
import type { EmbeddingProfile, LlmProfile } from "../../app/lib/config";
import { testEmbeddingConfig, testLlmConfig } from "../../app/lib/connectivity";
import { appendJobLog, createJob, runJob } from "../../app/lib/jobs";

const app = new Hono();

// GET /api/config - current config, created with defaults when missing
app.get("/api/config", async (c) => {
  const config = await loadConfig(configFilePath());
  return c.json({ success: true, config });
});

// PUT /api/config - replace the stored config
app.put("/api/config", async (c) => {
  const body: unknown = await c.req.json().catch(() => null);
  if (!isRecord(body)) {
    return c.json({ success: false, error: "invalid_config", message: "Body must be a JSON object" }, 400);
  }

  const saved = await saveConfig(body, configFilePath());
  if (!saved) {
    return c.json({ success: false, error: "save_failed" }, 500);
  }
  return c.json({ success: true });
});

/**
 * A profile is either given inline or named; names are looked up in the
 * stored config.
 */
async function resolveProfile<T>(
  body: unknown,
  byName: (config: Record<string, unknown>, name: string) => T | null,
  inline: (value: unknown) => T | null,
): Promise<T | null> {
  if (!isRecord(body)) return null;
  const profile = body.profile;
  if (typeof profile === "string") {
    return byName(await loadConfig(configFilePath()), profile);
  }
  return inline(profile);
}

// POST /api/config/test-llm - Body: { profile: string | LlmProfile }
app.post("/api/config/test-llm", async (c) => {
  const body: unknown = await c.req.json().catch(() => null);
  const profile = await resolveProfile<LlmProfile>(body, getLlmProfile, parseLlmProfile);
  if (!profile) {
    return c.json({ success: false, error: "invalid_profile", message: "Unknown or incomplete LLM profile" }, 400);
  }

  const jobId = `llm-test-${uuid()}`;
  createJob(jobId, "llm-test");
  runJob(jobId, () => testLlmConfig(profile, (line) => appendJobLog(jobId, line)));

  return c.json({ success: true, jobId, pending: true });
});

// POST /api/config/test-embedding - Body: { profile: string | EmbeddingProfile }
app.post("/api/config/test-embedding", async (c) => {
  const body: unknown = await c.req.json().catch(() => null);
  const profile = await resolveProfile<EmbeddingProfile>(body, getEmbeddingProfile, parseEmbeddingProfile);
  if (!profile) {
    return c.json({ success: false, error: "invalid_profile", message: "Unknown or incomplete embedding profile" }, 400);
  }

  const jobId = `embedding-test-${uuid()}`;
  createJob(jobId, "embedding-test");
  runJob(jobId, () => testEmbeddingConfig(profile, (line) => appendJobLog(jobId, line)));

  return c.json({ success: true, jobId, pending: true });
});

export { app as configRoutes };
