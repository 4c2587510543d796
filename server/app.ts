import { Hono } from "hono";
import { cors } from "hono/cors";

import { exportRoutes } from "./routes/export";
import { configRoutes } from "./routes/config";
import { jobsRoutes } from "./routes/jobs";

const app = new Hono();

// Global CORS middleware
app.use(
  "*",
  cors({
    origin: "*",
    allowMethods: ["GET", "POST", "PUT", "OPTIONS"],
    allowHeaders: ["Content-Type"],
  }),
);

// API routes
app.route("/", exportRoutes);
app.route("/", configRoutes);
app.route("/", jobsRoutes);

// 404 for unmatched API routes
app.all("/api/*", (c) => {
  return c.json(
    {
      success: false,
      error: "Endpoint not found",
      code: "NOT_FOUND",
      endpoints: {
        export: "POST /api/export (JSON body: {novelDir, outputPath, title, author?, language?})",
        getConfig: "GET /api/config",
        saveConfig: "PUT /api/config (JSON body: config object)",
        testLlm: "POST /api/config/test-llm (JSON body: {profile: name | profile})",
        testEmbedding: "POST /api/config/test-embedding (JSON body: {profile: name | profile})",
        job: "GET /api/jobs/:id",
        jobProgress: "GET /api/jobs/:id/progress (SSE)",
      },
    },
    404,
  );
});

export { app };
