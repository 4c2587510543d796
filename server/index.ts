import { serve } from "@hono/node-server";
import { app } from "./app";

const PORT = parseInt(process.env.API_PORT || "3001", 10);
console.log(`[API Server] Starting on port ${PORT}`);

serve({ fetch: app.fetch, port: PORT }, (info) => {
  console.log(`[API Server] Listening on http://localhost:${info.port}`);
});
