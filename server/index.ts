import { Hono } from "hono";
import { cors } from "hono/cors";
import { serve } from "@hono/node-server";

import { loadConfig } from "../app/lib/config";
import { mergeRoutes } from "./routes/merge";
import { jobsRoutes } from "./routes/jobs";

const app = new Hono();

const ENDPOINTS = {
  merge: "POST /api/merge (JSON body: {sources: [{path, kind?, chapter?}], outputPath?, formats?, strict?})",
  cancel: "POST /api/merge/:jobId/cancel",
  inspect: "POST /api/inspect (JSON body: {sources})",
  formats: "GET /api/formats",
  job: "GET /api/jobs/:id",
  jobProgress: "GET /api/jobs/:id/progress (Server-Sent Events)",
};

app.use("*", cors({ origin: "*", allowMethods: ["GET", "POST", "OPTIONS"], allowHeaders: ["Content-Type"] }));

app.route("/", mergeRoutes);
app.route("/", jobsRoutes);

// Unknown API paths list what is available
app.all("/api/*", (c) =>
  c.json({ success: false, error: "Unknown endpoint", code: "NOT_FOUND", endpoints: ENDPOINTS }, 404),
);

export function startServer(port = loadConfig().port) {
  console.log(`[API Server] Starting on port ${port}`);
  return serve({ fetch: app.fetch, port }, (info) => {
    console.log(`[API Server] Listening on http://localhost:${info.port}`);
  });
}

export { app };
