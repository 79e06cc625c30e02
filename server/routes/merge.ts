import { Hono } from "hono";
import { basename, extname, join } from "path";
import { v4 as uuid } from "uuid";

import { loadConfig, parseFormatList } from "../../app/lib/config";
import type { MergeConfig } from "../../app/lib/config";
import { errorMessage, isComicMergeError } from "../../app/lib/errors";
import { isTerminal, jobStore, percentOf } from "../../app/lib/jobs";
import { MergeEngine, inspectSources, toSourceEntries } from "../../app/lib/processing";
import type { SourceInput } from "../../app/lib/processing";
import { getUniqueFileName } from "../../app/lib/storage";
import { SUPPORTED_FORMATS } from "../../app/lib/types";
import type { ImageFormat, MergeProgress, SourceEntry } from "../../app/lib/types";

const app = new Hono();

// One engine per process: merges run one at a time
const engine = new MergeEngine();
let activeJobId: string | null = null;

interface MergeRequest {
  sources: SourceInput[];
  outputPath: string;
  formats: ImageFormat[];
  strict: boolean;
  preserveComicInfo: boolean;
  overwrite: boolean;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

function field(body: object, key: string): unknown {
  return Reflect.get(body, key);
}

function parseSources(value: unknown): Parsed<SourceInput[]> {
  if (!Array.isArray(value) || value.length === 0) {
    return { ok: false, error: "sources must be a non-empty array" };
  }

  const sources: SourceInput[] = [];
  for (const [index, item] of value.entries()) {
    const raw: unknown = typeof item === "string" ? { path: item } : item;
    if (!raw || typeof raw !== "object") {
      return { ok: false, error: `sources[${index}] must be a path or an object` };
    }
    const path = field(raw, "path");
    const kind = field(raw, "kind");
    const chapter = field(raw, "chapter");
    if (typeof path !== "string" || !path) {
      return { ok: false, error: `sources[${index}].path is required` };
    }
    if (kind !== undefined && kind !== "cbz" && kind !== "zip") {
      return { ok: false, error: `sources[${index}].kind must be "cbz" or "zip"` };
    }
    if (chapter !== undefined && typeof chapter !== "number") {
      return { ok: false, error: `sources[${index}].chapter must be a number` };
    }
    sources.push({ path, kind, chapter });
  }
  return { ok: true, value: sources };
}

function optionalBoolean(body: object, key: string, fallback: boolean): boolean {
  const value = field(body, key);
  return typeof value === "boolean" ? value : fallback;
}

function parseMergeRequest(body: unknown, config: MergeConfig): Parsed<MergeRequest> {
  if (!body || typeof body !== "object") {
    return { ok: false, error: "Expected a JSON object body" };
  }

  const sources = parseSources(field(body, "sources"));
  if (!sources.ok) return sources;

  const formatsField = field(body, "formats");
  const formats = Array.isArray(formatsField)
    ? parseFormatList(formatsField.filter((item) => typeof item === "string").join(","))
    : config.formats;

  const rawOutput = field(body, "outputPath");
  if (rawOutput !== undefined && typeof rawOutput !== "string") {
    return { ok: false, error: "outputPath must be a string" };
  }
  let outputPath: string = typeof rawOutput === "string" ? rawOutput : "";
  if (!outputPath) {
    const outputDir = field(body, "outputDir");
    const outputName = field(body, "outputName");
    const dir = typeof outputDir === "string" && outputDir ? outputDir : config.outputDir;
    const first = sources.value[0].path;
    const name =
      typeof outputName === "string" && outputName
        ? outputName
        : `${basename(first, extname(first))}_merged`;
    outputPath = join(dir, getUniqueFileName(dir, name));
  }

  return {
    ok: true,
    value: {
      sources: sources.value,
      outputPath,
      formats,
      strict: optionalBoolean(body, "strict", config.strict),
      preserveComicInfo: optionalBoolean(body, "preserveComicInfo", config.preserveComicInfo),
      overwrite: optionalBoolean(body, "overwrite", false),
    },
  };
}

function describeProgress(progress: MergeProgress): string {
  switch (progress.phase) {
    case "validating":
      return "Validating sources...";
    case "reading":
    case "extracting":
      return `Processing ${progress.currentSource ?? "source"} (${progress.sourcesCompleted + 1}/${progress.totalSources})`;
    case "writing":
      return `Writing pages ${progress.entriesWritten}/${progress.totalEntries}`;
    case "done":
      return "Merge complete";
    case "cancelled":
      return "Merge cancelled";
    case "failed":
      return `Merge failed: ${progress.error ?? "unknown error"}`;
  }
}

async function runMergeJob(
  jobId: string,
  sources: SourceEntry[],
  request: MergeRequest,
  stagingRoot: string,
): Promise<void> {
  try {
    const result = await engine.merge(sources, {
      outputPath: request.outputPath,
      selectedFormats: new Set(request.formats),
      strict: request.strict,
      preserveComicInfo: request.preserveComicInfo,
      overwrite: request.overwrite,
      stagingRoot,
      onProgress: (progress) => {
        jobStore.update(jobId, {
          status: "running",
          progress,
          percent: percentOf(progress),
          message: describeProgress(progress),
        });
      },
    });

    jobStore.update(jobId, {
      status: "completed",
      percent: 100,
      message: `Merged ${result.totalPages} pages into ${basename(result.outputPath)}`,
      result,
    });
  } catch (error) {
    const code = isComicMergeError(error) ? error.code : "IOFailure";
    const message = errorMessage(error);
    jobStore.update(jobId, {
      status: code === "Cancelled" ? "cancelled" : "error",
      message: code === "Cancelled" ? "Merge cancelled" : `Merge failed: ${message}`,
      error: { code, message, warnings: isComicMergeError(error) ? error.warnings : [] },
    });
  } finally {
    if (activeJobId === jobId) activeJobId = null;
  }
}

/**
 * POST /api/merge
 * Starts a merge as a background job and returns its jobId.
 */
app.post("/api/merge", async (c) => {
  const body: unknown = await c.req.json().catch(() => null);
  const config = loadConfig();

  const parsed = parseMergeRequest(body, config);
  if (!parsed.ok) {
    return c.json({ success: false, error: "invalid_request", message: parsed.error }, 400);
  }

  if (engine.isBusy) {
    return c.json(
      { success: false, error: "OperationInProgress", message: "A merge is already running", jobId: activeJobId },
      409,
    );
  }

  let sources: SourceEntry[];
  try {
    sources = toSourceEntries(parsed.value.sources);
  } catch (error) {
    return c.json({ success: false, error: "InvalidSource", message: errorMessage(error) }, 400);
  }

  const jobId = `merge-${uuid()}`;
  jobStore.create(jobId);
  activeJobId = jobId;

  // engine.merge claims the engine synchronously, before this handler returns
  runMergeJob(jobId, sources, parsed.value, config.stagingDir).catch((error: unknown) => {
    console.error(`[Merge] Job ${jobId} crashed:`, error);
  });

  return c.json({ success: true, jobId, outputPath: parsed.value.outputPath, pending: true });
});

/**
 * POST /api/merge/:jobId/cancel
 */
app.post("/api/merge/:jobId/cancel", (c) => {
  const jobId = c.req.param("jobId");
  const job = jobStore.get(jobId);
  if (!job) {
    return c.json({ success: false, error: "job_not_found" }, 404);
  }
  if (isTerminal(job.status) || activeJobId !== jobId) {
    return c.json({ success: false, error: "job_not_running", status: job.status }, 409);
  }

  engine.cancel();
  return c.json({ success: true, jobId, cancelling: true });
});

/**
 * POST /api/inspect
 * Reports page counts and problems for each source before a merge.
 */
app.post("/api/inspect", async (c) => {
  const body: unknown = await c.req.json().catch(() => null);
  const sourcesField = body && typeof body === "object" ? field(body, "sources") : undefined;
  const parsed = parseSources(sourcesField);
  if (!parsed.ok) {
    return c.json({ success: false, error: "invalid_request", message: parsed.error }, 400);
  }

  try {
    const report = await inspectSources(toSourceEntries(parsed.value));
    return c.json({ success: true, ...report });
  } catch (error) {
    return c.json({ success: false, error: "InvalidSource", message: errorMessage(error) }, 400);
  }
});

/**
 * GET /api/formats
 * Supported formats plus the configured defaults and recently merged files.
 */
app.get("/api/formats", (c) => {
  const config = loadConfig();
  return c.json({
    success: true,
    supported: SUPPORTED_FORMATS,
    defaults: config.formats,
    recentFiles: config.recentFiles,
  });
});

export { app as mergeRoutes, engine as mergeEngine };
