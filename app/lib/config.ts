/**
 * Read-only defaults for merge options.
 *
 * Precedence (lowest first): built-in defaults, the JSON settings file,
 * environment variables. Nothing here writes the settings file back.
 */

import { existsSync, readFileSync } from "fs";
import { homedir, tmpdir } from "os";
import { join } from "path";

import { errorMessage } from "./errors";
import { SUPPORTED_FORMATS } from "./types";
import type { ImageFormat } from "./types";

export interface MergeConfig {
  outputDir: string;
  formats: ImageFormat[];
  strict: boolean;
  preserveComicInfo: boolean;
  stagingDir: string;
  recentFiles: string[];
  port: number;
}

const MAX_RECENT_FILES = 10;

export function defaultConfigPath(): string {
  return join(homedir(), ".comic-merge", "config.json");
}

/**
 * Parse a comma separated format list. Unknown formats are dropped;
 * ".PNG" and " jpg " are accepted.
 */
export function parseFormatList(value: string): ImageFormat[] {
  const formats = new Set<ImageFormat>();
  for (const raw of value.split(",")) {
    const name = raw.trim().replace(/^\./, "").toLowerCase();
    const format = SUPPORTED_FORMATS.find((candidate) => candidate === name);
    if (format) formats.add(format);
  }
  return [...formats];
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return undefined;
}

function readSettingsFile(path: string): Partial<MergeConfig> {
  if (!existsSync(path)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    console.warn(`[Config] Ignoring unreadable settings file ${path}: ${errorMessage(error)}`);
    return {};
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    console.warn(`[Config] Ignoring settings file ${path}: expected a JSON object`);
    return {};
  }

  const source: object = parsed;
  const settings: Partial<MergeConfig> = {};
  const get = (key: string): unknown => Reflect.get(source, key);

  const outputDir = get("outputDir") ?? get("last_output_dir");
  if (typeof outputDir === "string" && outputDir) settings.outputDir = outputDir;

  const formats = get("formats");
  if (Array.isArray(formats)) {
    settings.formats = parseFormatList(formats.filter((item) => typeof item === "string").join(","));
  } else if (typeof formats === "string") {
    settings.formats = parseFormatList(formats);
  }

  const strict = get("strict");
  if (typeof strict === "boolean") settings.strict = strict;

  const preserveComicInfo = get("preserveComicInfo");
  if (typeof preserveComicInfo === "boolean") settings.preserveComicInfo = preserveComicInfo;

  const stagingDir = get("stagingDir");
  if (typeof stagingDir === "string" && stagingDir) settings.stagingDir = stagingDir;

  const recentFiles = get("recentFiles") ?? get("recent_files");
  if (Array.isArray(recentFiles)) {
    settings.recentFiles = recentFiles
      .filter((item): item is string => typeof item === "string")
      .slice(0, MAX_RECENT_FILES);
  }

  return settings;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MergeConfig {
  const defaults: MergeConfig = {
    outputDir: homedir(),
    formats: [...SUPPORTED_FORMATS],
    strict: false,
    preserveComicInfo: true,
    stagingDir: tmpdir(),
    recentFiles: [],
    port: 3001,
  };

  const config: MergeConfig = {
    ...defaults,
    ...readSettingsFile(env.COMIC_MERGE_CONFIG || defaultConfigPath()),
  };

  if (env.COMIC_MERGE_OUTPUT_DIR) config.outputDir = env.COMIC_MERGE_OUTPUT_DIR;
  if (env.COMIC_MERGE_FORMATS !== undefined) config.formats = parseFormatList(env.COMIC_MERGE_FORMATS);
  if (env.COMIC_MERGE_STAGING_DIR) config.stagingDir = env.COMIC_MERGE_STAGING_DIR;
  config.strict = parseBoolean(env.COMIC_MERGE_STRICT) ?? config.strict;
  config.preserveComicInfo = parseBoolean(env.COMIC_MERGE_PRESERVE_COMICINFO) ?? config.preserveComicInfo;

  const port = parseInt(env.API_PORT || "", 10);
  if (Number.isInteger(port) && port > 0) config.port = port;

  return config;
}
