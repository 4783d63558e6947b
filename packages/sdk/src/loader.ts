/**
 * Dataset loading from local JSON exports
 *
 * A dataset root is either { build_number, release?, data: [...] } or a bare
 * array of entries. Nested `release` fields take precedence over flat ones.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import { DatasetFormatError, DatasetNotFoundError, DatasetReadError } from "./errors.js";
import type { BuildInfo, Dataset, JsonValue } from "./types.js";
import { logger } from "./observability/logs.js";

/** File looked up when no dataset path is configured */
export const DEFAULT_DATASET_FILE = "all.json";

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

const ReleaseSchema = z.object({
  tag_name: z.string().optional(),
  prerelease: z.boolean().optional(),
  created_at: z.string().optional(),
});

const RootSchema = z.object({
  build_number: z.string(),
  prerelease: z.boolean().optional(),
  created_at: z.string().optional(),
  release: ReleaseSchema.nullish(),
  data: z.array(JsonValueSchema),
});

const EntriesSchema = z.array(JsonValueSchema);

type Root = z.infer<typeof RootSchema>;

function toBuildInfo(root: Root): BuildInfo {
  const release = root.release ?? undefined;
  return {
    buildNumber: root.build_number,
    tagName: release?.tag_name ?? root.build_number,
    prerelease: release?.prerelease ?? root.prerelease ?? false,
    createdAt: release?.created_at ?? root.created_at ?? "",
  };
}

/**
 * Format zod issues as "path: message" strings
 */
function summarizeIssues(error: z.ZodError): string[] {
  return error.issues.slice(0, 5).map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate a parsed dataset document
 * @param raw - Parsed JSON
 * @param source - Where the document came from, for error messages
 * @throws DatasetFormatError if the document has the wrong shape
 */
export function parseDataset(raw: unknown, source = "dataset"): Dataset {
  if (Array.isArray(raw)) {
    const entries = EntriesSchema.safeParse(raw);
    if (!entries.success) {
      throw new DatasetFormatError(source, summarizeIssues(entries.error), { cause: entries.error });
    }
    return { build: null, values: entries.data };
  }

  const root = RootSchema.safeParse(raw);
  if (!root.success) {
    throw new DatasetFormatError(source, summarizeIssues(root.error), { cause: root.error });
  }
  return { build: toBuildInfo(root.data), values: root.data.data };
}

/**
 * Parse dataset text, stripping a UTF-8 BOM
 * @throws DatasetFormatError if the text is not valid JSON or has the wrong shape
 */
export function parseDatasetText(text: string, source = "dataset"): Dataset {
  const cleaned = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  let raw: unknown;
  try {
    raw = JSON.parse(cleaned);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DatasetFormatError(source, [reason], { cause: err });
  }

  return parseDataset(raw, source);
}

/**
 * Read and parse a dataset file
 * @throws DatasetNotFoundError if the file does not exist
 * @throws DatasetReadError if the file cannot be read
 * @throws DatasetFormatError if the content is invalid
 */
export async function loadDatasetFile(filePath: string): Promise<Dataset> {
  const startTime = performance.now();

  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new DatasetNotFoundError(filePath, {
        cause: err,
        isDefault: path.basename(filePath) === DEFAULT_DATASET_FILE,
      });
    }
    throw new DatasetReadError(filePath, { cause: err });
  }

  const dataset = parseDatasetText(text, filePath);
  logger.debug("dataset.loaded", {
    details: {
      file: filePath,
      entries: dataset.values.length,
      durationMs: Math.round(performance.now() - startTime),
    },
  });
  return dataset;
}
