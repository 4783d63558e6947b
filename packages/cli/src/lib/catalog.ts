/**
 * Dataset loading for CLI commands
 */

import { Catalog, loadDatasetFile } from "@gdfind/sdk";
import type { CliIo } from "./io.js";
import { formatProgress } from "./render.js";

export interface OpenCatalogOptions {
  io: CliIo;
  /** Draw a progress line on stderr while indexing */
  showProgress: boolean;
}

/**
 * Load a dataset file and index it
 */
export async function openCatalog(file: string, options: OpenCatalogOptions): Promise<Catalog> {
  const { io, showProgress } = options;
  const dataset = await loadDatasetFile(file);

  let lastPercent = -1;
  const onProgress = showProgress
    ? (ratio: number): void => {
        const percent = Math.round(ratio * 100);
        if (percent !== lastPercent) {
          lastPercent = percent;
          io.err(formatProgress("Indexing", ratio));
        }
      }
    : undefined;

  const catalog = await Catalog.load(dataset.values, {
    build: dataset.build,
    onProgress,
  });

  if (showProgress) {
    io.err("\n");
  }
  return catalog;
}
