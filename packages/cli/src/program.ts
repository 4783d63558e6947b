/**
 * gdfind command definitions
 */

import { Command, CommanderError } from "commander";
import { logger, type Catalog } from "@gdfind/sdk";
import { resolveDataFile } from "./lib/env.js";
import { joinQuery, parseNonNegativeInt } from "./lib/arg.js";
import type { CliIo } from "./lib/io.js";
import { openCatalog } from "./lib/catalog.js";
import {
  colorize,
  formatMs,
  formatRecordLine,
  printJson,
  printLines,
  summarizeRecord,
} from "./lib/render.js";
import { CliError, formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";
import { VERSION } from "./version.js";

interface GlobalOptions {
  file?: string;
  verbose?: boolean;
  quiet?: boolean;
}

interface SearchOptions {
  json?: boolean;
  raw?: boolean;
  limit?: number;
}

interface ShowOptions {
  raw?: boolean;
}

interface StatsOptions {
  json?: boolean;
}

/**
 * Build the command tree writing through `io`
 */
export function createProgram(io: CliIo): Command {
  const program = new Command();

  program
    .configureOutput({
      writeOut: (str) => io.out(str),
      writeErr: (str) => io.err(colorize(str, "red", io.isErrTTY)),
    })
    .exitOverride();

  // Global options
  program
    .name("gdfind")
    .description("Game Data Finder - search game-entity datasets with a compact query language")
    .version(VERSION)
    .option("--file <path>", "Dataset file (default: $GDFIND_DATA_FILE or ./all.json)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const load = async (): Promise<Catalog> => {
    const opts = program.opts<GlobalOptions>();
    if (opts.quiet) {
      logger.setEnabled(false);
    }
    return openCatalog(resolveDataFile(opts.file), {
      io,
      showProgress: io.isErrTTY && !opts.quiet,
    });
  };

  // Search command
  program
    .command("search [query...]")
    .description("Find records matching a query (empty query lists everything)")
    .option("--json", "Output matches as a JSON array of summaries")
    .option("--raw", "Output full record values as a JSON array")
    .option("--limit <n>", "Maximum number of results", (val) => parseNonNegativeInt(val, "--limit"))
    .action(async (words: string[], options: SearchOptions) => {
      await withTiming(
        "cli.search",
        async (fields) => {
          if (options.json && options.raw) {
            throw new CliError("Cannot use both --json and --raw");
          }

          const catalog = await load();
          const query = joinQuery(words);
          let matches = catalog.search(query);
          const total = matches.length;
          fields.records = catalog.size;
          fields.matches = total;

          if (options.limit !== undefined) {
            matches = matches.slice(0, options.limit);
          }

          const hits = matches.flatMap((position) => {
            const record = catalog.get(position);
            return record ? [{ position, record }] : [];
          });

          if (options.json) {
            printJson(
              io.out,
              hits.map(({ position, record }) => summarizeRecord(position, record))
            );
          } else if (options.raw) {
            printJson(
              io.out,
              hits.map(({ record }) => record.value)
            );
          } else {
            printLines(
              io.out,
              hits.map(({ record }) => formatRecordLine(record))
            );
          }

          if (!program.opts<GlobalOptions>().quiet) {
            io.err(`${total} of ${catalog.size} records match\n`);
          }
        },
        io.err
      );
    });

  // Show command
  program
    .command("show <id>")
    .description("Print the record with exactly this id")
    .option("--raw", "Output compact JSON")
    .action(async (id: string, options: ShowOptions) => {
      await withTiming(
        "cli.show",
        async (fields) => {
          const catalog = await load();
          fields.records = catalog.size;
          const record = catalog.findById(id);

          if (!record) {
            throw new CliError(`Record not found: ${id}`, { exitCode: 2 });
          }

          printJson(io.out, record.value, { raw: options.raw });
        },
        io.err
      );
    });

  // Stats command
  program
    .command("stats")
    .description("Show dataset and index statistics")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (options: StatsOptions) => {
      await withTiming(
        "cli.stats",
        async (fields) => {
          const catalog = await load();
          const stats = catalog.stats();
          fields.records = stats.records;
          fields.index_ms = Math.round(stats.indexTimeMs);

          if (options.json) {
            printJson(io.out, stats, { raw: true });
            return;
          }

          const lines = [`Records: ${stats.records}`];
          if (stats.build) {
            const { buildNumber, tagName, prerelease } = stats.build;
            lines.push(
              `Build: ${buildNumber} (${tagName})${prerelease ? " prerelease" : ""}`
            );
          }
          lines.push(
            `Index keys: id=${stats.index.byId} type=${stats.index.byType} ` +
              `category=${stats.index.byCategory} words=${stats.index.wordIndex}`
          );
          lines.push(`Index time: ${formatMs(stats.indexTimeMs)}`);
          printLines(io.out, lines);
        },
        io.err
      );
    });

  return program;
}

/**
 * Run the CLI and return its exit code; never throws
 * @param argv - Arguments after the executable and script path
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already reported its own errors, help and version output
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    io.err(`Error: ${formatCliError(err, opts.verbose)}\n`);
    return mapErrorToExitCode(err);
  }
}
