import type { Command } from "commander";

import type { SearchMessage } from "../../../src/file-ops/scan-types";
import { startSearch, type SearchStream } from "../../../src/main/search-service";
import type { SearchFilterInput } from "../../../src/main/search-filter";
import { SearchConfigError } from "../../../src/utils/error-handling";
import { getErrorMessage } from "../../../src/utils/error-utils";
import { logger, setLogLevel } from "../../../src/utils/logger";
import { printMessage, processOutput, type OutputSink } from "../util/format";
import { parseNonNegativeInt, parsePositiveInt, splitCsv } from "../util/parse";

export interface SearchCommandOptions {
  pattern: string;
  maxDepth?: string;
  extensions?: string;
  showHidden: boolean;
  includeGitignored: boolean;
  json: boolean;
  sort: boolean;
  capacity?: string;
  debug: boolean;
}

export const EXIT_OK = 0;
export const EXIT_VALIDATION_ERROR = 2;

function toFilterInput(root: string, opts: SearchCommandOptions): SearchFilterInput {
  const extensions = opts.extensions === undefined ? undefined : splitCsv(opts.extensions);
  return {
    root,
    pattern: opts.pattern,
    maxDepth: opts.maxDepth === undefined ? undefined : parseNonNegativeInt(opts.maxDepth, "--max-depth"),
    extensions: extensions && extensions.length > 0 ? extensions : undefined,
    includeHidden: opts.showHidden,
    includeIgnored: opts.includeGitignored
  };
}

const byPath = (a: SearchMessage, b: SearchMessage): number => {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
};

/**
 * Run one search and render it. Failures are printed but never change the
 * exit code; only invalid options do.
 */
export async function runSearchCommand(
  root: string,
  opts: SearchCommandOptions,
  sink: OutputSink = processOutput
): Promise<number> {
  if (opts.debug) setLogLevel("debug");

  let stream: SearchStream;
  try {
    const capacity = opts.capacity === undefined ? undefined : parsePositiveInt(opts.capacity, "--capacity");
    stream = startSearch(toFilterInput(root, opts), { channelCapacity: capacity });
  } catch (err: unknown) {
    const message = err instanceof SearchConfigError ? err.issues.join("; ") : getErrorMessage(err);
    sink.err(`VALIDATION_ERROR: ${message}`);
    return EXIT_VALIDATION_ERROR;
  }

  if (!opts.sort) {
    for await (const message of stream) {
      printMessage(message, sink, opts.json);
    }
  } else {
    // Sorting needs the whole result set first
    const matches: SearchMessage[] = [];
    const failures: SearchMessage[] = [];
    for await (const message of stream) {
      (message.type === "match" ? matches : failures).push(message);
    }
    for (const message of [...matches.sort(byPath), ...failures.sort(byPath)]) {
      printMessage(message, sink, opts.json);
    }
  }

  const summary = await stream.completion;
  logger.info(`${summary.matches} matches, ${summary.failures} errors, ${summary.directoriesListed} directories listed`);
  return EXIT_OK;
}

export function configureSearchCommand(program: Command): Command {
  return program
    .argument("[root]", "Directory to start the search from", ".")
    .option("-p, --pattern <pattern>", "Match file names containing this text ('*' wildcards are stripped; naive only)", "*")
    .option("-m, --max-depth <n>", "Maximum depth to descend (root is depth 0; unlimited if omitted)")
    .option("-e, --extensions <list>", "Only report files with these extensions (comma-separated, case-insensitive)")
    .option("-H, --show-hidden", "Include hidden files and directories", false)
    .option("--include-gitignored", "Do not apply the root .gitignore", false)
    .option("--json", "Print one JSON object per result line", false)
    .option("--sort", "Wait for the whole walk, then print results sorted by path", false)
    .option("--capacity <n>", "Results buffered ahead of the printer")
    .option("--debug", "Enable debug logging on stderr", false)
    .action(async (root: string, opts: SearchCommandOptions) => {
      process.exitCode = await runSearchCommand(root, opts);
    });
}
