import { fileMatches, isHiddenName } from '../file-ops/filters';
import type { DirectoryQueueItem, SearchMessage, WalkSummary } from '../file-ops/scan-types';
import type { ChannelSender } from '../utils/bounded-channel';
import { isPathIgnored, type IgnoreMatcher } from '../utils/ignore-utils';
import { logger } from '../utils/logger';

import { toSearchFailure } from './error-normalizer';
import { nodeFileSystem, type EntryMetadata, type FileSystemAdapter } from './file-system';
import type { SearchFilter } from './search-filter';

export interface WalkerOptions {
  fileSystem?: FileSystemAdapter;
  /** Consulted only when the filter honors ignore rules */
  ignoreMatcher?: IgnoreMatcher | null;
}

interface WalkContext {
  filter: SearchFilter;
  sink: ChannelSender<SearchMessage>;
  fileSystem: FileSystemAdapter;
  matcher: IgnoreMatcher | null;
  maxDepth: number;
  frontier: DirectoryQueueItem[];
  summary: WalkSummary;
}

/**
 * Hand a message to the consumer. False means the consumer is gone and the
 * walk has to stop.
 */
const emit = async (ctx: WalkContext, message: SearchMessage): Promise<boolean> => {
  const accepted = await ctx.sink.send(message);
  if (!accepted) {
    ctx.summary.cancelled = true;
    return false;
  }
  if (message.type === 'match') {
    ctx.summary.matches++;
  } else {
    ctx.summary.failures++;
  }
  return true;
};

/**
 * List one directory, queue its subdirectories and emit its matching files.
 * Returns false when the consumer went away mid-directory.
 */
const scanDirectory = async (ctx: WalkContext, { path: dirPath, depth }: DirectoryQueueItem): Promise<boolean> => {
  const { filter, fileSystem, matcher } = ctx;

  try {
    for await (const entry of fileSystem.listDirectory(dirPath)) {
      if (ctx.sink.isCancelled) {
        ctx.summary.cancelled = true;
        return false;
      }
      if (isPathIgnored(matcher, entry.path, entry.isDirectory)) continue;

      let metadata: EntryMetadata;
      try {
        metadata = await fileSystem.getMetadata(entry.path);
      } catch (error: unknown) {
        if (!(await emit(ctx, toSearchFailure(entry.path, 'stat', error)))) return false;
        continue;
      }

      if (!filter.includeHidden && (isHiddenName(entry.name) || metadata.hidden)) continue;

      if (metadata.kind === 'directory') {
        if (depth + 1 <= ctx.maxDepth) {
          ctx.frontier.push({ path: entry.path, depth: depth + 1 });
        }
        continue;
      }

      if (fileMatches(entry.path, filter.pattern, filter.extensions)) {
        if (!(await emit(ctx, { type: 'match', path: entry.path }))) return false;
      }
    }
  } catch (error: unknown) {
    return emit(ctx, toSearchFailure(dirPath, 'list', error));
  }

  ctx.summary.directoriesListed++;
  return true;
};

/**
 * Breadth-first walk from `filter.root`, streaming matches and failures into
 * `sink` in discovery order. Always closes the sink and never rejects.
 *
 * The frontier is an explicit FIFO queue; a directory deeper than
 * `filter.maxDepth` is never listed. A failure to list a directory or to query
 * an entry becomes one failure message and the walk carries on.
 */
export async function runWalker(
  filter: SearchFilter,
  sink: ChannelSender<SearchMessage>,
  options: WalkerOptions = {}
): Promise<WalkSummary> {
  const ctx: WalkContext = {
    filter,
    sink,
    fileSystem: options.fileSystem ?? nodeFileSystem,
    matcher: filter.includeIgnored ? null : options.ignoreMatcher ?? null,
    maxDepth: filter.maxDepth ?? Number.POSITIVE_INFINITY,
    frontier: [{ path: filter.root, depth: 0 }],
    summary: { directoriesListed: 0, matches: 0, failures: 0, cancelled: false },
  };

  try {
    while (ctx.frontier.length > 0) {
      if (sink.isCancelled) {
        ctx.summary.cancelled = true;
        break;
      }

      const next = ctx.frontier.shift();
      if (!next) break;
      if (next.depth > ctx.maxDepth) continue;

      logger.debug(`Listing ${next.path} (depth ${next.depth})`);
      if (!(await scanDirectory(ctx, next))) break;
    }
  } catch (error: unknown) {
    logger.error(`Walk of ${filter.root} stopped unexpectedly:`, error instanceof Error ? error : String(error));
    await emit(ctx, toSearchFailure(filter.root, 'walk', error));
  } finally {
    sink.close();
  }

  logger.debug(
    `Walk of ${filter.root} finished: ${ctx.summary.matches} matches, ${ctx.summary.failures} failures, ` +
      `${ctx.summary.directoriesListed} directories${ctx.summary.cancelled ? ' (cancelled)' : ''}`
  );
  return ctx.summary;
}
