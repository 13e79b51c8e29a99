import type { FailureMessage, SearchMessage, WalkSummary } from '../file-ops/scan-types';
import { BoundedChannel } from '../utils/bounded-channel';
import { loadIgnoreMatcher } from '../utils/ignore-utils';

import { runWalker } from './bfs-walker';
import type { FileSystemAdapter } from './file-system';
import {
  createSearchFilter,
  resolveChannelCapacity,
  type SearchFilter,
  type SearchFilterInput,
} from './search-filter';

export interface SearchOptions {
  /** Messages buffered before the walker waits for the consumer */
  channelCapacity?: number;
  fileSystem?: FileSystemAdapter;
}

export interface CollectedSearch {
  matches: string[];
  failures: FailureMessage[];
  summary: WalkSummary;
}

/**
 * Receiving end of a running search. Iterate it to drain messages in discovery
 * order; iteration ends when the walk is done. Breaking out of the loop, or
 * calling close(), stops the walk.
 */
export class SearchStream implements AsyncIterable<SearchMessage> {
  constructor(
    readonly filter: SearchFilter,
    private readonly channel: BoundedChannel<SearchMessage>,
    /** Resolves once the walker has stopped, whether finished or cancelled */
    readonly completion: Promise<WalkSummary>
  ) {}

  close(): void {
    this.channel.cancel();
  }

  [Symbol.asyncIterator](): AsyncIterator<SearchMessage, undefined> {
    return this.channel[Symbol.asyncIterator]();
  }
}

/**
 * Validate the filter, load the root ignore file (unless ignored entries are
 * wanted) and start walking in the background.
 *
 * @throws SearchConfigError when the filter input or the channel capacity is invalid
 */
export function startSearch(input: SearchFilterInput = {}, options: SearchOptions = {}): SearchStream {
  const filter = createSearchFilter(input);
  const channel = new BoundedChannel<SearchMessage>(resolveChannelCapacity(options.channelCapacity));
  const ignoreMatcher = filter.includeIgnored ? null : loadIgnoreMatcher(filter.root);

  const completion = runWalker(filter, channel, {
    fileSystem: options.fileSystem,
    ignoreMatcher,
  });

  return new SearchStream(filter, channel, completion);
}

/**
 * Run a search to the end and split its messages. Order within each list is
 * discovery order.
 */
export async function collectSearch(
  input: SearchFilterInput = {},
  options: SearchOptions = {}
): Promise<CollectedSearch> {
  const stream = startSearch(input, options);
  const matches: string[] = [];
  const failures: FailureMessage[] = [];

  for await (const message of stream) {
    if (message.type === 'match') {
      matches.push(message.path);
    } else {
      failures.push(message);
    }
  }

  return { matches, failures, summary: await stream.completion };
}
