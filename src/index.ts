export { startSearch, collectSearch, SearchStream } from './main/search-service';
export type { SearchOptions, CollectedSearch } from './main/search-service';
export { createSearchFilter, resolveChannelCapacity } from './main/search-filter';
export type { SearchFilter, SearchFilterInput } from './main/search-filter';
export { runWalker } from './main/bfs-walker';
export type { WalkerOptions } from './main/bfs-walker';
export { nodeFileSystem } from './main/file-system';
export type { DirectoryEntry, EntryKind, EntryMetadata, FileSystemAdapter } from './main/file-system';
export { toSearchFailure, toSearchErrorCode } from './main/error-normalizer';
export { loadIgnoreMatcher, isPathIgnored } from './utils/ignore-utils';
export type { IgnoreMatcher } from './utils/ignore-utils';
export { BoundedChannel } from './utils/bounded-channel';
export type { ChannelSender } from './utils/bounded-channel';
export { SearchConfigError, ApplicationError } from './utils/error-handling';
export * from './file-ops';
