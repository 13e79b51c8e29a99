import { z } from "zod";

import { SEARCH_DEFAULTS } from "../constants";

export const SearchFilterSchema = z
  .object({
    root: z.string().min(1, "root must not be empty").default(SEARCH_DEFAULTS.ROOT),
    pattern: z.string().default(SEARCH_DEFAULTS.MATCH_ALL_PATTERN),
    maxDepth: z.number().int().nonnegative().optional(),
    extensions: z.array(z.string()).optional(),
    includeHidden: z.boolean().default(false),
    includeIgnored: z.boolean().default(false)
  })
  .strict();

export const ChannelCapacitySchema = z
  .number()
  .int()
  .positive()
  .default(SEARCH_DEFAULTS.CHANNEL_CAPACITY);

export type SearchFilterInput = z.input<typeof SearchFilterSchema>;
