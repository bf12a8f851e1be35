/**
 * Paginated listing drain
 */

import type { ListingOperation } from "../api/client.js";
import { ApiError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { FilterExpression } from "../types.js";

export type FetchAllPagesOptions = {
  sort?: string;
  logger?: Logger;
};

/**
 * Call `list` from cursor 1 until the last page and return every item in
 * backend order.
 */
export async function fetchAllPages<T>(
  list: ListingOperation<T>,
  filter: FilterExpression,
  options: FetchAllPagesOptions = {},
): Promise<T[]> {
  const logger = options.logger ?? silentLogger;
  const items: T[] = [];
  let start = 1;

  for (;;) {
    const page = await list({ filter, sort: options.sort, start });
    if (!page.ok) {
      throw new ApiError(`Listing failed: ${page.reason}`, page.statusCode, page.reason, page.content);
    }
    if (page.totalCount === 0) break;

    items.push(...page.items);
    logger.debug(`Fetched page ${start}/${page.totalPages}`, { items: page.items.length, total: page.totalCount });

    if (page.totalPages <= start) break;
    start += 1;
  }

  return items;
}
