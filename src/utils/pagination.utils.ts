import { config } from '../config/config';
import { PaginationParams, PaginationResult } from '../types/config.types';
import { BadRequestError } from '../middleware/error.middleware';

/**
 * Get pagination parameters with validation
 * @param offset - Requested offset (defaults to 0)
 * @param customLimit - Optional custom limit (capped at the configured max)
 * @returns Pagination parameters
 */
export function getPaginationParams(
  offset: number | undefined,
  customLimit?: number
): PaginationParams {
  const resolvedOffset = offset ?? 0;

  if (!Number.isInteger(resolvedOffset) || resolvedOffset < 0) {
    throw new BadRequestError('Invalid offset: must be a non-negative integer');
  }

  if (resolvedOffset > config.pagination.maxTotalResults) {
    throw new BadRequestError(
      'Offset too large. Please refine your query or use earlier pages.'
    );
  }

  let limit = config.pagination.defaultPageSize;

  if (customLimit !== undefined) {
    if (!Number.isInteger(customLimit) || customLimit <= 0) {
      throw new BadRequestError('Invalid limit: must be a positive integer');
    }
    limit = Math.min(customLimit, config.pagination.maxPageSize);
  }

  return { offset: resolvedOffset, limit };
}

/**
 * Calculate SQL LIMIT value
 * Adds 1 to detect if more results exist
 */
export function getSqlLimit(limit: number): number {
  return limit + 1;
}

/**
 * Process query results into paginated response
 * Expects up to limit + 1 rows to determine if there are more pages
 *
 * @param results - Array of results (length should be limit + 1)
 * @param offset - Current offset
 * @param limit - Items per page
 */
export function processPaginatedResults<T>(
  results: T[],
  offset: number,
  limit: number
): PaginationResult<T> {
  const hasMore = results.length > limit;
  const items = results.slice(0, limit); // Remove the extra item
  const nextOffset = hasMore ? offset + limit : null;

  return {
    items,
    nextOffset: nextOffset !== null ? String(nextOffset) : null,
    hasMore,
  };
}
