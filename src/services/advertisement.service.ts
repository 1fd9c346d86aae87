import { Pool } from 'pg';
import {
  Advertisement,
  AdvertisementRow,
  AdvertisementSearchFilters,
  CreateAdvertisementInput,
  UpdateAdvertisementInput,
} from '../types/advertisement.types';
import { PaginationParams } from '../types/config.types';
import { logger } from '../utils/logger';
import { BadRequestError, handleDatabaseError } from '../middleware/error.middleware';

const ADVERTISEMENT_COLUMNS = 'id, title, description, price, owner_id, created_at';

function rowToAdvertisement(row: AdvertisementRow): Advertisement {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    // pg returns NUMERIC as a string; DOUBLE PRECISION as a number
    price: typeof row.price === 'string' ? parseFloat(row.price) : row.price,
    ownerId: row.owner_id,
    createdAt: row.created_at,
  };
}

/**
 * Escape LIKE wildcards so user input matches literally
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Advertisement Service
 * Handles all database operations for advertisements
 */
export class AdvertisementService {
  private pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  /**
   * Create an advertisement owned by `ownerId`
   */
  async create(input: CreateAdvertisementInput, ownerId: number): Promise<Advertisement> {
    const query = `
      INSERT INTO advertisements (title, description, price, owner_id)
      VALUES ($1, $2, $3, $4)
      RETURNING ${ADVERTISEMENT_COLUMNS}
    `;

    try {
      const result = await this.pool.query<AdvertisementRow>(query, [
        input.title,
        input.description,
        input.price,
        ownerId,
      ]);

      const advertisement = rowToAdvertisement(result.rows[0]);
      logger.info('Advertisement created', { id: advertisement.id, ownerId });
      return advertisement;
    } catch (error) {
      handleDatabaseError(error);
    }
  }

  async findById(id: number): Promise<Advertisement | null> {
    const query = `SELECT ${ADVERTISEMENT_COLUMNS} FROM advertisements WHERE id = $1`;

    const result = await this.pool.query<AdvertisementRow>(query, [id]);
    return result.rows.length > 0 ? rowToAdvertisement(result.rows[0]) : null;
  }

  /**
   * Apply a partial update
   * Returns the updated advertisement, or null if it does not exist
   */
  async update(id: number, changes: UpdateAdvertisementInput): Promise<Advertisement | null> {
    const assignments: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (changes.title !== undefined) {
      assignments.push(`title = $${paramIndex++}`);
      params.push(changes.title);
    }

    if (changes.description !== undefined) {
      assignments.push(`description = $${paramIndex++}`);
      params.push(changes.description);
    }

    if (changes.price !== undefined) {
      assignments.push(`price = $${paramIndex++}`);
      params.push(changes.price);
    }

    if (assignments.length === 0) {
      return this.findById(id);
    }

    const query = `
      UPDATE advertisements
      SET ${assignments.join(', ')}
      WHERE id = $${paramIndex}
      RETURNING ${ADVERTISEMENT_COLUMNS}
    `;
    params.push(id);

    try {
      const result = await this.pool.query<AdvertisementRow>(query, params);
      if (result.rows.length === 0) {
        return null;
      }

      logger.info('Advertisement updated', { id, fields: Object.keys(changes) });
      return rowToAdvertisement(result.rows[0]);
    } catch (error) {
      handleDatabaseError(error);
    }
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM advertisements WHERE id = $1', [id]);

    if (result.rowCount && result.rowCount > 0) {
      logger.info('Advertisement deleted', { id });
      return true;
    }

    return false;
  }

  /**
   * Search advertisements
   * Text filters match case-insensitive substrings, price bounds are inclusive.
   * Callers pass the SQL limit (page size + 1) to detect further pages.
   */
  async search(
    filters: AdvertisementSearchFilters,
    pagination: PaginationParams
  ): Promise<Advertisement[]> {
    const { minPrice, maxPrice } = filters;

    if (minPrice !== undefined && maxPrice !== undefined && minPrice > maxPrice) {
      throw new BadRequestError('min_price must not be greater than max_price');
    }

    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (filters.title) {
      conditions.push(`title ILIKE $${paramIndex++}`);
      params.push(`%${escapeLikePattern(filters.title)}%`);
    }

    if (filters.description) {
      conditions.push(`description ILIKE $${paramIndex++}`);
      params.push(`%${escapeLikePattern(filters.description)}%`);
    }

    if (minPrice !== undefined) {
      conditions.push(`price >= $${paramIndex++}`);
      params.push(minPrice);
    }

    if (maxPrice !== undefined) {
      conditions.push(`price <= $${paramIndex++}`);
      params.push(maxPrice);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const query = `
      SELECT ${ADVERTISEMENT_COLUMNS}
      FROM advertisements
      ${whereClause}
      ORDER BY id
      LIMIT $${paramIndex}
      OFFSET $${paramIndex + 1}
    `;
    params.push(pagination.limit, pagination.offset);

    logger.debug('Search advertisements query', {
      filters: conditions.length,
      offset: pagination.offset,
      limit: pagination.limit,
    });

    try {
      const result = await this.pool.query<AdvertisementRow>(query, params);
      return result.rows.map(rowToAdvertisement);
    } catch (error) {
      handleDatabaseError(error);
    }
  }
}
