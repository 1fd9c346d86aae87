// Load environment variables FIRST (before any other imports)
import dotenv from 'dotenv';
dotenv.config();

import * as fs from 'fs';
import * as path from 'path';
import { db } from '../src/config/database';
import { logger } from '../src/utils/logger';

const REQUIRED_TABLES = ['users', 'advertisements'];

/**
 * Locate schema.sql whether running from sources or from dist/
 */
function resolveSchemaPath(): string {
  const candidates = [
    path.join(__dirname, 'schema.sql'),
    path.join(__dirname, '..', '..', 'database', 'schema.sql'),
  ];

  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`schema.sql not found (looked in ${candidates.join(', ')})`);
  }
  return found;
}

/**
 * Run database migrations
 * Executes the schema.sql file to set up the database
 */
async function runMigrations(): Promise<void> {
  try {
    logger.info('Starting database migrations...');

    const schemaSql = fs.readFileSync(resolveSchemaPath(), 'utf-8');

    // Test connection first
    const connected = await db.testConnection();
    if (!connected) {
      throw new Error('Database connection failed');
    }

    logger.info('Executing schema.sql...');
    const pool = db.getPool();
    await pool.query(schemaSql);

    logger.info('Database migrations completed successfully');

    const verifyQuery = `
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
        AND table_name = ANY($1)
      ORDER BY table_name;
    `;

    const result = await pool.query<{ table_name: string }>(verifyQuery, [REQUIRED_TABLES]);
    const present = result.rows.map((r) => r.table_name);
    const missing = REQUIRED_TABLES.filter((table) => !present.includes(table));
    if (missing.length > 0) {
      throw new Error(`Tables missing after migration: ${missing.join(', ')}`);
    }

    logger.info('Schema verified', { tables: present });

    await db.close();
    process.exit(0);
  } catch (error) {
    logger.error('Migration failed:', error);
    await db.close();
    process.exit(1);
  }
}

// Run migrations
void runMigrations();
