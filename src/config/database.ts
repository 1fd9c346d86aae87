import { Pool } from 'pg';
import { config } from './config';
import { logger } from '../utils/logger';

/**
 * PostgreSQL connection pool
 * Manages database connections efficiently
 */
class Database {
  private pool: Pool;
  private isConnected: boolean = false;

  constructor() {
    this.pool = new Pool({
      connectionString: config.database.connectionString,
      host: config.database.host,
      port: config.database.port,
      database: config.database.database,
      user: config.database.user,
      password: config.database.password,
      ssl: config.database.ssl
        ? {
            rejectUnauthorized: false, // Managed hosts use self-signed chains
          }
        : false,
      max: config.database.max,
      idleTimeoutMillis: config.database.idleTimeoutMillis,
      connectionTimeoutMillis: config.database.connectionTimeoutMillis,
    });

    // Handle pool errors
    this.pool.on('error', (err) => {
      logger.error('Unexpected database pool error:', err);
    });

    // Handle successful connection
    this.pool.on('connect', () => {
      if (!this.isConnected) {
        logger.info('Database pool connected successfully');
        this.isConnected = true;
      }
    });
  }

  /**
   * Underlying pool, shared by services and the database scripts
   */
  getPool(): Pool {
    return this.pool;
  }

  /**
   * Test database connection
   */
  async testConnection(): Promise<boolean> {
    try {
      const result = await this.pool.query<{ now: Date }>('SELECT NOW() as now');
      logger.info('Database connection test successful:', {
        timestamp: result.rows[0]?.now,
      });
      return true;
    } catch (error) {
      logger.error('Database connection test failed:', error);
      return false;
    }
  }

  /**
   * Close all connections in the pool
   */
  async close(): Promise<void> {
    try {
      await this.pool.end();
      this.isConnected = false;
      logger.info('Database pool closed');
    } catch (error) {
      logger.error('Error closing database pool:', error);
      throw error;
    }
  }
}

// Export singleton instance
export const db = new Database();
