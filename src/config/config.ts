import dotenv from 'dotenv';
import { AppConfig } from '../types/config.types';

// Load environment variables
dotenv.config();

const DEFAULT_JWT_SECRET = 'change_this_in_production';

const nodeEnv = process.env.NODE_ENV || 'development';

/**
 * Application configuration loaded from environment variables
 * with sensible defaults
 */
export const config: AppConfig = {
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv,

  database: {
    connectionString: process.env.DATABASE_URL,
    host: process.env.DATABASE_HOST || process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DATABASE_PORT || process.env.DB_PORT || '5432', 10),
    database: process.env.DATABASE_NAME || process.env.DB_NAME || 'advertisements',
    user: process.env.DATABASE_USER || process.env.DB_USER || 'postgres',
    password: process.env.DATABASE_PASSWORD || process.env.DB_PASSWORD || '',
    ssl: process.env.DATABASE_SSL === 'true',
    max: parseInt(process.env.DATABASE_POOL_MAX || '20', 10),
    idleTimeoutMillis: 30000, // Close idle clients after 30s
    connectionTimeoutMillis: 5000, // Timeout connection attempts after 5s
  },

  pagination: {
    defaultPageSize: parseInt(process.env.DEFAULT_PAGE_SIZE || '100', 10),
    maxPageSize: parseInt(process.env.MAX_PAGE_SIZE || '100', 10),
    maxTotalResults: parseInt(process.env.MAX_TOTAL_RESULTS || '10000', 10),
  },

  logging: {
    level: process.env.LOG_LEVEL || 'info',
    file: process.env.LOG_FILE ?? (nodeEnv === 'test' ? '' : './logs/app.log'),
    silent: nodeEnv === 'test',
  },

  auth: {
    jwtSecret: process.env.JWT_SECRET || DEFAULT_JWT_SECRET,
    jwtSecretIsDefault: !process.env.JWT_SECRET,
    tokenExpireHours: parseInt(process.env.ACCESS_TOKEN_EXPIRE_HOURS || '48', 10),
    bcryptRounds: parseInt(process.env.BCRYPT_ROUNDS || '12', 10),
  },

  rateLimit: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    max: parseInt(process.env.RATE_LIMIT_MAX || '1000', 10),
    loginMax: parseInt(process.env.LOGIN_RATE_LIMIT_MAX || '50', 10),
  },

  http: {
    maxBodyBytes: parseInt(process.env.MAX_BODY_BYTES || '1048576', 10), // 1MB
  },

  admin: {
    username: process.env.ADMIN_USERNAME || 'admin',
    email: process.env.ADMIN_EMAIL || 'admin@example.com',
    password: process.env.ADMIN_PASSWORD || undefined,
  },
};

/**
 * Validate configuration
 * Returns warnings for the caller to log; throws on settings that
 * must never reach production
 */
export function validateConfig(appConfig: AppConfig = config): string[] {
  const warnings: string[] = [];

  if (!appConfig.database.connectionString) {
    const required = [
      'DATABASE_HOST',
      'DATABASE_NAME',
      'DATABASE_USER',
      'DATABASE_PASSWORD',
    ];

    const missing = required.filter((key) => !process.env[key]);

    if (missing.length > 0) {
      warnings.push(
        `Missing environment variables: ${missing.join(', ')}. Using default values.`
      );
    }
  }

  if (appConfig.auth.jwtSecretIsDefault) {
    if (appConfig.nodeEnv === 'production') {
      throw new Error('JWT_SECRET must be set in production');
    }
    warnings.push('JWT_SECRET is not set; using the development default.');
  }

  return warnings;
}
