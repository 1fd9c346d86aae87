// ============================================
// Configuration Types
// ============================================

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

export interface PaginationConfig {
  defaultPageSize: number;
  maxPageSize: number;
  maxTotalResults: number;
}

export interface AuthConfig {
  jwtSecret: string;
  jwtSecretIsDefault: boolean;
  tokenExpireHours: number;
  bcryptRounds: number;
}

export interface RateLimitConfig {
  windowMs: number;
  max: number;
  loginMax: number;
}

export interface AdminBootstrapConfig {
  username: string;
  email: string;
  password?: string;
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  database: DatabaseConfig;
  pagination: PaginationConfig;
  logging: {
    level: string;
    file: string;
    silent: boolean;
  };
  auth: AuthConfig;
  rateLimit: RateLimitConfig;
  http: {
    maxBodyBytes: number;
  };
  admin: AdminBootstrapConfig;
}

export interface PaginationParams {
  offset: number;
  limit: number;
}

export interface PaginationResult<T> {
  items: T[];
  nextOffset: string | null;
  hasMore: boolean;
}
