export const USER_ROLES = ['user', 'admin'] as const;

export type UserRole = (typeof USER_ROLES)[number];

export function isUserRole(value: unknown): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

export interface User {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  role: UserRole;
  createdAt: Date;
}

// Row shape as returned by pg
export type UserRow = {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  role: string;
  created_at: Date;
};

export interface UserResponse {
  id: number;
  username: string;
  email: string;
  role: UserRole;
  created_at: Date;
}

export interface CreateUserInput {
  username: string;
  email: string;
  password: string;
  role?: UserRole;
}

export interface UpdateUserInput {
  username?: string;
  email?: string;
  password?: string;
}

export interface LoginRequest {
  username: string;
  password: string;
}

export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
}

/**
 * Claims carried by an access token
 */
export interface TokenClaims {
  sub: string;
  user_id: number;
  role: UserRole;
  iat: number;
  exp: number;
}
