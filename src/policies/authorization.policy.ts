import { UserRole } from '../types/user.types';
import { ForbiddenError, UnauthorizedError } from '../middleware/error.middleware';

/**
 * Authorization Policy
 *
 * Single place where access to users and advertisements is decided.
 * Handlers describe who is calling, what they want to do and to which
 * record; the policy answers allow or deny. Deny is a value, never an
 * exception: `assertAllowed` is the bridge to HTTP errors.
 */

// =============================================================================
// Types
// =============================================================================

export type Principal =
  | { kind: 'anonymous' }
  | { kind: 'authenticated'; id: number; role: UserRole };

export type ResourceKind = 'user' | 'advertisement';

/**
 * `ownerId` is null only for a record that does not exist yet.
 * For a user record the owner is the user itself.
 */
export interface Resource {
  kind: ResourceKind;
  ownerId: number | null;
}

export type Operation = 'create' | 'read' | 'update' | 'delete' | 'search';

export type Decision = 'allow' | 'deny';

export interface DecisionDetail {
  decision: Decision;
  rule: string;
}

interface PolicyRule {
  name: string;
  matches(principal: Principal, operation: Operation, resource: Resource): boolean;
  decide(principal: Principal, resource: Resource): Decision;
}

export const ANONYMOUS: Principal = { kind: 'anonymous' };

export function authenticatedPrincipal(id: number, role: UserRole): Principal {
  return { kind: 'authenticated', id, role };
}

export function isAdmin(principal: Principal): boolean {
  return principal.kind === 'authenticated' && principal.role === 'admin';
}

function isOwner(principal: Principal, resource: Resource): boolean {
  return (
    principal.kind === 'authenticated' &&
    resource.ownerId !== null &&
    principal.id === resource.ownerId
  );
}

// =============================================================================
// Rules (first match wins)
// =============================================================================

const RULES: readonly PolicyRule[] = [
  {
    name: 'public-read',
    matches: (_principal, operation, resource) =>
      operation === 'read' || (operation === 'search' && resource.kind === 'advertisement'),
    decide: () => 'allow',
  },
  {
    name: 'public-signup',
    matches: (_principal, operation, resource) =>
      operation === 'create' && resource.kind === 'user',
    decide: () => 'allow',
  },
  {
    name: 'authenticated-create',
    matches: (_principal, operation, resource) =>
      operation === 'create' && resource.kind === 'advertisement',
    decide: (principal) => (principal.kind === 'authenticated' ? 'allow' : 'deny'),
  },
  {
    name: 'owner-or-admin',
    matches: (_principal, operation) => operation === 'update' || operation === 'delete',
    decide: (principal, resource) =>
      isAdmin(principal) || isOwner(principal, resource) ? 'allow' : 'deny',
  },
  {
    name: 'admin-bypass',
    matches: (principal) => isAdmin(principal),
    decide: () => 'allow',
  },
];

const DEFAULT_DENY = 'default-deny';

// =============================================================================
// Evaluation
// =============================================================================

/**
 * Decide an operation and report which rule produced the decision.
 */
export function explain(
  principal: Principal,
  operation: Operation,
  resource: Resource
): DecisionDetail {
  for (const rule of RULES) {
    if (rule.matches(principal, operation, resource)) {
      return { decision: rule.decide(principal, resource), rule: rule.name };
    }
  }

  return { decision: 'deny', rule: DEFAULT_DENY };
}

/**
 * Decide whether `principal` may perform `operation` on `resource`.
 *
 * @example
 * ```typescript
 * decide(authenticatedPrincipal(5, 'user'), 'update', { kind: 'advertisement', ownerId: 5 });
 * // => 'allow'
 * ```
 */
export function decide(principal: Principal, operation: Operation, resource: Resource): Decision {
  return explain(principal, operation, resource).decision;
}

/**
 * Throw the transport error matching a denial: 401 for anonymous
 * callers, 403 with `forbiddenMessage` for authenticated ones.
 */
export function assertAllowed(
  principal: Principal,
  operation: Operation,
  resource: Resource,
  forbiddenMessage: string = 'Not enough permissions'
): void {
  if (decide(principal, operation, resource) === 'allow') {
    return;
  }

  if (principal.kind === 'anonymous') {
    throw new UnauthorizedError('Authentication required');
  }

  throw new ForbiddenError(forbiddenMessage);
}
