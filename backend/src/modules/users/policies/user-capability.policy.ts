/**
 * backend/src/modules/users/policies/user-capability.policy.ts
 *
 * WHY:
 * - Authorization is one pure predicate over the closed Role enumeration.
 * - Routes ask for a capability, never for a role name, so adding a role is a
 *   change in this file only.
 *
 * RULES:
 * - Pure function: no DB, no HTTP, no logging.
 */

import type { Role } from '../user.types';

export const CAPABILITIES = ['profile:read', 'avatar:update', 'role:change'] as const;

export type Capability = (typeof CAPABILITIES)[number];

const ROLE_CAPABILITIES: Record<Role, ReadonlySet<Capability>> = {
  USER: new Set<Capability>(['profile:read']),
  ADMIN: new Set<Capability>(['profile:read', 'avatar:update', 'role:change']),
};

export function hasCapability(role: Role, capability: Capability): boolean {
  return ROLE_CAPABILITIES[role].has(capability);
}
