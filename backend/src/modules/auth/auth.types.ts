/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Response types for the Auth endpoints.
 *
 * RULES:
 * - Never include raw passwords or hashes in response types.
 */

export type AccessTokenResult = {
  accessToken: string;
  tokenType: 'bearer';
};

export type MessageResult = {
  message: string;
};

/** Per-request facts every flow logs with. */
export type AuthRequestMeta = {
  requestId: string;
  tenantKey: string | null;
};
