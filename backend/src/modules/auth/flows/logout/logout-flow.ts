/**
 * backend/src/modules/auth/flows/logout/logout-flow.ts
 *
 * WHY:
 * - Bearer tokens are stateless; logging out means denylisting this token's id
 *   until it would have expired, and dropping the cached projection.
 *
 * RULES:
 * - Only the presented token is revoked; other sessions of the user stay valid.
 * - The revocation must land; a revocation store outage answers 503.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { TokenRevocations } from '../../../../shared/security/token-revocations';
import type { TokenClaims } from '../../../../shared/security/token.types';
import type { SessionCache } from '../../../../shared/session/session-cache';

import { AUTH_MESSAGES } from '../../auth.constants';
import type { AuthRequestMeta, MessageResult } from '../../auth.types';

export type LogoutParams = AuthRequestMeta & {
  userId: string;
  username: string;
  token: Pick<TokenClaims, 'tokenId' | 'expiresAt'>;
};

export async function logoutFlow(
  deps: {
    revocations: TokenRevocations;
    sessionCache: SessionCache;
    logger: Logger;
  },
  params: LogoutParams,
): Promise<MessageResult> {
  await deps.revocations.revokeToken(params.token);
  await deps.sessionCache.invalidate(params.username);

  deps.logger.info({
    msg: 'auth.logout.success',
    flow: 'auth.logout',
    requestId: params.requestId,
    tenantKey: params.tenantKey,
    userId: params.userId,
  });

  return { message: AUTH_MESSAGES.loggedOut };
}
