/**
 * backend/src/modules/auth/helpers/dispatch-email.ts
 *
 * WHY:
 * - Email delivery is fire-and-forget: the HTTP response never waits for it and
 *   never fails because of it. Tokens are stateless, so there is nothing to roll back.
 *
 * RULES:
 * - Never awaited by callers.
 * - A failed enqueue is logged (with type + requestId, never the token) and dropped.
 */

import type { Logger } from '../../../shared/logger/logger';
import type { Queue, QueueMessage } from '../../../shared/messaging/queue';

export function dispatchEmail(
  deps: { queue: Queue; logger: Logger },
  message: QueueMessage,
  meta: { requestId: string; flow: string },
): void {
  // Promise.resolve().then(...) also catches a synchronous throw inside enqueue().
  Promise.resolve()
    .then(() => deps.queue.enqueue(message))
    .catch((err: unknown) => {
      deps.logger.error({
        msg: 'auth.email.dispatch_failed',
        flow: meta.flow,
        requestId: meta.requestId,
        type: message.type,
        userId: message.userId,
        message: err instanceof Error ? err.message : String(err),
      });
    });
}
