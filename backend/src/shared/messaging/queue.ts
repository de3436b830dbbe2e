/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "I need to send an email" from "here is how emails are sent".
 * - Auth flows enqueue messages; the transport (SQS, SMTP relay, etc.) is
 *   wired at the DI layer only. Flows never change when transport changes.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase (shared → nothing).
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable.
 * - Raw verify/reset tokens are allowed here: they travel to the email renderer
 *   inside the link. They are never stored anywhere.
 * - Never put password hashes or ACCESS tokens in messages.
 */

// ── Message types ─────────────────────────────────────────────

export type VerifyEmailMessage = {
  type: 'auth.verify-email';
  userId: string;
  username: string;
  email: string;
  /** EMAIL_VERIFY token; consumed by GET /auth/confirmed_email/:token. */
  verifyToken: string;
  /** Fully built confirmation link (PUBLIC_BASE_URL + route). */
  link: string;
  tenantKey: string | null;
};

export type ResetPasswordEmailMessage = {
  type: 'auth.reset-password-email';
  userId: string;
  username: string;
  email: string;
  /** PASSWORD_RESET token; consumed by POST /auth/reset-password/:token. */
  resetToken: string;
  link: string;
  tenantKey: string | null;
};

export type QueueMessage = VerifyEmailMessage | ResetPasswordEmailMessage;

export type QueueMessageType = QueueMessage['type'];

// ── Queue interface ───────────────────────────────────────────

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
