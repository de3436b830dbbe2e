/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - One Winston instance for the whole service. Flows get it injected (deps.logger);
 *   request-scoped lines go through requestLogger(req) in with-context.ts.
 * - Every line carries `service` and `env`, so tenants' traffic can be sliced by deployment.
 *
 * FORMAT:
 * - development: colorized single line (`level message {meta}`) for a terminal.
 * - everything else: one JSON object per line.
 *
 * RULES:
 * - Secrets never reach a transport: fields named in SECRET_FIELDS are replaced
 *   before formatting, whoever logged them.
 * - Pass errors as `{ err }` or `message`, not as the bare first argument.
 * - LOG_SILENT=true mutes everything (test runs).
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'tenant-auth-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export const REDACTED = '[REDACTED]';

const SECRET_FIELDS: ReadonlySet<string> = new Set([
  'password',
  'newPassword',
  'passwordHash',
  'token',
  'accessToken',
  'verifyToken',
  'resetToken',
  'authorization',
]);

/** Replaces top-level secret fields of a log entry. */
export const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (SECRET_FIELDS.has(key)) info[key] = REDACTED;
  }
  return info;
});

const devLine = winston.format.printf(({ level: lvl, message, timestamp, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${lvl} ${String(message)}${rest}`;
});

export const logger = winston.createLogger({
  level,
  silent: process.env.LOG_SILENT === 'true',
  format: winston.format.combine(
    redactSecrets(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    nodeEnv === 'development'
      ? winston.format.combine(winston.format.colorize(), devLine)
      : winston.format.json(),
  ),
  defaultMeta: { service, env: nodeEnv },
  transports: [new winston.transports.Console()],
});

export type Logger = winston.Logger;
