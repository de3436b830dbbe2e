/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → AuthService for all auth endpoints.
 * - Returns structured response.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Body/params validated with Zod before the service is called.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodTypeAny, z } from 'zod';

import { AppError } from '../../shared/http/errors';
import { requireUser } from '../../shared/http/require-auth-context';
import {
  loginSchema,
  registerSchema,
  requestEmailSchema,
  resetPasswordSchema,
  tokenParamsSchema,
} from './auth.schemas';
import type { AuthService } from './auth.service';
import type { AuthRequestMeta } from './auth.types';

function parseOrThrow<S extends ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError(`Invalid ${what}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

function requestMeta(req: FastifyRequest): AuthRequestMeta {
  return {
    requestId: req.requestContext.requestId,
    tenantKey: req.requestContext.tenantKey,
  };
}

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(registerSchema, req.body, 'request body');

    const result = await this.authService.register({ ...requestMeta(req), ...body });
    return reply.status(201).send(result);
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const body = parseOrThrow(loginSchema, req.body, 'request body');

    const result = await this.authService.login({ ...requestMeta(req), ...body });
    return reply.status(200).send(result);
  }

  async confirmEmail(req: FastifyRequest, reply: FastifyReply) {
    const { token } = parseOrThrow(tokenParamsSchema, req.params, 'token');

    const result = await this.authService.confirmEmail({ ...requestMeta(req), token });
    return reply.status(200).send(result);
  }

  async requestEmail(req: FastifyRequest, reply: FastifyReply) {
    const { email } = parseOrThrow(requestEmailSchema, req.body, 'request body');

    const result = await this.authService.requestVerificationEmail({ ...requestMeta(req), email });
    return reply.status(200).send(result);
  }

  async forgotPassword(req: FastifyRequest, reply: FastifyReply) {
    const { email } = parseOrThrow(requestEmailSchema, req.body, 'request body');

    const result = await this.authService.requestPasswordReset({ ...requestMeta(req), email });
    return reply.status(200).send(result);
  }

  async resetPassword(req: FastifyRequest, reply: FastifyReply) {
    const { token } = parseOrThrow(tokenParamsSchema, req.params, 'token');
    const { newPassword } = parseOrThrow(resetPasswordSchema, req.body, 'request body');

    const result = await this.authService.resetPassword({
      ...requestMeta(req),
      token,
      newPassword,
    });
    return reply.status(200).send(result);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(req);

    const result = await this.authService.logout({
      ...requestMeta(req),
      userId: user.userId,
      username: user.username,
      token: user.token,
    });
    return reply.status(200).send(result);
  }
}
