/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP → UserService for the /users endpoints.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here; access checks go through requireUser.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireUser } from '../../shared/http/require-auth-context';
import { changeRoleSchema, updateAvatarSchema, usernameParamsSchema } from './user.schemas';
import type { UserService } from './user.service';

export class UserController {
  constructor(private readonly userService: UserService) {}

  async me(req: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(req, { capability: 'profile:read' });

    const result = await this.userService.getCurrentUser(user.username);
    return reply.status(200).send(result);
  }

  async updateAvatar(req: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(req, { capability: 'avatar:update' });

    const parsed = updateAvatarSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const result = await this.userService.updateAvatar({
      email: user.email,
      avatarUrl: parsed.data.avatarUrl,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async changeRole(req: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(req, { capability: 'role:change' });

    const params = usernameParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid username', { issues: params.error.issues });
    }

    const body = changeRoleSchema.safeParse(req.body);
    if (!body.success) {
      throw AppError.validationError('Invalid request body', { issues: body.error.issues });
    }

    const result = await this.userService.changeRole({
      actorUsername: user.username,
      targetUsername: params.data.username,
      role: body.data.role,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }
}
