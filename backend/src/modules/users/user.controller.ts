/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for the user endpoints.
 * - Converts between wire shape (snake_case) and domain types.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 * - Signup failures reply with the plain-text message from the outcome.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { signupSchema, userIdParamsSchema } from './user.schemas';
import type { UserResponse } from './user.schemas';
import type { UserService } from './user.service';
import type { User, UserId } from './user.types';

function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    first_name: user.firstName,
    last_name: user.lastName,
    email: user.email,
    password: user.password,
  };
}

function parseUserId(params: unknown): UserId {
  const parsed = userIdParamsSchema.safeParse(params);
  if (!parsed.success) {
    throw AppError.validationError('Invalid user id', { issues: parsed.error.issues });
  }
  return parsed.data.id;
}

export class UserController {
  constructor(private readonly userService: UserService) {}

  async listUsers(_req: FastifyRequest, reply: FastifyReply) {
    const users = await this.userService.listUsers();
    return reply.status(200).send(users.map(toUserResponse));
  }

  async signup(req: FastifyRequest, reply: FastifyReply) {
    const parsed = signupSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const outcome = await this.userService.signup({
      input: {
        username: parsed.data.username,
        firstName: parsed.data.first_name,
        lastName: parsed.data.last_name,
        email: parsed.data.email,
        password: parsed.data.password,
      },
      requestId: req.requestContext.requestId,
    });

    if (!outcome.ok) {
      return reply.status(outcome.status).type('text/plain; charset=utf-8').send(outcome.message);
    }

    return reply.status(201).header('location', outcome.location).send(toUserResponse(outcome.user));
  }

  async getUser(req: FastifyRequest, reply: FastifyReply) {
    const user = await this.userService.getUser(parseUserId(req.params));
    return reply.status(200).send(toUserResponse(user));
  }

  async deleteUser(req: FastifyRequest, reply: FastifyReply) {
    await this.userService.deleteUser({
      id: parseUserId(req.params),
      requestId: req.requestContext.requestId,
    });
    return reply.status(204).send();
  }
}
