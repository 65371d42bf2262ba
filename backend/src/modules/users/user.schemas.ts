/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Decodes wire payloads (snake_case JSON) into typed values.
 *
 * RULES:
 * - Shape only: five strings. Uniqueness is the database's job and there
 *   is no further field validation in this version.
 */

import { z } from 'zod';

export const signupSchema = z.object({
  username: z.string(),
  first_name: z.string(),
  last_name: z.string(),
  email: z.string(),
  password: z.string(),
});

// Plain decimal digits only: "1e3", "0x10" and "1.0" are not ids.
export const userIdParamsSchema = z.object({
  id: z
    .string()
    .regex(/^-?\d+$/)
    .transform(Number)
    .pipe(z.number().int().safe()),
});

export type UserResponse = {
  id: number;
  username: string;
  first_name: string;
  last_name: string;
  email: string;
  password: string;
};
