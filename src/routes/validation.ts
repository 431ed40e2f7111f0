// Request body parsing shared by the routes
import type { z } from 'zod';
import { AppError } from '../utils/errors.js';

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw AppError.validationError('Invalid request body', parsed.error.issues);
  }
  return parsed.data;
}

export interface ScopeQuery {
  Querystring: { clientId?: string };
}
