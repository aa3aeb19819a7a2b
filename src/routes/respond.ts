import type { Context } from 'hono';
import type { z } from 'zod';
import { isEpicEngineError, type EngineErrorCode } from '../errors.js';
import * as logger from '../services/logger.js';

type ErrorStatus = 400 | 404 | 409 | 422 | 500 | 502;

const STATUS_BY_CODE: Record<EngineErrorCode, ErrorStatus> = {
  INVALID_PREMISE: 400,
  INVALID_BATCH: 400,
  ARC_BOUNDARY: 422,
  OUT_OF_ORDER: 409,
  GENERATION_BACKEND: 502,
  STORY_BUSY: 409,
  CONTINUITY_FOLD: 502,
  STORY_NOT_FOUND: 404,
  CURSOR_CONFLICT: 409,
  CANCELLED: 409,
};

/**
 * Maps an error to the `{ success: false, ... }` envelope
 */
export function errorResponse(c: Context, error: unknown) {
  if (error instanceof BadRequestError) {
    return c.json({ success: false, error: error.message }, 400);
  }
  if (isEpicEngineError(error)) {
    return c.json(
      {
        success: false,
        error: error.message,
        code: error.code,
        retryable: error.retryable,
        resume: error.resume ?? null,
      },
      STATUS_BY_CODE[error.code]
    );
  }
  logger.error('Unhandled route error', { error: error instanceof Error ? error.message : String(error) });
  return c.json({ success: false, error: error instanceof Error ? error.message : String(error) }, 500);
}

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Parses and validates the JSON body, throwing `BadRequestError` on failure
 */
export async function readBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let json: unknown;
  try {
    json = await c.req.json();
  } catch {
    throw new BadRequestError('Request body must be JSON');
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new BadRequestError(result.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '));
  }
  return result.data;
}
