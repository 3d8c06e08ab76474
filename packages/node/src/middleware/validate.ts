/**
 * Request validation with zod.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { errorEnvelope } from "../types/error.js";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export function zodIssues(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
}

/** 400 response listing what failed to validate. */
export function validationFailed(c: Context, message: string, error: ZodError): Response {
  return c.json(errorEnvelope("VALIDATION_ERROR", message, { issues: zodIssues(error) }), 400);
}

async function readBody(c: Context): Promise<{ ok: true; body: unknown } | { ok: false }> {
  try {
    return { ok: true, body: await c.req.json() };
  } catch {
    return { ok: false };
  }
}

/**
 * Parse the JSON body with `schema` and expose the result as
 * `validatedBody`, typed by the schema's output.
 */
export function validateBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
): MiddlewareHandler<{ Variables: { validatedBody: T } }> {
  return async (c, next) => {
    const read = await readBody(c);
    if (!read.ok) {
      return c.json(errorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"), 400);
    }

    const result = schema.safeParse(read.body);
    if (!result.success) {
      return validationFailed(c, "Request body validation failed", result.error);
    }

    c.set("validatedBody", result.data);
    await next();
  };
}
