/**
 * Zod validation middleware.
 *
 * Validates request body against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import { validator } from "hono/validator";
import type { ZodType, ZodTypeDef } from "zod";
import { validationError } from "../types/error.js";

/**
 * Validate the JSON request body against a Zod schema.
 *
 * On success the parsed body is available as `c.req.valid("json")`.
 * Malformed JSON is rejected by Hono with a 400 HTTPException.
 */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return validator("json", (value, c) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      return c.json(validationError("Request body validation failed", result.error), 400);
    }
    return result.data;
  });
}
