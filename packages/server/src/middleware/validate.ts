/**
 * meshid: Request body validation.
 */

import type { z } from "zod";
import { IdentityError, IdentityErrorCode } from "@meshid/core";

/**
 * Parse `data` with `schema`.
 * @throws {IdentityError} VALIDATION_FAILED listing the offending fields.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new IdentityError(IdentityErrorCode.VALIDATION_FAILED, "Request body is invalid", {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
  }
  return result.data;
}
