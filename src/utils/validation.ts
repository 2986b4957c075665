/**
 * Validation helpers shared by zod-backed schemas
 *
 * @module
 */

import type { z } from "zod";

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
