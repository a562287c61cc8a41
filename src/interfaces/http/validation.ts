import type { z, ZodError } from "zod";

import { ErrorCode, ValidationError } from "@typesLocal/AppError";

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");
}

/**
 * Parses request input against a schema. Shape failures become
 * ValidationError(INVALID_REQUEST) with one `path: message` entry per issue.
 */
export function parseRequest<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown
): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw new ValidationError("Invalid request", {
      code: ErrorCode.INVALID_REQUEST,
      details: formatIssues(result.error),
    });
  }

  return result.data;
}
