/**
 * Request Validation Helpers
 * zod schemas shared by the route modules, and the bridge from zod
 * failures to `ValidationError`.
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";

/** ISO 8601 timestamp, kept as a string */
export const isoDateString = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "must be an ISO 8601 date");

/** ISO 8601 timestamp, parsed to a Date */
export const isoDate = isoDateString.transform((value) => new Date(value));

/** Positive integer id, from JSON or a path parameter */
export const idSchema = z.coerce.number().int().positive();

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Parse request input or throw a 400.
 *
 * @throws ValidationError listing every issue
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(formatZodError(result.error));
  }
  return result.data;
}
