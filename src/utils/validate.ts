import type { ZodTypeAny, output } from "zod";
import { ValidationError } from "../errors.js";

/** Parse a value with a zod schema, turning the first issue into a ValidationError. */
export function parseInput<S extends ZodTypeAny>(schema: S, value: unknown, what: string): output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? ` (${issue.path.join(".")})` : "";
    throw new ValidationError(`Invalid ${what}: ${issue?.message ?? "unknown error"}${where}`, {
      issues: result.error.issues,
    });
  }
  return result.data;
}
