import { type, type ArkErrors } from "arktype";

/** Runs an arktype schema and returns the validated value, or throws with the schema summary. */
export function assertSchema<T>(
  schema: (value: unknown) => T | ArkErrors,
  value: unknown,
  fail: (summary: string) => Error
): T {
  const out = schema(value);
  if (out instanceof type.errors) {
    throw fail(out.summary);
  }
  return out;
}
