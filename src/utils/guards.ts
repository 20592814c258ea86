/**
 * Runtime guard utilities used to enforce deterministic codepaths.
 * The caller supplies the error to raise so that each guard surfaces the
 * error code of the layer it protects.
 */

export type ErrorFactory = () => Error;

export function invariant(condition: unknown, fail: ErrorFactory): asserts condition {
  if (condition) return;
  throw fail();
}

export function assertString(value: unknown, fail: ErrorFactory): asserts value is string {
  invariant(typeof value === "string", fail);
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}
