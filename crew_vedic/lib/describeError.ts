import { ComputationError } from "../../astro/errors.js";

/**
 * "<kind>: <message>" for computation errors, the plain message otherwise.
 */
export function describeError(err: unknown): string {
  if (err instanceof ComputationError) {
    return `${err.kind}: ${err.message}`;
  }
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}
