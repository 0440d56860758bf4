import { ValidationError } from "@netpulse/shared/errors";

/** Parse an optional `limit` query parameter. */
export function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  if (!/^[1-9]\d*$/.test(raw)) {
    throw new ValidationError("limit must be a positive integer");
  }
  return Number.parseInt(raw, 10);
}
