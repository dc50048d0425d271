import { errorMessage } from "@tickweave/schemas";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

/** Splits a comma separated list and decodes every entry. Errors name the offending position. */
export function parseResponseList<R>(csv: string, decode: (raw: string) => R): R[] {
  if (csv.trim() === "") return [];
  return csv.split(",").map((raw, index) => {
    try {
      return decode(raw);
    } catch (err) {
      throw new Error(`Response ${index + 1} of "${csv}": ${errorMessage(err)}`);
    }
  });
}
