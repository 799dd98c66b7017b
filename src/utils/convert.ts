import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";
import { BadRequestError } from "../types/response/error.response";
import { DB_CONSTANTS } from "./constants";
// active plugin dayjs
dayjs.extend(customParseFormat);

export const ISO_DATE = "YYYY-MM-DD";

/** Strict YYYY-MM-DD; today when the input is blank. */
export function toIsoDate(dateStr?: string | null): string {
  const trimmed = (dateStr ?? "").trim();
  if (!trimmed) {
    return dayjs().format(ISO_DATE);
  }
  const parsedDate = dayjs(trimmed, ISO_DATE, true);
  if (!parsedDate.isValid()) {
    throw new BadRequestError(`Invalid date "${trimmed}", expected ${ISO_DATE}`);
  }
  return parsedDate.format(ISO_DATE);
}

export function sanitizeFileName(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]+/g, "_").replace(/^_+|_+$/g, "");
}

/**
 * Accepts either a list of numbers or the comma-separated form typed by
 * users ("10, 8,6"). Blank items are dropped.
 */
export function parseNumberList(
  value: number[] | string | undefined,
  field: string,
  integer = false
): number[] {
  if (value === undefined) return [];

  const items = Array.isArray(value)
    ? value
    : value
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .map(Number);

  for (const item of items) {
    if (!Number.isFinite(item) || (integer && !Number.isInteger(item))) {
      throw new BadRequestError(
        `${field} must contain only ${integer ? "integers" : "numbers"}`
      );
    }
    if (integer && (item < 0 || item > DB_CONSTANTS.MAX_INT)) {
      throw new BadRequestError(`${field} must be between 0 and ${DB_CONSTANTS.MAX_INT}`);
    }
  }
  return items;
}
