import { PageSize } from "../common/common-enum";

/** PDF points per millimetre. */
export const MM = 72 / 25.4;

export const CATALOG_CONSTANTS = {
  DEFAULT_SETS: 3,
  // reps: [8, -99] in the catalog means "8 or more, to failure"
  TO_FAILURE_SENTINEL: -99,
} as const;

// Postgres INTEGER columns hold ids, sets, rest and reps
export const DB_CONSTANTS = {
  MAX_INT: 2147483647,
} as const;

export const PAGE_SIZES: Record<PageSize, { width: number; height: number }> = {
  [PageSize.A4]: { width: 595.28, height: 841.89 },
  [PageSize.LETTER]: { width: 612, height: 792 },
};

export const SHEET_CONSTANTS = {
  MARGIN: 12 * MM,
  HEADER_HEIGHT: 10 * MM,
  PRIMARY_ROW_HEIGHT: 8 * MM,
  PARTNER_ROW_HEIGHT: 7 * MM,
  PAIRED_BLOCK_GAP: 8 * MM,
  SINGLE_BLOCK_GAP: 7 * MM,
  BREAK_THRESHOLD: 22 * MM,
  PARTNER_INDENT: 6 * MM,
  GRID_OFFSET: 50 * MM,
  BOX_WIDTH: 14 * MM,
  BOX_HEIGHT: 8 * MM,
  BOX_GAP: 4 * MM,
  FONTS: {
    TITLE: { name: "Helvetica-Bold", size: 14 },
    NAME: { name: "Helvetica-Bold", size: 10 },
    META: { name: "Helvetica", size: 7 },
    BOX_LABEL: { name: "Helvetica", size: 6 },
  },
} as const;
