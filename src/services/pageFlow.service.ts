import { EntryRole, PageSize } from "../common/common-enum";
import { PAGE_SIZES, SHEET_CONSTANTS } from "../utils/constants";
import { SheetConfigurationError } from "../types/response/error.response";
import type {
  PageGeometry,
  PageHeader,
  Placement,
  SheetEntry,
  SheetLayout,
} from "../types/model/sheet.model";

export function defaultPageGeometry(pageSize: PageSize = PageSize.A4): PageGeometry {
  return {
    pageHeight: PAGE_SIZES[pageSize].height,
    topMargin: SHEET_CONSTANTS.MARGIN,
    bottomMargin: SHEET_CONSTANTS.MARGIN,
    headerHeight: SHEET_CONSTANTS.HEADER_HEIGHT,
    primaryRowHeight: SHEET_CONSTANTS.PRIMARY_ROW_HEIGHT,
    partnerRowHeight: SHEET_CONSTANTS.PARTNER_ROW_HEIGHT,
    pairedBlockGap: SHEET_CONSTANTS.PAIRED_BLOCK_GAP,
    singleBlockGap: SHEET_CONSTANTS.SINGLE_BLOCK_GAP,
    breakThreshold: SHEET_CONSTANTS.BREAK_THRESHOLD,
  };
}

/** Where the first entry of every page is placed. */
export function firstRowOffset(geometry: PageGeometry): number {
  return geometry.pageHeight - geometry.topMargin - geometry.headerHeight;
}

export function rowHeight(entry: SheetEntry, geometry: PageGeometry): number {
  return entry.role === EntryRole.PARTNER
    ? geometry.partnerRowHeight
    : geometry.primaryRowHeight;
}

export function shouldBreakPage(
  cursor: number,
  entryHeight: number,
  geometry: PageGeometry
): boolean {
  return cursor - entryHeight < geometry.bottomMargin + geometry.breakThreshold;
}

export function validateGeometry(geometry: PageGeometry): void {
  const positive: (keyof PageGeometry)[] = [
    "pageHeight",
    "primaryRowHeight",
    "partnerRowHeight",
  ];
  const nonNegative: (keyof PageGeometry)[] = [
    "topMargin",
    "bottomMargin",
    "headerHeight",
    "pairedBlockGap",
    "singleBlockGap",
    "breakThreshold",
  ];

  for (const key of positive) {
    if (!Number.isFinite(geometry[key]) || geometry[key] <= 0) {
      throw new SheetConfigurationError(`${key} must be positive, got ${geometry[key]}`);
    }
  }
  for (const key of nonNegative) {
    if (!Number.isFinite(geometry[key]) || geometry[key] < 0) {
      throw new SheetConfigurationError(`${key} must not be negative, got ${geometry[key]}`);
    }
  }

  const tallestRow = Math.max(geometry.primaryRowHeight, geometry.partnerRowHeight);
  if (shouldBreakPage(firstRowOffset(geometry), tallestRow, geometry)) {
    throw new SheetConfigurationError(
      "Page geometry leaves no room for a single row below the header"
    );
  }
}

/**
 * Place entries top to bottom, one block after another, starting a new page
 * whenever the next row would cross `bottomMargin + breakThreshold`.
 * The check runs before each row, so a row is never split and partners may
 * continue on the next page. The header is repeated on every page.
 */
export function layoutSheet(
  title: string,
  entryBlocks: readonly (readonly SheetEntry[])[],
  geometry: PageGeometry
): SheetLayout {
  validateGeometry(geometry);

  const headerOffset = geometry.pageHeight - geometry.topMargin;
  const pages: PageHeader[] = [{ pageIndex: 0, title, offset: headerOffset }];
  const placements: Placement[] = [];

  let pageIndex = 0;
  let cursor = firstRowOffset(geometry);

  for (const block of entryBlocks) {
    if (block.length === 0) continue;

    for (const entry of block) {
      const height = rowHeight(entry, geometry);
      if (shouldBreakPage(cursor, height, geometry)) {
        pageIndex += 1;
        cursor = firstRowOffset(geometry);
        pages.push({ pageIndex, title, offset: headerOffset });
      }

      placements.push({ pageIndex, offset: cursor, entry });
      cursor -= height;
    }

    const paired = block.some((entry) => entry.role === EntryRole.PARTNER);
    cursor -= paired ? geometry.pairedBlockGap : geometry.singleBlockGap;
  }

  return { title, pageCount: pages.length, pages, placements };
}
