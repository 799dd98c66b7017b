/**
 * Page Flow Tests
 *
 * Covers: break arithmetic, gaps, header repetition, geometry validation
 */

import { describe, it, expect } from "vitest";
import { EntryRole, PageSize } from "../common/common-enum";
import { PAGE_SIZES, SHEET_CONSTANTS } from "../utils/constants";
import { SheetConfigurationError } from "../types/response/error.response";
import type { PageGeometry, SheetEntry } from "../types/model/sheet.model";
import {
  defaultPageGeometry,
  firstRowOffset,
  layoutSheet,
  shouldBreakPage,
  validateGeometry,
} from "./pageFlow.service";

const GEOMETRY: PageGeometry = {
  pageHeight: 200,
  topMargin: 0,
  bottomMargin: 0,
  headerHeight: 20,
  primaryRowHeight: 30,
  partnerRowHeight: 25,
  pairedBlockGap: 10,
  singleBlockGap: 10,
  breakThreshold: 40,
};

const entry = (exerciseId: number, blockIndex: number, role = EntryRole.PRIMARY): SheetEntry => ({
  exerciseId,
  blockIndex,
  role,
  name: `Exercise ${exerciseId}`,
  sets: 3,
  repsText: null,
  comment: null,
  restSeconds: null,
  missing: false,
});

const singles = (count: number) =>
  Array.from({ length: count }, (_, i) => [entry(i + 1, i)]);

describe("shouldBreakPage", () => {
  it("breaks only when the row would end below bottom margin plus threshold", () => {
    expect(shouldBreakPage(70, 30, GEOMETRY)).toBe(false); // ends at 40
    expect(shouldBreakPage(69, 30, GEOMETRY)).toBe(true);
    expect(shouldBreakPage(75, 30, { ...GEOMETRY, bottomMargin: 10 })).toBe(true);
  });
});

describe("layoutSheet", () => {
  it("starts below the header and breaks before the fourth of five single blocks", () => {
    const layout = layoutSheet("Push", singles(5), GEOMETRY);

    expect(firstRowOffset(GEOMETRY)).toBe(180);
    expect(layout.placements.map((p) => [p.entry.exerciseId, p.pageIndex, p.offset])).toEqual([
      [1, 0, 180],
      [2, 0, 140],
      [3, 0, 100],
      [4, 1, 180],
      [5, 1, 140],
    ]);
    expect(layout.pageCount).toBe(2);
  });

  it("repeats the header on every page", () => {
    const layout = layoutSheet("Push", singles(9), GEOMETRY);

    expect(layout.pages).toEqual([
      { pageIndex: 0, title: "Push", offset: 200 },
      { pageIndex: 1, title: "Push", offset: 200 },
      { pageIndex: 2, title: "Push", offset: 200 },
    ]);
    expect(layout.pageCount).toBe(3);
  });

  it("uses partner row height inside a block and the paired gap after it", () => {
    const geometry = { ...GEOMETRY, pairedBlockGap: 15, singleBlockGap: 5 };
    const layout = layoutSheet(
      "Supersets",
      [[entry(1, 0), entry(2, 0, EntryRole.PARTNER)], [entry(3, 1)], [entry(4, 2)]],
      geometry
    );

    // 180 - 30 = 150 partner, 150 - 25 - 15 = 110, 110 - 30 - 5 = 75
    expect(layout.placements.map((p) => p.offset)).toEqual([180, 150, 110, 75]);
    expect(layout.pageCount).toBe(1);
  });

  it("lets partners continue on the next page", () => {
    const layout = layoutSheet(
      "Long",
      [
        [entry(1, 0)],
        [entry(2, 1)],
        [entry(3, 2), entry(4, 2, EntryRole.PARTNER), entry(5, 2, EntryRole.PARTNER)],
      ],
      GEOMETRY
    );

    // 3 at 100, partner 4 needs 70 - 25 = 45 >= 40, partner 5 needs 45 - 25 < 40
    expect(layout.placements.map((p) => [p.entry.exerciseId, p.pageIndex, p.offset])).toEqual([
      [1, 0, 180],
      [2, 0, 140],
      [3, 0, 100],
      [4, 0, 70],
      [5, 1, 180],
    ]);
  });

  it("keeps page indices non-decreasing", () => {
    const layout = layoutSheet("Many", singles(25), GEOMETRY);
    const indices = layout.placements.map((p) => p.pageIndex);

    expect(indices).toEqual([...indices].sort((a, b) => a - b));
    expect(layout.placements).toHaveLength(25);
  });

  it("produces a single page with only a header for an empty workout", () => {
    const layout = layoutSheet("Rest day", [], GEOMETRY);

    expect(layout).toEqual({
      title: "Rest day",
      pageCount: 1,
      pages: [{ pageIndex: 0, title: "Rest day", offset: 200 }],
      placements: [],
    });
  });

  it("skips empty blocks without adding a gap", () => {
    const layout = layoutSheet("Gaps", [[entry(1, 0)], [], [entry(2, 2)]], GEOMETRY);

    expect(layout.placements.map((p) => p.offset)).toEqual([180, 140]);
  });

  it("lays out independent calls with their own page state", () => {
    const first = layoutSheet("A", singles(5), GEOMETRY);
    const second = layoutSheet("A", singles(5), GEOMETRY);

    expect(second).toEqual(first);
  });
});

describe("validateGeometry", () => {
  it("accepts the default page geometries", () => {
    expect(() => validateGeometry(defaultPageGeometry(PageSize.A4))).not.toThrow();
    expect(() => validateGeometry(defaultPageGeometry(PageSize.LETTER))).not.toThrow();
  });

  it("derives the default geometry from the page size", () => {
    const geometry = defaultPageGeometry(PageSize.LETTER);

    expect(geometry.pageHeight).toBe(PAGE_SIZES[PageSize.LETTER].height);
    expect(geometry.breakThreshold).toBe(SHEET_CONSTANTS.BREAK_THRESHOLD);
  });

  it("rejects non-positive heights", () => {
    expect(() => validateGeometry({ ...GEOMETRY, primaryRowHeight: 0 })).toThrow(
      new SheetConfigurationError("primaryRowHeight must be positive, got 0")
    );
  });

  it("rejects negative margins", () => {
    expect(() => validateGeometry({ ...GEOMETRY, bottomMargin: -1 })).toThrow(
      "bottomMargin must not be negative, got -1"
    );
  });

  it("rejects a page with no room for a row below the header", () => {
    expect(() =>
      layoutSheet("Tiny", singles(1), { ...GEOMETRY, breakThreshold: 160 })
    ).toThrow(SheetConfigurationError);
  });
});
