import type { EntryRole } from "../../common/common-enum";

export type AdjacencyMap = Map<number, Set<number>>;

export interface Block {
  primaryId: number;
  partnerIds: number[];
}

export interface SheetEntry {
  exerciseId: number;
  blockIndex: number;
  role: EntryRole;
  name: string;
  sets: number;
  repsText: string | null;
  comment: string | null;
  restSeconds: number | null;
  missing: boolean;
}

/**
 * Vertical page model. Offsets are measured upwards from the bottom edge of
 * the page, so the cursor decreases as entries are placed.
 */
export interface PageGeometry {
  pageHeight: number;
  topMargin: number;
  bottomMargin: number;
  headerHeight: number;
  primaryRowHeight: number;
  partnerRowHeight: number;
  pairedBlockGap: number;
  singleBlockGap: number;
  breakThreshold: number;
}

export interface PageHeader {
  pageIndex: number;
  title: string;
  offset: number;
}

export interface Placement {
  pageIndex: number;
  offset: number;
  entry: SheetEntry;
}

export interface SheetLayout {
  title: string;
  pageCount: number;
  pages: PageHeader[];
  placements: Placement[];
}
