import PDFDocument from "pdfkit";
import { EntryRole, PageSize } from "../common/common-enum";
import { MM, PAGE_SIZES, SHEET_CONSTANTS } from "../utils/constants";
import type {
  PageHeader,
  Placement,
  SheetEntry,
  SheetLayout,
} from "../types/model/sheet.model";

/**
 * Drawing surface for a sheet. `y` is measured upwards from the bottom edge
 * of the page, the same system the page flow uses for offsets; text is drawn
 * on its baseline and rectangles from their bottom-left corner.
 */
export interface SheetCanvas {
  addPage(): void;
  setFont(name: string, size: number): void;
  text(value: string, x: number, y: number): void;
  centredText(value: string, centreX: number, y: number): void;
  rect(x: number, y: number, width: number, height: number): void;
}

export interface SheetRenderOptions {
  leftMargin: number;
  partnerIndent: number;
}

const DEFAULT_OPTIONS: SheetRenderOptions = {
  leftMargin: SHEET_CONSTANTS.MARGIN,
  partnerIndent: SHEET_CONSTANTS.PARTNER_INDENT,
};

export function formatEntryMeta(entry: SheetEntry): string | null {
  const parts: string[] = [];
  if (entry.repsText !== null) parts.push(`${entry.repsText} reps`);
  if (entry.restSeconds !== null) parts.push(`${entry.restSeconds}s rest`);
  if (entry.comment) parts.push(entry.comment);
  return parts.length > 0 ? parts.join(", ") : null;
}

function drawHeader(canvas: SheetCanvas, header: PageHeader, options: SheetRenderOptions) {
  const { TITLE } = SHEET_CONSTANTS.FONTS;
  canvas.setFont(TITLE.name, TITLE.size);
  canvas.text(header.title, options.leftMargin, header.offset);
}

// One "reps" and one "kg" box per set
function drawSetBoxes(canvas: SheetCanvas, x: number, top: number, sets: number) {
  const { BOX_WIDTH, BOX_HEIGHT, BOX_GAP, FONTS } = SHEET_CONSTANTS;
  const bottom = top - BOX_HEIGHT;
  const labelY = bottom + 1.5 * MM;

  canvas.setFont(FONTS.BOX_LABEL.name, FONTS.BOX_LABEL.size);
  let boxX = x;
  for (let set = 0; set < sets; set++) {
    canvas.rect(boxX, bottom, BOX_WIDTH, BOX_HEIGHT);
    canvas.centredText("reps", boxX + BOX_WIDTH / 2, labelY);
    boxX += BOX_WIDTH;
    canvas.rect(boxX, bottom, BOX_WIDTH, BOX_HEIGHT);
    canvas.centredText("kg", boxX + BOX_WIDTH / 2, labelY);
    boxX += BOX_WIDTH + BOX_GAP;
  }
}

function drawEntry(canvas: SheetCanvas, placement: Placement, options: SheetRenderOptions) {
  const { entry, offset } = placement;
  const { FONTS, GRID_OFFSET } = SHEET_CONSTANTS;
  const x =
    options.leftMargin + (entry.role === EntryRole.PARTNER ? options.partnerIndent : 0);

  canvas.setFont(FONTS.NAME.name, FONTS.NAME.size);
  canvas.text(entry.name, x, offset + 1 * MM);

  const meta = formatEntryMeta(entry);
  if (meta) {
    canvas.setFont(FONTS.META.name, FONTS.META.size);
    canvas.text(meta, x, offset - 2 * MM);
  }

  drawSetBoxes(canvas, options.leftMargin + GRID_OFFSET, offset + 6 * MM, entry.sets);
}

/**
 * Replay a layout onto a canvas. Placements are already ordered by page, so
 * pages are opened in sequence and never revisited.
 */
export function renderSheet(
  layout: SheetLayout,
  canvas: SheetCanvas,
  options: SheetRenderOptions = DEFAULT_OPTIONS
): void {
  let next = 0;
  for (const header of layout.pages) {
    if (header.pageIndex > 0) canvas.addPage();
    drawHeader(canvas, header, options);

    while (
      next < layout.placements.length &&
      layout.placements[next].pageIndex === header.pageIndex
    ) {
      drawEntry(canvas, layout.placements[next], options);
      next += 1;
    }
  }
}

export class PdfSheetCanvas implements SheetCanvas {
  private readonly doc: PDFKit.PDFDocument;
  private readonly width: number;
  private readonly height: number;
  private readonly output: Promise<Buffer>;

  constructor(pageSize: PageSize = PageSize.A4) {
    const { width, height } = PAGE_SIZES[pageSize];
    this.width = width;
    this.height = height;
    this.doc = new PDFDocument({ size: [width, height], margin: 0 });

    const chunks: Buffer[] = [];
    this.output = new Promise<Buffer>((resolve, reject) => {
      this.doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      this.doc.on("end", () => resolve(Buffer.concat(chunks)));
      this.doc.on("error", reject);
    });
  }

  addPage(): void {
    this.doc.addPage({ size: [this.width, this.height], margin: 0 });
  }

  setFont(name: string, size: number): void {
    this.doc.font(name).fontSize(size);
  }

  text(value: string, x: number, y: number): void {
    this.doc.text(value, x, this.height - y, {
      lineBreak: false,
      baseline: "alphabetic",
    });
  }

  centredText(value: string, centreX: number, y: number): void {
    this.text(value, centreX - this.doc.widthOfString(value) / 2, y);
  }

  rect(x: number, y: number, width: number, height: number): void {
    this.doc.rect(x, this.height - y - height, width, height).stroke();
  }

  finish(): Promise<Buffer> {
    this.doc.end();
    return this.output;
  }
}
