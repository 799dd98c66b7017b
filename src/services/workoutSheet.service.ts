import { PageSize } from "../common/common-enum";
import { loadConfig } from "../configs/environment";
import { sanitizeFileName } from "../utils/convert";
import { logger } from "../utils/logger";
import { NotFoundError } from "../types/response/error.response";
import type { ExerciseCatalog } from "../types/model/exercise.model";
import type { Workout } from "../types/model/workout.model";
import type { PageGeometry, SheetLayout } from "../types/model/sheet.model";
import { resolvePairs } from "./pairingResolver.service";
import { buildEntryBlocks, sequenceBlocks } from "./entrySequencer.service";
import { defaultPageGeometry, layoutSheet } from "./pageFlow.service";
import { PdfSheetCanvas, renderSheet } from "./sheetRenderer.service";
import { workoutStore } from "./workoutStore.service";
import type { WorkoutStore } from "./workoutStore.service";

export interface RenderedSheet {
  workoutId: number;
  fileName: string;
  pageCount: number;
  pdf: Buffer;
}

export function sheetFileName(workout: Workout): string {
  return `workout_${workout.id}_${sanitizeFileName(workout.name)}.pdf`;
}

/** Pairing, sequencing and pagination for one workout. Pure. */
export function layoutWorkout(
  workout: Workout,
  catalog: ExerciseCatalog,
  geometry: PageGeometry
): SheetLayout {
  const adjacency = resolvePairs(workout.pairedSets);
  const blocks = sequenceBlocks(workout.exerciseIds, adjacency);
  return layoutSheet(workout.name, buildEntryBlocks(blocks, catalog), geometry);
}

export class WorkoutSheetService {
  private readonly geometry: PageGeometry;

  constructor(
    private readonly store: WorkoutStore,
    private readonly pageSize: PageSize = PageSize.A4
  ) {
    this.geometry = defaultPageGeometry(pageSize);
  }

  async getWorkout(workoutId: number): Promise<Workout> {
    const workout = await this.store.getWorkout(workoutId);
    if (!workout) {
      throw new NotFoundError(`Workout ${workoutId} not found`);
    }
    return workout;
  }

  async buildLayout(workoutId: number): Promise<SheetLayout> {
    return this.layoutFor(await this.getWorkout(workoutId));
  }

  async layoutFor(workout: Workout): Promise<SheetLayout> {
    const catalog = await this.store.getExercises(workout.exerciseIds);
    const missing = workout.exerciseIds.filter((id) => !catalog.has(id));
    if (missing.length > 0) {
      logger.warn(
        `Workout ${workout.id} references unknown exercises: ${missing.join(", ")}`
      );
    }
    return layoutWorkout(workout, catalog, this.geometry);
  }

  async renderWorkout(workout: Workout): Promise<RenderedSheet> {
    const layout = await this.layoutFor(workout);
    const canvas = new PdfSheetCanvas(this.pageSize);
    renderSheet(layout, canvas);
    const pdf = await canvas.finish();

    logger.info(
      `[WorkoutSheetService] - Rendered workout ${workout.id} on ${layout.pageCount} page(s)`
    );
    return {
      workoutId: workout.id,
      fileName: sheetFileName(workout),
      pageCount: layout.pageCount,
      pdf,
    };
  }

  async renderPdf(workoutId: number): Promise<RenderedSheet> {
    return this.renderWorkout(await this.getWorkout(workoutId));
  }
}

export const workoutSheetService = new WorkoutSheetService(
  workoutStore,
  loadConfig().sheets.pageSize === "LETTER" ? PageSize.LETTER : PageSize.A4
);
