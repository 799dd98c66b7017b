import type { Request, Response } from "express";
import { logger } from "../utils/logger";
import { sendFailure, sendPdf, sendSuccess } from "../utils/response";
import { workoutStore } from "../services/workoutStore.service";
import type { WorkoutStore } from "../services/workoutStore.service";
import {
  workoutSheetService,
  WorkoutSheetService,
} from "../services/workoutSheet.service";
import { progressService, ProgressService } from "../services/progress.service";

export class WorkoutController {
  constructor(
    private readonly store: WorkoutStore,
    private readonly sheets: WorkoutSheetService,
    private readonly progress: ProgressService
  ) {}

  /**
   * @route GET /api/workouts
   */
  listWorkouts = async (_req: Request, res: Response) => {
    try {
      const workouts = await this.store.listWorkouts();
      sendSuccess(res, `Found ${workouts.length} workouts`, workouts);
    } catch (error) {
      logger.error("list workouts error:", error);
      sendFailure(res, "Failed to list workouts", error);
    }
  };

  /**
   * @route GET /api/workouts/:workoutId
   * @desc Workout with its entries in printed order
   */
  getWorkout = async (req: Request, res: Response) => {
    try {
      const workout = await this.sheets.getWorkout(Number(req.params.workoutId));
      const layout = await this.sheets.layoutFor(workout);
      sendSuccess(res, "Workout retrieved", {
        ...workout,
        entries: layout.placements.map((placement) => placement.entry),
      });
    } catch (error) {
      logger.error("get workout error:", error);
      sendFailure(res, "Failed to retrieve workout", error);
    }
  };

  /**
   * @route GET /api/workouts/:workoutId/sheet/layout
   */
  getSheetLayout = async (req: Request, res: Response) => {
    try {
      const layout = await this.sheets.buildLayout(Number(req.params.workoutId));
      sendSuccess(res, `Sheet laid out on ${layout.pageCount} page(s)`, layout);
    } catch (error) {
      logger.error("sheet layout error:", error);
      sendFailure(res, "Failed to lay out workout sheet", error);
    }
  };

  /**
   * @route GET /api/workouts/:workoutId/sheet
   * @desc Printable PDF
   */
  downloadSheet = async (req: Request, res: Response) => {
    try {
      const sheet = await this.sheets.renderPdf(Number(req.params.workoutId));
      sendPdf(res, sheet.fileName, sheet.pdf);
    } catch (error) {
      logger.error("sheet render error:", error);
      sendFailure(res, "Failed to render workout sheet", error);
    }
  };

  /**
   * @route GET /api/workouts/:workoutId/progress
   */
  getProgress = async (req: Request, res: Response) => {
    try {
      const progress = await this.progress.workoutProgress(Number(req.params.workoutId));
      sendSuccess(res, "Workout progress retrieved", progress);
    } catch (error) {
      logger.error("workout progress error:", error);
      sendFailure(res, "Failed to compute workout progress", error);
    }
  };
}

// Export class instance (Singleton)
export default new WorkoutController(workoutStore, workoutSheetService, progressService);
