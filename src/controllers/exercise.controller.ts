import type { Request, Response } from "express";
import { logger } from "../utils/logger";
import { sendFailure, sendSuccess } from "../utils/response";
import { workoutStore } from "../services/workoutStore.service";
import type { WorkoutStore } from "../services/workoutStore.service";
import { progressService, ProgressService } from "../services/progress.service";

export class ExerciseController {
  constructor(
    private readonly store: WorkoutStore,
    private readonly progress: ProgressService
  ) {}

  listExercises = async (_req: Request, res: Response) => {
    try {
      const exercises = await this.store.listExercises();
      sendSuccess(res, `Found ${exercises.length} exercises`, exercises);
    } catch (error) {
      logger.error("list exercises error:", error);
      sendFailure(res, "Failed to list exercises", error);
    }
  };

  getProgress = async (req: Request, res: Response) => {
    try {
      const progress = await this.progress.exerciseProgress(Number(req.params.exerciseId));
      sendSuccess(res, "Exercise progress retrieved", progress);
    } catch (error) {
      logger.error("exercise progress error:", error);
      sendFailure(res, "Failed to compute exercise progress", error);
    }
  };
}

export default new ExerciseController(workoutStore, progressService);
