import type { Request, Response } from "express";
import { logger } from "../utils/logger";
import { sendFailure, sendSuccess } from "../utils/response";
import {
  performanceService,
  PerformanceService,
} from "../services/performance.service";
import type { RecordPerformanceRequest } from "../types/request/performanceRequest";

export class PerformanceController {
  constructor(private readonly performance: PerformanceService) {}

  /**
   * @route POST /api/workouts/:workoutId/performance
   * @desc Record one session of a workout
   */
  recordSession = async (req: Request, res: Response) => {
    try {
      const workoutId = Number(req.params.workoutId);
      const request: RecordPerformanceRequest = req.body;

      logger.info(`[Controller] - Recording performance for workout ${workoutId}`);
      const rows = await this.performance.recordSession(workoutId, request);
      sendSuccess(res, `Recorded ${rows.length} performance rows`, rows, 201);
    } catch (error) {
      logger.error("record performance error:", error);
      sendFailure(res, "Failed to record performance", error);
    }
  };

  /**
   * @route GET /api/workouts/:workoutId/performance
   */
  listSessions = async (req: Request, res: Response) => {
    try {
      const rows = await this.performance.listSessions(Number(req.params.workoutId));
      sendSuccess(res, `Found ${rows.length} performance rows`, rows);
    } catch (error) {
      logger.error("list performance error:", error);
      sendFailure(res, "Failed to list performance", error);
    }
  };
}

export default new PerformanceController(performanceService);
