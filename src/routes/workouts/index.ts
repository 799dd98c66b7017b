import express from "express";
import workoutController from "../../controllers/workout.controller";
import performanceController from "../../controllers/performance.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { validateContentType } from "../../middlewares/validation.middleware";
import { workoutParamsSchema } from "../../validators/workout.validator";
import { recordPerformanceSchema } from "../../validators/performance.validator";

const router = express.Router();

router.get("/", workoutController.listWorkouts);
router.get("/:workoutId", validateRequest(workoutParamsSchema), workoutController.getWorkout);

// sheet
router.get(
  "/:workoutId/sheet/layout",
  validateRequest(workoutParamsSchema),
  workoutController.getSheetLayout
);
router.get(
  "/:workoutId/sheet",
  validateRequest(workoutParamsSchema),
  workoutController.downloadSheet
);

// performance
router.get(
  "/:workoutId/performance",
  validateRequest(workoutParamsSchema),
  performanceController.listSessions
);
router.post(
  "/:workoutId/performance",
  validateContentType,
  validateRequest(recordPerformanceSchema),
  performanceController.recordSession
);
router.get(
  "/:workoutId/progress",
  validateRequest(workoutParamsSchema),
  workoutController.getProgress
);

export default router;
