import express from "express";
import exerciseController from "../../controllers/exercise.controller";
import { validateRequest } from "../../middlewares/schema-validation.middleware";
import { exerciseParamsSchema } from "../../validators/workout.validator";

const router = express.Router();

router.get("/", exerciseController.listExercises);
router.get(
  "/:exerciseId/progress",
  validateRequest(exerciseParamsSchema),
  exerciseController.getProgress
);

export default router;
