import { z } from "zod";
import { DB_CONSTANTS } from "../utils/constants";
import { workoutParamsSchema } from "./workout.validator";

const repsList = z.union([
  z.array(
    z
      .number({ invalid_type_error: "reps must be numbers" })
      .int("reps must be integers")
      .min(0, "reps must not be negative")
      .max(DB_CONSTANTS.MAX_INT, "reps are too large")
  ),
  z.string(),
]);

const weightsList = z.union([
  z.array(z.number({ invalid_type_error: "weights must be numbers" })),
  z.string(),
]);

export const recordPerformanceSchema = {
  params: workoutParamsSchema.params,
  body: z.object({
    date: z.string().optional(),
    entries: z
      .array(
        z.object({
          exerciseId: z
            .number()
            .int("exerciseId must be an integer")
            .positive("exerciseId must be positive")
            .max(DB_CONSTANTS.MAX_INT, "exerciseId is too large"),
          reps: repsList.optional(),
          weights: weightsList.optional(),
        })
      )
      .default([]),
  }),
};
