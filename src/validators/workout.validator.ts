import { z } from "zod";
import { DB_CONSTANTS } from "../utils/constants";

const positiveId = (field: string) =>
  z.coerce
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .positive(`${field} must be positive`)
    .max(DB_CONSTANTS.MAX_INT, `${field} is too large`);

export const workoutParamsSchema = {
  params: z.object({
    workoutId: positiveId("workoutId"),
  }),
};

export const exerciseParamsSchema = {
  params: z.object({
    exerciseId: positiveId("exerciseId"),
  }),
};
