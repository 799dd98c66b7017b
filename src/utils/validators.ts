import Joi from "joi";
import { CATALOG_CONSTANTS, DB_CONSTANTS } from "./constants";

const { MAX_INT } = DB_CONSTANTS;
const catalogId = () => Joi.number().integer().positive().max(MAX_INT);

export interface ExerciseRecord {
  id: number;
  name?: string;
  sets?: number;
  reps?: number[] | null;
  comment?: string | null;
  rest?: number | null;
}

export interface WorkoutRecord {
  id: number;
  name?: string;
  comment?: string | null;
  exercises: number[];
  paired_sets: unknown[][];
}

export const exerciseRecordSchema = Joi.object<ExerciseRecord>({
  id: catalogId().required(),
  name: Joi.string().allow("").optional(),
  sets: Joi.number().integer().positive().max(MAX_INT).optional(),
  reps: Joi.array()
    .items(Joi.number().integer().min(CATALOG_CONSTANTS.TO_FAILURE_SENTINEL).max(MAX_INT))
    .min(1)
    .max(2)
    .allow(null)
    .optional(),
  comment: Joi.string().allow("", null).optional(),
  rest: Joi.number().integer().min(0).max(MAX_INT).allow(null).optional(),
}).unknown(true);

export const workoutRecordSchema = Joi.object<WorkoutRecord>({
  id: catalogId().required(),
  name: Joi.string().allow("").optional(),
  comment: Joi.string().allow("", null).optional(),
  exercises: Joi.array().items(catalogId()).allow(null).empty(null).default([]),
  // declarations are kept raw; malformed ones are skipped at render time
  paired_sets: Joi.array().items(Joi.array()).allow(null).empty(null).default([]),
}).unknown(true);
