import { Pool, types } from "pg";
import type { PoolClient } from "pg";
import { DATABASE_CONFIG, WORKOUT_SCHEMA_SQL } from "../configs/database";
import { RepTargetKind } from "../common/common-enum";
import { logger } from "../utils/logger";
import { errorMessage } from "../types/response/error.response";
import type { Exercise, RepTarget } from "../types/model/exercise.model";
import type { PairedSetDeclaration, Workout } from "../types/model/workout.model";
import type {
  PerformanceEntry,
  PerformanceFilter,
} from "../types/model/performance.model";

// DATE columns stay YYYY-MM-DD strings
types.setTypeParser(1082, (val) => val);

/**
 * Persistence for the exercise catalog, workouts and recorded sessions.
 */
export interface WorkoutStore {
  initialize(): Promise<void>;
  listExercises(): Promise<Exercise[]>;
  getExercises(ids: readonly number[]): Promise<Map<number, Exercise>>;
  listWorkouts(): Promise<Workout[]>;
  getWorkout(id: number): Promise<Workout | null>;
  /** Replace exercises and workouts together; nothing is kept on failure. */
  replaceCatalog(
    exercises: readonly Exercise[],
    workouts: readonly Workout[]
  ): Promise<{ exercises: number; workouts: number }>;
  insertPerformance(entries: readonly PerformanceEntry[]): Promise<number>;
  listPerformance(filter?: PerformanceFilter): Promise<PerformanceEntry[]>;
  close(): Promise<void>;
}

interface ExerciseRow {
  id: number;
  name: string;
  sets: number;
  reps_min: number | null;
  reps_max: number | null;
  to_failure: boolean;
  comment: string | null;
  rest_seconds: number | null;
}

interface WorkoutRow {
  id: number;
  name: string;
  comment: string | null;
  exercise_ids: number[];
  paired_sets: unknown;
}

interface PerformanceRow {
  workout_id: number;
  exercise_id: number;
  performed_on: string;
  reps: number[];
  weights: number[];
}

const toRepTarget = (row: ExerciseRow): RepTarget | null => {
  if (row.reps_min === null) return null;
  if (row.to_failure) {
    return { kind: RepTargetKind.TO_FAILURE, min: row.reps_min };
  }
  return { kind: RepTargetKind.RANGE, min: row.reps_min, max: row.reps_max ?? row.reps_min };
};

const toExercise = (row: ExerciseRow): Exercise => ({
  id: row.id,
  name: row.name,
  sets: row.sets,
  reps: toRepTarget(row),
  comment: row.comment,
  restSeconds: row.rest_seconds,
});

const toDeclarations = (value: unknown): PairedSetDeclaration[] =>
  Array.isArray(value)
    ? value.filter((item): item is unknown[] => Array.isArray(item))
    : [];

const toWorkout = (row: WorkoutRow): Workout => ({
  id: row.id,
  name: row.name,
  comment: row.comment,
  exerciseIds: row.exercise_ids,
  pairedSets: toDeclarations(row.paired_sets),
});

const toPerformance = (row: PerformanceRow): PerformanceEntry => ({
  workoutId: row.workout_id,
  exerciseId: row.exercise_id,
  date: row.performed_on,
  reps: row.reps,
  weights: row.weights,
});

const EXERCISE_COLUMNS = `id, name, sets, reps_min, reps_max, to_failure, comment, rest_seconds`;
const WORKOUT_COLUMNS = `id, name, comment, exercise_ids, paired_sets`;

export class PgWorkoutStore implements WorkoutStore {
  private pool: Pool;

  constructor(pool?: Pool) {
    this.pool =
      pool ??
      new Pool({
        ...DATABASE_CONFIG,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });
  }

  async initialize(): Promise<void> {
    logger.info("Ensuring workout schema...");
    await this.pool.query(WORKOUT_SCHEMA_SQL);
  }

  async listExercises(): Promise<Exercise[]> {
    const result = await this.pool.query<ExerciseRow>(
      `SELECT ${EXERCISE_COLUMNS} FROM exercises ORDER BY id`
    );
    return result.rows.map(toExercise);
  }

  async getExercises(ids: readonly number[]): Promise<Map<number, Exercise>> {
    if (ids.length === 0) return new Map();
    const result = await this.pool.query<ExerciseRow>(
      `SELECT ${EXERCISE_COLUMNS} FROM exercises WHERE id = ANY($1::int[])`,
      [ids]
    );
    return new Map(result.rows.map((row) => [row.id, toExercise(row)]));
  }

  async listWorkouts(): Promise<Workout[]> {
    const result = await this.pool.query<WorkoutRow>(
      `SELECT ${WORKOUT_COLUMNS} FROM workouts ORDER BY id`
    );
    return result.rows.map(toWorkout);
  }

  async getWorkout(id: number): Promise<Workout | null> {
    const result = await this.pool.query<WorkoutRow>(
      `SELECT ${WORKOUT_COLUMNS} FROM workouts WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? toWorkout(result.rows[0]) : null;
  }

  async replaceCatalog(
    exercises: readonly Exercise[],
    workouts: readonly Workout[]
  ): Promise<{ exercises: number; workouts: number }> {
    return this.inTransaction(async (client) => {
      await client.query("DELETE FROM workouts");
      await client.query("DELETE FROM exercises");
      for (const exercise of exercises) {
        await client.query(
          `INSERT INTO exercises (${EXERCISE_COLUMNS})
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
          [
            exercise.id,
            exercise.name,
            exercise.sets,
            exercise.reps?.min ?? null,
            exercise.reps?.kind === RepTargetKind.RANGE ? exercise.reps.max : null,
            exercise.reps?.kind === RepTargetKind.TO_FAILURE,
            exercise.comment,
            exercise.restSeconds,
          ]
        );
      }
      for (const workout of workouts) {
        await client.query(
          `INSERT INTO workouts (${WORKOUT_COLUMNS})
           VALUES ($1, $2, $3, $4, $5)`,
          [
            workout.id,
            workout.name,
            workout.comment,
            workout.exerciseIds,
            JSON.stringify(workout.pairedSets),
          ]
        );
      }
      return { exercises: exercises.length, workouts: workouts.length };
    });
  }

  async insertPerformance(entries: readonly PerformanceEntry[]): Promise<number> {
    return this.inTransaction(async (client) => {
      for (const entry of entries) {
        await client.query(
          `INSERT INTO performance (workout_id, exercise_id, performed_on, reps, weights)
           VALUES ($1, $2, $3, $4, $5)`,
          [entry.workoutId, entry.exerciseId, entry.date, entry.reps, entry.weights]
        );
      }
      return entries.length;
    });
  }

  async listPerformance(filter: PerformanceFilter = {}): Promise<PerformanceEntry[]> {
    const conditions: string[] = [];
    const params: number[] = [];
    if (filter.workoutId !== undefined) {
      params.push(filter.workoutId);
      conditions.push(`workout_id = $${params.length}`);
    }
    if (filter.exerciseId !== undefined) {
      params.push(filter.exerciseId);
      conditions.push(`exercise_id = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const result = await this.pool.query<PerformanceRow>(
      `SELECT workout_id, exercise_id, performed_on, reps, weights
       FROM performance ${where}
       ORDER BY performed_on, id`,
      params
    );
    return result.rows.map(toPerformance);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async inTransaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    // set when the connection cannot be trusted any more
    let broken: Error | undefined;
    try {
      await client.query("BEGIN");
      const result = await work(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        broken =
          rollbackError instanceof Error ? rollbackError : new Error(errorMessage(rollbackError));
        logger.error("Rollback failed, discarding connection:", rollbackError);
      }
      logger.error("Workout store transaction rolled back:", error);
      throw error;
    } finally {
      client.release(broken);
    }
  }
}

export const workoutStore: WorkoutStore = new PgWorkoutStore();
