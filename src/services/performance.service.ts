import { logger } from "../utils/logger";
import { parseNumberList, toIsoDate } from "../utils/convert";
import { BadRequestError, NotFoundError } from "../types/response/error.response";
import type { PerformanceEntry } from "../types/model/performance.model";
import type {
  PerformanceEntryInput,
  RecordPerformanceRequest,
} from "../types/request/performanceRequest";
import { workoutStore } from "./workoutStore.service";
import type { WorkoutStore } from "./workoutStore.service";

/**
 * Line weights up with sets: a single weight applies to every set, extra
 * weights are dropped and missing ones count as 0 kg.
 */
export function alignWeights(reps: readonly number[], weights: readonly number[]): number[] {
  if (reps.length === 0) return [];
  if (weights.length === 1 && reps.length > 1) {
    return reps.map(() => weights[0]);
  }
  return reps.map((_, index) => weights[index] ?? 0);
}

export class PerformanceService {
  constructor(private readonly store: WorkoutStore) {}

  /**
   * Record one session: a row per exercise of the workout, in workout order.
   * Exercises without reps are stored empty ("finished earlier").
   */
  async recordSession(
    workoutId: number,
    request: RecordPerformanceRequest
  ): Promise<PerformanceEntry[]> {
    const workout = await this.store.getWorkout(workoutId);
    if (!workout) {
      throw new NotFoundError(`Workout ${workoutId} not found`);
    }

    const date = toIsoDate(request.date);
    const inputs = new Map<number, PerformanceEntryInput>();
    for (const input of request.entries) {
      if (!workout.exerciseIds.includes(input.exerciseId)) {
        throw new BadRequestError(
          `Exercise ${input.exerciseId} is not part of workout ${workoutId}`
        );
      }
      if (inputs.has(input.exerciseId)) {
        throw new BadRequestError(`Exercise ${input.exerciseId} is listed more than once`);
      }
      inputs.set(input.exerciseId, input);
    }

    const rows = [...new Set(workout.exerciseIds)].map((exerciseId): PerformanceEntry => {
      const input = inputs.get(exerciseId);
      const reps = parseNumberList(input?.reps, "reps", true);
      const weights = parseNumberList(input?.weights, "weights");
      return {
        workoutId,
        exerciseId,
        date,
        reps,
        weights: alignWeights(reps, weights),
      };
    });

    await this.store.insertPerformance(rows);
    logger.info(
      `[PerformanceService] - Recorded ${rows.length} rows for workout ${workoutId} on ${date}`
    );
    return rows;
  }

  async listSessions(workoutId: number): Promise<PerformanceEntry[]> {
    const workout = await this.store.getWorkout(workoutId);
    if (!workout) {
      throw new NotFoundError(`Workout ${workoutId} not found`);
    }
    return this.store.listPerformance({ workoutId });
  }
}

export const performanceService = new PerformanceService(workoutStore);
