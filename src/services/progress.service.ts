import { progressCalculator, ProgressCalculator } from "../utils/calculators";
import { NotFoundError } from "../types/response/error.response";
import type { Exercise } from "../types/model/exercise.model";
import type { PerformanceEntry } from "../types/model/performance.model";
import type { ExerciseProgress, WorkoutProgress } from "../types/model/progress.model";
import { formatReps } from "./entrySequencer.service";
import { workoutStore } from "./workoutStore.service";
import type { WorkoutStore } from "./workoutStore.service";

/** "Bench Press (sets=3, reps=8-12, rest=90s)" */
export function seriesTitle(exerciseId: number, exercise: Exercise | undefined): string {
  if (!exercise) return `exercise_${exerciseId}`;

  const meta = [`sets=${exercise.sets}`];
  const reps = formatReps(exercise.reps);
  if (reps !== null) meta.push(`reps=${reps}`);
  if (exercise.restSeconds !== null) meta.push(`rest=${exercise.restSeconds}s`);
  return `${exercise.name} (${meta.join(", ")})`;
}

export class ProgressService {
  constructor(
    private readonly store: WorkoutStore,
    private readonly calculator: ProgressCalculator = progressCalculator
  ) {}

  async workoutProgress(workoutId: number): Promise<WorkoutProgress> {
    const workout = await this.store.getWorkout(workoutId);
    if (!workout) {
      throw new NotFoundError(`Workout ${workoutId} not found`);
    }

    const title = `${workout.name} (id=${workout.id})`;
    const rows = await this.store.listPerformance({ workoutId });
    if (rows.length === 0) {
      return { workoutId, title, exercises: [] };
    }

    const exerciseIds =
      workout.exerciseIds.length > 0
        ? [...new Set(workout.exerciseIds)]
        : [...new Set(rows.map((row) => row.exerciseId))].sort((a, b) => a - b);
    const catalog = await this.store.getExercises(exerciseIds);

    return {
      workoutId,
      title,
      exercises: exerciseIds.map((exerciseId) =>
        this.series(
          exerciseId,
          catalog.get(exerciseId),
          rows.filter((row) => row.exerciseId === exerciseId)
        )
      ),
    };
  }

  async exerciseProgress(exerciseId: number): Promise<ExerciseProgress> {
    const rows = await this.store.listPerformance({ exerciseId });
    const catalog = await this.store.getExercises([exerciseId]);
    return this.series(exerciseId, catalog.get(exerciseId), rows);
  }

  private series(
    exerciseId: number,
    exercise: Exercise | undefined,
    rows: readonly PerformanceEntry[]
  ): ExerciseProgress {
    return {
      exerciseId,
      title: seriesTitle(exerciseId, exercise),
      hasData: rows.length > 0,
      points: this.calculator.aggregateByDate(rows),
    };
  }
}

export const progressService = new ProgressService(workoutStore);
