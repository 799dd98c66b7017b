import { loadConfig } from "../configs/environment";
import { logger } from "../utils/logger";
import { exerciseLoader, ExerciseLoader } from "../loaders/exerciseLoader";
import { workoutLoader, WorkoutLoader } from "../loaders/workoutLoader";
import { workoutStore } from "./workoutStore.service";
import type { WorkoutStore } from "./workoutStore.service";

export interface CatalogPaths {
  exercisesPath: string;
  workoutsPath: string;
}

export interface CatalogImportResult {
  exercises: number;
  workouts: number;
  danglingReferences: { workoutId: number; exerciseId: number }[];
}

export class CatalogImportService {
  constructor(
    private readonly store: WorkoutStore,
    private readonly exercises: ExerciseLoader = exerciseLoader,
    private readonly workouts: WorkoutLoader = workoutLoader
  ) {}

  /**
   * Replace the stored catalog with the YAML files. Both files are parsed
   * before anything is written, and both are written in one transaction.
   * Workouts may reference exercises that do not exist; those are reported
   * and later printed as placeholders.
   */
  async importCatalog(paths: CatalogPaths = loadConfig().catalog): Promise<CatalogImportResult> {
    logger.info(
      `Importing catalog from ${paths.exercisesPath} and ${paths.workoutsPath}`
    );
    const exercises = await this.exercises.load(paths.exercisesPath);
    const workouts = await this.workouts.load(paths.workoutsPath);

    const knownIds = new Set(exercises.map((exercise) => exercise.id));
    const danglingReferences = workouts.flatMap((workout) =>
      workout.exerciseIds
        .filter((exerciseId) => !knownIds.has(exerciseId))
        .map((exerciseId) => ({ workoutId: workout.id, exerciseId }))
    );
    for (const { workoutId, exerciseId } of danglingReferences) {
      logger.warn(`Workout ${workoutId} references unknown exercise ${exerciseId}`);
    }

    const counts = await this.store.replaceCatalog(exercises, workouts);
    logger.info(`Imported ${counts.exercises} exercises and ${counts.workouts} workouts`);

    return { ...counts, danglingReferences };
  }
}

export const catalogImportService = new CatalogImportService(workoutStore);
