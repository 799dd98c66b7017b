import { workoutRecordSchema } from "../utils/validators";
import type { WorkoutRecord } from "../utils/validators";
import type { Workout } from "../types/model/workout.model";
import { assertUniqueIds, readRecordList } from "./catalogFile";

export class WorkoutLoader {
  async load(filePath: string): Promise<Workout[]> {
    const records = await readRecordList(filePath, workoutRecordSchema);
    assertUniqueIds(filePath, records);
    return records.map((record) => this.toWorkout(record));
  }

  toWorkout(record: WorkoutRecord): Workout {
    return {
      id: record.id,
      name: record.name?.trim() || `Workout ${record.id}`,
      comment: record.comment?.trim() || null,
      exerciseIds: record.exercises,
      pairedSets: record.paired_sets,
    };
  }
}

export const workoutLoader = new WorkoutLoader();
