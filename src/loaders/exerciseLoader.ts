import path from "path";
import { RepTargetKind } from "../common/common-enum";
import { CATALOG_CONSTANTS } from "../utils/constants";
import { exerciseRecordSchema } from "../utils/validators";
import type { ExerciseRecord } from "../utils/validators";
import { CatalogFormatError } from "../types/response/error.response";
import type { Exercise, RepTarget } from "../types/model/exercise.model";
import { assertUniqueIds, readRecordList } from "./catalogFile";

export class ExerciseLoader {
  async load(filePath: string): Promise<Exercise[]> {
    const records = await readRecordList(filePath, exerciseRecordSchema);
    assertUniqueIds(filePath, records);
    return records.map((record) => this.toExercise(record, path.basename(filePath)));
  }

  toExercise(record: ExerciseRecord, file = "exercises"): Exercise {
    return {
      id: record.id,
      name: record.name?.trim() || `#${record.id}`,
      sets: record.sets ?? CATALOG_CONSTANTS.DEFAULT_SETS,
      reps: this.toRepTarget(record, file),
      comment: record.comment?.trim() || null,
      restSeconds: record.rest ?? null,
    };
  }

  /** `[8, 12]` is a range, `[8, -99]` means 8 or more, `[10]` exactly 10. */
  private toRepTarget(record: ExerciseRecord, file: string): RepTarget | null {
    const reps = record.reps;
    if (!reps || reps.length === 0) return null;

    const [min, max = min] = reps;
    if (max === CATALOG_CONSTANTS.TO_FAILURE_SENTINEL) {
      return { kind: RepTargetKind.TO_FAILURE, min };
    }
    if (min < 0 || max < min) {
      throw new CatalogFormatError(file, `exercise ${record.id}: invalid reps [${reps.join(", ")}]`);
    }
    return { kind: RepTargetKind.RANGE, min, max };
  }
}

export const exerciseLoader = new ExerciseLoader();
