import type { RepTargetKind } from "../../common/common-enum";

export type RepTarget =
  | { kind: RepTargetKind.RANGE; min: number; max: number }
  | { kind: RepTargetKind.TO_FAILURE; min: number };

export interface Exercise {
  id: number;
  name: string;
  sets: number; // defaults to 3
  reps: RepTarget | null;
  comment: string | null;
  restSeconds: number | null;
}

/** Exercise lookup consumed by the sheet engine; misses are expected. */
export type ExerciseCatalog = ReadonlyMap<number, Exercise>;
