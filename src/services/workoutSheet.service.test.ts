/**
 * Workout Sheet Service Tests
 *
 * Covers: file names, layout from stored data, PDF rendering
 */

import { describe, it, expect, beforeEach } from "vitest";
import { EntryRole, PageSize, RepTargetKind } from "../common/common-enum";
import { MemoryWorkoutStore } from "../../tests/mocks/memoryStore";
import { NotFoundError } from "../types/response/error.response";
import type { Exercise } from "../types/model/exercise.model";
import type { Workout } from "../types/model/workout.model";
import type { PageGeometry } from "../types/model/sheet.model";
import { layoutWorkout, sheetFileName, WorkoutSheetService } from "./workoutSheet.service";

const exercise = (id: number, name: string): Exercise => ({
  id,
  name,
  sets: 3,
  reps: { kind: RepTargetKind.RANGE, min: 8, max: 12 },
  comment: null,
  restSeconds: 60,
});

const UPPER: Workout = {
  id: 12,
  name: "Upper / Pull & Push!",
  comment: null,
  exerciseIds: [1, 2, 3, 4],
  pairedSets: [[2, 4]],
};

describe("sheetFileName", () => {
  it("sanitises the workout name", () => {
    expect(sheetFileName(UPPER)).toBe("workout_12_Upper_Pull_Push.pdf");
  });
});

describe("layoutWorkout", () => {
  it("runs pairing, sequencing and pagination", () => {
    const geometry: PageGeometry = {
      pageHeight: 200,
      topMargin: 0,
      bottomMargin: 0,
      headerHeight: 20,
      primaryRowHeight: 30,
      partnerRowHeight: 25,
      pairedBlockGap: 10,
      singleBlockGap: 10,
      breakThreshold: 40,
    };
    const catalog = new Map([
      [1, exercise(1, "Squat")],
      [2, exercise(2, "Bench Press")],
      [4, exercise(4, "Row")],
    ]);

    const layout = layoutWorkout(UPPER, catalog, geometry);

    // 1 at 180; 2 at 140, partner 4 at 110; paired gap leaves 75 for 3
    expect(
      layout.placements.map((p) => [p.entry.name, p.entry.role, p.pageIndex, p.offset])
    ).toEqual([
      ["Squat", EntryRole.PRIMARY, 0, 180],
      ["Bench Press", EntryRole.PRIMARY, 0, 140],
      ["Row", EntryRole.PARTNER, 0, 110],
      ["Exercise #3 (missing)", EntryRole.PRIMARY, 0, 75],
    ]);
    expect(layout.title).toBe("Upper / Pull & Push!");
  });
});

describe("WorkoutSheetService", () => {
  let service: WorkoutSheetService;

  beforeEach(() => {
    const store = new MemoryWorkoutStore({
      exercises: [exercise(1, "Squat"), exercise(2, "Bench Press"), exercise(4, "Row")],
      workouts: [UPPER],
    });
    service = new WorkoutSheetService(store, PageSize.A4);
  });

  it("lays a stored workout out on one A4 page", async () => {
    const layout = await service.buildLayout(12);

    expect(layout.pageCount).toBe(1);
    expect(layout.placements.map((p) => p.entry.exerciseId)).toEqual([1, 2, 4, 3]);
  });

  it("renders a PDF named after the workout", async () => {
    const sheet = await service.renderPdf(12);

    expect(sheet.workoutId).toBe(12);
    expect(sheet.fileName).toBe("workout_12_Upper_Pull_Push.pdf");
    expect(sheet.pageCount).toBe(1);
    expect(sheet.pdf.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("rejects an unknown workout", async () => {
    await expect(service.buildLayout(13)).rejects.toThrow(
      new NotFoundError("Workout 13 not found")
    );
  });
});
