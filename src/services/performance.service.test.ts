/**
 * Performance Service Tests
 *
 * Covers: one row per exercise, weight alignment, input validation, dates
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { MemoryWorkoutStore } from "../../tests/mocks/memoryStore";
import { BadRequestError, NotFoundError } from "../types/response/error.response";
import type { Workout } from "../types/model/workout.model";
import { alignWeights, PerformanceService } from "./performance.service";

const PUSH_DAY: Workout = {
  id: 3,
  name: "Push Day",
  comment: null,
  exerciseIds: [1, 2, 3],
  pairedSets: [],
};

describe("alignWeights", () => {
  it("repeats a single weight for every set", () => {
    expect(alignWeights([10, 8, 6], [50])).toEqual([50, 50, 50]);
  });

  it("drops extra weights and pads missing ones with 0", () => {
    expect(alignWeights([10, 8], [40, 45, 50])).toEqual([40, 45]);
    expect(alignWeights([10, 8, 6], [40, 45])).toEqual([40, 45, 0]);
    expect(alignWeights([12], [])).toEqual([0]);
  });

  it("returns no weights without reps", () => {
    expect(alignWeights([], [60])).toEqual([]);
  });
});

describe("PerformanceService", () => {
  let store: MemoryWorkoutStore;
  let service: PerformanceService;

  beforeEach(() => {
    store = new MemoryWorkoutStore({ workouts: [PUSH_DAY] });
    service = new PerformanceService(store);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("records a row for every exercise of the workout", async () => {
    const rows = await service.recordSession(3, {
      date: "2024-05-02",
      entries: [
        { exerciseId: 2, reps: "10, 8,6", weights: "40" },
        { exerciseId: 1, reps: [12, 10], weights: [60, 65] },
      ],
    });

    expect(rows).toEqual([
      { workoutId: 3, exerciseId: 1, date: "2024-05-02", reps: [12, 10], weights: [60, 65] },
      { workoutId: 3, exerciseId: 2, date: "2024-05-02", reps: [10, 8, 6], weights: [40, 40, 40] },
      { workoutId: 3, exerciseId: 3, date: "2024-05-02", reps: [], weights: [] },
    ]);
    expect(store.performance).toEqual(rows);
  });

  it("stores an exercise with blank reps as finished early", async () => {
    const rows = await service.recordSession(3, {
      date: "2024-05-02",
      entries: [{ exerciseId: 1, reps: " , ", weights: "80" }],
    });

    expect(rows[0]).toEqual({
      workoutId: 3,
      exerciseId: 1,
      date: "2024-05-02",
      reps: [],
      weights: [],
    });
  });

  it("defaults the date to today", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 2, 15, 12, 0, 0));

    const rows = await service.recordSession(3, { entries: [] });

    expect(rows.map((row) => row.date)).toEqual(["2024-03-15", "2024-03-15", "2024-03-15"]);
  });

  it("rejects an unknown workout", async () => {
    await expect(service.recordSession(42, { entries: [] })).rejects.toThrow(
      new NotFoundError("Workout 42 not found")
    );
  });

  it("rejects an exercise that is not part of the workout", async () => {
    await expect(
      service.recordSession(3, { entries: [{ exerciseId: 9, reps: [10] }] })
    ).rejects.toThrow(new BadRequestError("Exercise 9 is not part of workout 3"));
    expect(store.performance).toEqual([]);
  });

  it("rejects an exercise listed twice", async () => {
    await expect(
      service.recordSession(3, {
        entries: [
          { exerciseId: 1, reps: [10] },
          { exerciseId: 1, reps: [8] },
        ],
      })
    ).rejects.toThrow("Exercise 1 is listed more than once");
  });

  it("rejects non-numeric reps and weights", async () => {
    await expect(
      service.recordSession(3, { entries: [{ exerciseId: 1, reps: "10, x" }] })
    ).rejects.toThrow("reps must contain only integers");
    await expect(
      service.recordSession(3, { entries: [{ exerciseId: 1, reps: "10", weights: "heavy" }] })
    ).rejects.toThrow("weights must contain only numbers");
  });

  it("rejects typed reps beyond the integer column range", async () => {
    await expect(
      service.recordSession(3, { entries: [{ exerciseId: 1, reps: "10, 3000000000" }] })
    ).rejects.toThrow(new BadRequestError("reps must be between 0 and 2147483647"));
    expect(store.performance).toEqual([]);
  });

  it("rejects a malformed date", async () => {
    await expect(
      service.recordSession(3, { date: "02/05/2024", entries: [] })
    ).rejects.toThrow('Invalid date "02/05/2024", expected YYYY-MM-DD');
  });

  it("lists the stored rows of a workout", async () => {
    await service.recordSession(3, {
      date: "2024-05-02",
      entries: [{ exerciseId: 1, reps: [5] }],
    });

    const rows = await service.listSessions(3);

    expect(rows).toHaveLength(3);
    expect(rows[0]).toEqual({
      workoutId: 3,
      exerciseId: 1,
      date: "2024-05-02",
      reps: [5],
      weights: [0],
    });
    await expect(service.listSessions(4)).rejects.toThrow(NotFoundError);
  });
});
