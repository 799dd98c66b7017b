import { describe, it, expect } from "vitest";
import { exerciseRecordSchema, workoutRecordSchema } from "./validators";

describe("catalog record schemas", () => {
  it("rejects exercise ids the routes cannot address", () => {
    expect(exerciseRecordSchema.validate({ id: 0 }).error?.message).toBe(
      '"id" must be a positive number'
    );
    expect(exerciseRecordSchema.validate({ id: 3000000000 }).error?.message).toBe(
      '"id" must be less than or equal to 2147483647'
    );
  });

  it("accepts the to-failure marker but no other negative reps", () => {
    expect(exerciseRecordSchema.validate({ id: 1, reps: [8, -99] }).error).toBeUndefined();
    expect(exerciseRecordSchema.validate({ id: 1, reps: [8, -100] }).error?.message).toBe(
      '"reps[1]" must be greater than or equal to -99'
    );
  });

  it("bounds workout ids and their exercise references", () => {
    expect(workoutRecordSchema.validate({ id: -4 }).error?.message).toBe(
      '"id" must be a positive number'
    );
    expect(
      workoutRecordSchema.validate({ id: 2, exercises: [1, 3000000000] }).error?.message
    ).toBe('"exercises[1]" must be less than or equal to 2147483647');
    expect(workoutRecordSchema.validate({ id: 2147483647, exercises: [1] }).error).toBeUndefined();
  });
});
