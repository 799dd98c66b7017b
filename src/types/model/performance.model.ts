export interface PerformanceEntry {
  workoutId: number;
  exerciseId: number;
  date: string; // YYYY-MM-DD
  reps: number[];
  weights: number[]; // kg, one per set
}

export interface PerformanceFilter {
  workoutId?: number;
  exerciseId?: number;
}
