export interface PerformanceEntryInput {
  exerciseId: number;
  reps?: number[] | string;
  weights?: number[] | string;
}

export interface RecordPerformanceRequest {
  date?: string;
  entries: PerformanceEntryInput[];
}
