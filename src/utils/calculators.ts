import type { PerformanceEntry } from "../types/model/performance.model";
import type { ProgressPoint } from "../types/model/progress.model";

export class ProgressCalculator {
  public mean(values: readonly number[]): number | null {
    if (values.length === 0) return null;
    return values.reduce((sum, value) => sum + value, 0) / values.length;
  }

  /**
   * Average the per-session means of each date. Sessions with no recorded
   * sets do not count towards a date's average.
   */
  public aggregateByDate(entries: readonly PerformanceEntry[]): ProgressPoint[] {
    const byDate = new Map<string, { reps: number[]; weights: number[] }>();

    for (const entry of entries) {
      const bucket = byDate.get(entry.date) ?? { reps: [], weights: [] };
      const repsMean = this.mean(entry.reps);
      const weightMean = this.mean(entry.weights);
      if (repsMean !== null) bucket.reps.push(repsMean);
      if (weightMean !== null) bucket.weights.push(weightMean);
      byDate.set(entry.date, bucket);
    }

    return [...byDate.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, bucket]) => ({
        date,
        avgReps: this.mean(bucket.reps),
        avgWeight: this.mean(bucket.weights),
      }));
  }
}

export const progressCalculator = new ProgressCalculator();
