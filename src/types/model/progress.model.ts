export interface ProgressPoint {
  date: string;
  avgReps: number | null;
  avgWeight: number | null;
}

export interface ExerciseProgress {
  exerciseId: number;
  title: string;
  hasData: boolean;
  points: ProgressPoint[];
}

export interface WorkoutProgress {
  workoutId: number;
  title: string;
  exercises: ExerciseProgress[];
}
