import "dotenv/config";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { parseArgs } from "util";
import { loadConfig } from "../configs/environment";
import { logger } from "../utils/logger";
import { workoutStore } from "../services/workoutStore.service";
import { workoutSheetService } from "../services/workoutSheet.service";
import type { Workout } from "../types/model/workout.model";

async function selectWorkouts(workoutId: string | undefined): Promise<Workout[]> {
  if (workoutId === undefined) {
    return workoutStore.listWorkouts();
  }
  const id = Number(workoutId);
  if (!Number.isInteger(id) || id <= 0) {
    throw new Error(`--workout-id must be a positive integer, got "${workoutId}"`);
  }
  return [await workoutSheetService.getWorkout(id)];
}

async function renderSheets() {
  const { values } = parseArgs({
    options: {
      "workout-id": { type: "string" },
      out: { type: "string" },
    },
  });
  const outputDir = values.out ?? loadConfig().sheets.outputDir;

  try {
    const workouts = await selectWorkouts(values["workout-id"]);
    if (workouts.length === 0) {
      console.log("No workouts to render.");
      return;
    }

    await mkdir(outputDir, { recursive: true });
    for (const workout of workouts) {
      const sheet = await workoutSheetService.renderWorkout(workout);
      const target = path.join(outputDir, sheet.fileName);
      await writeFile(target, sheet.pdf);
      console.log(`${target} (${sheet.pageCount} page${sheet.pageCount === 1 ? "" : "s"})`);
    }
  } finally {
    await workoutStore.close();
  }
}

renderSheets().catch((error) => {
  logger.error("Sheet rendering failed:", error);
  process.exit(1);
});
