import "dotenv/config";
import { parseArgs } from "util";
import { loadConfig } from "../configs/environment";
import { logger } from "../utils/logger";
import { workoutStore } from "../services/workoutStore.service";
import { catalogImportService } from "../services/catalogImport.service";

async function importCatalog() {
  const { values } = parseArgs({
    options: {
      exercises: { type: "string" },
      workouts: { type: "string" },
    },
  });
  const { catalog } = loadConfig();

  try {
    await workoutStore.initialize();
    const result = await catalogImportService.importCatalog({
      exercisesPath: values.exercises ?? catalog.exercisesPath,
      workoutsPath: values.workouts ?? catalog.workoutsPath,
    });

    console.log(`Imported ${result.exercises} exercises and ${result.workouts} workouts`);
    for (const { workoutId, exerciseId } of result.danglingReferences) {
      console.log(`  workout ${workoutId} -> unknown exercise ${exerciseId}`);
    }
  } finally {
    await workoutStore.close();
  }
}

importCatalog().catch((error) => {
  logger.error("Catalog import failed:", error);
  process.exit(1);
});
