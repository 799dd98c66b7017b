import * as cron from "node-cron";
import { logger } from "./utils/logger";
import { validateConfig } from "./configs/environment";
import { workoutStore } from "./services/workoutStore.service";
import type { WorkoutStore } from "./services/workoutStore.service";
import {
  catalogImportService,
  CatalogImportService,
} from "./services/catalogImport.service";

class SheetApplication {
  constructor(
    private readonly store: WorkoutStore = workoutStore,
    private readonly catalog: CatalogImportService = catalogImportService
  ) {}

  async initialize() {
    logger.info("Starting workout sheet service ...");

    // Validate environment upfront
    const config = validateConfig();

    await this.store.initialize();

    if (config.catalog.importOnStartup) {
      try {
        await this.catalog.importCatalog(config.catalog);
      } catch (e) {
        logger.warn("Startup catalog import failed, serving the stored catalog:", e);
      }
    }

    if (config.sync.enableCatalogSync) {
      if (!cron.validate(config.sync.cron)) {
        throw new Error(`Invalid CATALOG_SYNC_CRON expression "${config.sync.cron}"`);
      }
      cron.schedule(config.sync.cron, async () => {
        logger.info("Cron: re-importing catalog...");
        try {
          await this.catalog.importCatalog(config.catalog);
          logger.info("Cron: catalog imported successfully");
        } catch (err) {
          logger.error("Cron: failed to import catalog", err);
        }
      });
      logger.info(`Catalog sync scheduled (${config.sync.cron})`);
    }

    logger.info("Workout sheet service ready!");
  }
}

async function main() {
  const app = new SheetApplication();
  await app.initialize();
}

if (require.main === module) {
  main().catch((error) => {
    logger.error("Failed to initialize application:", error);
    process.exit(1);
  });
}

export { SheetApplication };
