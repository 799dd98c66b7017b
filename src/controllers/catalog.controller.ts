import type { Request, Response } from "express";
import { logger } from "../utils/logger";
import { sendFailure, sendSuccess } from "../utils/response";
import {
  catalogImportService,
  CatalogImportService,
} from "../services/catalogImport.service";

export class CatalogController {
  constructor(private readonly catalog: CatalogImportService) {}

  /**
   * @route POST /api/catalog/import
   * @desc Reload exercises and workouts from the configured YAML files
   */
  importCatalog = async (_req: Request, res: Response) => {
    try {
      const result = await this.catalog.importCatalog();
      sendSuccess(
        res,
        `Imported ${result.exercises} exercises and ${result.workouts} workouts`,
        result
      );
    } catch (error) {
      logger.error("catalog import error:", error);
      sendFailure(res, "Failed to import catalog", error);
    }
  };
}

export default new CatalogController(catalogImportService);
