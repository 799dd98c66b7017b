import express from "express";
import { loadConfig } from "../../configs/environment";

const healthRouter = express.Router();

healthRouter.get("/", (_req, res) => {
  res.json({
    success: true,
    message: "Workout sheet service is healthy",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: loadConfig().nodeEnv,
  });
});

healthRouter.get("/status", (_req, res) => {
  const config = loadConfig();
  res.json({
    success: true,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    services: {
      database: `${config.database.host}:${config.database.port}/${config.database.name}`,
      catalog_sync: config.sync.enableCatalogSync ? "scheduled" : "disabled",
      sheets: config.sheets.pageSize,
    },
    endpoints: {
      exercises: "/api/exercises",
      workouts: "/api/workouts",
      catalog: "/api/catalog",
    },
  });
});

export default healthRouter;
