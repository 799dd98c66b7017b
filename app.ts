import "dotenv/config";
import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import { loadConfig } from "./src/configs/environment";
import { logger } from "./src/utils/logger";
import { requestLogger } from "./src/middlewares/logger.middleware";
import { rateLimiter } from "./src/middlewares/validation.middleware";
import { errorMiddleware, notFoundMiddleware } from "./src/middlewares/error.middleware";
import { SheetApplication } from "./src/main";
import routes from "./src/routes";

const config = loadConfig();
const app = express();

app.use(helmet());
app.use(cors({ origin: [...config.api.cors.origin] }));
app.use(compression());
app.use(express.json({ limit: "1mb" }));
app.use(rateLimiter);
app.use(requestLogger());

app.use("/", routes);

app.use(notFoundMiddleware);
// Error middleware should be last
app.use(errorMiddleware);

async function start() {
  await new SheetApplication().initialize();
  app.listen(config.port, () =>
    logger.info(`Workout sheet service listening on port ${config.port}`)
  );
}

if (require.main === module) {
  start().catch((error) => {
    logger.error("Failed to start server:", error);
    process.exit(1);
  });
}

export default app;
