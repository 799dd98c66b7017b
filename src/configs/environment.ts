import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const numeric = z.string().regex(/^\d+$/, "must be a non-negative integer");
const flag = z.enum(["true", "false"]);

const envSchema = z.object({
  PORT: numeric.optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).optional(),

  MAIN_DB_HOST: z.string().optional(),
  MAIN_DB_PORT: numeric.optional(),
  MAIN_DB_NAME: z.string().optional(),
  MAIN_DB_USER: z.string().optional(),
  MAIN_DB_PASSWORD: z.string().optional(),
  DB_SSL_CERT: z.string().optional(),

  LOG_LEVEL: z
    .enum(["error", "warn", "info", "http", "verbose", "debug", "silly"])
    .optional(),
  ENABLE_CONSOLE_LOG: flag.optional(),
  ENABLE_FILE_LOG: flag.optional(),
  LOG_FILE: z.string().optional(),

  EXERCISES_YAML: z.string().optional(),
  WORKOUTS_YAML: z.string().optional(),
  OUTPUT_DIR: z.string().optional(),
  IMPORT_ON_STARTUP: flag.optional(),
  SHEET_PAGE_SIZE: z.enum(["A4", "LETTER"]).optional(),

  ENABLE_CATALOG_SYNC: flag.optional(),
  CATALOG_SYNC_CRON: z.string().optional(),

  RATE_LIMIT_WINDOW: numeric.optional(),
  RATE_LIMIT_MAX: numeric.optional(),
  CORS_ORIGIN: z.string().optional(),
});

export type AppConfig = ReturnType<typeof buildConfig>;

const buildConfig = () => {
  const env = process.env;
  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv: env.NODE_ENV || "development",
    database: {
      host: env.MAIN_DB_HOST || "localhost",
      port: parseInt(env.MAIN_DB_PORT || "5432", 10),
      name: env.MAIN_DB_NAME || "workouts",
      user: env.MAIN_DB_USER || "postgres",
      password: env.MAIN_DB_PASSWORD || "postgres",
      sslCertPath: env.DB_SSL_CERT || null,
    },
    logging: {
      level: env.LOG_LEVEL || "info",
      enableConsole: env.ENABLE_CONSOLE_LOG !== "false",
      enableFile: env.ENABLE_FILE_LOG === "true",
      file: env.LOG_FILE || "logs/app.log",
    },
    catalog: {
      exercisesPath: env.EXERCISES_YAML || "data/exercises.yaml",
      workoutsPath: env.WORKOUTS_YAML || "data/workouts.yaml",
      importOnStartup: env.IMPORT_ON_STARTUP === "true",
    },
    sheets: {
      outputDir: env.OUTPUT_DIR || "output",
      pageSize: env.SHEET_PAGE_SIZE === "LETTER" ? "LETTER" : "A4",
    },
    sync: {
      enableCatalogSync: env.ENABLE_CATALOG_SYNC === "true",
      cron: env.CATALOG_SYNC_CRON || "0 2 * * *",
    },
    api: {
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "60000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "60", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",") || ["http://localhost:3000"],
      },
    },
  } as const;
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

export const validateConfig = (): AppConfig => {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const config = loadConfig();
  if (config.api.rateLimit.max === 0) {
    throw new Error("RATE_LIMIT_MAX must be greater than 0");
  }
  return config;
};
