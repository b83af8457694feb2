import os from "os";
import path from "path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const numeric = (name: string) =>
  z
    .string()
    .regex(/^\d+$/, `${name} must be a whole number`)
    .optional();

const flag = (name: string) =>
  z
    .enum(["true", "false"], {
      errorMap: () => ({ message: `${name} must be "true" or "false"` }),
    })
    .optional();

const envSchema = z.object({
  PORT: numeric("PORT"),
  NODE_ENV: z.string().optional(),

  CATALOG_CSV_PATH: z.string().min(1).optional(),
  REQUEST_LOG_PATH: z.string().min(1).optional(),
  BACKUP_ON_REPLACE: flag("BACKUP_ON_REPLACE"),
  VERCEL: z.string().optional(),

  ADMIN_PASSWORD: z.string().optional(),

  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  LOG_PRETTY: flag("LOG_PRETTY"),

  RATE_LIMIT_WINDOW: numeric("RATE_LIMIT_WINDOW"),
  RATE_LIMIT_MAX: numeric("RATE_LIMIT_MAX"),
  CORS_ORIGIN: z.string().optional(),
  NEARBY_MAX_LIMIT: numeric("NEARBY_MAX_LIMIT"),
});

export type AppConfig = ReturnType<typeof buildConfig>;

// Serverless hosts mount the bundle read-only; only the temp dir is writable.
const resolveRequestLogPath = (env: NodeJS.ProcessEnv): string => {
  const configured = env.REQUEST_LOG_PATH || "subscription_requests.json";
  return env.VERCEL ? path.join(os.tmpdir(), path.basename(configured)) : configured;
};

export const buildConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const nodeEnv = env.NODE_ENV || "development";
  return {
    port: parseInt(env.PORT || "3000", 10),
    nodeEnv,
    storage: {
      catalogCsvPath: env.CATALOG_CSV_PATH || "gyms.csv",
      requestLogPath: resolveRequestLogPath(env),
      backupOnReplace: env.BACKUP_ON_REPLACE !== "false",
    },
    admin: {
      password: env.ADMIN_PASSWORD || "",
    },
    logging: {
      level: nodeEnv === "test" ? "silent" : env.LOG_LEVEL || "info",
      pretty: env.LOG_PRETTY === "true",
    },
    api: {
      rateLimit: {
        windowMs: parseInt(env.RATE_LIMIT_WINDOW || "60000", 10),
        max: parseInt(env.RATE_LIMIT_MAX || "60", 10),
      },
      cors: {
        origin: env.CORS_ORIGIN?.split(",").map((o) => o.trim()) || ["*"],
      },
      nearbyMaxLimit: parseInt(env.NEARBY_MAX_LIMIT || "50", 10),
    },
  };
};

let cachedConfig: AppConfig | null = null;

export const loadConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
};

export const validateConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const config = buildConfig(env);
  if (config.nodeEnv === "production" && !config.admin.password) {
    throw new Error("ADMIN_PASSWORD is required in production");
  }
  return config;
};
