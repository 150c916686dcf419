/**
 * Runtime configuration, parsed once from the environment.
 *
 * DATABASE_TYPE is kept as a free string: unknown values are not a startup
 * failure, the backend selector falls back to the embedded store and warns.
 */

import { z } from "zod";

const MIB = 1024 * 1024;

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),

  DATABASE_TYPE: z.string().trim().toLowerCase().default("sqlite"),
  SQLITE_DB_PATH: z.string().min(1).default("medical_imaging.db"),
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),

  UPLOAD_DIR: z.string().min(1).default("uploads/medical_images"),
  MAX_FILE_SIZE: z.coerce.number().int().positive().default(10 * MIB),

  ANALYTICS_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(60),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  env: Env["NODE_ENV"];
  port: number;
  database: {
    type: string;
    sqlitePath: string;
    url?: string;
    poolMax: number;
  };
  uploads: {
    dir: string;
    maxFileSize: number;
  };
  analyticsCacheTtlSeconds: number;
  logLevel: Env["LOG_LEVEL"];
}

export class ConfigError extends Error {
  constructor(public readonly variables: string[], message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== "") cleaned[key] = value;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const variables = Array.from(new Set(parsed.error.errors.map((issue) => String(issue.path[0]))));
    throw new ConfigError(variables, `Invalid environment configuration: ${variables.join(", ")}`);
  }

  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    database: {
      type: env.DATABASE_TYPE,
      sqlitePath: env.SQLITE_DB_PATH,
      url: env.DATABASE_URL,
      poolMax: env.DATABASE_POOL_MAX,
    },
    uploads: {
      dir: env.UPLOAD_DIR,
      maxFileSize: env.MAX_FILE_SIZE,
    },
    analyticsCacheTtlSeconds: env.ANALYTICS_CACHE_TTL_SECONDS,
    logLevel: env.LOG_LEVEL,
  };
}
