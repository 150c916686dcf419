import type { AppConfig } from "./config";
import type { IRecordStore, StoreKind } from "./storage";
import { SqliteStorage } from "./storage/sqliteStorage";
import { PostgresStorage } from "./storage/postgresStorage";
import { safeLogger, type Logger } from "./safe_logger";

export const DEFAULT_SQLITE_PATH = "medical_imaging.db";

export interface StorageConfig {
  /** "embedded" | "client-server"; anything else falls back to embedded */
  kind: string;
  embeddedPath?: string;
  connectionUrl?: string;
  poolMax?: number;
}

const KIND_ALIASES: Record<string, StoreKind> = {
  sqlite: "embedded",
  embedded: "embedded",
  postgres: "client-server",
  postgresql: "client-server",
  "client-server": "client-server",
};

function normalizeKind(kind: string): StoreKind | undefined {
  return KIND_ALIASES[kind.trim().toLowerCase()];
}

export function storageConfigFromDatabase(database: AppConfig["database"]): StorageConfig {
  return {
    kind: normalizeKind(database.type) ?? database.type,
    embeddedPath: database.sqlitePath,
    connectionUrl: database.url,
    poolMax: database.poolMax,
  };
}

/** Reads DATABASE_TYPE, SQLITE_DB_PATH, DATABASE_URL and DATABASE_POOL_MAX. */
export function resolveStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  const poolMax = Number(env.DATABASE_POOL_MAX);
  return storageConfigFromDatabase({
    type: env.DATABASE_TYPE || "sqlite",
    sqlitePath: env.SQLITE_DB_PATH || DEFAULT_SQLITE_PATH,
    url: env.DATABASE_URL || undefined,
    poolMax: Number.isInteger(poolMax) && poolMax > 0 ? poolMax : 10,
  });
}

/** Loggable target of a storage config, with any password masked. */
export function describeConnection(config: StorageConfig): string {
  if (normalizeKind(config.kind) !== "client-server" || !config.connectionUrl) {
    return `sqlite:${config.embeddedPath ?? DEFAULT_SQLITE_PATH}`;
  }
  try {
    const url = new URL(config.connectionUrl);
    if (url.password) url.password = "****";
    return url.toString();
  } catch {
    return "postgres:[unparseable connection url]";
  }
}

/**
 * Builds an unconnected store for the configured backend. Misconfiguration
 * degrades to the embedded backend with a warning instead of failing.
 */
export function createStorage(config: StorageConfig, logger: Logger = safeLogger): IRecordStore {
  const log = logger.child("storage-selector");
  const kind = normalizeKind(config.kind);
  const embedded = (): IRecordStore =>
    new SqliteStorage({ path: config.embeddedPath ?? DEFAULT_SQLITE_PATH, logger });

  if (kind === "client-server") {
    if (config.connectionUrl) {
      return new PostgresStorage({ connectionUrl: config.connectionUrl, poolMax: config.poolMax, logger });
    }
    log.warn("Client/server backend selected without a connection URL, falling back to embedded storage");
    return embedded();
  }

  if (kind === undefined) {
    log.warn(`Unknown storage kind "${config.kind}", falling back to embedded storage`);
  }
  return embedded();
}
