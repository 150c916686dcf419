import type {
  ActivityType,
  AdminUser,
  ContentFlag,
  InsertAdminUser,
  InsertContentFlag,
  JsonValue,
  LogLevel,
  Metadata,
  ModerationStatus,
  SystemLog,
  UserActivityLog,
} from "@shared/schema";
import type { StoreHandle } from "../storage";
import type { Logger } from "../safe_logger";
import { SqliteAdminLogStore } from "./sqliteAdminLogStore";
import { PostgresAdminLogStore } from "./postgresAdminLogStore";

/** Tables the analytics layer counts rows in. */
export type CountableTable =
  | "patients"
  | "medical_records"
  | "appointments"
  | "user_activity_logs"
  | "system_logs"
  | "content_flags";

export interface CountFilter {
  /** Inclusive lower bound (ISO-8601) */
  since?: string;
  /** Exclusive upper bound (ISO-8601) */
  until?: string;
  /** Only applies to user_activity_logs */
  activityType?: ActivityType;
  /** Only applies to system_logs */
  level?: LogLevel;
}

export interface ActivityFilter {
  userId?: string;
  activityType?: ActivityType;
  since?: string;
  until?: string;
  limit?: number;
}

export interface SystemLogFilter {
  level?: LogLevel;
  component?: string;
  since?: string;
  until?: string;
  limit?: number;
}

export interface NewUserActivity {
  userId?: string | null;
  userEmail?: string | null;
  activityType: ActivityType;
  description: string;
  ipAddress?: string | null;
  userAgent?: string | null;
  metadata?: Metadata | null;
  sessionId?: string | null;
}

export interface NewSystemLog {
  level: LogLevel;
  component: string;
  message: string;
  stackTrace?: string | null;
  metadata?: Metadata | null;
}

/** Moderation action written alongside a flag status change. */
export interface ModerationActionInput {
  adminId: string;
  adminEmail: string;
  actionType: string;
  reason?: string | null;
  metadata?: Metadata | null;
}

export const DEFAULT_RECENT_LIMIT = 10;
export const FLAG_TARGET_TYPE = "content_flag";

/**
 * Audit and analytics persistence that rides on the record store's
 * connection. Logging calls resolve to false rather than throwing so a
 * broken log table never takes down the operation being logged.
 */
export interface IAdminLogStore {
  createSchema(): Promise<boolean>;

  logUserActivity(entry: NewUserActivity): Promise<boolean>;
  logSystemEvent(entry: NewSystemLog): Promise<boolean>;
  getRecentActivities(filter?: ActivityFilter): Promise<UserActivityLog[]>;
  getRecentLogs(filter?: SystemLogFilter): Promise<SystemLog[]>;
  countRows(table: CountableTable, filter?: CountFilter): Promise<number>;

  createContentFlag(flag: InsertContentFlag): Promise<string>;
  getContentFlag(id: string): Promise<ContentFlag | undefined>;
  getPendingFlags(limit?: number): Promise<ContentFlag[]>;
  moderateFlag(
    flagId: string,
    status: ModerationStatus,
    adminNotes: string | null,
    action: ModerationActionInput,
  ): Promise<boolean>;

  createAdminUser(user: InsertAdminUser): Promise<string>;
  getAdminUserByEmail(email: string): Promise<AdminUser | undefined>;
  touchAdminLogin(id: string, at?: Date): Promise<boolean>;

  getCachedAnalytics(key: string, now?: Date): Promise<JsonValue | undefined>;
  setCachedAnalytics(key: string, data: JsonValue, expiresAt: Date): Promise<boolean>;
}

export function createAdminLogStore(handle: StoreHandle, logger?: Logger): IAdminLogStore {
  switch (handle.kind) {
    case "embedded":
      return new SqliteAdminLogStore(handle, logger);
    case "client-server":
      return new PostgresAdminLogStore(handle, logger);
  }
}
