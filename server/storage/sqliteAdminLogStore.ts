import { and, count, desc, eq, gt, gte, lt, type SQL } from "drizzle-orm";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { AnySQLiteColumn, AnySQLiteTable } from "drizzle-orm/sqlite-core";
import type * as schema from "@shared/sqliteSchema";
import {
  userActivityLogs,
  systemLogs,
  adminUsers,
  moderationActions,
  contentFlags,
  analyticsCache,
  patients,
  medicalRecords,
  appointments,
} from "@shared/sqliteSchema";
import type {
  AdminUser,
  ContentFlag,
  InsertAdminUser,
  InsertContentFlag,
  JsonValue,
  ModerationStatus,
  SystemLog,
  UserActivityLog,
} from "@shared/schema";
import type { EmbeddedHandle } from "../storage";
import { ConflictError, StorageError, errorMessage } from "../errors";
import { safeLogger, type Logger } from "../safe_logger";
import { SQLITE_ADMIN_DDL } from "./ddl";
import {
  DEFAULT_RECENT_LIMIT,
  FLAG_TARGET_TYPE,
  type ActivityFilter,
  type CountFilter,
  type CountableTable,
  type IAdminLogStore,
  type ModerationActionInput,
  type NewSystemLog,
  type NewUserActivity,
  type SystemLogFilter,
} from "./adminLogStore";
import {
  decodeJson,
  decodeList,
  decodeMetadata,
  encodeJson,
  encodeList,
  generateId,
  hasErrorCode,
  monotonicNow,
  toIsoString,
} from "./rowMapping";

type Db = BetterSQLite3Database<typeof schema>;

function mapActivityRow(row: typeof userActivityLogs.$inferSelect): UserActivityLog {
  return { ...row, metadata: decodeMetadata(row.metadata) };
}

function mapSystemLogRow(row: typeof systemLogs.$inferSelect): SystemLog {
  return { ...row, metadata: decodeMetadata(row.metadata) };
}

function mapAdminUserRow(row: typeof adminUsers.$inferSelect): AdminUser {
  return { ...row, permissions: decodeList(row.permissions) };
}

function mapContentFlagRow(row: typeof contentFlags.$inferSelect): ContentFlag {
  return { ...row };
}

function timeBounds(column: AnySQLiteColumn, since?: string, until?: string): SQL[] {
  const conditions: SQL[] = [];
  if (since) conditions.push(gte(column, toIsoString(since)));
  if (until) conditions.push(lt(column, toIsoString(until)));
  return conditions;
}

export class SqliteAdminLogStore implements IAdminLogStore {
  private readonly db: Db;
  private readonly log: Logger;

  constructor(private readonly handle: EmbeddedHandle, logger?: Logger) {
    this.db = handle.db;
    this.log = (logger ?? safeLogger).child("sqlite-admin-store");
  }

  private attempt<T>(operation: string, fallback: T, run: (db: Db) => T): T {
    try {
      return run(this.db);
    } catch (error) {
      this.log.error(`Failed to ${operation}`, { error: errorMessage(error) });
      return fallback;
    }
  }

  async createSchema(): Promise<boolean> {
    return this.attempt("create admin schema", false, () => {
      const sqlite = this.handle.sqlite;
      sqlite.transaction(() => {
        for (const statement of SQLITE_ADMIN_DDL) sqlite.exec(statement);
      })();
      return true;
    });
  }

  async logUserActivity(entry: NewUserActivity): Promise<boolean> {
    return this.attempt("log user activity", false, (db) => {
      db.insert(userActivityLogs)
        .values({
          id: generateId(),
          userId: entry.userId ?? null,
          userEmail: entry.userEmail ?? null,
          activityType: entry.activityType,
          description: entry.description,
          ipAddress: entry.ipAddress ?? null,
          userAgent: entry.userAgent ?? null,
          metadata: encodeJson(entry.metadata),
          timestamp: monotonicNow(),
          sessionId: entry.sessionId ?? null,
        })
        .run();
      return true;
    });
  }

  async logSystemEvent(entry: NewSystemLog): Promise<boolean> {
    return this.attempt("log system event", false, (db) => {
      db.insert(systemLogs)
        .values({
          id: generateId(),
          level: entry.level,
          component: entry.component,
          message: entry.message,
          stackTrace: entry.stackTrace ?? null,
          metadata: encodeJson(entry.metadata),
          timestamp: monotonicNow(),
        })
        .run();
      return true;
    });
  }

  async getRecentActivities(filter: ActivityFilter = {}): Promise<UserActivityLog[]> {
    const conditions = timeBounds(userActivityLogs.timestamp, filter.since, filter.until);
    if (filter.userId) conditions.push(eq(userActivityLogs.userId, filter.userId));
    if (filter.activityType) conditions.push(eq(userActivityLogs.activityType, filter.activityType));

    return this.attempt("get recent activities", [], (db) =>
      db
        .select()
        .from(userActivityLogs)
        .where(and(...conditions))
        .orderBy(desc(userActivityLogs.timestamp))
        .limit(filter.limit ?? DEFAULT_RECENT_LIMIT)
        .all()
        .map(mapActivityRow),
    );
  }

  async getRecentLogs(filter: SystemLogFilter = {}): Promise<SystemLog[]> {
    const conditions = timeBounds(systemLogs.timestamp, filter.since, filter.until);
    if (filter.level) conditions.push(eq(systemLogs.level, filter.level));
    if (filter.component) conditions.push(eq(systemLogs.component, filter.component));

    return this.attempt("get recent logs", [], (db) =>
      db
        .select()
        .from(systemLogs)
        .where(and(...conditions))
        .orderBy(desc(systemLogs.timestamp))
        .limit(filter.limit ?? DEFAULT_RECENT_LIMIT)
        .all()
        .map(mapSystemLogRow),
    );
  }

  async countRows(table: CountableTable, filter: CountFilter = {}): Promise<number> {
    return this.attempt(`count ${table}`, 0, (db) => {
      const tally = (source: AnySQLiteTable, conditions: SQL[]): number =>
        db.select({ value: count() }).from(source).where(and(...conditions)).get()?.value ?? 0;

      switch (table) {
        case "patients":
          return tally(patients, timeBounds(patients.createdAt, filter.since, filter.until));
        case "medical_records":
          return tally(medicalRecords, timeBounds(medicalRecords.createdAt, filter.since, filter.until));
        case "appointments":
          return tally(appointments, timeBounds(appointments.createdAt, filter.since, filter.until));
        case "content_flags":
          return tally(contentFlags, timeBounds(contentFlags.timestamp, filter.since, filter.until));
        case "user_activity_logs": {
          const conditions = timeBounds(userActivityLogs.timestamp, filter.since, filter.until);
          if (filter.activityType) conditions.push(eq(userActivityLogs.activityType, filter.activityType));
          return tally(userActivityLogs, conditions);
        }
        case "system_logs": {
          const conditions = timeBounds(systemLogs.timestamp, filter.since, filter.until);
          if (filter.level) conditions.push(eq(systemLogs.level, filter.level));
          return tally(systemLogs, conditions);
        }
      }
    });
  }

  async createContentFlag(flag: InsertContentFlag): Promise<string> {
    const id = generateId();
    try {
      this.db
        .insert(contentFlags)
        .values({
          id,
          contentType: flag.contentType,
          contentId: flag.contentId,
          reporterId: flag.reporterId ?? null,
          reporterEmail: flag.reporterEmail ?? null,
          reason: flag.reason,
          description: flag.description ?? null,
          status: "pending",
          adminNotes: null,
          timestamp: monotonicNow(),
        })
        .run();
      return id;
    } catch (error) {
      throw new StorageError(`Failed to create content flag: ${errorMessage(error)}`);
    }
  }

  async getContentFlag(id: string): Promise<ContentFlag | undefined> {
    return this.attempt("get content flag", undefined, (db) => {
      const row = db.select().from(contentFlags).where(eq(contentFlags.id, id)).get();
      return row ? mapContentFlagRow(row) : undefined;
    });
  }

  async getPendingFlags(limit: number = DEFAULT_RECENT_LIMIT): Promise<ContentFlag[]> {
    return this.attempt("get pending flags", [], (db) =>
      db
        .select()
        .from(contentFlags)
        .where(eq(contentFlags.status, "pending"))
        .orderBy(desc(contentFlags.timestamp))
        .limit(limit)
        .all()
        .map(mapContentFlagRow),
    );
  }

  async moderateFlag(
    flagId: string,
    status: ModerationStatus,
    adminNotes: string | null,
    action: ModerationActionInput,
  ): Promise<boolean> {
    return this.attempt("moderate content flag", false, (db) =>
      db.transaction((tx) => {
        const updated = tx
          .update(contentFlags)
          .set({ status, adminNotes })
          .where(eq(contentFlags.id, flagId))
          .returning({ id: contentFlags.id })
          .all();
        if (updated.length === 0) return false;

        tx.insert(moderationActions)
          .values({
            id: generateId(),
            adminId: action.adminId,
            adminEmail: action.adminEmail,
            targetType: FLAG_TARGET_TYPE,
            targetId: flagId,
            actionType: action.actionType,
            reason: action.reason ?? null,
            status,
            metadata: encodeJson(action.metadata),
            timestamp: monotonicNow(),
          })
          .run();
        return true;
      }),
    );
  }

  async createAdminUser(user: InsertAdminUser): Promise<string> {
    const id = generateId();
    try {
      this.db
        .insert(adminUsers)
        .values({
          id,
          email: user.email.trim().toLowerCase(),
          name: user.name,
          role: user.role,
          permissions: encodeList(user.permissions),
          isActive: user.isActive ?? true,
          lastLogin: null,
          createdAt: monotonicNow(),
        })
        .run();
      return id;
    } catch (error) {
      if (hasErrorCode(error, "SQLITE_CONSTRAINT_UNIQUE")) {
        throw new ConflictError("An admin user with this email already exists");
      }
      throw new StorageError(`Failed to create admin user: ${errorMessage(error)}`);
    }
  }

  async getAdminUserByEmail(email: string): Promise<AdminUser | undefined> {
    return this.attempt("get admin user", undefined, (db) => {
      const row = db.select().from(adminUsers).where(eq(adminUsers.email, email.trim().toLowerCase())).get();
      return row ? mapAdminUserRow(row) : undefined;
    });
  }

  async touchAdminLogin(id: string, at: Date = new Date()): Promise<boolean> {
    return this.attempt("record admin login", false, (db) => {
      const updated = db
        .update(adminUsers)
        .set({ lastLogin: at.toISOString() })
        .where(eq(adminUsers.id, id))
        .returning({ id: adminUsers.id })
        .all();
      return updated.length > 0;
    });
  }

  async getCachedAnalytics(key: string, now: Date = new Date()): Promise<JsonValue | undefined> {
    return this.attempt("read analytics cache", undefined, (db) => {
      const row = db
        .select()
        .from(analyticsCache)
        .where(and(eq(analyticsCache.cacheKey, key), gt(analyticsCache.expiresAt, now.toISOString())))
        .get();
      return row ? decodeJson(row.data) ?? undefined : undefined;
    });
  }

  async setCachedAnalytics(key: string, data: JsonValue, expiresAt: Date): Promise<boolean> {
    const encoded = JSON.stringify(data);
    return this.attempt("write analytics cache", false, (db) => {
      const createdAt = monotonicNow();
      db.insert(analyticsCache)
        .values({ id: generateId(), cacheKey: key, data: encoded, expiresAt: expiresAt.toISOString(), createdAt })
        .onConflictDoUpdate({
          target: analyticsCache.cacheKey,
          set: { data: encoded, expiresAt: expiresAt.toISOString(), createdAt },
        })
        .run();
      return true;
    });
  }
}
