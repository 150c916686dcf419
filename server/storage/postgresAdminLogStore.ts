import type { Pool, PoolClient } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { and, count, desc, eq, gt, gte, lt, type SQL } from "drizzle-orm";
import type { AnyPgColumn, AnyPgTable } from "drizzle-orm/pg-core";
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
  type AdminUser,
  type ContentFlag,
  type InsertAdminUser,
  type InsertContentFlag,
  type JsonValue,
  type ModerationStatus,
  type SystemLog,
  type UserActivityLog,
} from "@shared/schema";
import type { ClientServerHandle } from "../storage";
import { ConflictError, StorageError, errorMessage } from "../errors";
import { safeLogger, type Logger } from "../safe_logger";
import { POSTGRES_ADMIN_DDL } from "./ddl";
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
import { decodeJson, decodeList, decodeMetadata, generateId, hasErrorCode, monotonicNow, toIsoString } from "./rowMapping";

function mapActivityRow(row: typeof userActivityLogs.$inferSelect): UserActivityLog {
  return { ...row, metadata: decodeMetadata(row.metadata), timestamp: toIsoString(row.timestamp) };
}

function mapSystemLogRow(row: typeof systemLogs.$inferSelect): SystemLog {
  return { ...row, metadata: decodeMetadata(row.metadata), timestamp: toIsoString(row.timestamp) };
}

function mapAdminUserRow(row: typeof adminUsers.$inferSelect): AdminUser {
  return {
    ...row,
    permissions: decodeList(row.permissions),
    lastLogin: toIsoString(row.lastLogin),
    createdAt: toIsoString(row.createdAt),
  };
}

function mapContentFlagRow(row: typeof contentFlags.$inferSelect): ContentFlag {
  return { ...row, timestamp: toIsoString(row.timestamp) };
}

function timeBounds(column: AnyPgColumn, since?: string, until?: string): SQL[] {
  const conditions: SQL[] = [];
  if (since) conditions.push(gte(column, new Date(since)));
  if (until) conditions.push(lt(column, new Date(until)));
  return conditions;
}

export class PostgresAdminLogStore implements IAdminLogStore {
  private readonly pool: Pool;
  private readonly log: Logger;

  constructor(handle: ClientServerHandle, logger?: Logger) {
    this.pool = handle.pool;
    this.log = (logger ?? safeLogger).child("postgres-admin-store");
  }

  private async withClient<T>(run: (db: NodePgDatabase, client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await run(drizzle(client), client);
    } finally {
      client.release();
    }
  }

  private async attempt<T>(
    operation: string,
    fallback: T,
    run: (db: NodePgDatabase, client: PoolClient) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.withClient(run);
    } catch (error) {
      this.log.error(`Failed to ${operation}`, { error: errorMessage(error) });
      return fallback;
    }
  }

  async createSchema(): Promise<boolean> {
    return this.attempt("create admin schema", false, async (_db, client) => {
      await client.query("BEGIN");
      try {
        for (const statement of POSTGRES_ADMIN_DDL) await client.query(statement);
        await client.query("COMMIT");
      } catch (error) {
        await client.query("ROLLBACK");
        throw error;
      }
      return true;
    });
  }

  async logUserActivity(entry: NewUserActivity): Promise<boolean> {
    return this.attempt("log user activity", false, async (db) => {
      await db.insert(userActivityLogs).values({
        id: generateId(),
        userId: entry.userId ?? null,
        userEmail: entry.userEmail ?? null,
        activityType: entry.activityType,
        description: entry.description,
        ipAddress: entry.ipAddress ?? null,
        userAgent: entry.userAgent ?? null,
        metadata: entry.metadata ?? null,
        timestamp: new Date(monotonicNow()),
        sessionId: entry.sessionId ?? null,
      });
      return true;
    });
  }

  async logSystemEvent(entry: NewSystemLog): Promise<boolean> {
    return this.attempt("log system event", false, async (db) => {
      await db.insert(systemLogs).values({
        id: generateId(),
        level: entry.level,
        component: entry.component,
        message: entry.message,
        stackTrace: entry.stackTrace ?? null,
        metadata: entry.metadata ?? null,
        timestamp: new Date(monotonicNow()),
      });
      return true;
    });
  }

  async getRecentActivities(filter: ActivityFilter = {}): Promise<UserActivityLog[]> {
    const conditions = timeBounds(userActivityLogs.timestamp, filter.since, filter.until);
    if (filter.userId) conditions.push(eq(userActivityLogs.userId, filter.userId));
    if (filter.activityType) conditions.push(eq(userActivityLogs.activityType, filter.activityType));

    return this.attempt("get recent activities", [], async (db) => {
      const rows = await db
        .select()
        .from(userActivityLogs)
        .where(and(...conditions))
        .orderBy(desc(userActivityLogs.timestamp))
        .limit(filter.limit ?? DEFAULT_RECENT_LIMIT);
      return rows.map(mapActivityRow);
    });
  }

  async getRecentLogs(filter: SystemLogFilter = {}): Promise<SystemLog[]> {
    const conditions = timeBounds(systemLogs.timestamp, filter.since, filter.until);
    if (filter.level) conditions.push(eq(systemLogs.level, filter.level));
    if (filter.component) conditions.push(eq(systemLogs.component, filter.component));

    return this.attempt("get recent logs", [], async (db) => {
      const rows = await db
        .select()
        .from(systemLogs)
        .where(and(...conditions))
        .orderBy(desc(systemLogs.timestamp))
        .limit(filter.limit ?? DEFAULT_RECENT_LIMIT);
      return rows.map(mapSystemLogRow);
    });
  }

  async countRows(table: CountableTable, filter: CountFilter = {}): Promise<number> {
    return this.attempt(`count ${table}`, 0, async (db) => {
      const tally = async (source: AnyPgTable, conditions: SQL[]): Promise<number> => {
        const [row] = await db.select({ value: count() }).from(source).where(and(...conditions));
        return row?.value ?? 0;
      };

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
      await this.withClient((db) =>
        db.insert(contentFlags).values({
          id,
          contentType: flag.contentType,
          contentId: flag.contentId,
          reporterId: flag.reporterId ?? null,
          reporterEmail: flag.reporterEmail ?? null,
          reason: flag.reason,
          description: flag.description ?? null,
          status: "pending",
          adminNotes: null,
          timestamp: new Date(monotonicNow()),
        }),
      );
      return id;
    } catch (error) {
      throw new StorageError(`Failed to create content flag: ${errorMessage(error)}`);
    }
  }

  async getContentFlag(id: string): Promise<ContentFlag | undefined> {
    return this.attempt("get content flag", undefined, async (db) => {
      const [row] = await db.select().from(contentFlags).where(eq(contentFlags.id, id));
      return row ? mapContentFlagRow(row) : undefined;
    });
  }

  async getPendingFlags(limit: number = DEFAULT_RECENT_LIMIT): Promise<ContentFlag[]> {
    return this.attempt("get pending flags", [], async (db) => {
      const rows = await db
        .select()
        .from(contentFlags)
        .where(eq(contentFlags.status, "pending"))
        .orderBy(desc(contentFlags.timestamp))
        .limit(limit);
      return rows.map(mapContentFlagRow);
    });
  }

  async moderateFlag(
    flagId: string,
    status: ModerationStatus,
    adminNotes: string | null,
    action: ModerationActionInput,
  ): Promise<boolean> {
    return this.attempt("moderate content flag", false, (db) =>
      db.transaction(async (tx) => {
        const updated = await tx
          .update(contentFlags)
          .set({ status, adminNotes })
          .where(eq(contentFlags.id, flagId))
          .returning({ id: contentFlags.id });
        if (updated.length === 0) return false;

        await tx.insert(moderationActions).values({
          id: generateId(),
          adminId: action.adminId,
          adminEmail: action.adminEmail,
          targetType: FLAG_TARGET_TYPE,
          targetId: flagId,
          actionType: action.actionType,
          reason: action.reason ?? null,
          status,
          metadata: action.metadata ?? null,
          timestamp: new Date(monotonicNow()),
        });
        return true;
      }),
    );
  }

  async createAdminUser(user: InsertAdminUser): Promise<string> {
    const id = generateId();
    try {
      await this.withClient((db) =>
        db.insert(adminUsers).values({
          id,
          email: user.email.trim().toLowerCase(),
          name: user.name,
          role: user.role,
          permissions: user.permissions,
          isActive: user.isActive ?? true,
          lastLogin: null,
          createdAt: new Date(monotonicNow()),
        }),
      );
      return id;
    } catch (error) {
      if (hasErrorCode(error, "23505")) {
        throw new ConflictError("An admin user with this email already exists");
      }
      throw new StorageError(`Failed to create admin user: ${errorMessage(error)}`);
    }
  }

  async getAdminUserByEmail(email: string): Promise<AdminUser | undefined> {
    return this.attempt("get admin user", undefined, async (db) => {
      const [row] = await db.select().from(adminUsers).where(eq(adminUsers.email, email.trim().toLowerCase()));
      return row ? mapAdminUserRow(row) : undefined;
    });
  }

  async touchAdminLogin(id: string, at: Date = new Date()): Promise<boolean> {
    return this.attempt("record admin login", false, async (db) => {
      const updated = await db
        .update(adminUsers)
        .set({ lastLogin: at })
        .where(eq(adminUsers.id, id))
        .returning({ id: adminUsers.id });
      return updated.length > 0;
    });
  }

  async getCachedAnalytics(key: string, now: Date = new Date()): Promise<JsonValue | undefined> {
    return this.attempt("read analytics cache", undefined, async (db) => {
      const [row] = await db
        .select()
        .from(analyticsCache)
        .where(and(eq(analyticsCache.cacheKey, key), gt(analyticsCache.expiresAt, now)));
      return row ? decodeJson(row.data) ?? undefined : undefined;
    });
  }

  async setCachedAnalytics(key: string, data: JsonValue, expiresAt: Date): Promise<boolean> {
    return this.attempt("write analytics cache", false, async (db) => {
      const createdAt = new Date(monotonicNow());
      await db
        .insert(analyticsCache)
        .values({ id: generateId(), cacheKey: key, data, expiresAt, createdAt })
        .onConflictDoUpdate({ target: analyticsCache.cacheKey, set: { data, expiresAt, createdAt } });
      return true;
    });
  }
}
