import { z } from "zod";
import {
  insertAdminUserSchema,
  insertContentFlagSchema,
  type AdminUser,
  type ContentFlag,
  type Metadata,
  type SystemLog,
  type UserActivityLog,
} from "@shared/schema";
import type { IRecordStore } from "../storage";
import { createAdminLogStore, type IAdminLogStore } from "../storage/adminLogStore";
import { utcDayRange } from "../storage/rowMapping";
import { ConflictError, NotFoundError, StorageError, errorMessage, wrapStorageFailure } from "../errors";
import { safeLogger, type Logger } from "../safe_logger";
import {
  activityFilterSchema,
  adminActorSchema,
  idSchema,
  moderationSchema,
  newSystemLogSchema,
  newUserActivitySchema,
  parseInput,
  systemLogFilterSchema,
} from "../validation";

const ANALYTICS_CACHE_KEY = "analytics:summary";
const DASHBOARD_LIST_LIMIT = 10;
const PENDING_FLAGS_LIMIT = 50;

export const analyticsDataSchema = z.object({
  totalUsers: z.number(),
  activeUsersToday: z.number(),
  totalAnalyses: z.number(),
  analysesToday: z.number(),
  totalAppointments: z.number(),
  appointmentsToday: z.number(),
  totalPatients: z.number(),
  patientsToday: z.number(),
  analysisRequests: z.number(),
  analysisRequestsToday: z.number(),
  errorRate: z.number(),
  systemUptimeHours: z.number(),
  generatedAt: z.string(),
});

export type AnalyticsData = z.infer<typeof analyticsDataSchema>;

export type HealthStatus = "healthy" | "warning" | "critical";

export interface SystemHealth {
  healthScore: number;
  status: HealthStatus;
  metrics: {
    errorRate: number;
    uptimeHours: number;
    activeUsersToday: number;
  };
  lastUpdated: string;
}

export interface DashboardStats {
  analytics: AnalyticsData;
  recentActivities: UserActivityLog[];
  recentLogs: SystemLog[];
  pendingFlags: ContentFlag[];
  systemInfo: {
    uptimeHours: number;
    startTime: string;
    currentTime: string;
  };
}

/**
 * 100, minus twice every error-rate point above 5%, minus 10 when fewer than
 * ten activities were logged today; clamped to 0..100 and rounded to one decimal.
 */
export function scoreHealth(errorRate: number, activeUsersToday: number): { score: number; status: HealthStatus } {
  let score = 100;
  if (errorRate > 5) score -= (errorRate - 5) * 2;
  if (activeUsersToday < 10) score -= 10;
  score = Math.round(Math.max(0, Math.min(100, score)) * 10) / 10;

  const status: HealthStatus = score >= 80 ? "healthy" : score >= 60 ? "warning" : "critical";
  return { score, status };
}

export interface AdminServiceOptions {
  logger?: Logger;
  clock?: () => Date;
  /** 0 disables the analytics cache */
  analyticsCacheTtlSeconds?: number;
}

export class AdminService {
  private adminStore?: IAdminLogStore;
  private readonly logger: Logger;
  private readonly log: Logger;
  private readonly clock: () => Date;
  private readonly cacheTtlMs: number;
  readonly startedAt: Date;

  constructor(
    private readonly store: IRecordStore,
    options: AdminServiceOptions = {},
  ) {
    this.logger = options.logger ?? safeLogger;
    this.log = this.logger.child("admin-service");
    this.clock = options.clock ?? (() => new Date());
    this.cacheTtlMs = (options.analyticsCacheTtlSeconds ?? 60) * 1000;
    this.startedAt = this.clock();
  }

  /** Connects the store, creates core and admin tables and records the startup. */
  async initialize(): Promise<boolean> {
    if (!(await this.store.connect())) return false;
    if (!(await this.store.createSchema())) return false;

    const handle = this.store.getHandle();
    if (!handle) return false;

    const adminStore = createAdminLogStore(handle, this.logger);
    if (!(await adminStore.createSchema())) return false;
    this.adminStore = adminStore;

    await this.logSystemEvent({
      level: "info",
      component: "system",
      message: "Admin service initialized",
      metadata: { startTime: this.startedAt.toISOString() },
    });
    return true;
  }

  async shutdown(): Promise<boolean> {
    this.adminStore = undefined;
    return this.store.disconnect();
  }

  private requireAdminStore(): IAdminLogStore {
    if (!this.adminStore) throw new StorageError("Admin service is not initialized");
    return this.adminStore;
  }

  private uptimeHours(now: Date): number {
    return Math.round(((now.getTime() - this.startedAt.getTime()) / 3_600_000) * 100) / 100;
  }

  async logUserActivity(input: unknown): Promise<boolean> {
    const entry = parseInput(newUserActivitySchema, input);
    return this.requireAdminStore().logUserActivity(entry);
  }

  async logSystemEvent(input: unknown): Promise<boolean> {
    const entry = parseInput(newSystemLogSchema, input);
    return this.requireAdminStore().logSystemEvent(entry);
  }

  async getAnalytics(options: { fresh?: boolean } = {}): Promise<AnalyticsData> {
    const adminStore = this.requireAdminStore();
    const now = this.clock();

    if (!options.fresh && this.cacheTtlMs > 0) {
      const cached = analyticsDataSchema.safeParse(await adminStore.getCachedAnalytics(ANALYTICS_CACHE_KEY, now));
      if (cached.success) return cached.data;
    }

    const today = utcDayRange(now);
    const [
      totalPatients,
      patientsToday,
      totalAnalyses,
      analysesToday,
      totalAppointments,
      appointmentsToday,
      activeUsersToday,
      analysisRequests,
      analysisRequestsToday,
      errorLogs,
      allLogs,
    ] = await Promise.all([
      adminStore.countRows("patients"),
      adminStore.countRows("patients", { since: today.start, until: today.end }),
      adminStore.countRows("medical_records"),
      adminStore.countRows("medical_records", { since: today.start, until: today.end }),
      adminStore.countRows("appointments"),
      adminStore.countRows("appointments", { since: today.start, until: today.end }),
      adminStore.countRows("user_activity_logs", { since: today.start, until: today.end }),
      adminStore.countRows("user_activity_logs", { activityType: "analysis_request" }),
      adminStore.countRows("user_activity_logs", {
        activityType: "analysis_request",
        since: today.start,
        until: today.end,
      }),
      adminStore.countRows("system_logs", { level: "error" }),
      adminStore.countRows("system_logs"),
    ]);

    const analytics: AnalyticsData = {
      totalUsers: totalPatients,
      activeUsersToday,
      totalAnalyses,
      analysesToday,
      totalAppointments,
      appointmentsToday,
      totalPatients,
      patientsToday,
      analysisRequests,
      analysisRequestsToday,
      errorRate: allLogs === 0 ? 0 : (errorLogs / allLogs) * 100,
      systemUptimeHours: this.uptimeHours(now),
      generatedAt: now.toISOString(),
    };

    if (this.cacheTtlMs > 0) {
      await adminStore.setCachedAnalytics(ANALYTICS_CACHE_KEY, analytics, new Date(now.getTime() + this.cacheTtlMs));
    }
    return analytics;
  }

  async getDashboardStats(): Promise<DashboardStats> {
    const adminStore = this.requireAdminStore();
    const [analytics, recentActivities, recentLogs, pendingFlags] = await Promise.all([
      this.getAnalytics(),
      adminStore.getRecentActivities({ limit: DASHBOARD_LIST_LIMIT }),
      adminStore.getRecentLogs({ limit: DASHBOARD_LIST_LIMIT }),
      adminStore.getPendingFlags(DASHBOARD_LIST_LIMIT),
    ]);

    const now = this.clock();
    return {
      analytics,
      recentActivities,
      recentLogs,
      pendingFlags,
      systemInfo: {
        uptimeHours: this.uptimeHours(now),
        startTime: this.startedAt.toISOString(),
        currentTime: now.toISOString(),
      },
    };
  }

  async getUserActivities(filter: unknown = {}): Promise<UserActivityLog[]> {
    return this.requireAdminStore().getRecentActivities(parseInput(activityFilterSchema, filter));
  }

  async getSystemLogs(filter: unknown = {}): Promise<SystemLog[]> {
    return this.requireAdminStore().getRecentLogs(parseInput(systemLogFilterSchema, filter));
  }

  async getPendingContentFlags(limit: number = PENDING_FLAGS_LIMIT): Promise<ContentFlag[]> {
    return this.requireAdminStore().getPendingFlags(limit);
  }

  async createContentFlag(input: unknown): Promise<ContentFlag> {
    const fields = parseInput(insertContentFlagSchema, input);
    const adminStore = this.requireAdminStore();

    let id: string;
    try {
      id = await adminStore.createContentFlag(fields);
    } catch (error) {
      throw wrapStorageFailure(error, "create content flag");
    }

    await this.logSystemEvent({
      level: "info",
      component: "moderation",
      message: `Content flag created for ${fields.contentType}:${fields.contentId}`,
      metadata: { flagId: id, reason: fields.reason },
    });

    const flag = await adminStore.getContentFlag(id);
    if (!flag) {
      throw new StorageError("Failed to create content flag: created record could not be read back");
    }
    return flag;
  }

  /**
   * Sets the flag's status and records the moderation action together;
   * either both are stored or neither is.
   */
  async moderateContent(flagId: string, admin: unknown, command: unknown): Promise<ContentFlag> {
    const id = parseInput(idSchema, flagId);
    const actor = parseInput(adminActorSchema, admin);
    const { action, status, reason, notes } = parseInput(moderationSchema, command);
    const adminStore = this.requireAdminStore();

    if (!(await adminStore.getContentFlag(id))) {
      throw new NotFoundError(`Content flag ${id} not found`);
    }

    const moderated = await adminStore.moderateFlag(id, status, notes ?? null, {
      adminId: actor.id,
      adminEmail: actor.email,
      actionType: action,
      reason: reason ?? null,
    });
    if (!moderated) {
      throw new StorageError("Failed to moderate content flag");
    }

    const metadata: Metadata = { adminId: actor.id, flagId: id, action, status };
    await this.logSystemEvent({
      level: "info",
      component: "moderation",
      message: `Content moderated: ${action} on flag ${id}`,
      metadata,
    });

    const updated = await adminStore.getContentFlag(id);
    if (!updated) {
      throw new StorageError("Failed to moderate content flag: flag could not be read back");
    }
    return updated;
  }

  async createAdminUser(input: unknown): Promise<AdminUser> {
    const fields = parseInput(insertAdminUserSchema, input);
    const adminStore = this.requireAdminStore();

    if (await adminStore.getAdminUserByEmail(fields.email)) {
      throw new ConflictError("An admin user with this email already exists");
    }
    try {
      await adminStore.createAdminUser(fields);
    } catch (error) {
      throw wrapStorageFailure(error, "create admin user");
    }
    return this.getAdminUserByEmail(fields.email);
  }

  async getAdminUserByEmail(email: string): Promise<AdminUser> {
    const user = await this.requireAdminStore().getAdminUserByEmail(email);
    if (!user) {
      throw new NotFoundError("No admin user is registered with this email");
    }
    return user;
  }

  async recordAdminLogin(email: string): Promise<AdminUser> {
    const user = await this.getAdminUserByEmail(email);
    const adminStore = this.requireAdminStore();

    if (!(await adminStore.touchAdminLogin(user.id, this.clock()))) {
      throw new StorageError("Failed to record admin login");
    }
    await adminStore.logUserActivity({
      userId: user.id,
      userEmail: user.email,
      activityType: "login",
      description: "Admin login",
    });
    return this.getAdminUserByEmail(user.email);
  }

  async getSystemHealth(): Promise<SystemHealth> {
    const analytics = await this.getAnalytics();
    const { score, status } = scoreHealth(analytics.errorRate, analytics.activeUsersToday);
    return {
      healthScore: score,
      status,
      metrics: {
        errorRate: analytics.errorRate,
        uptimeHours: analytics.systemUptimeHours,
        activeUsersToday: analytics.activeUsersToday,
      },
      lastUpdated: this.clock().toISOString(),
    };
  }

  /** Records an unexpected failure as an error-level system log, never throwing itself. */
  async recordFailure(component: string, error: unknown): Promise<void> {
    if (!this.adminStore) return;
    const logged = await this.adminStore.logSystemEvent({
      level: "error",
      component,
      message: errorMessage(error),
      stackTrace: error instanceof Error ? error.stack ?? null : null,
    });
    if (!logged) this.log.warn(`Failed to persist ${component} error`);
  }
}
