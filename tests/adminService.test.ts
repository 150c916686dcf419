import { ConflictError, NotFoundError, StorageError, ValidationError } from '../server/errors';
import { AdminService, scoreHealth, type HealthStatus } from '../server/services/adminService';
import { SqliteStorage } from '../server/storage/sqliteStorage';
import { captureLogger, patientInput } from './helpers';

describe('scoreHealth', () => {
  it.each<[number, number, number, HealthStatus]>([
    [0, 20, 100, 'healthy'],
    [0, 5, 90, 'healthy'],
    [15, 20, 80, 'healthy'],
    [7.33, 10, 95.3, 'healthy'],
    [20, 5, 60, 'warning'],
    [25, 20, 60, 'warning'],
    [26, 20, 58, 'critical'],
    [60, 0, 0, 'critical'],
  ])('errorRate %p with %p activities scores %p (%s)', (errorRate, active, score, status) => {
    expect(scoreHealth(errorRate, active)).toEqual({ score, status });
  });
});

describe('AdminService', () => {
  const now = new Date();
  let store: SqliteStorage;
  let service: AdminService;

  beforeEach(async () => {
    store = new SqliteStorage({ path: ':memory:', logger: captureLogger() });
    service = new AdminService(store, { logger: captureLogger(), clock: () => now });
    expect(await service.initialize()).toBe(true);
  });

  afterEach(async () => {
    await service.shutdown();
  });

  it('should refuse admin operations before initialize', async () => {
    const idle = new AdminService(new SqliteStorage({ path: ':memory:' }), { logger: captureLogger() });
    await expect(idle.getAnalytics()).rejects.toThrow(new StorageError('Admin service is not initialized'));
  });

  it('should log its own startup', async () => {
    const logs = await service.getSystemLogs();
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({
      level: 'info',
      component: 'system',
      message: 'Admin service initialized',
      metadata: { startTime: now.toISOString() },
    });
  });

  it('should validate activity entries', async () => {
    await expect(service.logUserActivity({ activityType: 'dancing', description: 'x' })).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(await service.logUserActivity({ activityType: 'login', description: 'User login' })).toBe(true);
  });

  describe('analytics', () => {
    beforeEach(async () => {
      await store.createPatient(patientInput());
      await store.createPatient(patientInput({ email: 'bob@example.com', name: 'Bob' }));
      await service.logUserActivity({ activityType: 'analysis_request', description: 'CT analysis' });
      await service.logUserActivity({ activityType: 'login', description: 'User login' });
      await service.recordFailure('http', new Error('upstream timeout'));
    });

    it('should compute totals, today counts and the error rate', async () => {
      const analytics = await service.getAnalytics({ fresh: true });

      expect(analytics).toEqual({
        totalUsers: 2,
        activeUsersToday: 2,
        totalAnalyses: 0,
        analysesToday: 0,
        totalAppointments: 0,
        appointmentsToday: 0,
        totalPatients: 2,
        patientsToday: 2,
        analysisRequests: 1,
        analysisRequestsToday: 1,
        errorRate: 50,
        systemUptimeHours: 0,
        generatedAt: now.toISOString(),
      });
    });

    it('should serve cached analytics until asked for fresh numbers', async () => {
      expect((await service.getAnalytics()).totalPatients).toBe(2);
      await store.createPatient(patientInput({ email: 'cy@example.com', name: 'Cy' }));

      expect((await service.getAnalytics()).totalPatients).toBe(2);
      expect((await service.getAnalytics({ fresh: true })).totalPatients).toBe(3);
    });

    it('should score system health from analytics', async () => {
      const health = await service.getSystemHealth();

      expect(health).toEqual({
        healthScore: 0,
        status: 'critical',
        metrics: { errorRate: 50, uptimeHours: 0, activeUsersToday: 2 },
        lastUpdated: now.toISOString(),
      });
    });

    it('should assemble the dashboard', async () => {
      const dashboard = await service.getDashboardStats();

      expect(dashboard.recentActivities.map((a) => a.description)).toEqual(['User login', 'CT analysis']);
      expect(dashboard.recentLogs.map((l) => l.level)).toEqual(['error', 'info']);
      expect(dashboard.pendingFlags).toEqual([]);
      expect(dashboard.systemInfo).toEqual({
        uptimeHours: 0,
        startTime: now.toISOString(),
        currentTime: now.toISOString(),
      });
    });

    it('should persist failures with their stack', async () => {
      const [failure] = await service.getSystemLogs({ level: 'error' });
      expect(failure.component).toBe('http');
      expect(failure.message).toBe('upstream timeout');
      expect(failure.stackTrace).toContain('upstream timeout');
    });
  });

  describe('moderation', () => {
    const admin = { id: 'admin-1', email: 'admin@example.com' };

    it('should moderate a flag and log the action', async () => {
      const flag = await service.createContentFlag({
        contentType: 'medical_record',
        contentId: 'r-1',
        reason: 'Duplicate upload',
      });
      expect(flag.status).toBe('pending');

      const moderated = await service.moderateContent(flag.id, admin, {
        action: 'reject',
        status: 'rejected',
        notes: 'Duplicate of an earlier study',
      });

      expect(moderated).toMatchObject({ id: flag.id, status: 'rejected', adminNotes: 'Duplicate of an earlier study' });
      expect(await service.getPendingContentFlags()).toEqual([]);

      const messages = (await service.getSystemLogs({ component: 'moderation' })).map((l) => l.message);
      expect(messages).toEqual([
        `Content moderated: reject on flag ${flag.id}`,
        'Content flag created for medical_record:r-1',
      ]);
    });

    it('should reject unknown flags and bad commands', async () => {
      await expect(
        service.moderateContent('missing', admin, { action: 'approve', status: 'approved' }),
      ).rejects.toBeInstanceOf(NotFoundError);
      await expect(
        service.moderateContent('missing', { id: 'admin-1' }, { action: 'approve', status: 'approved' }),
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(service.moderateContent('missing', admin, { action: 'approve', status: 'done' })).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });

  describe('admin users', () => {
    const input = { email: 'admin@example.com', name: 'Admin', role: 'admin', permissions: ['moderate'] };

    it('should create admin users once', async () => {
      const user = await service.createAdminUser(input);
      expect(user).toMatchObject({ email: 'admin@example.com', role: 'admin', permissions: ['moderate'] });
      await expect(service.createAdminUser(input)).rejects.toBeInstanceOf(ConflictError);
    });

    it('should record a login', async () => {
      await service.createAdminUser(input);
      const user = await service.recordAdminLogin('admin@example.com');

      expect(user.lastLogin).toBe(now.toISOString());
      const [login] = await service.getUserActivities({ activityType: 'login' });
      expect(login).toMatchObject({ userId: user.id, description: 'Admin login' });
    });

    it('should report unknown admins', async () => {
      await expect(service.recordAdminLogin('nobody@example.com')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
