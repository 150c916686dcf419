import { Pool } from 'pg';
import { ConflictError } from '../server/errors';
import { PostgresAdminLogStore } from '../server/storage/postgresAdminLogStore';
import { captureLogger } from './helpers';

const mockClient = { query: jest.fn(), release: jest.fn() };
const mockPool = { connect: jest.fn(), end: jest.fn(), on: jest.fn() };

jest.mock('pg', () => ({
  types: jest.requireActual<typeof import('pg')>('pg').types,
  Pool: jest.fn(() => mockPool),
}));

type QueryText = string | { text: string };

function textOf(query: QueryText): string {
  return typeof query === 'string' ? query : query.text;
}

function statements(): string[] {
  return mockClient.query.mock.calls.map((call) => textOf(call[0]));
}

function pgError(code: string): Error {
  return Object.assign(new Error(`pg error ${code}`), { code });
}

describe('PostgresAdminLogStore', () => {
  const action = { adminId: 'admin-1', adminEmail: 'admin@example.com', actionType: 'approve' };
  let store: PostgresAdminLogStore;

  beforeEach(() => {
    jest.clearAllMocks();
    mockPool.connect.mockResolvedValue(mockClient);
    mockClient.query.mockResolvedValue({ rows: [], rowCount: 0 });
    store = new PostgresAdminLogStore({ kind: 'client-server', pool: new Pool() }, captureLogger());
  });

  describe('moderateFlag', () => {
    it('should update the flag and insert the action inside one transaction', async () => {
      mockClient.query.mockImplementation((query: QueryText) =>
        Promise.resolve({ rows: textOf(query).startsWith('update "content_flags"') ? [['flag-1']] : [] }),
      );

      expect(await store.moderateFlag('flag-1', 'approved', 'Checked', action)).toBe(true);

      const sent = statements();
      expect(sent).toHaveLength(4);
      expect(sent[0]).toMatch(/^begin\b/);
      expect(sent[1]).toMatch(/^update "content_flags"/);
      expect(sent[2]).toMatch(/^insert into "moderation_actions"/);
      expect(sent[3]).toBe('commit');
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should roll back the flag update when the action insert fails', async () => {
      mockClient.query.mockImplementation((query: QueryText) => {
        const text = textOf(query);
        if (text.startsWith('insert into "moderation_actions"')) return Promise.reject(new Error('disk full'));
        return Promise.resolve({ rows: text.startsWith('update "content_flags"') ? [['flag-1']] : [] });
      });

      expect(await store.moderateFlag('flag-1', 'approved', 'Checked', action)).toBe(false);

      const sent = statements();
      expect(sent[sent.length - 1]).toBe('rollback');
      expect(sent).not.toContain('commit');
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should skip the action for an unknown flag', async () => {
      expect(await store.moderateFlag('missing', 'rejected', null, action)).toBe(false);

      const sent = statements();
      expect(sent).toHaveLength(3);
      expect(sent[1]).toMatch(/^update "content_flags"/);
      expect(sent[2]).toBe('commit');
    });
  });

  describe('countRows', () => {
    it('should return the counted value', async () => {
      mockClient.query.mockResolvedValue({ rows: [[7]] });

      expect(await store.countRows('patients')).toBe(7);
      expect(statements()[0]).toContain('from "patients"');
    });

    it('should filter system logs by level', async () => {
      mockClient.query.mockResolvedValue({ rows: [[2]] });

      expect(await store.countRows('system_logs', { level: 'error' })).toBe(2);
      expect(statements()[0]).toContain('from "system_logs"');
      expect(mockClient.query.mock.calls[0][1]).toEqual(['error']);
    });

    it('should resolve to zero when the query fails', async () => {
      mockClient.query.mockRejectedValue(new Error('server closed the connection'));

      expect(await store.countRows('appointments')).toBe(0);
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });
  });

  describe('row mapping', () => {
    it('should map a content flag row', async () => {
      mockClient.query.mockResolvedValue({
        rows: [
          [
            'flag-1',
            'medical_record',
            'rec-1',
            null,
            'reporter@example.com',
            'Wrong patient',
            null,
            'pending',
            null,
            '2024-03-15T14:25:01.000Z',
          ],
        ],
      });

      expect(await store.getContentFlag('flag-1')).toEqual({
        id: 'flag-1',
        contentType: 'medical_record',
        contentId: 'rec-1',
        reporterId: null,
        reporterEmail: 'reporter@example.com',
        reason: 'Wrong patient',
        description: null,
        status: 'pending',
        adminNotes: null,
        timestamp: '2024-03-15T14:25:01.000Z',
      });
    });

    it('should map an admin user row and look it up by normalized email', async () => {
      mockClient.query.mockResolvedValue({
        rows: [
          [
            'adm-1',
            'admin@example.com',
            'Ada Admin',
            'moderator',
            ['flags:review'],
            true,
            null,
            '2024-03-15T14:25:01.000Z',
          ],
        ],
      });

      expect(await store.getAdminUserByEmail(' Admin@Example.com ')).toEqual({
        id: 'adm-1',
        email: 'admin@example.com',
        name: 'Ada Admin',
        role: 'moderator',
        permissions: ['flags:review'],
        isActive: true,
        lastLogin: null,
        createdAt: '2024-03-15T14:25:01.000Z',
      });
      expect(mockClient.query.mock.calls[0][1]).toEqual(['admin@example.com']);
    });

    it('should map a duplicate admin email to ConflictError', async () => {
      mockClient.query.mockRejectedValue(pgError('23505'));

      await expect(
        store.createAdminUser({ email: 'admin@example.com', name: 'Ada Admin', role: 'moderator', permissions: [] }),
      ).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe('analytics cache', () => {
    it('should upsert on the cache key', async () => {
      const data = { totalPatients: 3 };

      expect(await store.setCachedAnalytics('analytics:summary', data, new Date('2030-01-10T12:05:00.000Z'))).toBe(true);

      const [query, params] = mockClient.query.mock.calls[0];
      expect(textOf(query)).toMatch(/^insert into "analytics_cache"/);
      expect(textOf(query)).toContain('on conflict ("cache_key") do update set');
      expect(params).toContain('analytics:summary');
      expect(params).toContain(JSON.stringify(data));
    });

    it('should decode a cached payload', async () => {
      mockClient.query.mockResolvedValue({
        rows: [
          [
            'cache-1',
            'analytics:summary',
            { totalPatients: 3 },
            '2030-01-10T12:05:00.000Z',
            '2030-01-10T12:00:00.000Z',
          ],
        ],
      });

      expect(await store.getCachedAnalytics('analytics:summary', new Date('2030-01-10T12:01:00.000Z'))).toEqual({
        totalPatients: 3,
      });
    });
  });
});
