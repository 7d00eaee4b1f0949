import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { MappingStore, mappingKeyString } from '../src/mappingStore';
import { StorageError } from '../src/errors';
import { Mapping, MappingKey, SyncStatus } from '../src/types';

vi.mock('../src/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    banner: vi.fn(),
  },
}));

const TASK: MappingKey = { kind: 'task', sourceId: '101' };

function synced(key: MappingKey, targetId: string, extra: Partial<Mapping> = {}): Mapping {
  return {
    key,
    targetId,
    sourceUpdatedAt: '2024-01-02T00:00:00Z',
    syncStatus: SyncStatus.SYNCED,
    lastSyncedAt: '2024-01-05T00:00:00Z',
    reason: null,
    ...extra,
  };
}

describe('mappingKeyString', () => {
  it('should distinguish tasks from child records', () => {
    expect(mappingKeyString(TASK)).toBe('task:101');
    expect(mappingKeyString({ kind: 'comment', sourceTaskId: '101', sourceId: '7' })).toBe('comment:101:7');
  });
});

describe('MappingStore', () => {
  let store: MappingStore;

  beforeEach(() => {
    store = new MappingStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  describe('upsert and lookup', () => {
    it('should return null for an unknown key', () => {
      expect(store.lookup(TASK)).toBeNull();
    });

    it('should store and update a task mapping under the same key', () => {
      store.upsert(synced(TASK, '900', { sourceProjectId: 'mp-1' }));
      const updated = store.upsert(synced(TASK, '900', { sourceUpdatedAt: '2024-02-01T00:00:00Z' }));

      expect(updated).toEqual({
        key: TASK,
        targetId: '900',
        sourceUpdatedAt: '2024-02-01T00:00:00Z',
        syncStatus: SyncStatus.SYNCED,
        lastSyncedAt: '2024-01-05T00:00:00Z',
        reason: null,
        sourceProjectId: 'mp-1',
      });
      expect(store.countByStatus('task')[SyncStatus.SYNCED]).toBe(1);
    });

    it('should keep comment and attachment mappings apart', () => {
      store.upsert(synced(TASK, '900'));
      store.upsert(synced({ kind: 'comment', sourceTaskId: '101', sourceId: '1' }, 'act-1'));
      store.upsert(synced({ kind: 'attachment', sourceTaskId: '101', sourceId: '1' }, 'att-1', { sourceSize: 64 }));

      expect(store.lookup({ kind: 'comment', sourceTaskId: '101', sourceId: '1' })?.targetId).toBe('act-1');
      expect(store.lookup({ kind: 'attachment', sourceTaskId: '101', sourceId: '1' })).toMatchObject({
        targetId: 'att-1',
        sourceSize: 64,
      });
    });

    it('should refuse a target id on a record that is not synced', () => {
      expect(() => store.upsert({ ...synced(TASK, '900'), syncStatus: SyncStatus.PENDING })).toThrow(StorageError);
    });

    it('should refuse a synced record without a target id', () => {
      expect(() => store.upsert({ ...synced(TASK, '900'), targetId: null })).toThrow(
        'Synced mapping task:101 needs a target id'
      );
    });

    it('should reject a child record whose task is unknown', () => {
      expect(() => store.upsert(synced({ kind: 'comment', sourceTaskId: '404', sourceId: '1' }, 'act-1'))).toThrow(
        StorageError
      );
    });
  });

  describe('markFailed and markSkipped', () => {
    it('should record a reason for a new record', () => {
      const failed = store.markFailed(TASK, 'openproject 500', { sourceUpdatedAt: '2024-01-02T00:00:00Z' });
      expect(failed).toMatchObject({ syncStatus: SyncStatus.FAILED, targetId: null, reason: 'openproject 500' });
    });

    it('should keep the target of an already synced record', () => {
      store.upsert(synced(TASK, '900'));
      const failed = store.markFailed(TASK, 'update rejected');
      expect(failed).toMatchObject({
        syncStatus: SyncStatus.SYNCED,
        targetId: '900',
        reason: 'update rejected',
        sourceUpdatedAt: '2024-01-02T00:00:00Z',
      });
    });

    it('should list pending and failed records only', () => {
      store.upsert(synced({ kind: 'task', sourceId: '1' }, '900'));
      store.upsert({ ...synced({ kind: 'task', sourceId: '2' }, '901'), targetId: null, syncStatus: SyncStatus.PENDING });
      store.markFailed({ kind: 'task', sourceId: '3' }, 'boom');
      store.markSkipped({ kind: 'task', sourceId: '4' }, 'tagged #nosync');

      expect(store.listPending('task').map(m => m.key.sourceId)).toEqual(['2', '3']);
      expect(store.listByStatus('task', [SyncStatus.SKIPPED]).map(m => m.reason)).toEqual(['tagged #nosync']);
    });
  });

  describe('users, sync state and log', () => {
    it('should remember user mappings', () => {
      store.upsertUser('u1', '5');
      store.upsertUser('u1', '6');
      expect(store.lookupUser('u1')).toBe('6');
      expect(store.lookupUser('u2')).toBeNull();
    });

    it('should track the last sync per project', () => {
      const moment = new Date('2024-03-01T12:00:00Z');
      expect(store.getLastSync('mp-1')).toBeNull();
      store.setLastSync('mp-1', moment);
      expect(store.getLastSync('mp-1')?.toISOString()).toBe('2024-03-01T12:00:00.000Z');
    });

    it('should return recent log entries newest first', () => {
      store.logOperation({ operation: 'task_created', entityType: 'task', entityId: '1', status: 'success' });
      store.logOperation({
        operation: 'task_failed',
        entityType: 'task',
        entityId: '2',
        status: 'error',
        errorMessage: 'boom',
      });

      const logs = store.recentLogs(10);
      expect(logs.map(l => l.operation)).toEqual(['task_failed', 'task_created']);
      expect(logs[0]).toMatchObject({ entityId: '2', status: 'error', errorMessage: 'boom' });
    });
  });

  describe('dry run', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'mapping-store-test-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should answer lookups from simulated writes and persist none of them', () => {
      const dbPath = join(dir, 'state.sqlite');
      const dry = new MappingStore(dbPath, true);
      dry.upsert(synced(TASK, 'dry-run:task:1'));
      dry.upsertUser('u1', '5');
      dry.setLastSync('mp-1', new Date());
      dry.logOperation({ operation: 'task_created', entityType: 'task', status: 'success' });

      expect(dry.lookup(TASK)?.targetId).toBe('dry-run:task:1');
      expect(dry.lookupUser('u1')).toBe('5');
      dry.close();

      const live = new MappingStore(dbPath);
      try {
        expect(live.lookup(TASK)).toBeNull();
        expect(live.lookupUser('u1')).toBeNull();
        expect(live.getLastSync('mp-1')).toBeNull();
        expect(live.recentLogs()).toEqual([]);
      } finally {
        live.close();
      }
    });
  });
});
