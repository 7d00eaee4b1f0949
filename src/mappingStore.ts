/**
 * Mapping store using better-sqlite3
 *
 * Owns the lifecycle of every source → target correspondence. Rows are only
 * ever inserted or updated; the engine never deletes a mapping.
 */

import Database from 'better-sqlite3';
import { Mapping, MappingKey, MappingKind, SyncLog, SyncStatus, UserMapping } from './types';
import { StorageError, describeError } from './errors';
import { logger } from './logger';

interface MappingRow {
  source_task_id: string | null;
  source_id: string;
  source_project_id: string | null;
  target_id: string | null;
  source_updated_at: string | null;
  source_size: number | null;
  sync_status: string;
  last_synced_at: string | null;
  reason: string | null;
}

interface UserRow {
  source_user_id: string;
  target_user_id: string;
  synced_at: string;
}

interface SyncLogRow {
  id: number;
  timestamp: string;
  operation: string;
  entity_type: SyncLog['entityType'];
  entity_id: string | null;
  details: string | null;
  status: SyncLog['status'];
  error_message: string | null;
}

const TABLES: Record<MappingKind, string> = {
  task: 'task_mappings',
  comment: 'comment_mappings',
  attachment: 'attachment_mappings',
};

export type MappingDetails = Partial<Pick<Mapping, 'sourceUpdatedAt' | 'sourceSize' | 'sourceProjectId'>>;

export function mappingKeyString(key: MappingKey): string {
  return key.kind === 'task' ? `task:${key.sourceId}` : `${key.kind}:${key.sourceTaskId}:${key.sourceId}`;
}

export class MappingStore {
  private db: Database.Database;
  private readonly simulated = new Map<string, Mapping>();
  private readonly simulatedUsers = new Map<string, UserMapping>();

  /**
   * @param dryRun when set, writes land in an in-memory overlay that later
   * lookups consult; nothing reaches the database file.
   */
  constructor(dbPath: string, private readonly dryRun: boolean = false) {
    this.db = MappingStore.open(dbPath);
  }

  private static open(dbPath: string): Database.Database {
    try {
      const db = new Database(dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('foreign_keys = ON');
      MappingStore.createTables(db);
      MappingStore.runMigrations(db);
      return db;
    } catch (error) {
      throw new StorageError(`Cannot open mapping database ${dbPath}: ${describeError(error)}`, error);
    }
  }

  get isDryRun(): boolean {
    return this.dryRun;
  }

  private static createTables(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS task_mappings (
        source_id TEXT PRIMARY KEY,
        source_project_id TEXT,
        target_id TEXT,
        source_updated_at TEXT,
        sync_status TEXT NOT NULL DEFAULT 'pending',
        last_synced_at TEXT,
        reason TEXT,
        created_at TEXT DEFAULT CURRENT_TIMESTAMP,
        updated_at TEXT DEFAULT CURRENT_TIMESTAMP,
        CHECK (target_id IS NULL OR sync_status = 'synced')
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS comment_mappings (
        source_task_id TEXT NOT NULL REFERENCES task_mappings(source_id),
        source_id TEXT NOT NULL,
        target_id TEXT,
        source_updated_at TEXT,
        sync_status TEXT NOT NULL DEFAULT 'pending',
        last_synced_at TEXT,
        reason TEXT,
        created_at TEXT DEFAULT CURRENT_TIMESTAMP,
        updated_at TEXT DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (source_task_id, source_id),
        CHECK (target_id IS NULL OR sync_status = 'synced')
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS attachment_mappings (
        source_task_id TEXT NOT NULL REFERENCES task_mappings(source_id),
        source_id TEXT NOT NULL,
        target_id TEXT,
        source_updated_at TEXT,
        sync_status TEXT NOT NULL DEFAULT 'pending',
        last_synced_at TEXT,
        reason TEXT,
        created_at TEXT DEFAULT CURRENT_TIMESTAMP,
        updated_at TEXT DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (source_task_id, source_id),
        CHECK (target_id IS NULL OR sync_status = 'synced')
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        source_user_id TEXT PRIMARY KEY,
        target_user_id TEXT NOT NULL,
        synced_at TEXT NOT NULL
      )
    `);

    // Last successful sync start per Megaplan project
    db.exec(`
      CREATE TABLE IF NOT EXISTS sync_state (
        project_id TEXT PRIMARY KEY,
        last_sync TEXT NOT NULL
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS sync_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT DEFAULT CURRENT_TIMESTAMP,
        operation TEXT NOT NULL,
        entity_type TEXT,
        entity_id TEXT,
        details TEXT,
        status TEXT,
        error_message TEXT
      )
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_task_mappings_status ON task_mappings(sync_status);
      CREATE INDEX IF NOT EXISTS idx_task_mappings_project ON task_mappings(source_project_id);
      CREATE INDEX IF NOT EXISTS idx_sync_log_timestamp ON sync_log(timestamp);
    `);
  }

  private static runMigrations(db: Database.Database): void {
    // Databases created before skipped attachments were size-tracked lack source_size
    const tableInfo = db
      .prepare<[], { name: string }>('PRAGMA table_info(attachment_mappings)')
      .all();
    const hasSizeColumn = tableInfo.some(col => col.name === 'source_size');

    if (!hasSizeColumn) {
      logger.debug('Running migration: adding source_size to attachment_mappings');
      db.exec('ALTER TABLE attachment_mappings ADD COLUMN source_size INTEGER');
    }
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Mapping store ${operation} failed: ${describeError(error)}`, error);
    }
  }

  // Mapping operations

  lookup(key: MappingKey): Mapping | null {
    if (this.dryRun) {
      const simulated = this.simulated.get(mappingKeyString(key));
      if (simulated) return simulated;
    }
    return this.guard('lookup', () => this.readMapping(key));
  }

  /**
   * Atomic create-or-update keyed by the mapping key. Returns the stored
   * mapping, or the simulated one under dry-run.
   */
  upsert(mapping: Mapping): Mapping {
    if (mapping.targetId !== null && mapping.syncStatus !== SyncStatus.SYNCED) {
      throw new StorageError(
        `Refusing to store target id for ${mappingKeyString(mapping.key)} with status ${mapping.syncStatus}`
      );
    }
    if (mapping.syncStatus === SyncStatus.SYNCED && mapping.targetId === null) {
      throw new StorageError(`Synced mapping ${mappingKeyString(mapping.key)} needs a target id`);
    }

    if (this.dryRun) {
      const simulated = { ...mapping };
      this.simulated.set(mappingKeyString(mapping.key), simulated);
      logger.debug(`[DRY-RUN] mapping ${mappingKeyString(mapping.key)} → ${mapping.syncStatus}`);
      return simulated;
    }

    return this.guard('upsert', () => this.upsertTransaction(mapping));
  }

  private upsertTransaction(mapping: Mapping): Mapping {
    const write = this.db.transaction((m: Mapping): Mapping => {
      if (this.readMapping(m.key)) {
        this.updateRow(m);
      } else {
        this.insertRow(m);
      }
      const stored = this.readMapping(m.key);
      if (!stored) {
        throw new StorageError(`Mapping ${mappingKeyString(m.key)} vanished after write`);
      }
      return stored;
    });
    return write(mapping);
  }

  /**
   * Records still owed work: pending (interrupted create) or failed.
   */
  listPending(kind: MappingKind): Mapping[] {
    return this.listByStatus(kind, [SyncStatus.PENDING, SyncStatus.FAILED]);
  }

  listByStatus(kind: MappingKind, statuses: readonly SyncStatus[]): Mapping[] {
    if (statuses.length === 0) return [];
    const placeholders = statuses.map(() => '?').join(', ');
    const rows = this.guard('listByStatus', () =>
      this.db
        .prepare<SyncStatus[], MappingRow>(
          `SELECT ${this.selectColumns(kind)} FROM ${TABLES[kind]}
           WHERE sync_status IN (${placeholders}) ORDER BY source_id`
        )
        .all(...statuses)
    );
    const result = new Map<string, Mapping>();
    for (const row of rows) {
      const mapping = this.rowToMapping(kind, row);
      result.set(mappingKeyString(mapping.key), mapping);
    }

    if (this.dryRun) {
      for (const [keyString, mapping] of this.simulated) {
        if (mapping.key.kind !== kind) continue;
        if (statuses.includes(mapping.syncStatus)) {
          result.set(keyString, mapping);
        } else {
          result.delete(keyString);
        }
      }
    }
    return [...result.values()];
  }

  markSkipped(key: MappingKey, reason: string, details: MappingDetails = {}): Mapping {
    return this.markUnsynced(key, SyncStatus.SKIPPED, reason, details);
  }

  /**
   * Records a failure. A mapping that already points at a target record keeps
   * its target id and status so the next run updates instead of re-creating.
   */
  markFailed(key: MappingKey, reason: string, details: MappingDetails = {}): Mapping {
    return this.markUnsynced(key, SyncStatus.FAILED, reason, details);
  }

  private markUnsynced(
    key: MappingKey,
    status: SyncStatus.SKIPPED | SyncStatus.FAILED,
    reason: string,
    details: MappingDetails,
  ): Mapping {
    const existing = this.lookup(key);
    if (existing && existing.targetId !== null) {
      return this.upsert({ ...existing, reason });
    }
    return this.upsert({
      key,
      targetId: null,
      sourceUpdatedAt: details.sourceUpdatedAt ?? existing?.sourceUpdatedAt ?? null,
      sourceProjectId: details.sourceProjectId ?? existing?.sourceProjectId,
      sourceSize: details.sourceSize ?? existing?.sourceSize ?? null,
      syncStatus: status,
      lastSyncedAt: existing?.lastSyncedAt ?? null,
      reason,
    });
  }

  countByStatus(kind: MappingKind): Record<SyncStatus, number> {
    const counts: Record<SyncStatus, number> = {
      [SyncStatus.PENDING]: 0,
      [SyncStatus.SYNCED]: 0,
      [SyncStatus.SKIPPED]: 0,
      [SyncStatus.FAILED]: 0,
    };
    const rows = this.guard('countByStatus', () =>
      this.db
        .prepare<[], { sync_status: string; total: number }>(
          `SELECT sync_status, COUNT(*) AS total FROM ${TABLES[kind]} GROUP BY sync_status`
        )
        .all()
    );
    for (const row of rows) {
      counts[this.parseStatus(row.sync_status)] += row.total;
    }
    return counts;
  }

  // User operations

  lookupUser(sourceUserId: string): string | null {
    const simulated = this.simulatedUsers.get(sourceUserId);
    if (simulated) return simulated.targetUserId;

    const row = this.guard('lookupUser', () =>
      this.db
        .prepare<[string], UserRow>('SELECT * FROM users WHERE source_user_id = ?')
        .get(sourceUserId)
    );
    return row ? row.target_user_id : null;
  }

  upsertUser(sourceUserId: string, targetUserId: string): void {
    const syncedAt = new Date().toISOString();
    if (this.dryRun) {
      this.simulatedUsers.set(sourceUserId, { sourceUserId, targetUserId, syncedAt });
      return;
    }
    this.guard('upsertUser', () =>
      this.db
        .prepare(
          `INSERT INTO users (source_user_id, target_user_id, synced_at) VALUES (?, ?, ?)
           ON CONFLICT(source_user_id) DO UPDATE SET
             target_user_id = excluded.target_user_id,
             synced_at = excluded.synced_at`
        )
        .run(sourceUserId, targetUserId, syncedAt)
    );
  }

  // Sync state operations

  getLastSync(projectId: string): Date | null {
    const row = this.guard('getLastSync', () =>
      this.db
        .prepare<[string], { last_sync: string }>('SELECT last_sync FROM sync_state WHERE project_id = ?')
        .get(projectId)
    );
    return row ? new Date(row.last_sync) : null;
  }

  setLastSync(projectId: string, moment: Date): void {
    if (this.dryRun) return;
    this.guard('setLastSync', () =>
      this.db
        .prepare(
          `INSERT INTO sync_state (project_id, last_sync) VALUES (?, ?)
           ON CONFLICT(project_id) DO UPDATE SET last_sync = excluded.last_sync`
        )
        .run(projectId, moment.toISOString())
    );
  }

  // Sync log operations

  logOperation(log: Omit<SyncLog, 'id' | 'timestamp'>): void {
    if (this.dryRun) return;
    this.guard('logOperation', () =>
      this.db
        .prepare(
          `INSERT INTO sync_log (operation, entity_type, entity_id, details, status, error_message)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(
          log.operation,
          log.entityType,
          log.entityId ?? null,
          log.details ?? null,
          log.status,
          log.errorMessage ?? null
        )
    );
  }

  recentLogs(limit: number = 50): SyncLog[] {
    const rows = this.guard('recentLogs', () =>
      this.db
        .prepare<[number], SyncLogRow>('SELECT * FROM sync_log ORDER BY id DESC LIMIT ?')
        .all(limit)
    );
    return rows.map(row => ({
      id: row.id,
      timestamp: row.timestamp,
      operation: row.operation,
      entityType: row.entity_type,
      entityId: row.entity_id ?? undefined,
      details: row.details ?? undefined,
      status: row.status,
      errorMessage: row.error_message ?? undefined,
    }));
  }

  // Row helpers

  private selectColumns(kind: MappingKind): string {
    if (kind === 'task') {
      return `NULL AS source_task_id, source_id, source_project_id, target_id, source_updated_at,
        NULL AS source_size, sync_status, last_synced_at, reason`;
    }
    const size = kind === 'attachment' ? 'source_size' : 'NULL AS source_size';
    return `source_task_id, source_id, NULL AS source_project_id, target_id, source_updated_at,
      ${size}, sync_status, last_synced_at, reason`;
  }

  private readMapping(key: MappingKey): Mapping | null {
    const columns = this.selectColumns(key.kind);
    const row =
      key.kind === 'task'
        ? this.db
            .prepare<[string], MappingRow>(`SELECT ${columns} FROM task_mappings WHERE source_id = ?`)
            .get(key.sourceId)
        : this.db
            .prepare<[string, string], MappingRow>(
              `SELECT ${columns} FROM ${TABLES[key.kind]} WHERE source_task_id = ? AND source_id = ?`
            )
            .get(key.sourceTaskId, key.sourceId);
    return row ? this.rowToMapping(key.kind, row) : null;
  }

  private insertRow(m: Mapping): void {
    const key = m.key;
    if (key.kind === 'task') {
      this.db
        .prepare(
          `INSERT INTO task_mappings (
            source_id, source_project_id, target_id, source_updated_at, sync_status, last_synced_at, reason
          ) VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(key.sourceId, m.sourceProjectId ?? null, m.targetId, m.sourceUpdatedAt, m.syncStatus, m.lastSyncedAt, m.reason);
      return;
    }

    if (key.kind === 'attachment') {
      this.db
        .prepare(
          `INSERT INTO attachment_mappings (
            source_task_id, source_id, target_id, source_updated_at, source_size, sync_status, last_synced_at, reason
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(key.sourceTaskId, key.sourceId, m.targetId, m.sourceUpdatedAt, m.sourceSize ?? null, m.syncStatus, m.lastSyncedAt, m.reason);
      return;
    }

    this.db
      .prepare(
        `INSERT INTO comment_mappings (
          source_task_id, source_id, target_id, source_updated_at, sync_status, last_synced_at, reason
        ) VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(key.sourceTaskId, key.sourceId, m.targetId, m.sourceUpdatedAt, m.syncStatus, m.lastSyncedAt, m.reason);
  }

  private updateRow(m: Mapping): void {
    const key = m.key;
    if (key.kind === 'task') {
      this.db
        .prepare(
          `UPDATE task_mappings SET
            source_project_id = COALESCE(?, source_project_id),
            target_id = ?,
            source_updated_at = ?,
            sync_status = ?,
            last_synced_at = ?,
            reason = ?,
            updated_at = CURRENT_TIMESTAMP
          WHERE source_id = ?`
        )
        .run(m.sourceProjectId ?? null, m.targetId, m.sourceUpdatedAt, m.syncStatus, m.lastSyncedAt, m.reason, key.sourceId);
      return;
    }

    const sizeAssignment = key.kind === 'attachment' ? 'source_size = ?,' : '';
    const sizeParams = key.kind === 'attachment' ? [m.sourceSize ?? null] : [];
    this.db
      .prepare(
        `UPDATE ${TABLES[key.kind]} SET
          target_id = ?,
          source_updated_at = ?,
          ${sizeAssignment}
          sync_status = ?,
          last_synced_at = ?,
          reason = ?,
          updated_at = CURRENT_TIMESTAMP
        WHERE source_task_id = ? AND source_id = ?`
      )
      .run(m.targetId, m.sourceUpdatedAt, ...sizeParams, m.syncStatus, m.lastSyncedAt, m.reason, key.sourceTaskId, key.sourceId);
  }

  private parseStatus(value: string): SyncStatus {
    const status = Object.values(SyncStatus).find(candidate => candidate === value);
    if (!status) {
      throw new StorageError(`Unknown sync status in mapping database: ${value}`);
    }
    return status;
  }

  private rowToMapping(kind: MappingKind, row: MappingRow): Mapping {
    const key: MappingKey =
      kind === 'task'
        ? { kind, sourceId: row.source_id }
        : { kind, sourceTaskId: row.source_task_id ?? '', sourceId: row.source_id };

    const mapping: Mapping = {
      key,
      targetId: row.target_id,
      sourceUpdatedAt: row.source_updated_at,
      syncStatus: this.parseStatus(row.sync_status),
      lastSyncedAt: row.last_synced_at,
      reason: row.reason,
    };
    if (kind === 'task') mapping.sourceProjectId = row.source_project_id ?? undefined;
    if (kind === 'attachment') mapping.sourceSize = row.source_size;
    return mapping;
  }

  close(): void {
    this.db.close();
  }
}
