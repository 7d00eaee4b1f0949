/**
 * Synchronization engine
 *
 * Projects run independently (optionally several at once); inside a project
 * every collaborator call is awaited before the next record starts, so the
 * parent-before-child order holds for writes as well as for reads.
 */

import {
  Mapping,
  MappingKey,
  MappingKind,
  ProjectSyncReport,
  SourceComment,
  SourceTask,
  SyncStatus,
  TargetTaskPayload,
  TaskSink,
  TaskSource,
  VisitAction,
} from './types';
import { Config, ProjectMapping, attachmentLimitBytes } from './config';
import { MappingDetails, MappingStore } from './mappingStore';
import { HierarchyResolver, compareSourceIds } from './hierarchy';
import { TaskMapper } from './taskMapper';
import { ConfiguredFieldTranslator, FieldTranslator } from './fieldTranslator';
import { AttachmentTransfer } from './attachmentTransfer';
import { DryRunSink } from './dryRunSink';
import { ConfigError, HierarchyCycleError, describeError } from './errors';
import { pMap } from './concurrency';
import { logger } from './logger';

export interface SyncEngineOptions {
  config: Config;
  store: MappingStore;
  source: TaskSource;
  sink: TaskSink;
  translator?: FieldTranslator;
}

type SyncMode = ProjectSyncReport['mode'];

interface ProjectRun {
  project: ProjectMapping;
  report: ProjectSyncReport;
  since: Date | null;
  scope: Set<string>;
}

function emptyReport(projectId: string, mode: SyncMode, dryRun: boolean, since: Date | null): ProjectSyncReport {
  return {
    projectId,
    mode,
    dryRun,
    since: since ? since.toISOString() : null,
    created: 0,
    updated: 0,
    unchanged: 0,
    skipped: 0,
    failed: 0,
    comments: 0,
    attachments: 0,
    attachmentsSkipped: 0,
    visits: [],
    errors: [],
  };
}

function toTime(value: string | null): number {
  return value ? Date.parse(value) : Number.NaN;
}

/** Source timestamp at or after the cutoff */
export function isInWindow(updatedAt: string | null, since: Date | null): boolean {
  if (since === null) return true;
  const time = toTime(updatedAt);
  return !Number.isNaN(time) && time >= since.getTime();
}

/** Source timestamp moved past the one recorded at the last sync */
export function hasAdvanced(current: string | null, stored: string | null): boolean {
  if (current === null) return false;
  if (stored === null) return true;
  const currentTime = toTime(current);
  const storedTime = toTime(stored);
  if (Number.isNaN(currentTime) || Number.isNaN(storedTime)) {
    return current !== stored;
  }
  return currentTime > storedTime;
}

export class SyncEngine {
  private readonly config: Config;
  private readonly store: MappingStore;
  private readonly source: TaskSource;
  private readonly sink: TaskSink;
  private readonly translator: FieldTranslator;
  private readonly mapper: TaskMapper;
  private readonly transfer: AttachmentTransfer;
  private readonly maxAttachmentBytes: number;
  private readonly userCache = new Map<string, string | null>();

  constructor(options: SyncEngineOptions) {
    const { config, store } = options;
    if (store.isDryRun !== config.sync.dryRun) {
      throw new ConfigError('Mapping store and configuration disagree about dry-run mode');
    }

    this.config = config;
    this.store = store;
    this.source = options.source;
    this.sink = config.sync.dryRun && !(options.sink instanceof DryRunSink)
      ? new DryRunSink(options.sink, config.openproject)
      : options.sink;
    this.translator = options.translator ?? new ConfiguredFieldTranslator(config.mapping);
    this.mapper = new TaskMapper(this.translator, {
      defaults: config.mapping.defaults,
      onUnmapped: config.mapping.onUnmapped,
    });
    this.transfer = new AttachmentTransfer(this.source, this.sink, config.sync.dryRun);
    this.maxAttachmentBytes = attachmentLimitBytes(config);
  }

  /**
   * Every task of every configured project, whatever its mapping state.
   */
  async fullSync(): Promise<ProjectSyncReport[]> {
    return this.runProjects(() => null);
  }

  /**
   * Tasks changed since `since`, or since each project's last recorded sync
   * when no cutoff is given. A project never synced before gets a full pass.
   */
  async incrementalSync(since?: Date): Promise<ProjectSyncReport[]> {
    return this.runProjects(project => since ?? this.store.getLastSync(project.megaplanId));
  }

  private async runProjects(cutoff: (project: ProjectMapping) => Date | null): Promise<ProjectSyncReport[]> {
    const projects = [...this.config.projects];
    return pMap(projects, project => this.syncProject(project, cutoff(project)), this.config.sync.projectConcurrency);
  }

  async syncProject(project: ProjectMapping, since: Date | null): Promise<ProjectSyncReport> {
    const startedAt = new Date();
    const mode: SyncMode = since ? 'incremental' : 'full';
    const report = emptyReport(project.megaplanId, mode, this.config.sync.dryRun, since);

    logger.banner(
      `${this.config.sync.dryRun ? '[DRY-RUN] ' : ''}Project ${project.megaplanId} → ${project.openprojectId} ` +
      `(${mode}${since ? ` since ${since.toISOString()}` : ''})`
    );

    let tasks: SourceTask[];
    try {
      tasks = await this.source.listTasks(project.megaplanId, since ?? undefined);
    } catch (error) {
      return this.abortProject(report, `Listing tasks failed: ${describeError(error)}`);
    }

    let ordered: SourceTask[];
    try {
      ordered = HierarchyResolver.order(tasks);
    } catch (error) {
      if (error instanceof HierarchyCycleError) {
        return this.abortProject(report, error.message);
      }
      throw error;
    }

    logger.info(`  Fetched ${tasks.length} tasks, processing in hierarchy order`);
    const run: ProjectRun = { project, report, since, scope: new Set(tasks.map(task => task.id)) };

    for (const task of ordered) {
      await this.visitTask(run, task);
    }

    if (report.failed === 0) {
      this.store.setLastSync(project.megaplanId, startedAt);
    } else {
      logger.warn(`${report.failed} record(s) failed; last sync time for ${project.megaplanId} left unchanged`);
    }

    logger.info(
      `  ✓ Project ${project.megaplanId}: ${report.created} created, ${report.updated} updated, ` +
      `${report.unchanged} unchanged, ${report.skipped} skipped, ${report.failed} failed, ` +
      `${report.comments} comments, ${report.attachments} attachments (${report.attachmentsSkipped} too large)`
    );
    return report;
  }

  private abortProject(report: ProjectSyncReport, reason: string): ProjectSyncReport {
    logger.error(`  ✗ Project ${report.projectId} aborted: ${reason}`);
    report.aborted = reason;
    this.store.logOperation({
      operation: 'project_aborted',
      entityType: 'project',
      entityId: report.projectId,
      status: 'error',
      errorMessage: reason,
    });
    return report;
  }

  // Tasks

  private async visitTask(run: ProjectRun, task: SourceTask): Promise<void> {
    const { report, project } = run;
    const key: MappingKey = { kind: 'task', sourceId: task.id };
    const details: MappingDetails = { sourceUpdatedAt: task.updatedAt, sourceProjectId: project.megaplanId };

    try {
      const existing = this.store.lookup(key);

      if (!isInWindow(task.updatedAt, run.since)) {
        // Surfaced for context (e.g. an ancestor); traversed, never written
        this.visit(report, 'task', task.id, 'outside-window');
        return;
      }

      if (task.tags.includes(this.config.sync.excludeTag)) {
        this.skipTask(report, key, existing, `tagged #${this.config.sync.excludeTag}`, details);
        return;
      }

      const parentTargetId = this.resolveParent(run, task);
      if (parentTargetId === undefined) {
        this.fail(report, key, `parent ${task.parentId} is not synced`, details);
        return;
      }

      let mapping: Mapping;
      if (existing !== null && existing.targetId !== null) {
        if (!hasAdvanced(task.updatedAt, existing.sourceUpdatedAt)) {
          report.unchanged++;
          this.visit(report, 'task', task.id, 'unchanged');
          await this.syncChildren(run, task, existing);
          return;
        }

        const payload = await this.buildPayload(run, task, parentTargetId);
        logger.debug(`Updating task ${task.id} → #${existing.targetId}`);
        await this.sink.updateTask(existing.targetId, payload);
        mapping = this.store.upsert({
          ...existing,
          sourceUpdatedAt: task.updatedAt,
          sourceProjectId: project.megaplanId,
          lastSyncedAt: new Date().toISOString(),
          reason: null,
        });
        report.updated++;
        this.visit(report, 'task', task.id, 'updated');
        this.store.logOperation({
          operation: 'task_updated',
          entityType: 'task',
          entityId: task.id,
          details: JSON.stringify({ targetId: existing.targetId }),
          status: 'success',
        });
      } else {
        const payload = await this.buildPayload(run, task, parentTargetId);
        // Intent row first: a crash after the create leaves this record pending
        this.store.upsert({
          key,
          targetId: null,
          sourceUpdatedAt: existing?.sourceUpdatedAt ?? null,
          sourceProjectId: project.megaplanId,
          syncStatus: SyncStatus.PENDING,
          lastSyncedAt: existing?.lastSyncedAt ?? null,
          reason: null,
        });
        logger.debug(`Creating work package for task ${task.id}`);
        const targetId = await this.sink.createTask(payload);
        mapping = this.store.upsert({
          key,
          targetId,
          sourceUpdatedAt: task.updatedAt,
          sourceProjectId: project.megaplanId,
          syncStatus: SyncStatus.SYNCED,
          lastSyncedAt: new Date().toISOString(),
          reason: null,
        });
        report.created++;
        this.visit(report, 'task', task.id, 'created');
        this.store.logOperation({
          operation: 'task_created',
          entityType: 'task',
          entityId: task.id,
          details: JSON.stringify({ targetId, subject: payload.subject }),
          status: 'success',
        });
      }

      await this.syncChildren(run, task, mapping);
    } catch (error) {
      this.fail(report, key, describeError(error), details);
    }
  }

  private async buildPayload(run: ProjectRun, task: SourceTask, parentTargetId: string | null): Promise<TargetTaskPayload> {
    return this.mapper.map(
      task,
      {
        parentTargetId,
        authorTargetId: await this.resolveUser(task.authorId),
        assigneeTargetId: await this.resolveUser(task.assigneeId),
      },
      run.project.openprojectId,
    );
  }

  private skipTask(
    report: ProjectSyncReport,
    key: MappingKey,
    existing: Mapping | null,
    reason: string,
    details: MappingDetails,
  ): void {
    logger.info(`  ⏭️  Skipping task ${key.sourceId}: ${reason}`);
    if (existing?.syncStatus !== SyncStatus.SYNCED) {
      this.store.markSkipped(key, reason, details);
    }
    report.skipped++;
    this.visit(report, 'task', key.sourceId, 'skipped');
    this.store.logOperation({
      operation: 'task_skipped',
      entityType: 'task',
      entityId: key.sourceId,
      status: 'warning',
      errorMessage: reason,
    });
  }

  /**
   * Target id of the parent work package, null for no parent link, or
   * undefined when the parent is known but not synced, which blocks the
   * child. A parent counts as known when it is part of this run or has a
   * mapping row from an earlier one.
   */
  private resolveParent(run: ProjectRun, task: SourceTask): string | null | undefined {
    if (task.parentId === null) return null;

    const parent = this.store.lookup({ kind: 'task', sourceId: task.parentId });
    if (parent?.syncStatus === SyncStatus.SYNCED) return parent.targetId;
    if (parent?.syncStatus === SyncStatus.SKIPPED) return null;
    if (parent === null && !run.scope.has(task.parentId)) {
      // Never seen and outside this project's work set
      return null;
    }
    return undefined;
  }

  private async resolveUser(sourceUserId: string | null): Promise<string | null> {
    if (sourceUserId === null) return null;

    const configured = this.translator.translateUser(sourceUserId);
    if (configured !== null) return configured;

    const known = this.userCache.get(sourceUserId);
    if (known !== undefined) return known;

    const cached = this.store.lookupUser(sourceUserId);
    if (cached !== null) {
      this.userCache.set(sourceUserId, cached);
      return cached;
    }

    let targetUserId: string | null;
    const user = await this.source.getUser(sourceUserId);
    if (!user) {
      logger.warn(`Megaplan user ${sourceUserId} not found, using default user`);
      targetUserId = this.config.openproject.defaultUserId;
    } else {
      targetUserId = await this.sink.ensureUser(user);
      if (targetUserId !== null && targetUserId !== this.config.openproject.defaultUserId) {
        this.store.upsertUser(sourceUserId, targetUserId);
      }
    }

    this.userCache.set(sourceUserId, targetUserId);
    return targetUserId;
  }

  // Comments and attachments

  private async syncChildren(run: ProjectRun, task: SourceTask, mapping: Mapping): Promise<void> {
    if (mapping.syncStatus !== SyncStatus.SYNCED || mapping.targetId === null) return;
    if (this.config.sync.comments) {
      await this.syncComments(run, task, mapping.targetId);
    }
    if (this.config.sync.attachments) {
      await this.syncAttachments(run, task, mapping.targetId);
    }
  }

  private async syncComments(run: ProjectRun, task: SourceTask, targetTaskId: string): Promise<void> {
    const { report } = run;
    let comments: SourceComment[];
    try {
      comments = await this.source.listComments(task.id);
    } catch (error) {
      this.recordError(report, 'comment', task.id, `Listing comments of task ${task.id} failed: ${describeError(error)}`);
      return;
    }

    const sorted = [...comments].sort(
      (a, b) => a.createdAt.localeCompare(b.createdAt) || compareSourceIds(a.id, b.id)
    );

    for (const comment of sorted) {
      const key: MappingKey = { kind: 'comment', sourceTaskId: task.id, sourceId: comment.id };
      try {
        const existing = this.store.lookup(key);
        if (existing?.syncStatus === SyncStatus.SYNCED) {
          this.visit(report, 'comment', comment.id, 'unchanged', task.id);
          continue;
        }

        const payload = this.mapper.mapComment(comment, await this.resolveUser(comment.authorId));
        const targetId = await this.sink.createComment(targetTaskId, payload);
        this.store.upsert({
          key,
          targetId,
          sourceUpdatedAt: comment.createdAt,
          syncStatus: SyncStatus.SYNCED,
          lastSyncedAt: new Date().toISOString(),
          reason: null,
        });
        report.comments++;
        this.visit(report, 'comment', comment.id, 'created', task.id);
      } catch (error) {
        this.fail(report, key, describeError(error), { sourceUpdatedAt: comment.createdAt });
      }
    }
  }

  private async syncAttachments(run: ProjectRun, task: SourceTask, targetTaskId: string): Promise<void> {
    const { report } = run;
    const descriptors = [...task.attachments].sort((a, b) => compareSourceIds(a.id, b.id));

    for (const descriptor of descriptors) {
      const key: MappingKey = { kind: 'attachment', sourceTaskId: task.id, sourceId: descriptor.id };
      try {
        const existing = this.store.lookup(key);
        if (existing?.syncStatus === SyncStatus.SYNCED) {
          this.visit(report, 'attachment', descriptor.id, 'unchanged', task.id);
          continue;
        }
        if (existing?.syncStatus === SyncStatus.SKIPPED && existing.sourceSize === descriptor.size) {
          // Same file that was too large last time
          this.visit(report, 'attachment', descriptor.id, 'skipped', task.id);
          continue;
        }

        const result = await this.transfer.transfer(descriptor, this.maxAttachmentBytes, targetTaskId);
        if (result.kind === 'skipped-too-large') {
          logger.warn(`Skipping attachment ${descriptor.filename} of task ${task.id}: ${result.reason}`);
          this.store.markSkipped(key, result.reason, { sourceSize: descriptor.size });
          report.attachmentsSkipped++;
          this.visit(report, 'attachment', descriptor.id, 'skipped', task.id);
          this.store.logOperation({
            operation: 'attachment_skipped',
            entityType: 'attachment',
            entityId: descriptor.id,
            details: JSON.stringify({ taskId: task.id, filename: descriptor.filename }),
            status: 'warning',
            errorMessage: result.reason,
          });
          continue;
        }

        this.store.upsert({
          key,
          targetId: result.targetId,
          sourceUpdatedAt: null,
          sourceSize: descriptor.size,
          syncStatus: SyncStatus.SYNCED,
          lastSyncedAt: new Date().toISOString(),
          reason: null,
        });
        report.attachments++;
        this.visit(report, 'attachment', descriptor.id, 'created', task.id);
      } catch (error) {
        this.fail(report, key, describeError(error), { sourceSize: descriptor.size });
      }
    }
  }

  // Bookkeeping

  private visit(
    report: ProjectSyncReport,
    kind: MappingKind,
    sourceId: string,
    action: VisitAction,
    sourceTaskId?: string,
  ): void {
    report.visits.push(sourceTaskId === undefined ? { kind, sourceId, action } : { kind, sourceId, sourceTaskId, action });
  }

  private recordError(report: ProjectSyncReport, kind: MappingKind, sourceId: string, reason: string): void {
    logger.error(`  ✗ ${kind} ${sourceId}: ${reason}`);
    report.failed++;
    report.errors.push({ kind, sourceId, reason });
  }

  /**
   * A failure costs only the current record: it is reported, and the mapping
   * is left failed so the next run picks it up again.
   */
  private fail(report: ProjectSyncReport, key: MappingKey, reason: string, details: MappingDetails): void {
    this.recordError(report, key.kind, key.sourceId, reason);
    this.visit(report, key.kind, key.sourceId, 'failed', key.kind === 'task' ? undefined : key.sourceTaskId);
    try {
      this.store.markFailed(key, reason, details);
      this.store.logOperation({
        operation: `${key.kind}_failed`,
        entityType: key.kind,
        entityId: key.sourceId,
        status: 'error',
        errorMessage: reason,
      });
    } catch (storeError) {
      logger.error(`  ✗ Could not record failure of ${key.kind} ${key.sourceId}: ${describeError(storeError)}`);
    }
  }
}
