/**
 * Type definitions for the migration system
 */

import { Readable } from 'stream';

export enum SyncStatus {
  PENDING = 'pending',
  SYNCED = 'synced',
  SKIPPED = 'skipped',
  FAILED = 'failed',
}

export type MappingKind = 'task' | 'comment' | 'attachment';

export type MappingKey =
  | { kind: 'task'; sourceId: string }
  | { kind: 'comment' | 'attachment'; sourceTaskId: string; sourceId: string };

export interface Mapping {
  key: MappingKey;
  targetId: string | null;
  sourceUpdatedAt: string | null;
  syncStatus: SyncStatus;
  lastSyncedAt: string | null;
  reason: string | null;

  // Task mappings only
  sourceProjectId?: string;

  // Attachment mappings only: size seen at the last attempt
  sourceSize?: number | null;
}

export interface UserMapping {
  sourceUserId: string;
  targetUserId: string;
  syncedAt: string;
}

export interface SyncLog {
  id?: number;
  timestamp: string;
  operation: string;
  entityType: MappingKind | 'project' | 'sync';
  entityId?: string;
  details?: string;
  status: 'success' | 'error' | 'warning';
  errorMessage?: string;
}

// ---------------------------------------------------------------------------
// Source side (Megaplan)
// ---------------------------------------------------------------------------

export interface AttachmentDescriptor {
  id: string;
  filename: string;
  size: number;
}

export interface SourceTask {
  id: string;
  projectId: string;
  name: string;
  description: string;
  status: string;
  type: string | null;
  authorId: string | null;
  assigneeId: string | null;
  parentId: string | null;
  createdAt: string | null;
  updatedAt: string | null;
  startDate: string | null;
  dueDate: string | null;
  tags: string[];
  customFields: Record<string, string>;
  attachments: AttachmentDescriptor[];
}

export interface SourceComment {
  id: string;
  authorId: string | null;
  body: string;
  createdAt: string;
}

export interface SourceUser {
  id: string;
  login: string | null;
  email: string | null;
  firstName: string | null;
  lastName: string | null;
}

export interface AttachmentContent {
  stream: Readable;
  size: number;
  filename: string;
}

export interface ProjectSummary {
  id: string;
  name: string;
}

// ---------------------------------------------------------------------------
// Target side (OpenProject)
// ---------------------------------------------------------------------------

export interface TargetTaskPayload {
  projectId: string;
  subject: string;
  description: string;
  statusId?: string;
  typeId?: string;
  parentId?: string;
  /** Accountable user; Megaplan has no such role, so the task author fills it */
  responsibleId?: string;
  assigneeId?: string;
  startDate?: string;
  dueDate?: string;
  customFields?: Record<string, string>;
}

export interface TargetCommentPayload {
  body: string;
  authorId?: string;
}

export interface ResolvedRefs {
  parentTargetId: string | null;
  authorTargetId: string | null;
  assigneeTargetId: string | null;
}

// ---------------------------------------------------------------------------
// Capability interfaces implemented by the HTTP clients
// ---------------------------------------------------------------------------

export interface TaskSource {
  listTasks(projectId: string, since?: Date): Promise<SourceTask[]>;
  listComments(taskId: string): Promise<SourceComment[]>;
  fetchAttachment(attachmentId: string): Promise<AttachmentContent>;
  getUser(userId: string): Promise<SourceUser | null>;
  listProjects(): Promise<ProjectSummary[]>;
}

export interface TaskSink {
  createTask(payload: TargetTaskPayload): Promise<string>;
  updateTask(targetId: string, payload: TargetTaskPayload): Promise<void>;
  createComment(targetTaskId: string, payload: TargetCommentPayload): Promise<string>;
  createAttachment(targetTaskId: string, content: Readable, filename: string): Promise<string>;
  /**
   * Returns the target user for a source author, or null when the user
   * cannot be found or created and no default user is configured.
   */
  ensureUser(user: SourceUser): Promise<string | null>;
  /** Read-only lookup of an existing target user */
  findUser(user: SourceUser): Promise<string | null>;
  listProjects(): Promise<ProjectSummary[]>;
  ping(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Run results
// ---------------------------------------------------------------------------

export type VisitAction =
  | 'created'
  | 'updated'
  | 'unchanged'
  | 'outside-window'
  | 'skipped'
  | 'failed';

export interface Visit {
  kind: MappingKind;
  sourceId: string;
  sourceTaskId?: string;
  action: VisitAction;
}

export interface RecordError {
  kind: MappingKind;
  sourceId: string;
  reason: string;
}

export interface ProjectSyncReport {
  projectId: string;
  mode: 'full' | 'incremental';
  dryRun: boolean;
  since: string | null;
  created: number;
  updated: number;
  unchanged: number;
  skipped: number;
  failed: number;
  comments: number;
  attachments: number;
  attachmentsSkipped: number;
  visits: Visit[];
  errors: RecordError[];
  aborted?: string;
}
