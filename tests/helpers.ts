import { Readable } from 'stream';
import { buffer } from 'stream/consumers';
import { stringify } from 'yaml';
import { Config, parseConfig } from '../src/config';
import { TransientAPIError } from '../src/errors';
import {
  AttachmentContent,
  ProjectSummary,
  SourceComment,
  SourceTask,
  SourceUser,
  TargetCommentPayload,
  TargetTaskPayload,
  TaskSink,
  TaskSource,
} from '../src/types';

export function makeTask(id: string, overrides: Partial<SourceTask> = {}): SourceTask {
  return {
    id,
    projectId: 'mp-1',
    name: `Task ${id} title`,
    description: `Description of ${id}`,
    status: 'open',
    type: null,
    authorId: null,
    assigneeId: null,
    parentId: null,
    createdAt: '2024-01-01T09:00:00Z',
    updatedAt: '2024-01-02T00:00:00Z',
    startDate: null,
    dueDate: null,
    tags: [],
    customFields: {},
    attachments: [],
    ...overrides,
  };
}

export interface ConfigOverrides {
  sync?: Record<string, unknown>;
  mapping?: Record<string, unknown>;
  openproject?: Record<string, unknown>;
  projects?: Array<{ megaplanId: string; openprojectId: string }>;
}

export function makeConfig(overrides: ConfigOverrides = {}): Config {
  const raw = {
    megaplan: { baseUrl: 'https://megaplan.test', username: 'test-user', password: 'test-secret' },
    openproject: {
      baseUrl: 'https://openproject.test',
      username: 'apikey',
      password: 'test-secret',
      ...overrides.openproject,
    },
    projects: overrides.projects ?? [{ megaplanId: 'mp-1', openprojectId: 'op-1' }],
    sync: overrides.sync ?? {},
    mapping: overrides.mapping ?? { statuses: { open: '1' }, defaults: { status: '1', type: '2' } },
    stateDb: ':memory:',
  };
  return parseConfig(stringify(raw), 'test config', {});
}

/**
 * In-memory Megaplan stand-in
 */
export class FakeSource implements TaskSource {
  tasks = new Map<string, SourceTask[]>();
  comments = new Map<string, SourceComment[]>();
  files = new Map<string, Buffer>();
  users = new Map<string, SourceUser>();
  failingProjects = new Set<string>();
  /** Returned regardless of `since`, like ancestors Megaplan adds for context */
  surfaced = new Set<string>();
  fetched: string[] = [];
  userLookups: string[] = [];

  setTasks(projectId: string, tasks: SourceTask[]): void {
    this.tasks.set(projectId, tasks);
  }

  async listTasks(projectId: string, since?: Date): Promise<SourceTask[]> {
    if (this.failingProjects.has(projectId)) {
      throw new TransientAPIError(`megaplan 503 on GET /tasks`, 'megaplan', 503);
    }
    return (this.tasks.get(projectId) ?? [])
      .filter(task => !since || this.surfaced.has(task.id) || (task.updatedAt !== null && new Date(task.updatedAt) >= since))
      .map(task => ({ ...task }));
  }

  async listComments(taskId: string): Promise<SourceComment[]> {
    return this.comments.get(taskId) ?? [];
  }

  async fetchAttachment(attachmentId: string): Promise<AttachmentContent> {
    this.fetched.push(attachmentId);
    const content = this.files.get(attachmentId) ?? Buffer.alloc(0);
    return { stream: Readable.from([content]), size: content.length, filename: `${attachmentId}.bin` };
  }

  async getUser(userId: string): Promise<SourceUser | null> {
    this.userLookups.push(userId);
    return this.users.get(userId) ?? null;
  }

  async listProjects(): Promise<ProjectSummary[]> {
    return [...this.tasks.keys()].map(id => ({ id, name: `Project ${id}` }));
  }
}

/**
 * Records every OpenProject write; ids are handed out as wp-1, wp-2, ...
 */
export class FakeSink implements TaskSink {
  created: Array<{ id: string; payload: TargetTaskPayload }> = [];
  updated: Array<{ id: string; payload: TargetTaskPayload }> = [];
  comments: Array<{ id: string; targetTaskId: string; payload: TargetCommentPayload }> = [];
  attachments: Array<{ id: string; targetTaskId: string; filename: string; size: number }> = [];
  ensuredUsers: string[] = [];
  userIds = new Map<string, string | null>();
  failCreateFor = new Set<string>();
  private sequence = 0;

  async createTask(payload: TargetTaskPayload): Promise<string> {
    if (this.failCreateFor.has(payload.subject)) {
      throw new TransientAPIError(`openproject 500 on POST /api/v3/work_packages: boom`, 'openproject', 500);
    }
    const id = `wp-${++this.sequence}`;
    this.created.push({ id, payload });
    return id;
  }

  async updateTask(targetId: string, payload: TargetTaskPayload): Promise<void> {
    this.updated.push({ id: targetId, payload });
  }

  async createComment(targetTaskId: string, payload: TargetCommentPayload): Promise<string> {
    const id = `c-${++this.sequence}`;
    this.comments.push({ id, targetTaskId, payload });
    return id;
  }

  async createAttachment(targetTaskId: string, content: Readable, filename: string): Promise<string> {
    const data = await buffer(content);
    const id = `att-${++this.sequence}`;
    this.attachments.push({ id, targetTaskId, filename, size: data.length });
    return id;
  }

  async ensureUser(user: SourceUser): Promise<string | null> {
    this.ensuredUsers.push(user.id);
    return this.userIds.get(user.id) ?? null;
  }

  async findUser(user: SourceUser): Promise<string | null> {
    return this.userIds.get(user.id) ?? null;
  }

  async listProjects(): Promise<ProjectSummary[]> {
    return [{ id: 'op-1', name: 'Target' }];
  }

  async ping(): Promise<void> {}

  get writes(): number {
    return this.created.length + this.updated.length + this.comments.length + this.attachments.length;
  }
}
