/**
 * Megaplan integration module
 */

import { AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { z } from 'zod';
import { HttpCredentials, createHttpClient, toTransientError } from './http';
import { logger } from './logger';
import {
  megaplanCommentSchema,
  megaplanFileSchema,
  megaplanPageSchema,
  megaplanProjectSchema,
  megaplanTaskSchema,
  megaplanUserSchema,
  SourceModel,
} from './models';
import {
  AttachmentContent,
  AttachmentDescriptor,
  ProjectSummary,
  SourceComment,
  SourceTask,
  SourceUser,
  TaskSource,
} from './types';
import { CONSTANTS } from './constants';

export interface MegaplanOptions {
  pageSize?: number;
  /** List each task's files while listing tasks */
  withAttachments?: boolean;
}

const taskPage = megaplanPageSchema(megaplanTaskSchema);
const commentPage = megaplanPageSchema(megaplanCommentSchema);
const filePage = megaplanPageSchema(megaplanFileSchema);
const userPage = megaplanPageSchema(megaplanUserSchema);
const projectPage = megaplanPageSchema(megaplanProjectSchema);

/**
 * `filename="a b.pdf"` or RFC 5987 `filename*=UTF-8''a%20b.pdf`
 */
export function filenameFromDisposition(header: string | undefined): string | null {
  if (!header) return null;
  const encoded = /filename\*=(?:UTF-8'')?([^;]+)/i.exec(header);
  if (encoded) {
    try {
      return decodeURIComponent(encoded[1].trim().replace(/^"|"$/g, ''));
    } catch {
      return encoded[1].trim();
    }
  }
  const plain = /filename="?([^";]+)"?/i.exec(header);
  return plain ? plain[1].trim() : null;
}

export class MegaplanIntegration implements TaskSource {
  private client: AxiosInstance;
  private pageSize: number;
  private withAttachments: boolean;

  constructor(credentials: HttpCredentials, options: MegaplanOptions = {}) {
    this.client = createHttpClient(credentials);
    this.pageSize = options.pageSize ?? CONSTANTS.PAGE_SIZE;
    this.withAttachments = options.withAttachments ?? true;
  }

  private async getJson<T extends z.ZodTypeAny>(
    endpoint: string,
    schema: T,
    params?: Record<string, string>,
  ): Promise<z.infer<T>> {
    const call = `GET ${endpoint}`;
    try {
      const response = await this.client.get<unknown>(endpoint, { params });
      return schema.parse(response.data);
    } catch (error) {
      throw toTransientError(error, 'megaplan', call);
    }
  }

  /**
   * Fetch every task of a project, following `data.next` across pages
   */
  async listTasks(projectId: string, since?: Date): Promise<SourceTask[]> {
    const startTime = Date.now();
    logger.info(`Fetching tasks of Megaplan project ${projectId}${since ? ` updated after ${since.toISOString()}` : ''}...`);

    const tasks: SourceTask[] = [];
    let offset: string | null = null;
    let page = 0;

    do {
      const params: Record<string, string> = {
        project: projectId,
        limit: String(this.pageSize),
      };
      if (offset) params.offset = offset;
      if (since) params.updated_after = since.toISOString();

      const { data } = await this.getJson('/tasks', taskPage, params);
      page++;
      for (const raw of data.items) {
        const task = SourceModel.taskFromMegaplan(raw);
        if (this.withAttachments) {
          task.attachments = await this.listFiles(task.id);
        }
        tasks.push(task);
      }
      logger.debug(`  page ${page}: ${data.items.length} tasks`);
      offset = data.next === undefined || data.next === null || data.next === '' ? null : String(data.next);
    } while (offset !== null);

    const elapsed = Date.now() - startTime;
    logger.info(`  ✓ Retrieved ${tasks.length} tasks in ${page} page(s) (${(elapsed / 1000).toFixed(2)}s)`);
    return tasks;
  }

  async listFiles(taskId: string): Promise<AttachmentDescriptor[]> {
    const { data } = await this.getJson(`/tasks/${encodeURIComponent(taskId)}/files`, filePage);
    return data.items.map(raw => SourceModel.attachmentFromMegaplan(raw));
  }

  async listComments(taskId: string): Promise<SourceComment[]> {
    const { data } = await this.getJson(`/tasks/${encodeURIComponent(taskId)}/comments`, commentPage);
    return data.items.map(raw => SourceModel.commentFromMegaplan(raw));
  }

  /**
   * Open a download stream; the size comes from Content-Length (0 when absent)
   */
  async fetchAttachment(attachmentId: string): Promise<AttachmentContent> {
    const endpoint = `/files/${encodeURIComponent(attachmentId)}/download`;
    try {
      const response = await this.client.get<Readable>(endpoint, { responseType: 'stream' });
      const length = Number.parseInt(String(response.headers['content-length'] ?? ''), 10);
      const disposition = response.headers['content-disposition'];
      return {
        stream: response.data,
        size: Number.isFinite(length) ? length : 0,
        filename: filenameFromDisposition(typeof disposition === 'string' ? disposition : undefined) ?? attachmentId,
      };
    } catch (error) {
      throw toTransientError(error, 'megaplan', `GET ${endpoint}`);
    }
  }

  async getUser(userId: string): Promise<SourceUser | null> {
    const { data } = await this.getJson('/users', userPage, { ids: userId });
    for (const raw of data.items) {
      const user = SourceModel.userFromMegaplan(raw);
      if (user?.id === userId) return user;
    }
    return null;
  }

  async listProjects(): Promise<ProjectSummary[]> {
    const projects: ProjectSummary[] = [];
    let offset: string | null = null;

    do {
      const params: Record<string, string> = { limit: String(this.pageSize) };
      if (offset) params.offset = offset;
      const { data } = await this.getJson('/projects', projectPage, params);
      for (const raw of data.items) {
        const project = SourceModel.projectFromMegaplan(raw);
        if (project) projects.push(project);
      }
      offset = data.next === undefined || data.next === null || data.next === '' ? null : String(data.next);
    } while (offset !== null);

    return projects;
  }
}
