/**
 * OpenProject integration module (API v3, HAL+JSON)
 */

import { AxiosInstance } from 'axios';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { z } from 'zod';
import { HttpCredentials, createHttpClient, toTransientError } from './http';
import { logger } from './logger';
import { openProjectCollectionSchema, openProjectResourceSchema } from './models';
import { ProjectSummary, SourceUser, TargetCommentPayload, TargetTaskPayload, TaskSink } from './types';

export interface OpenProjectOptions {
  defaultUserId: string | null;
  allowUserCreation: boolean;
  pageSize?: number;
}

interface HalLink {
  href: string;
}

const lockVersionSchema = z.object({ lockVersion: z.number().int() }).passthrough();

function link(collection: string, id: string): HalLink {
  return { href: `/api/v3/${collection}/${encodeURIComponent(id)}` };
}

/**
 * Build the work package body. Custom fields keep their configured keys
 * (`customField12`) at the top level, as the API expects.
 */
export function toWorkPackageBody(payload: TargetTaskPayload): Record<string, unknown> {
  const links: Record<string, HalLink> = {
    project: link('projects', payload.projectId),
  };
  if (payload.statusId) links.status = link('statuses', payload.statusId);
  if (payload.typeId) links.type = link('types', payload.typeId);
  if (payload.parentId) links.parent = link('work_packages', payload.parentId);
  if (payload.assigneeId) links.assignee = link('users', payload.assigneeId);
  if (payload.responsibleId) links.responsible = link('users', payload.responsibleId);

  const body: Record<string, unknown> = {
    subject: payload.subject,
    description: { format: 'markdown', raw: payload.description },
    _links: links,
  };
  if (payload.startDate) body.startDate = payload.startDate;
  if (payload.dueDate) body.dueDate = payload.dueDate;
  for (const [field, value] of Object.entries(payload.customFields ?? {})) {
    body[field] = value;
  }
  return body;
}

export function userFilter(field: 'login' | 'email', value: string): string {
  return JSON.stringify([{ [field]: { operator: '=', values: [value] } }]);
}

export class OpenProjectIntegration implements TaskSink {
  private client: AxiosInstance;
  private options: OpenProjectOptions;

  constructor(credentials: HttpCredentials, options: OpenProjectOptions) {
    this.client = createHttpClient(credentials);
    this.options = options;
  }

  private async send<T extends z.ZodTypeAny>(
    method: 'get' | 'post' | 'patch',
    endpoint: string,
    schema: T,
    data?: unknown,
    params?: Record<string, string>,
  ): Promise<z.infer<T>> {
    const call = `${method.toUpperCase()} ${endpoint}`;
    try {
      const response = await this.client.request<unknown>({ method, url: endpoint, data, params });
      return schema.parse(response.data);
    } catch (error) {
      throw toTransientError(error, 'openproject', call);
    }
  }

  /**
   * Create a work package and return its id
   */
  async createTask(payload: TargetTaskPayload): Promise<string> {
    const created = await this.send('post', '/api/v3/work_packages', openProjectResourceSchema, toWorkPackageBody(payload));
    logger.debug(`Work package created with ID: ${created.id}`);
    return created.id;
  }

  /**
   * PATCH needs the current lockVersion, read just before the write
   */
  async updateTask(targetId: string, payload: TargetTaskPayload): Promise<void> {
    const endpoint = `/api/v3/work_packages/${encodeURIComponent(targetId)}`;
    const current = await this.send('get', endpoint, lockVersionSchema);
    await this.send('patch', endpoint, openProjectResourceSchema, {
      ...toWorkPackageBody(payload),
      lockVersion: current.lockVersion,
    });
    logger.debug(`Work package #${targetId} updated`);
  }

  async createComment(targetTaskId: string, payload: TargetCommentPayload): Promise<string> {
    const body: Record<string, unknown> = { comment: { raw: payload.body } };
    if (payload.authorId) body.notify = [link('users', payload.authorId)];
    const activity = await this.send(
      'post',
      `/api/v3/work_packages/${encodeURIComponent(targetTaskId)}/activities`,
      openProjectResourceSchema,
      body,
    );
    return activity.id;
  }

  /**
   * Multipart upload: a `metadata` JSON part and the `file` part. The
   * download is spooled to a temp file so the upload reads it from disk.
   */
  async createAttachment(targetTaskId: string, content: Readable, filename: string): Promise<string> {
    const endpoint = `/api/v3/work_packages/${encodeURIComponent(targetTaskId)}/attachments`;
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'mp-op-attachment-'));
    try {
      const spool = path.join(dir, 'upload');
      try {
        await pipeline(content, fs.createWriteStream(spool));
      } catch (error) {
        throw toTransientError(error, 'megaplan', `download of ${filename}`);
      }
      const file = await fs.openAsBlob(spool);

      const form = new FormData();
      form.append('metadata', JSON.stringify({ fileName: filename }));
      form.append('file', file, filename);

      const attachment = await this.send('post', endpoint, openProjectResourceSchema, form);
      logger.debug(`Attached ${filename} (${file.size} bytes) to #${targetTaskId}`);
      return attachment.id;
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  }

  /**
   * Find the user by login, then by email
   */
  async findUser(user: SourceUser): Promise<string | null> {
    for (const field of ['login', 'email'] as const) {
      const value = user[field];
      if (!value) continue;
      const found = await this.send('get', '/api/v3/users', openProjectCollectionSchema, undefined, {
        filters: userFilter(field, value),
      });
      const match = found._embedded.elements[0];
      if (match) return match.id;
    }
    return null;
  }

  /**
   * Existing user, else a new one when creation is allowed, else the
   * configured default user (possibly null)
   */
  async ensureUser(user: SourceUser): Promise<string | null> {
    const existing = await this.findUser(user);
    if (existing !== null) return existing;

    if (this.options.allowUserCreation && user.login && user.email) {
      logger.info(`Creating OpenProject user ${user.login}`);
      const created = await this.send('post', '/api/v3/users', openProjectResourceSchema, {
        login: user.login,
        email: user.email,
        firstName: user.firstName ?? user.login,
        lastName: user.lastName ?? user.login,
        status: 'active',
      });
      return created.id;
    }

    logger.warn(`No OpenProject user for Megaplan user ${user.id}, using default user`);
    return this.options.defaultUserId;
  }

  async listProjects(): Promise<ProjectSummary[]> {
    const pageSize = this.options.pageSize ?? 50;
    const projects: ProjectSummary[] = [];
    let offset = 1;

    for (;;) {
      const page = await this.send('get', '/api/v3/projects', openProjectCollectionSchema, undefined, {
        offset: String(offset),
        pageSize: String(pageSize),
      });
      const elements = page._embedded.elements;
      for (const element of elements) {
        projects.push({ id: element.id, name: element.name ?? '' });
      }
      if (elements.length < pageSize) break;
      offset += 1;
    }

    return projects;
  }

  /**
   * Authenticated round trip used by `verify`
   */
  async ping(): Promise<void> {
    await this.send('get', '/api/v3/users/me', openProjectResourceSchema);
  }
}
