/**
 * TaskSink decorator that turns every OpenProject write into a logged no-op
 */

import { Readable } from 'stream';
import { CONSTANTS } from './constants';
import { logger } from './logger';
import { ProjectSummary, SourceUser, TargetCommentPayload, TargetTaskPayload, TaskSink } from './types';

/** The live sink's user fallback, mirrored so previews resolve users alike */
export interface DryRunUserPolicy {
  defaultUserId: string | null;
  allowUserCreation: boolean;
}

export class DryRunSink implements TaskSink {
  private sequence = 0;

  /**
   * @param inner used only for read calls (user lookup, project listing, ping)
   */
  constructor(
    private readonly inner?: TaskSink,
    private readonly users: DryRunUserPolicy = { defaultUserId: null, allowUserCreation: false },
  ) {}

  private nextId(kind: string): string {
    this.sequence += 1;
    return `${CONSTANTS.DRY_RUN_ID_PREFIX}${kind}:${this.sequence}`;
  }

  async createTask(payload: TargetTaskPayload): Promise<string> {
    const id = this.nextId('task');
    logger.info(`  [DRY-RUN] Create work package ${id}: ${JSON.stringify(payload)}`);
    return id;
  }

  async updateTask(targetId: string, payload: TargetTaskPayload): Promise<void> {
    logger.info(`  [DRY-RUN] Update work package #${targetId}: ${JSON.stringify(payload)}`);
  }

  async createComment(targetTaskId: string, payload: TargetCommentPayload): Promise<string> {
    const id = this.nextId('comment');
    logger.info(`  [DRY-RUN] Comment on #${targetTaskId}: ${JSON.stringify(payload)}`);
    return id;
  }

  async createAttachment(targetTaskId: string, content: Readable, filename: string): Promise<string> {
    content.destroy();
    const id = this.nextId('attachment');
    logger.info(`  [DRY-RUN] Attach "${filename}" to #${targetTaskId}`);
    return id;
  }

  async ensureUser(user: SourceUser): Promise<string | null> {
    const existing = await this.findUser(user);
    if (existing !== null) return existing;

    if (this.users.allowUserCreation && user.login && user.email) {
      logger.info(`  [DRY-RUN] Create user ${user.login}`);
      return `${CONSTANTS.DRY_RUN_ID_PREFIX}user:${user.id}`;
    }
    return this.users.defaultUserId;
  }

  async findUser(user: SourceUser): Promise<string | null> {
    return this.inner ? this.inner.findUser(user) : null;
  }

  async listProjects(): Promise<ProjectSummary[]> {
    return this.inner ? this.inner.listProjects() : [];
  }

  async ping(): Promise<void> {
    if (this.inner) await this.inner.ping();
  }
}
