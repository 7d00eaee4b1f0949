/**
 * Source task → OpenProject payload transformation
 */

import { FieldPolicy } from './config';
import { UnmappableFieldError, TranslatedField } from './errors';
import { FieldTranslator } from './fieldTranslator';
import { ResolvedRefs, SourceComment, SourceTask, TargetCommentPayload, TargetTaskPayload } from './types';

export interface TaskMapperOptions {
  defaults: { status?: string; type?: string };
  onUnmapped: Record<TranslatedField, FieldPolicy>;
}

const DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})/;

function toDateOnly(value: string | null): string | undefined {
  if (!value) return undefined;
  const match = DATE_PREFIX.exec(value);
  return match ? match[1] : undefined;
}

export class TaskMapper {
  constructor(
    private readonly translator: FieldTranslator,
    private readonly options: TaskMapperOptions,
  ) {}

  /**
   * Pure: no I/O, parent and user references must already be resolved.
   * Throws UnmappableFieldError when a field has no translation, no default,
   * and its policy is `fail`.
   */
  map(task: SourceTask, refs: ResolvedRefs, targetProjectId: string): TargetTaskPayload {
    const payload: TargetTaskPayload = {
      projectId: targetProjectId,
      subject: task.name.trim() || `Task ${task.id}`,
      description: task.description,
    };

    const statusId = this.resolve('status', task.status, this.translator.translateStatus(task.status), task.id);
    if (statusId) payload.statusId = statusId;

    if (task.type !== null) {
      const typeId = this.resolve('type', task.type, this.translator.translateType(task.type), task.id);
      if (typeId) payload.typeId = typeId;
    } else if (this.options.defaults.type) {
      payload.typeId = this.options.defaults.type;
    }

    if (refs.parentTargetId) payload.parentId = refs.parentTargetId;

    this.checkUser(task.authorId, refs.authorTargetId, task.id);
    if (refs.authorTargetId) payload.responsibleId = refs.authorTargetId;

    this.checkUser(task.assigneeId, refs.assigneeTargetId, task.id);
    if (refs.assigneeTargetId) payload.assigneeId = refs.assigneeTargetId;

    const startDate = toDateOnly(task.startDate);
    if (startDate) payload.startDate = startDate;
    const dueDate = toDateOnly(task.dueDate);
    if (dueDate) payload.dueDate = dueDate;

    const customFields = this.translator.translateCustomFields(task);
    if (Object.keys(customFields).length > 0) payload.customFields = customFields;

    return payload;
  }

  mapComment(comment: SourceComment, authorTargetId: string | null): TargetCommentPayload {
    const payload: TargetCommentPayload = {
      body: `${comment.body}\n\n_Author: ${comment.authorId ?? 'unknown'} (${comment.createdAt})_`,
    };
    if (authorTargetId) payload.authorId = authorTargetId;
    return payload;
  }

  private resolve(field: 'status' | 'type', value: string, translated: string | null, taskId: string): string | null {
    if (translated !== null) return translated;
    const fallback = this.options.defaults[field];
    if (fallback) return fallback;
    if (this.options.onUnmapped[field] === 'fail') {
      throw new UnmappableFieldError(field, value, taskId);
    }
    return null;
  }

  private checkUser(sourceUserId: string | null, targetUserId: string | null, taskId: string): void {
    if (sourceUserId !== null && targetUserId === null && this.options.onUnmapped.user === 'fail') {
      throw new UnmappableFieldError('user', sourceUserId, taskId);
    }
  }
}
