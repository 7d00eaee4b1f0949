/**
 * Raw API payload models with conversion utilities
 *
 * Megaplan answers with different field spellings depending on API version
 * (`name` / `Name`, `parent_id` / `ParentTask`, ...); both are accepted.
 */

import { z } from 'zod';
import { AttachmentDescriptor, ProjectSummary, SourceComment, SourceTask, SourceUser } from './types';

const idLike = z.union([z.string(), z.number()]).transform(String);
const optionalId = z
  .union([idLike, z.object({ id: idLike }).transform(ref => ref.id), z.null()])
  .optional()
  .transform(value => (value === undefined || value === null || value === '' ? null : value));
const optionalText = z.union([z.string(), z.null()]).optional();

export const megaplanTaskSchema = z
  .object({
    id: idLike.optional(),
    TaskId: idLike.optional(),
    name: optionalText,
    Name: optionalText,
    title: optionalText,
    description: optionalText,
    Description: optionalText,
    status: optionalText,
    Status: optionalText,
    type: optionalText,
    Type: optionalText,
    project_id: optionalId,
    Project: optionalId,
    project: optionalId,
    author_id: optionalId,
    Author: optionalId,
    responsible_id: optionalId,
    Responsible: optionalId,
    parent_id: optionalId,
    ParentTask: optionalId,
    created_at: optionalText,
    CreatedAt: optionalText,
    updated_at: optionalText,
    UpdatedAt: optionalText,
    start_date: optionalText,
    StartDate: optionalText,
    due_date: optionalText,
    FinishDate: optionalText,
    tags: z.array(z.union([z.string(), z.object({ name: z.string() }).transform(tag => tag.name)])).optional(),
    custom_fields: z.record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
  })
  .passthrough();

export const megaplanCommentSchema = z.object({
  id: idLike.optional(),
  CommentId: idLike.optional(),
  author_id: optionalId,
  Author: optionalId,
  text: optionalText,
  Body: optionalText,
  created_at: optionalText,
  CreatedAt: optionalText,
});

export const megaplanFileSchema = z.object({
  id: idLike.optional(),
  FileId: idLike.optional(),
  name: optionalText,
  FileName: optionalText,
  size: z.union([z.number(), z.string()]).optional(),
  FileSize: z.union([z.number(), z.string()]).optional(),
});

export const megaplanUserSchema = z.object({
  id: idLike.optional(),
  Id: idLike.optional(),
  login: optionalText,
  Login: optionalText,
  email: optionalText,
  Email: optionalText,
  first_name: optionalText,
  FirstName: optionalText,
  last_name: optionalText,
  LastName: optionalText,
});

export const megaplanProjectSchema = z.object({
  id: idLike.optional(),
  Id: idLike.optional(),
  name: optionalText,
  Name: optionalText,
});

/** Envelope used by every Megaplan list endpoint */
export function megaplanPageSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    data: z
      .object({
        items: z.array(item).default([]),
        next: z.union([z.string(), z.number(), z.null()]).optional(),
      })
      .default({}),
  });
}

export type MegaplanTask = z.infer<typeof megaplanTaskSchema>;
export type MegaplanComment = z.infer<typeof megaplanCommentSchema>;
export type MegaplanFile = z.infer<typeof megaplanFileSchema>;
export type MegaplanUser = z.infer<typeof megaplanUserSchema>;
export type MegaplanProject = z.infer<typeof megaplanProjectSchema>;

/** OpenProject HAL resources: only the id is read back */
export const openProjectResourceSchema = z.object({ id: idLike }).passthrough();

export const openProjectCollectionSchema = z.object({
  _embedded: z
    .object({
      elements: z.array(z.object({ id: idLike, name: z.string().optional() }).passthrough()).default([]),
    })
    .default({}),
});

function first(...values: Array<string | null | undefined>): string | null {
  for (const value of values) {
    if (value !== undefined && value !== null && value !== '') return value;
  }
  return null;
}

function toSize(value: number | string | undefined): number {
  const size = typeof value === 'string' ? Number.parseInt(value, 10) : value ?? 0;
  return Number.isFinite(size) ? size : 0;
}

export class SourceModel {
  /**
   * Create a SourceTask from a Megaplan task payload
   */
  static taskFromMegaplan(raw: MegaplanTask, attachments: AttachmentDescriptor[] = []): SourceTask {
    const id = raw.id ?? raw.TaskId;
    if (id === undefined) {
      throw new Error('Megaplan task payload without id');
    }

    const customFields: Record<string, string> = {};
    for (const [field, value] of Object.entries(raw.custom_fields ?? {})) {
      if (value !== null) customFields[field] = String(value);
    }

    return {
      id,
      projectId: first(raw.project_id, raw.Project, raw.project) ?? '',
      name: first(raw.name, raw.Name, raw.title) ?? `Task ${id}`,
      description: first(raw.description, raw.Description) ?? '',
      status: first(raw.status, raw.Status) ?? 'unknown',
      type: first(raw.type, raw.Type),
      authorId: first(raw.author_id, raw.Author),
      assigneeId: first(raw.responsible_id, raw.Responsible),
      parentId: first(raw.parent_id, raw.ParentTask),
      createdAt: first(raw.created_at, raw.CreatedAt),
      updatedAt: first(raw.updated_at, raw.UpdatedAt),
      startDate: first(raw.start_date, raw.StartDate),
      dueDate: first(raw.due_date, raw.FinishDate),
      tags: raw.tags ?? [],
      customFields,
      attachments,
    };
  }

  static commentFromMegaplan(raw: MegaplanComment): SourceComment {
    const id = raw.id ?? raw.CommentId;
    if (id === undefined) {
      throw new Error('Megaplan comment payload without id');
    }
    return {
      id,
      authorId: first(raw.author_id, raw.Author),
      body: first(raw.text, raw.Body) ?? '',
      createdAt: first(raw.created_at, raw.CreatedAt) ?? new Date(0).toISOString(),
    };
  }

  static attachmentFromMegaplan(raw: MegaplanFile): AttachmentDescriptor {
    const id = raw.id ?? raw.FileId;
    if (id === undefined) {
      throw new Error('Megaplan file payload without id');
    }
    return {
      id,
      filename: first(raw.name, raw.FileName) ?? id,
      size: toSize(raw.size ?? raw.FileSize),
    };
  }

  static userFromMegaplan(raw: MegaplanUser): SourceUser | null {
    const id = raw.id ?? raw.Id;
    if (id === undefined) return null;
    return {
      id,
      login: first(raw.login, raw.Login),
      email: first(raw.email, raw.Email),
      firstName: first(raw.first_name, raw.FirstName),
      lastName: first(raw.last_name, raw.LastName),
    };
  }

  static projectFromMegaplan(raw: MegaplanProject): ProjectSummary | null {
    const id = raw.id ?? raw.Id;
    if (id === undefined) return null;
    return { id, name: first(raw.name, raw.Name) ?? '' };
  }
}
