/**
 * zod schemas for the Todoist REST v2 payloads this tool reads.
 *
 * Records are converted to camelCase at the boundary; ids are normalised to
 * strings because older payloads carried numeric ids.
 */

import { z } from 'zod';
import type { RemoteLabel, RemoteProject, RemoteTask } from '../types/remote.js';

const IdSchema = z.union([z.string(), z.number()]).transform((v) => String(v));

const DueSchema = z.object({
  date: z.string(),
  string: z.string().optional(),
  lang: z.string().optional(),
  datetime: z.string().nullish(),
  timezone: z.string().nullish(),
  is_recurring: z.boolean().optional(),
});

export const ProjectSchema = z
  .object({
    id: IdSchema,
    name: z.string(),
    parent_id: IdSchema.nullish(),
  })
  .transform((p): RemoteProject => ({ id: p.id, name: p.name, parentId: p.parent_id ?? null }));

export const TaskSchema = z
  .object({
    id: IdSchema,
    content: z.string().default(''),
    created_at: z.string().nullish(),
    due: DueSchema.nullish(),
    labels: z.array(z.union([z.string(), z.number()]).transform((v) => String(v))).default([]),
    project_id: IdSchema,
  })
  .transform((t): RemoteTask => ({
    id: t.id,
    content: t.content,
    createdAt: t.created_at ?? '',
    due: t.due
      ? {
          date: t.due.date,
          string: t.due.string,
          lang: t.due.lang,
          datetime: t.due.datetime,
          timezone: t.due.timezone,
          isRecurring: t.due.is_recurring,
        }
      : null,
    labels: t.labels,
    projectId: t.project_id,
  }));

export const LabelSchema = z
  .object({
    id: IdSchema,
    name: z.string(),
  })
  .transform((l): RemoteLabel => ({ id: l.id, name: l.name }));

export const ProjectListSchema = z.array(ProjectSchema);
// An empty body on a list endpoint means "nothing there".
export const TaskListSchema = z.preprocess((v) => v ?? [], z.array(TaskSchema));
export const LabelListSchema = z.preprocess((v) => v ?? [], z.array(LabelSchema));
