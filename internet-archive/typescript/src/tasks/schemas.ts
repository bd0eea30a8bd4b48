/**
 * Schemas for the tasks API
 * @module internet-archive-client/tasks/schemas
 */

import { z } from 'zod';
import type { Task } from './types.js';

const integer = z.union([z.number().int(), z.string().regex(/^-?\d+$/).transform(Number)]);

/**
 * `args` is an object, or `[]` when a task has no arguments.
 */
const argsSchema = z
  .union([z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])), z.array(z.unknown())])
  .transform((args): Record<string, string> => {
    if (Array.isArray(args)) {
      return {};
    }
    return Object.fromEntries(
      Object.entries(args).map(([name, value]) => [name, value === null ? '' : String(value)])
    );
  });

/**
 * Parses the archive's `YYYY-MM-DD HH:MM:SS` submit time as UTC.
 */
const submitTimeSchema = z.string().transform((value, ctx): Date => {
  const date = new Date(`${value.trim().replace(' ', 'T')}Z`);
  if (isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid submit time ${value}` });
    return z.NEVER;
  }
  return date;
});

const baseEntry = {
  task_id: integer.refine((id) => id > 0, 'task_id must be positive'),
  identifier: z.string(),
  cmd: z.string(),
  priority: integer,
  submitter: z.string(),
  submittime: submitTimeSchema,
  args: argsSchema.default([]),
};

export const catalogEntrySchema = z
  .object({
    ...baseEntry,
    server: z.string().nullish(),
    status: z.enum(['queued', 'running', 'error', 'paused']),
  })
  .transform((raw): Task => ({
    taskId: raw.task_id,
    identifier: raw.identifier,
    command: raw.cmd,
    status: raw.status,
    priority: raw.priority,
    submitter: raw.submitter,
    submittedAt: raw.submittime,
    ...(raw.server ? { server: raw.server } : {}),
    args: raw.args,
  }));

export const historyEntrySchema = z
  .object({
    ...baseEntry,
    server: z.string().nullish(),
    finished: integer,
  })
  .transform((raw): Task => ({
    taskId: raw.task_id,
    identifier: raw.identifier,
    command: raw.cmd,
    status: 'finished',
    priority: raw.priority,
    submitter: raw.submitter,
    submittedAt: raw.submittime,
    ...(raw.server ? { server: raw.server } : {}),
    args: raw.args,
    finished: raw.finished,
  }));

export const summarySchema = z.object({
  queued: integer,
  running: integer,
  error: integer,
  paused: integer,
});

export const searchResponseSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
  value: z
    .object({
      catalog: z.array(catalogEntrySchema).default([]),
      history: z.array(historyEntrySchema).default([]),
      summary: summarySchema.optional(),
      cursor: z.string().nullish(),
    })
    .optional(),
});
