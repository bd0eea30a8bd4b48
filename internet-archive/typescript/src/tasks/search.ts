/**
 * Task search
 * @module internet-archive-client/tasks/search
 */

import { ArchiveError } from '../errors/error.js';
import { buildQuery, execute, type RequestContext } from '../transport/execute.js';
import { decodeJson } from '../transport/json.js';
import { searchResponseSchema } from './schemas.js';
import type { Task, TaskPage, TaskSearchCriteria } from './types.js';
import { taskStatusToWaitAdmin } from './types.js';

/** Page size used when the criteria set none. */
export const DEFAULT_TASK_LIMIT = 50;

/** Largest page the server returns. */
export const MAX_TASK_LIMIT = 500;

/**
 * Clamps a page size to 0..500.
 *
 * @throws {ArchiveError} `Configuration` when the limit is not a number
 */
export function clampLimit(limit: number | undefined): number {
  if (limit === undefined) {
    return DEFAULT_TASK_LIMIT;
  }
  if (Number.isNaN(limit)) {
    throw ArchiveError.configuration('Task search limit must be a number');
  }
  return Math.min(Math.max(Math.trunc(limit), 0), MAX_TASK_LIMIT);
}

/**
 * Formats a submit time bound as `YYYY-MM-DD HH:MM:SS` (UTC).
 */
export function formatSubmitTime(value: Date | string): string {
  if (typeof value === 'string') {
    return value;
  }
  if (isNaN(value.getTime())) {
    throw ArchiveError.configuration('Submit time bound is an invalid Date');
  }
  return value.toISOString().slice(0, 19).replace('T', ' ');
}

function optionalTime(value: Date | string | undefined): string | undefined {
  return value === undefined ? undefined : formatSubmitTime(value);
}

function flag(value: boolean): string {
  return value ? '1' : '0';
}

/**
 * Builds the query string for a task search.
 */
export function buildTaskSearchQuery(criteria: TaskSearchCriteria, cursor?: string): string {
  const categories = {
    summary: true,
    catalog: true,
    history: false,
    ...criteria.categories,
  };

  return buildQuery([
    ['identifier', criteria.identifier],
    ['task_id', criteria.taskId],
    ['cmd', criteria.command],
    ['wait_admin', criteria.status === undefined ? undefined : taskStatusToWaitAdmin(criteria.status)],
    ['server', criteria.server],
    ['submitter', criteria.submitter],
    ['priority', criteria.priority],
    ['submittime>', optionalTime(criteria.submittedAfter)],
    ['submittime<', optionalTime(criteria.submittedBefore)],
    ['submittime>=', optionalTime(criteria.submittedOnOrAfter)],
    ['submittime<=', optionalTime(criteria.submittedOnOrBefore)],
    ['summary', flag(categories.summary)],
    ['catalog', flag(categories.catalog)],
    ['history', flag(categories.history)],
    ['limit', clampLimit(criteria.limit)],
    ['cursor', cursor],
  ]);
}

/**
 * Fetches one page of task search results.
 *
 * @throws {ArchiveError} `Api` when the server answers `success: false`
 */
export async function searchTasksPage(
  context: RequestContext,
  criteria: TaskSearchCriteria = {},
  cursor?: string
): Promise<TaskPage> {
  const response = await execute(
    context,
    'searchTasks',
    {
      method: 'GET',
      url: `${context.endpoints.archive}/services/tasks.php${buildTaskSearchQuery(criteria, cursor)}`,
      headers: { accept: 'application/json' },
    },
    'Task search'
  );

  const body = decodeJson(response, searchResponseSchema, 'task search response');
  if (!body.success) {
    throw ArchiveError.api(body.error ?? 'Task search failed', response.status);
  }

  const value = body.value;
  if (!value) {
    return { tasks: [] };
  }

  return {
    tasks: [...value.catalog, ...value.history],
    ...(value.summary ? { summary: value.summary } : {}),
    ...(value.cursor ? { cursor: value.cursor } : {}),
  };
}

/**
 * Returns the tasks on the first page of a search.
 */
export async function searchTasks(context: RequestContext, criteria: TaskSearchCriteria = {}): Promise<Task[]> {
  const page = await searchTasksPage(context, criteria);
  return page.tasks;
}

/**
 * Iterates over every matching task, following the cursor page by page.
 *
 * @example
 * ```typescript
 * for await (const task of iterateTasks(context, { identifier: 'my-item', categories: { history: true } })) {
 *   console.log(task.taskId, task.command, task.status);
 * }
 * ```
 */
export async function* iterateTasks(
  context: RequestContext,
  criteria: TaskSearchCriteria = {}
): AsyncGenerator<Task, void, undefined> {
  let cursor: string | undefined;
  do {
    const page = await searchTasksPage(context, criteria, cursor);
    yield* page.tasks;
    // a repeated cursor would loop forever
    cursor = page.cursor !== cursor ? page.cursor : undefined;
  } while (cursor);
}
