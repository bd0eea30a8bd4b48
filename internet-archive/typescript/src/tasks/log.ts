/**
 * Task logs
 * @module internet-archive-client/tasks/log
 */

import { ArchiveError } from '../errors/error.js';
import { buildQuery, execute, type RequestContext } from '../transport/execute.js';
import { decodeBody } from '../transport/types.js';

/**
 * Fetches the log of a task as text from the catalog server.
 *
 * @throws {ArchiveError} `Configuration` when the id is not a positive integer
 * @throws {ArchiveError} `NotFound` when the task does not exist
 */
export async function getTaskLog(context: RequestContext, taskId: number): Promise<string> {
  if (!Number.isSafeInteger(taskId) || taskId <= 0) {
    throw ArchiveError.configuration(`Task id must be a positive integer, got: ${taskId}`);
  }

  const response = await execute(
    context,
    'getTaskLog',
    {
      method: 'GET',
      url: `${context.endpoints.catalog}/services/tasks.php${buildQuery([['task_log', taskId]])}`,
      headers: {},
    },
    `Task ${taskId}`
  );

  return decodeBody(response);
}
