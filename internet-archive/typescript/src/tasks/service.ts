/**
 * Task operations bound to a client
 * @module internet-archive-client/tasks/service
 */

import type { RequestContext } from '../transport/execute.js';
import { getTaskLog } from './log.js';
import { iterateTasks, searchTasks, searchTasksPage } from './search.js';
import type { Task, TaskPage, TaskSearchCriteria } from './types.js';

/**
 * Search and log access for catalog tasks.
 */
export class TasksService {
  constructor(private readonly context: RequestContext) {}

  /**
   * First page of matching tasks.
   */
  search(criteria: TaskSearchCriteria = {}): Promise<Task[]> {
    return searchTasks(this.context, criteria);
  }

  searchPage(criteria: TaskSearchCriteria = {}, cursor?: string): Promise<TaskPage> {
    return searchTasksPage(this.context, criteria, cursor);
  }

  /**
   * Every matching task across all pages.
   */
  iterate(criteria: TaskSearchCriteria = {}): AsyncGenerator<Task, void, undefined> {
    return iterateTasks(this.context, criteria);
  }

  log(taskId: number): Promise<string> {
    return getTaskLog(this.context, taskId);
  }
}
