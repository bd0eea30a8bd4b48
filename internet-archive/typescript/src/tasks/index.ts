/**
 * Catalog tasks
 * @module internet-archive-client/tasks
 */

export { TasksService } from './service.js';
export {
  searchTasks,
  searchTasksPage,
  iterateTasks,
  buildTaskSearchQuery,
  clampLimit,
  formatSubmitTime,
  DEFAULT_TASK_LIMIT,
  MAX_TASK_LIMIT,
} from './search.js';
export { getTaskLog } from './log.js';
export {
  ACTIVE_TASK_STATUSES,
  TASK_COMMANDS,
  taskStatusToWaitAdmin,
  taskStatusColor,
  isKnownTaskCommand,
  type ActiveTaskStatus,
  type TaskStatus,
  type KnownTaskCommand,
  type TaskCommand,
  type TaskCategories,
  type TaskSearchCriteria,
  type Task,
  type TaskSummary,
  type TaskPage,
} from './types.js';
