/**
 * Catalog task types
 * @module internet-archive-client/tasks/types
 */

/**
 * State of a task still in the catalog.
 */
export type ActiveTaskStatus = 'queued' | 'running' | 'error' | 'paused';

/**
 * Task state; history entries are always `finished`.
 */
export type TaskStatus = ActiveTaskStatus | 'finished';

export const ACTIVE_TASK_STATUSES: readonly ActiveTaskStatus[] = ['queued', 'running', 'error', 'paused'];

const WAIT_ADMIN: Record<ActiveTaskStatus, number> = {
  queued: 0,
  running: 1,
  error: 2,
  paused: 9,
};

const STATUS_COLOR: Record<ActiveTaskStatus, string> = {
  queued: 'green',
  running: 'blue',
  error: 'red',
  paused: 'brown',
};

/**
 * Value of the `wait_admin` search parameter for a status.
 */
export function taskStatusToWaitAdmin(status: ActiveTaskStatus): number {
  return WAIT_ADMIN[status];
}

/**
 * Color the archive's task pages use for a status.
 */
export function taskStatusColor(status: ActiveTaskStatus): string {
  return STATUS_COLOR[status];
}

/**
 * Task commands the archive documents.
 */
export const TASK_COMMANDS = [
  'archive.php',
  'book_op.php',
  'bup.php',
  'delete.php',
  'derive.php',
  'fixer.php',
  'make_dark.php',
  'make_undark.php',
  'modify_xml.php',
  'rename.php',
] as const;

export type KnownTaskCommand = (typeof TASK_COMMANDS)[number];

/**
 * A task command: one of {@link TASK_COMMANDS} or any custom script name.
 */
export type TaskCommand = KnownTaskCommand | (string & {});

export function isKnownTaskCommand(command: string): command is KnownTaskCommand {
  return TASK_COMMANDS.some((known) => known === command);
}

/**
 * Which sections the task search returns.
 */
export interface TaskCategories {
  /** Per-status counts. @default true */
  summary?: boolean;
  /** Queued, running, failed and paused tasks. @default true */
  catalog?: boolean;
  /** Finished tasks. @default false */
  history?: boolean;
}

/**
 * Task search filters. All fields are optional; with none set the server
 * decides which tasks to return.
 *
 * Submit time bounds accept a Date (sent as UTC) or a string in the
 * archive's `YYYY-MM-DD HH:MM:SS` form.
 */
export interface TaskSearchCriteria {
  identifier?: string;
  taskId?: number;
  command?: TaskCommand;
  status?: ActiveTaskStatus;
  server?: string;
  submitter?: string;
  priority?: number;
  submittedAfter?: Date | string;
  submittedBefore?: Date | string;
  submittedOnOrAfter?: Date | string;
  submittedOnOrBefore?: Date | string;
  categories?: TaskCategories;
  /**
   * Maximum tasks per page, clamped to 0..500.
   * @default 50
   */
  limit?: number;
}

/**
 * A catalog or history task.
 */
export interface Task {
  taskId: number;
  identifier: string;
  command: TaskCommand;
  status: TaskStatus;
  priority: number;
  submitter: string;
  submittedAt: Date;
  server?: string;
  args: Record<string, string>;
  /** Set on history entries only. */
  finished?: number;
}

/**
 * Task counts per status.
 */
export interface TaskSummary {
  queued: number;
  running: number;
  error: number;
  paused: number;
}

/**
 * One page of task search results.
 */
export interface TaskPage {
  /** Catalog entries first, then history entries. */
  tasks: Task[];
  summary?: TaskSummary;
  /** Pass to the next call to continue; absent on the last page. */
  cursor?: string;
}
