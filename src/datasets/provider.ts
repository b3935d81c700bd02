import type { TaskData } from '../types.js';

/**
 * Source of tasks for a run. Ids are yielded in a stable order and each is
 * loaded lazily, one at a time, by the orchestrator.
 */
export interface DatasetProvider {
  readonly name: string;
  initialize(): Promise<void>;
  taskIds(): AsyncIterable<string>;
  loadTask(id: string): Promise<TaskData>;
}

export class DatasetUnavailableError extends Error {
  readonly dataset: string;

  constructor(dataset: string, message: string, opts?: { cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'DatasetUnavailableError';
    this.dataset = dataset;
  }
}

export class TaskNotFoundError extends Error {
  readonly taskId: string;

  constructor(dataset: string, taskId: string) {
    super(`task '${taskId}' not found in dataset '${dataset}'`);
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}
