import type { TaskData } from '../types.js';
import type { DatasetProvider } from './provider.js';

import { TaskNotFoundError } from './provider.js';

export interface TaskLoaderSource {
  ids: readonly string[];
  load: (id: string) => Promise<TaskData> | TaskData;
}

export class InMemoryDataset implements DatasetProvider {
  readonly name: string;
  private readonly ids: readonly string[];
  private readonly load: (id: string) => Promise<TaskData> | TaskData;

  constructor(name: string, source: readonly TaskData[] | TaskLoaderSource) {
    this.name = name;
    if (isLoaderSource(source)) {
      this.ids = [...source.ids];
      this.load = source.load;
    } else {
      const byId = new Map(source.map((task) => [task.id, task]));
      this.ids = source.map((task) => task.id);
      this.load = (id) => {
        const task = byId.get(id);
        if (task === undefined) throw new TaskNotFoundError(name, id);
        return task;
      };
    }
  }

  async initialize(): Promise<void> {
    // nothing to prepare
  }

  async *taskIds(): AsyncIterable<string> {
    yield* this.ids;
  }

  async loadTask(id: string): Promise<TaskData> {
    return await this.load(id);
  }
}

function isLoaderSource(source: readonly TaskData[] | TaskLoaderSource): source is TaskLoaderSource {
  return !Array.isArray(source);
}
