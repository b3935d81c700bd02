import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import type { TaskData } from '../types.js';
import type { DatasetProvider } from './provider.js';

import { TaskNotFoundError } from './provider.js';

const TaskRecordSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform((value) => String(value)),
  instruction: z.string().optional(),
  supervisor: z.union([z.string(), z.record(z.unknown())]).optional(),
  appDescriptions: z.record(z.string()).optional(),
  app_descriptions: z.record(z.string()).optional(),
}).passthrough();

const DatasetFileSchema = z.union([
  z.object({ tasks: z.array(TaskRecordSchema) }).passthrough(),
  z.array(TaskRecordSchema),
]);

type TaskRecord = z.infer<typeof TaskRecordSchema>;

export interface JsonFileDatasetOptions {
  name: string;
  path: string;
  read?: (path: string) => Promise<string>;
}

/**
 * Dataset backed by a JSON file holding either `{ "tasks": [...] }` or a bare
 * array of task records. The file is read and validated once on initialize.
 */
export class JsonFileDataset implements DatasetProvider {
  readonly name: string;
  private readonly path: string;
  private readonly read: (path: string) => Promise<string>;
  private records?: Map<string, TaskRecord>;

  constructor(options: JsonFileDatasetOptions) {
    this.name = options.name;
    this.path = options.path;
    this.read = options.read ?? ((p) => readFile(p, 'utf-8'));
  }

  async initialize(): Promise<void> {
    const raw = await this.read(this.path);
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new Error(`dataset file '${this.path}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    const parsed = DatasetFileSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
      throw new Error(`dataset file '${this.path}' is invalid: ${issues.join('; ')}`);
    }
    const list = Array.isArray(parsed.data) ? parsed.data : parsed.data.tasks;
    const records = new Map<string, TaskRecord>();
    list.forEach((record) => {
      if (records.has(record.id)) {
        throw new Error(`dataset file '${this.path}' has duplicate task id '${record.id}'`);
      }
      records.set(record.id, record);
    });
    this.records = records;
  }

  async *taskIds(): AsyncIterable<string> {
    yield* this.requireRecords().keys();
  }

  async loadTask(id: string): Promise<TaskData> {
    const record = this.requireRecords().get(id);
    if (record === undefined) throw new TaskNotFoundError(this.name, id);
    if (record.instruction === undefined || record.instruction.trim().length === 0) {
      throw new Error(`task '${id}' has no instruction`);
    }
    const task: TaskData = { id: record.id, instruction: record.instruction };
    if (record.supervisor !== undefined) task.supervisor = record.supervisor;
    const apps = record.appDescriptions ?? record.app_descriptions;
    if (apps !== undefined) task.appDescriptions = apps;
    return task;
  }

  private requireRecords(): Map<string, TaskRecord> {
    if (this.records === undefined) {
      throw new Error(`dataset '${this.name}' used before initialize()`);
    }
    return this.records;
  }
}
