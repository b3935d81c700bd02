import { Liquid } from 'liquidjs';

import type { TaskData } from './types.js';

import { isPlainObject } from './utils.js';

const TASK_PROMPT_TEMPLATE = [
  'I am your supervisor:',
  '{{ supervisor }}',
  '',
  'The task you are to complete is:',
  '{{ instruction }}',
  '',
  'The applications available to you to help you complete the task are the following:',
  '{{ apps | json_pretty }}',
].join('\n');

const engine = new Liquid({ cache: false, strictFilters: true, strictVariables: true });
engine.registerFilter('json_pretty', (value: unknown) => JSON.stringify(value ?? null, null, 2));
const taskPrompt = engine.parse(TASK_PROMPT_TEMPLATE);

export class PromptBuildError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PromptBuildError';
  }
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) return value.map((item) => sortKeysDeep(item));
  if (!isPlainObject(value)) return value;
  return Object.keys(value).sort().reduce<Record<string, unknown>>((acc, key) => {
    acc[key] = sortKeysDeep(value[key]);
    return acc;
  }, {});
}

export function serializeSupervisor(supervisor: TaskData['supervisor']): string {
  if (supervisor === undefined) return '';
  if (typeof supervisor === 'string') return supervisor;
  return JSON.stringify(sortKeysDeep(supervisor), null, 2);
}

/**
 * Builds the text sent to the agent for one task.
 *
 * A bare instruction is passed through unchanged. When the dataset supplies
 * supervisor or application context, the instruction is wrapped in the
 * supervisor/task/applications template.
 */
export function buildPrompt(task: TaskData): string {
  if (task.instruction.trim().length === 0) {
    throw new PromptBuildError(`task ${task.id} has an empty instruction`);
  }
  const hasSupervisor = task.supervisor !== undefined;
  const hasApps = task.appDescriptions !== undefined && Object.keys(task.appDescriptions).length > 0;
  if (!hasSupervisor && !hasApps) return task.instruction;

  const rendered = engine.renderSync(taskPrompt, {
    supervisor: serializeSupervisor(task.supervisor),
    instruction: task.instruction,
    apps: task.appDescriptions ?? {},
  }) as unknown;
  if (typeof rendered === 'string') return rendered;
  return String(rendered);
}
