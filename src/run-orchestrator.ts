import type { DatasetProvider } from './datasets/provider.js';
import type { TaskExecutor } from './task-executor.js';
import type { LogEntry, LogSink, RunState, RunSummary, StopReason, TaskOutcome } from './types.js';

import { DatasetUnavailableError } from './datasets/provider.js';
import { LatencyAggregator } from './latency-aggregator.js';
import { describeError } from './utils.js';

export interface RunOrchestratorOptions {
  dataset: DatasetProvider;
  executor: Pick<TaskExecutor, 'execute' | 'fail'>;
  maxTasks?: number;
  abortOnFailure?: boolean;
  onLog?: LogSink;
  onStateChange?: (state: RunState) => void;
  // Aborting stops the run after the task in progress.
  signal?: AbortSignal;
  now?: () => number;
}

/**
 * Drives one run: initializes the dataset, then executes its tasks strictly
 * one after another until the dataset is exhausted, the task limit is
 * reached, a failure triggers abort-on-failure, or the caller's signal
 * interrupts it between tasks.
 */
export class RunOrchestrator {
  private readonly dataset: DatasetProvider;
  private readonly executor: Pick<TaskExecutor, 'execute' | 'fail'>;
  private readonly maxTasks?: number;
  private readonly abortOnFailure: boolean;
  private readonly onLog?: LogSink;
  private readonly onStateChange?: (state: RunState) => void;
  private readonly signal?: AbortSignal;
  private readonly now: () => number;
  private readonly aggregator = new LatencyAggregator();
  private readonly outcomes: TaskOutcome[] = [];
  private currentState: RunState = 'idle';
  private tasksProcessed = 0;

  constructor(options: RunOrchestratorOptions) {
    this.dataset = options.dataset;
    this.executor = options.executor;
    this.maxTasks = options.maxTasks;
    this.abortOnFailure = options.abortOnFailure ?? false;
    this.onLog = options.onLog;
    this.onStateChange = options.onStateChange;
    this.signal = options.signal;
    this.now = options.now ?? Date.now;
  }

  get state(): RunState {
    return this.currentState;
  }

  /** Throws DatasetUnavailableError when the dataset cannot be initialized. */
  async run(): Promise<RunSummary> {
    const start = this.now();
    try {
      await this.dataset.initialize();
    } catch (error) {
      this.transition('stopped');
      const message = `dataset '${this.dataset.name}' unavailable: ${describeError(error)}`;
      this.log('ERR', 'dataset:init', message, { fatal: true });
      throw new DatasetUnavailableError(this.dataset.name, message, { cause: error });
    }
    this.log('VRB', 'dataset:init', `dataset '${this.dataset.name}' initialized`);

    const stopReason = await this.drain();
    this.transition('stopped');

    const summary = this.buildSummary(stopReason, this.now() - start);
    this.log(
      'FIN',
      'runner:summary',
      `run finished: ${String(summary.tasksSucceeded)}/${String(summary.tasksAttempted)} succeeded (${summary.stopReason})`,
    );
    return summary;
  }

  private async drain(): Promise<StopReason> {
    const early = this.haltReason();
    if (early !== undefined) return early;
    try {
      // eslint-disable-next-line functional/no-loop-statements -- tasks run strictly in order
      for await (const taskId of this.dataset.taskIds()) {
        const outcome = await this.runOne(taskId);
        this.outcomes.push(outcome);
        this.aggregator.record(outcome.durationMs);
        this.tasksProcessed += 1;
        this.transition('recorded');
        if (!outcome.ok && this.abortOnFailure) {
          this.log('ERR', 'runner:abort', `aborting run after task ${taskId} failed`, { taskId });
          return 'aborted';
        }
        // Checked before the next id is requested from the provider.
        const halt = this.haltReason();
        if (halt !== undefined) return halt;
      }
    } catch (error) {
      this.log('ERR', 'dataset:iterate', `dataset '${this.dataset.name}' iteration failed: ${describeError(error)}`);
      return 'dataset_error';
    }
    return 'exhausted';
  }

  private haltReason(): StopReason | undefined {
    if (this.signal?.aborted === true) return 'interrupted';
    if (this.maxTasks !== undefined && this.tasksProcessed >= this.maxTasks) return 'max_tasks';
    return undefined;
  }

  private async runOne(taskId: string): Promise<TaskOutcome> {
    const fetchStart = this.now();
    this.transition('dataset_fetch');
    try {
      const task = await this.dataset.loadTask(taskId);
      this.transition('executing');
      return await this.executor.execute(task);
    } catch (error) {
      return this.executor.fail(taskId, 'dataset_fetch_error', describeError(error), this.now() - fetchStart);
    }
  }

  private buildSummary(stopReason: StopReason, wallTimeMs: number): RunSummary {
    const stats = this.aggregator.summary();
    const succeeded = this.outcomes.filter((outcome) => outcome.ok).length;
    return {
      dataset: this.dataset.name,
      tasksAttempted: this.tasksProcessed,
      tasksSucceeded: succeeded,
      tasksFailed: this.tasksProcessed - succeeded,
      totalWallTimeMs: Math.max(0, wallTimeMs),
      meanLatencyMs: stats.mean,
      p50LatencyMs: stats.p50,
      p95LatencyMs: stats.p95,
      stopReason,
      outcomes: [...this.outcomes],
    };
  }

  private transition(next: RunState): void {
    this.currentState = next;
    this.onStateChange?.(next);
  }

  private log(
    severity: LogEntry['severity'],
    remoteIdentifier: string,
    message: string,
    extra: { fatal?: boolean; taskId?: string } = {},
  ): void {
    if (this.onLog === undefined) return;
    this.onLog({
      timestamp: Date.now(),
      severity,
      component: remoteIdentifier.startsWith('dataset') ? 'dataset' : 'runner',
      direction: 'response',
      remoteIdentifier,
      fatal: extra.fatal ?? false,
      message,
      taskId: extra.taskId,
      dataset: this.dataset.name,
    });
  }
}
