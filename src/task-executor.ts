import { SpanStatusCode, type Span } from '@opentelemetry/api';

import type { ExchangeClient } from './a2a/client.js';
import type { DebugConfig, ExchangeOutcome, LogEntry, LogSink, TaskData, TaskErrorKind, TaskOutcome } from './types.js';
import type { TaskTelemetrySink } from './telemetry/index.js';

import { buildPrompt } from './prompt-builder.js';
import { defaultTaskTelemetry, runWithSpan } from './telemetry/index.js';
import { describeError } from './utils.js';

export const TASK_SPAN = 'a2a_runner.task';
export const PROMPT_SPAN = 'a2a_runner.prompt.build';
export const EXCHANGE_SPAN = 'a2a_runner.a2a.send_prompt';

export interface TaskExecutorOptions {
  client: ExchangeClient;
  dataset: string;
  baseUrl: string;
  timeoutMs: number;
  debug?: DebugConfig;
  telemetry?: TaskTelemetrySink;
  onLog?: LogSink;
  now?: () => number;
}

interface Attempt {
  promptChars: number;
  exchange?: ExchangeOutcome;
  failure?: { kind: TaskErrorKind; message: string };
}

/**
 * Runs a single task end to end: prompt construction, the protocol exchange,
 * and the span, metric and log emission that go with it.
 *
 * `execute` never rejects. Faults outside the exchange surface as
 * `internal_error` outcomes.
 */
export class TaskExecutor {
  private readonly client: ExchangeClient;
  private readonly dataset: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly debug: DebugConfig;
  private readonly telemetry: TaskTelemetrySink;
  private readonly onLog?: LogSink;
  private readonly now: () => number;

  constructor(options: TaskExecutorOptions) {
    this.client = options.client;
    this.dataset = options.dataset;
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.debug = options.debug ?? { logPrompt: false, logResponse: false };
    this.telemetry = options.telemetry ?? defaultTaskTelemetry;
    this.onLog = options.onLog;
    this.now = options.now ?? Date.now;
  }

  async execute(task: TaskData): Promise<TaskOutcome> {
    const start = this.now();
    let counted = false;
    try {
      this.telemetry.inFlight(1);
      counted = true;
      return await runWithSpan(TASK_SPAN, {
        attributes: {
          'task.id': task.id,
          'dataset.name': this.dataset,
          'a2a.base_url': this.baseUrl,
          'a2a.timeout_ms': this.timeoutMs,
        },
      }, async (span) => {
        const attempt = await this.attempt(task, span);
        return this.finish(task.id, start, attempt, span);
      });
    } catch (error) {
      // Only reachable if span or gauge bookkeeping itself fails.
      return this.fail(task.id, 'internal_error', describeError(error), this.now() - start);
    } finally {
      if (counted) this.telemetry.inFlight(-1);
    }
  }

  /**
   * Records a task that failed before it could execute (the dataset could not
   * load it). Emits the same metric and log as an executed failure.
   */
  fail(taskId: string, kind: TaskErrorKind, message: string, durationMs: number): TaskOutcome {
    const outcome: TaskOutcome = {
      taskId,
      ok: false,
      durationMs: Math.max(0, durationMs),
      exchangeDurationMs: 0,
      promptChars: 0,
      responseChars: 0,
      errorKind: kind,
      error: message,
    };
    this.report(outcome);
    return outcome;
  }

  private async attempt(task: TaskData, span: Span): Promise<Attempt> {
    let prompt: string;
    try {
      prompt = await runWithSpan(PROMPT_SPAN, () => buildPrompt(task));
    } catch (error) {
      return { promptChars: 0, failure: { kind: 'internal_error', message: describeError(error) } };
    }

    span.setAttribute('prompt.chars', prompt.length);
    span.addEvent('prompt_built', { 'prompt.chars': prompt.length });
    if (this.debug.logPrompt) {
      this.log('VRB', 'request', `prompt length: ${String(prompt.length)} chars`, task.id);
    }

    try {
      const exchange = await runWithSpan(EXCHANGE_SPAN, async (child) => {
        const result = await this.client.exchange(prompt);
        if (!result.ok) {
          child.setStatus({ code: SpanStatusCode.ERROR, message: result.errorKind });
        }
        return result;
      });
      return { promptChars: prompt.length, exchange };
    } catch (error) {
      return { promptChars: prompt.length, failure: { kind: 'internal_error', message: describeError(error) } };
    }
  }

  private finish(taskId: string, start: number, attempt: Attempt, span: Span): TaskOutcome {
    const { exchange } = attempt;
    const exchangeDurationMs = exchange?.durationMs ?? 0;
    const durationMs = Math.max(0, this.now() - start);
    const outcome: TaskOutcome = exchange?.ok === true
      ? {
          taskId,
          ok: true,
          durationMs,
          exchangeDurationMs,
          promptChars: attempt.promptChars,
          responseChars: exchange.responseText.length,
        }
      : {
          taskId,
          ok: false,
          durationMs,
          exchangeDurationMs,
          promptChars: attempt.promptChars,
          responseChars: 0,
          errorKind: exchange?.ok === false ? exchange.errorKind : (attempt.failure?.kind ?? 'internal_error'),
          error: exchange?.ok === false ? exchange.message : (attempt.failure?.message ?? 'task did not run'),
        };

    span.setAttributes({
      'response.chars': outcome.responseChars,
      'task.status': outcome.ok ? 'success' : 'failed',
      'a2a.duration_ms': exchangeDurationMs,
    });
    if (outcome.ok) {
      span.setStatus({ code: SpanStatusCode.OK });
      if (this.debug.logResponse) {
        this.log('VRB', 'response', `response length: ${String(outcome.responseChars)} chars`, taskId);
      }
    } else {
      span.addEvent('task_failed', {
        'error.type': outcome.errorKind ?? 'internal_error',
        'error.message': outcome.error ?? '',
      });
      span.setStatus({ code: SpanStatusCode.ERROR, message: outcome.error });
    }

    this.report(outcome);
    return outcome;
  }

  private report(outcome: TaskOutcome): void {
    try {
      this.telemetry.recordTask({
        taskId: outcome.taskId,
        dataset: this.dataset,
        status: outcome.ok ? 'success' : 'failed',
        errorKind: outcome.errorKind,
        latencyMs: outcome.durationMs,
        exchangeLatencyMs: outcome.exchangeDurationMs,
        promptChars: outcome.promptChars,
        responseChars: outcome.responseChars,
      });
    } catch (error) {
      this.log('WRN', 'response', `failed to record task metrics: ${describeError(error)}`, outcome.taskId);
    }

    const duration = outcome.durationMs.toFixed(2);
    if (outcome.ok) {
      this.log('VRB', 'response', `task ${outcome.taskId} succeeded in ${duration}ms`, outcome.taskId, {
        status: 'success',
        latency_ms: outcome.durationMs,
        response_chars: outcome.responseChars,
      });
    } else {
      this.log('ERR', 'response', `task ${outcome.taskId} failed (${outcome.errorKind ?? 'internal_error'}): ${outcome.error ?? ''}`, outcome.taskId, {
        status: 'failed',
        error_kind: outcome.errorKind ?? 'internal_error',
        latency_ms: outcome.durationMs,
      });
    }
  }

  private log(
    severity: LogEntry['severity'],
    direction: LogEntry['direction'],
    message: string,
    taskId: string,
    details?: LogEntry['details'],
  ): void {
    if (this.onLog === undefined) return;
    this.onLog({
      timestamp: Date.now(),
      severity,
      component: 'runner',
      direction,
      remoteIdentifier: 'runner:task',
      fatal: false,
      message,
      taskId,
      dataset: this.dataset,
      details,
    });
  }
}
