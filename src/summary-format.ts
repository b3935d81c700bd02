import type { RunSummary, TaskOutcome } from './types.js';

const RULE = '='.repeat(60);
const LABEL_WIDTH = 19;

function row(label: string, value: string): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

export function formatSummaryTable(summary: RunSummary): string {
  return [
    RULE,
    'RUN SUMMARY',
    RULE,
    row('Dataset', summary.dataset),
    row('Tasks Attempted', String(summary.tasksAttempted)),
    row('Tasks Succeeded', String(summary.tasksSucceeded)),
    row('Tasks Failed', String(summary.tasksFailed)),
    row('Stop Reason', summary.stopReason),
    row('Total Wall Time', `${(summary.totalWallTimeMs / 1000).toFixed(2)}s`),
    row('Average Latency', `${summary.meanLatencyMs.toFixed(2)}ms`),
    row('P50 Latency', `${summary.p50LatencyMs.toFixed(2)}ms`),
    row('P95 Latency', `${summary.p95LatencyMs.toFixed(2)}ms`),
    RULE,
  ].join('\n');
}

function outcomeToJson(outcome: TaskOutcome): Record<string, unknown> {
  const out: Record<string, unknown> = {
    task_id: outcome.taskId,
    success: outcome.ok,
    latency_ms: outcome.durationMs,
    a2a_latency_ms: outcome.exchangeDurationMs,
    prompt_chars: outcome.promptChars,
    response_chars: outcome.responseChars,
  };
  if (outcome.errorKind !== undefined) out.error_kind = outcome.errorKind;
  if (outcome.error !== undefined) out.error = outcome.error;
  return out;
}

/** JSON document written by `--output`. */
export function summaryToJson(summary: RunSummary): Record<string, unknown> {
  return {
    dataset: summary.dataset,
    tasks_attempted: summary.tasksAttempted,
    tasks_succeeded: summary.tasksSucceeded,
    tasks_failed: summary.tasksFailed,
    stop_reason: summary.stopReason,
    total_wall_time_ms: summary.totalWallTimeMs,
    mean_latency_ms: summary.meanLatencyMs,
    p50_latency_ms: summary.p50LatencyMs,
    p95_latency_ms: summary.p95LatencyMs,
    results: summary.outcomes.map((outcome) => outcomeToJson(outcome)),
  };
}

export function exitCodeFor(summary: RunSummary): number {
  return summary.tasksSucceeded > 0 ? 0 : 1;
}
