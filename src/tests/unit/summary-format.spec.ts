import { describe, expect, it } from 'vitest';

import type { RunSummary } from '../../types.js';

import { exitCodeFor, formatSummaryTable, summaryToJson } from '../../summary-format.js';

const SUMMARY: RunSummary = {
  dataset: 'demo',
  tasksAttempted: 2,
  tasksSucceeded: 1,
  tasksFailed: 1,
  totalWallTimeMs: 1_234,
  meanLatencyMs: 12.5,
  p50LatencyMs: 10,
  p95LatencyMs: 15,
  stopReason: 'exhausted',
  outcomes: [
    { taskId: 't1', ok: true, durationMs: 10, exchangeDurationMs: 8, promptChars: 4, responseChars: 4 },
    {
      taskId: 't2',
      ok: false,
      durationMs: 15,
      exchangeDurationMs: 15,
      promptChars: 4,
      responseChars: 0,
      errorKind: 'http_error',
      error: 'message/send returned HTTP 500: oops',
    },
  ],
};

describe('formatSummaryTable', () => {
  it('renders the aligned summary block', () => {
    const rule = '='.repeat(60);
    expect(formatSummaryTable(SUMMARY).split('\n')).toEqual([
      rule,
      'RUN SUMMARY',
      rule,
      'Dataset:           demo',
      'Tasks Attempted:   2',
      'Tasks Succeeded:   1',
      'Tasks Failed:      1',
      'Stop Reason:       exhausted',
      'Total Wall Time:   1.23s',
      'Average Latency:   12.50ms',
      'P50 Latency:       10.00ms',
      'P95 Latency:       15.00ms',
      rule,
    ]);
  });
});

describe('summaryToJson', () => {
  it('uses snake_case keys and lists each task result', () => {
    expect(summaryToJson(SUMMARY)).toEqual({
      dataset: 'demo',
      tasks_attempted: 2,
      tasks_succeeded: 1,
      tasks_failed: 1,
      stop_reason: 'exhausted',
      total_wall_time_ms: 1_234,
      mean_latency_ms: 12.5,
      p50_latency_ms: 10,
      p95_latency_ms: 15,
      results: [
        { task_id: 't1', success: true, latency_ms: 10, a2a_latency_ms: 8, prompt_chars: 4, response_chars: 4 },
        {
          task_id: 't2',
          success: false,
          latency_ms: 15,
          a2a_latency_ms: 15,
          prompt_chars: 4,
          response_chars: 0,
          error_kind: 'http_error',
          error: 'message/send returned HTTP 500: oops',
        },
      ],
    });
  });
});

describe('exitCodeFor', () => {
  it('succeeds when at least one task succeeded', () => {
    expect(exitCodeFor(SUMMARY)).toBe(0);
    expect(exitCodeFor({ ...SUMMARY, tasksSucceeded: 0, tasksFailed: 2 })).toBe(1);
    expect(exitCodeFor({ ...SUMMARY, tasksAttempted: 0, tasksSucceeded: 0, tasksFailed: 0, outcomes: [] })).toBe(1);
  });
});
