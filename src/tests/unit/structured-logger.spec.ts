import { describe, expect, it } from 'vitest';

import type { LogEntry } from '../../types.js';

import { formatConsole } from '../../logging/console-format.js';
import { formatLogfmt } from '../../logging/logfmt.js';
import { resolveMessageId } from '../../logging/message-ids.js';
import { buildStructuredLogEvent } from '../../logging/structured-log-event.js';
import { StructuredLogger } from '../../logging/structured-logger.js';
import { makeTTYLogSink } from '../../log-sink-tty.js';

const TS = 1_700_000_000_000;
const ISO = '2023-11-14T22:13:20.000Z';
const TASK_MESSAGE_ID = 'a7c2e914-2b5d-4c8a-8f13-6e0d9b4a1c27';

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: TS,
    severity: 'ERR',
    component: 'runner',
    direction: 'response',
    remoteIdentifier: 'runner:task',
    fatal: false,
    message: 'task t2 failed (timeout): took "too" long',
    taskId: 't2',
    dataset: 'demo',
    ...overrides,
  };
}

describe('buildStructuredLogEvent', () => {
  it('merges labels with details and skips reserved keys', () => {
    const event = buildStructuredLogEvent(
      entry({ details: { attempt: 2, retry: false, component: 'shadow', note: '' } }),
      { labels: { env: 'ci', dataset: 'shadow' } },
    );
    expect(event.labels).toEqual({ env: 'ci', attempt: '2', retry: 'false' });
    expect(event.priority).toBe(3);
    expect(event.isoTimestamp).toBe(ISO);
    expect(event.messageId).toBe(TASK_MESSAGE_ID);
  });

  it('does not let details override configured labels', () => {
    const event = buildStructuredLogEvent(entry({ details: { env: 'prod' } }), { labels: { env: 'ci' } });
    expect(event.labels).toEqual({ env: 'ci' });
  });
});

describe('resolveMessageId', () => {
  it('falls back to the identifier prefix', () => {
    expect(resolveMessageId(entry({ remoteIdentifier: 'dataset:init:sample' }))).toBe('92e6b1f4-3d0a-4c75-8e2b-b7f5a1d9c463');
    expect(resolveMessageId(entry({ remoteIdentifier: 'a2a:message/send' }))).toBeUndefined();
    expect(resolveMessageId(entry({ remoteIdentifier: '  ' }))).toBeUndefined();
  });
});

describe('formatLogfmt', () => {
  it('renders fields in a fixed order with the message last', () => {
    const line = formatLogfmt(buildStructuredLogEvent(entry({ details: { attempt: 2 } }), { labels: { env: 'ci' } }));
    expect(line).toBe(
      `ts=${ISO} level=err priority=3 component=runner direction=response message_id=${TASK_MESSAGE_ID} `
      + 'remote=runner:task dataset=demo task_id=t2 env=ci attempt=2 '
      + 'message="task t2 failed (timeout): took \\"too\\" long"',
    );
  });

  it('flattens newlines and marks fatal entries', () => {
    const line = formatLogfmt(buildStructuredLogEvent(entry({
      severity: 'VRB',
      remoteIdentifier: 'custom:event',
      fatal: true,
      message: 'a\nb',
      taskId: undefined,
      dataset: undefined,
    })));
    expect(line).toBe(`ts=${ISO} level=vrb priority=6 component=runner direction=response remote=custom:event fatal=true message=a\\nb`);
  });

  it('wraps colored output in the severity color', () => {
    const line = formatLogfmt(buildStructuredLogEvent(entry({ severity: 'WRN' })), { color: true });
    expect(line.startsWith('\u001B[33mts=')).toBe(true);
    expect(line.endsWith('\u001B[0m')).toBe(true);
  });
});

describe('formatConsole', () => {
  it('prints a compact line with context and an indented stack for errors', () => {
    const text = formatConsole(buildStructuredLogEvent(entry({ stack: 'Error: boom\n    at run' })));
    const [first, ...rest] = text.split('\n');
    expect(first).toMatch(/^\d{2}:\d{2}:\d{2}\.\d{3} ERR runner:task \[demo\/t2\] task t2 failed \(timeout\): took "too" long$/);
    expect(rest).toEqual(['    Error: boom', '        at run']);
  });

  it('appends labels only when verbose', () => {
    const event = buildStructuredLogEvent(entry({ severity: 'FIN', message: 'done' }), { labels: { env: 'ci' } });
    expect(formatConsole(event).endsWith(' done')).toBe(true);
    expect(formatConsole(event, { verbose: true }).endsWith(' done (env=ci)')).toBe(true);
  });
});

describe('StructuredLogger', () => {
  it('writes one JSON object per entry', () => {
    const lines: string[] = [];
    const logger = new StructuredLogger({ formats: ['json'], labels: { env: 'ci' }, jsonWriter: (line) => { lines.push(line); } });
    logger.emit(entry({ fatal: true }));

    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith('\n')).toBe(true);
    const parsed: unknown = JSON.parse(lines[0]);
    expect(parsed).toEqual({
      ts: ISO,
      timestamp: TS,
      severity: 'ERR',
      level: 'err',
      priority: 3,
      message_id: TASK_MESSAGE_ID,
      component: 'runner',
      direction: 'response',
      remote: 'runner:task',
      dataset: 'demo',
      task_id: 't2',
      fatal: true,
      labels: { env: 'ci' },
      message: 'task t2 failed (timeout): took "too" long',
    });
  });

  it('defaults to logfmt and writes nothing for none', () => {
    const lines: string[] = [];
    const write = (line: string): void => { lines.push(line); };
    expect(new StructuredLogger({ logfmtWriter: write }).format).toBe('logfmt');

    const silent = new StructuredLogger({ formats: ['none'], logfmtWriter: write, jsonWriter: write, consoleWriter: write });
    silent.emit(entry());
    expect(lines).toEqual([]);
  });
});

describe('makeTTYLogSink', () => {
  it('drops verbose and trace entries unless enabled', () => {
    const lines: string[] = [];
    const sink = makeTTYLogSink({ explicitFormat: 'logfmt', color: false }, (line) => { lines.push(line); });
    sink(entry({ severity: 'VRB', message: 'hidden' }));
    sink(entry({ severity: 'TRC', message: 'hidden' }));
    sink(entry({ severity: 'WRN', message: 'shown' }));
    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith('message=shown\n')).toBe(true);
  });

  it('passes verbose and trace entries when asked to', () => {
    const lines: string[] = [];
    const sink = makeTTYLogSink({ explicitFormat: 'logfmt', color: false, verbose: true, traceA2A: true }, (line) => { lines.push(line); });
    sink(entry({ severity: 'VRB', message: 'one' }));
    sink(entry({ severity: 'TRC', message: 'two' }));
    expect(lines.map((line) => line.slice(line.indexOf('level=') + 6, line.indexOf(' priority')))).toEqual(['vrb', 'trc']);
  });
});
