import type { LogEntry, TelemetryLogFormat } from '../types.js';

import { emitTelemetryLog, getTelemetryLoggingConfig } from '../telemetry/index.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent, type BuildStructuredEventOptions } from './structured-log-event.js';

export type LogFormat = Exclude<TelemetryLogFormat, 'none'>;

export interface StructuredLoggerOptions {
  formats?: TelemetryLogFormat[];
  labels?: Record<string, string>;
  color?: boolean;
  verbose?: boolean;
  logfmtWriter?: (line: string) => void;
  jsonWriter?: (line: string) => void;
  consoleWriter?: (line: string) => void;
}

export class StructuredLogger {
  private readonly labels: Record<string, string>;
  private readonly sinks: ((event: StructuredLogEvent) => void)[] = [];
  private readonly color: boolean;
  private readonly verbose: boolean;
  readonly format: TelemetryLogFormat;

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    this.color = options.color ?? false;
    this.verbose = options.verbose ?? false;
    this.format = selectLogFormat(options.formats);

    if (this.format === 'logfmt') {
      const writer = options.logfmtWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${formatLogfmt(event, { color: this.color })}\n`);
      });
    }
    if (this.format === 'json') {
      const writer = options.jsonWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${JSON.stringify(buildJsonPayload(event))}\n`);
      });
    }
    if (this.format === 'console') {
      const writer = options.consoleWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${formatConsole(event, { color: this.color, verbose: this.verbose })}\n`);
      });
    }
  }

  emit(entry: LogEntry): void {
    const options: BuildStructuredEventOptions = { labels: this.labels };
    const event = buildStructuredLogEvent(entry, options);
    emitTelemetryLog(event);
    this.sinks.forEach((sink) => {
      sink(event);
    });
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // ignore
  }
}

function selectLogFormat(explicit?: TelemetryLogFormat[]): TelemetryLogFormat {
  if (Array.isArray(explicit) && explicit.length > 0) return explicit[0];
  const configured = getTelemetryLoggingConfig()?.formats;
  if (configured !== undefined && configured.length > 0) return configured[0];
  return 'logfmt';
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('message_id', event.messageId);
  push('component', event.component);
  push('direction', event.direction);
  push('remote', event.remoteIdentifier);
  push('dataset', event.dataset);
  push('task_id', event.taskId);
  if (event.fatal) push('fatal', true);
  push('labels', event.labels);
  push('stack', event.stack);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
