import type { LogEntry, LogSink, TelemetryLogFormat } from './types.js';

import { createStructuredLogger } from './logging/structured-logger.js';
import { getTelemetryLabels } from './telemetry/index.js';

export function makeTTYLogSink(
  opts: {
    color?: boolean;
    verbose?: boolean;
    traceA2A?: boolean;
    explicitFormat?: TelemetryLogFormat;
  },
  write?: (s: string) => void
): LogSink {
  const writer = typeof write === 'function'
    ? write
    : (s: string) => {
        try {
          process.stderr.write(s);
        } catch {
          // stderr closed
        }
      };

  let formats: TelemetryLogFormat[] | undefined;
  if (opts.explicitFormat !== undefined) {
    formats = [opts.explicitFormat];
  } else if (process.stderr.isTTY) {
    // Interactive console mode - use simplified format
    formats = ['console'];
  }

  const logger = createStructuredLogger({
    formats,
    color: opts.color ?? process.stderr.isTTY,
    verbose: opts.verbose === true,
    logfmtWriter: writer,
    jsonWriter: writer,
    consoleWriter: writer,
    labels: { ...getTelemetryLabels() },
  });

  return (entry: LogEntry) => {
    if (entry.severity === 'VRB' && opts.verbose !== true) return;
    if (entry.severity === 'TRC' && opts.traceA2A !== true) return;
    logger.emit(entry);
  };
}
