import type { StructuredLogEvent } from './structured-log-event.js';

import { ANSI_RESET, COLOR_BY_SEVERITY } from './logfmt.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

function formatClock(timestamp: number): string {
  const d = new Date(timestamp);
  const pad = (n: number, width = 2): string => String(n).padStart(width, '0');
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}.${pad(d.getMilliseconds(), 3)}`;
}

export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const context = [event.dataset, event.taskId].filter((part): part is string => typeof part === 'string' && part.length > 0);
  const prefix = context.length > 0 ? ` [${context.join('/')}]` : '';
  const head = `${formatClock(event.timestamp)} ${event.severity} ${event.remoteIdentifier}${prefix}`;
  let output = `${head} ${event.message}`;

  if (options.verbose === true) {
    const labels = Object.entries(event.labels).map(([key, value]) => `${key}=${value}`);
    if (labels.length > 0) output += ` (${labels.join(', ')})`;
  }
  if (options.color === true) {
    output = `${COLOR_BY_SEVERITY[event.severity]}${output}${ANSI_RESET}`;
  }

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((line) => `    ${line}`).join('\n');
    output += `\n${stackLines}`;
  }

  return output;
}
