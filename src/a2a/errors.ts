import type { ExchangeErrorKind, TaskErrorKind } from '../types.js';

export const TASK_ERROR_KIND_MEANINGS: Record<TaskErrorKind, { summary: string }> = {
  timeout: { summary: 'A submit or poll call did not finish before the exchange deadline.' },
  http_error: { summary: 'Transport failure or non-2xx HTTP status from the agent endpoint.' },
  malformed_response: { summary: 'Response body is not the expected JSON-RPC envelope or carries no text.' },
  terminal_error_status: { summary: 'The agent reported a JSON-RPC error or a terminal failed task state.' },
  internal_error: { summary: 'Unexpected fault inside the runner while preparing or executing a task.' },
  dataset_fetch_error: { summary: 'The dataset provider could not load the task data.' },
};

export class ExchangeError extends Error {
  readonly kind: ExchangeErrorKind;
  readonly status?: number;

  constructor(kind: ExchangeErrorKind, message: string, opts?: { status?: number; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'ExchangeError';
    this.kind = kind;
    if (opts?.status !== undefined) {
      this.status = opts.status;
    }
  }
}

export const isExchangeError = (value: unknown): value is ExchangeError =>
  value instanceof ExchangeError;
