// Shared types for the task runner.

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC' | 'FIN'; // FIN for end-of-run summary
  // Which part of the runner produced the entry
  component: 'runner' | 'a2a' | 'dataset' | 'telemetry';
  direction: 'request' | 'response';
  remoteIdentifier: string;             // 'a2a:message/send', 'runner:summary', 'dataset:<name>'
  fatal: boolean;                       // True if this ended the run
  message: string;                      // Human readable message
  taskId?: string;
  dataset?: string;
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export type LogSink = (entry: LogEntry) => void;

export type TelemetryLogFormat = 'logfmt' | 'json' | 'console' | 'none';
export type TelemetryLogExtra = 'otlp';
export type TelemetryTraceSampler = 'always_on' | 'always_off' | 'parent' | 'ratio';

export interface TelemetryConfig {
  enabled?: boolean;
  serviceName?: string;
  otlp?: { endpoint?: string; timeoutMs?: number };
  prometheus?: { enabled?: boolean; host?: string; port?: number };
  labels?: Record<string, string>;
  traces?: { enabled?: boolean; sampler?: TelemetryTraceSampler; ratio?: number };
  logging?: {
    formats?: TelemetryLogFormat[];
    extra?: TelemetryLogExtra[];
    otlp?: { endpoint?: string; timeoutMs?: number };
  };
}

export interface A2AConfig {
  baseUrl: string;
  timeoutMs: number;
  authToken?: string;
  verifyTls: boolean;
  endpointPath: string;
  pollIntervalMs: number;
}

export interface DatasetConfig {
  name: string;
  file?: string;
  maxTasks?: number;
  abortOnFailure: boolean;
}

export interface DebugConfig {
  logPrompt: boolean;
  logResponse: boolean;
}

/** Complete runner configuration, built once at startup and passed down by reference. */
export interface RunnerConfig {
  a2a: A2AConfig;
  dataset: DatasetConfig;
  telemetry: TelemetryConfig;
  debug: DebugConfig;
}

export interface TaskData {
  id: string;
  instruction: string;
  supervisor?: string | Record<string, unknown>;
  appDescriptions?: Record<string, string>;
}

export type ExchangeErrorKind =
  | 'timeout'
  | 'http_error'
  | 'malformed_response'
  | 'terminal_error_status';

export type TaskErrorKind = ExchangeErrorKind | 'internal_error' | 'dataset_fetch_error';

export type ExchangeOutcome =
  | { ok: true; responseText: string; durationMs: number }
  | { ok: false; errorKind: TaskErrorKind; message: string; durationMs: number };

export type EndpointSource = 'card' | 'card_base' | 'fallback';

export interface EndpointResolution {
  url: string;
  source: EndpointSource;
}

export interface TaskOutcome {
  taskId: string;
  ok: boolean;
  durationMs: number;           // end-to-end task latency
  exchangeDurationMs: number;   // 0 when the exchange never started
  promptChars: number;
  responseChars: number;        // 0 on failure
  errorKind?: TaskErrorKind;
  error?: string;
}

export type RunState = 'idle' | 'dataset_fetch' | 'executing' | 'recorded' | 'stopped';

export type StopReason = 'exhausted' | 'max_tasks' | 'aborted' | 'interrupted' | 'dataset_error';

export interface RunSummary {
  dataset: string;
  tasksAttempted: number;
  tasksSucceeded: number;
  tasksFailed: number;
  totalWallTimeMs: number;
  meanLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  stopReason: StopReason;
  outcomes: readonly TaskOutcome[];
}
