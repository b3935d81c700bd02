// Main library exports for programmatic use
export { A2AClient, buildRpcUrl, normalizeEndpointPath, resolveFromCard, DEFAULT_ENDPOINT_PATH, DEFAULT_POLL_INTERVAL_MS } from './a2a/client.js';
export { ExchangeError, TASK_ERROR_KIND_MEANINGS, isExchangeError } from './a2a/errors.js';
export { UndiciTransport } from './a2a/transport.js';
export { ConfigurationError, loadRunnerConfig } from './config.js';
export { resolveEnvironment, parseEnvFile } from './config-resolver.js';
export { InMemoryDataset } from './datasets/in-memory-dataset.js';
export { JsonFileDataset } from './datasets/json-file-dataset.js';
export { DatasetUnavailableError, TaskNotFoundError } from './datasets/provider.js';
export { LatencyAggregator } from './latency-aggregator.js';
export { buildPrompt } from './prompt-builder.js';
export { RunOrchestrator } from './run-orchestrator.js';
export { createDataset, runTasks } from './runner.js';
export { formatSummaryTable, summaryToJson } from './summary-format.js';
export { TaskExecutor } from './task-executor.js';
export { initTelemetry, shutdownTelemetry } from './telemetry/index.js';

// Type exports
export type { ExchangeClient, A2AClientOptions } from './a2a/client.js';
export type { HttpRequest, HttpResponse, HttpTransport } from './a2a/transport.js';
export type { DatasetProvider } from './datasets/provider.js';
export type { LatencySummary } from './latency-aggregator.js';
export type { RunTasksOptions } from './runner.js';
export type { TaskMetricsRecord, TaskTelemetrySink, TelemetryInitOptions, TelemetryRuntimeConfig } from './telemetry/index.js';
export type {
  A2AConfig,
  DatasetConfig,
  DebugConfig,
  EndpointResolution,
  ExchangeOutcome,
  LogEntry,
  LogSink,
  RunState,
  RunSummary,
  RunnerConfig,
  StopReason,
  TaskData,
  TaskErrorKind,
  TaskOutcome,
} from './types.js';
