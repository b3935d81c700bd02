import type { HttpTransport } from './a2a/transport.js';
import type { DatasetProvider } from './datasets/provider.js';
import type { TaskTelemetrySink } from './telemetry/index.js';
import type { DatasetConfig, LogSink, RunState, RunSummary, RunnerConfig } from './types.js';

import { A2AClient } from './a2a/client.js';
import { UndiciTransport } from './a2a/transport.js';
import { ConfigurationError } from './config.js';
import { JsonFileDataset } from './datasets/json-file-dataset.js';
import { RunOrchestrator } from './run-orchestrator.js';
import { TaskExecutor } from './task-executor.js';

export interface RunTasksOptions {
  dataset?: DatasetProvider;
  transport?: HttpTransport;
  telemetry?: TaskTelemetrySink;
  onLog?: LogSink;
  onStateChange?: (state: RunState) => void;
  traceA2A?: boolean;
  signal?: AbortSignal;
  now?: () => number;
}

export function createDataset(config: DatasetConfig): DatasetProvider {
  if (config.file === undefined) {
    throw new ConfigurationError(['DATASET_FILE: is required (no dataset provider supplied)']);
  }
  return new JsonFileDataset({ name: config.name, path: config.file });
}

/**
 * Wires the protocol client, task executor and orchestrator for one run and
 * returns its summary. A transport created here is closed before returning.
 */
export async function runTasks(config: RunnerConfig, options: RunTasksOptions = {}): Promise<RunSummary> {
  const dataset = options.dataset ?? createDataset(config.dataset);
  const transport = options.transport ?? new UndiciTransport({ verifyTls: config.a2a.verifyTls });
  const ownsTransport = options.transport === undefined;

  const client = new A2AClient({
    baseUrl: config.a2a.baseUrl,
    timeoutMs: config.a2a.timeoutMs,
    endpointPath: config.a2a.endpointPath,
    pollIntervalMs: config.a2a.pollIntervalMs,
    authToken: config.a2a.authToken,
    transport,
    onLog: options.onLog,
    traceA2A: options.traceA2A,
    now: options.now,
  });
  const executor = new TaskExecutor({
    client,
    dataset: dataset.name,
    baseUrl: config.a2a.baseUrl,
    timeoutMs: config.a2a.timeoutMs,
    debug: config.debug,
    telemetry: options.telemetry,
    onLog: options.onLog,
    now: options.now,
  });
  const orchestrator = new RunOrchestrator({
    dataset,
    executor,
    maxTasks: config.dataset.maxTasks,
    abortOnFailure: config.dataset.abortOnFailure,
    onLog: options.onLog,
    onStateChange: options.onStateChange,
    signal: options.signal,
    now: options.now,
  });

  options.onLog?.({
    timestamp: Date.now(),
    severity: 'VRB',
    component: 'runner',
    direction: 'request',
    remoteIdentifier: 'runner:start',
    fatal: false,
    message: `starting run on dataset '${dataset.name}' against ${config.a2a.baseUrl}`,
    dataset: dataset.name,
    details: {
      timeout_ms: config.a2a.timeoutMs,
      abort_on_failure: config.dataset.abortOnFailure,
      max_tasks: config.dataset.maxTasks ?? -1,
    },
  });

  try {
    return await orchestrator.run();
  } finally {
    if (ownsTransport) await transport.close?.();
  }
}

