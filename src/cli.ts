#!/usr/bin/env node
import fs from 'node:fs';

import { Command, Option } from 'commander';

import type { EnvSource } from './config.js';
import type { LogEntry, LogSink, TelemetryLogFormat } from './types.js';
import type { CommanderError } from 'commander';

import { UndiciTransport } from './a2a/transport.js';
import { ConfigurationError, loadRunnerConfig } from './config.js';
import { EnvFileError, resolveEnvironment } from './config-resolver.js';
import { DatasetUnavailableError } from './datasets/provider.js';
import { makeTTYLogSink } from './log-sink-tty.js';
import { runTasks } from './runner.js';
import { ShutdownController } from './shutdown-controller.js';
import { exitCodeFor, formatSummaryTable, summaryToJson } from './summary-format.js';
import { initTelemetry, shutdownTelemetry } from './telemetry/index.js';
import { buildTelemetryRuntimeConfig } from './telemetry/runtime-config.js';
import { describeError, setWarningSink } from './utils.js';
import { VERSION } from './version.js';

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

interface CliOptions {
  datasetFile?: string;
  dataset?: string;
  baseUrl?: string;
  maxTasks?: string;
  abortOnFailure?: boolean;
  timeout?: string;
  output?: string;
  envFile?: string;
  logFormat?: TelemetryLogFormat;
  verbose?: boolean;
  traceA2a?: boolean;
  verifyTls: boolean;
}

const shutdownController = new ShutdownController();

// Centralized exit path to guarantee a single, reasoned exit
let hasExited = false;
function exitWith(code: number, reason: string): never {
  try {
    process.stderr.write(`[VRB] runner EXIT: ${reason} (code=${String(code)})\n`);
  } catch { /* ignore */ }
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

const exitAndShutdown = async (code: number, reason: string, logger?: LogSink): Promise<never> => {
  try {
    await shutdownController.shutdown({ logger });
  } catch (err) {
    try { process.stderr.write(`[warn] shutdown controller failed: ${describeError(err)}\n`); } catch { /* ignore */ }
  }
  return exitWith(code, reason);
};

const defaultWarningSink = (message: string): void => {
  const prefix = '[warn] ';
  const colored = process.stderr.isTTY ? `\x1b[33m${prefix}${message}\x1b[0m` : `${prefix}${message}`;
  try { process.stderr.write(`${colored}\n`); } catch { /* ignore */ }
};

setWarningSink(defaultWarningSink);

/** CLI flags override the environment; they are applied as the variables they stand for. */
function applyCliOverrides(env: EnvSource, opts: CliOptions): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = { ...env };
  const set = (key: string, value: string | undefined): void => {
    if (value !== undefined && value.length > 0) out[key] = value;
  };
  set('A2A_BASE_URL', opts.baseUrl);
  set('DATASET_NAME', opts.dataset);
  set('DATASET_FILE', opts.datasetFile);
  set('MAX_TASKS', opts.maxTasks);
  set('A2A_TIMEOUT_SECONDS', opts.timeout);
  set('A2A_RUNNER_LOG_FORMAT', opts.logFormat);
  if (opts.abortOnFailure === true) out.ABORT_ON_FAILURE = 'true';
  if (!opts.verifyTls) out.A2A_VERIFY_TLS = 'false';
  return out;
}

function fatalEntry(message: string, remoteIdentifier: string): LogEntry {
  return {
    timestamp: Date.now(),
    severity: 'ERR',
    component: 'runner',
    direction: 'response',
    remoteIdentifier,
    fatal: true,
    message,
  };
}

async function main(opts: CliOptions): Promise<void> {
  let env: Record<string, string | undefined>;
  try {
    env = applyCliOverrides(resolveEnvironment({ env: process.env, envFile: opts.envFile }), opts);
  } catch (err) {
    if (err instanceof EnvFileError) {
      process.stderr.write(`${err.message}\n`);
      await exitAndShutdown(EXIT_FAILURE, 'env file error');
    }
    throw err;
  }

  let loaded: ReturnType<typeof loadRunnerConfig>;
  try {
    loaded = loadRunnerConfig(env);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`${err.message}\n`);
      await exitAndShutdown(EXIT_FAILURE, 'configuration error');
    }
    throw err;
  }
  const { config, resourceAttributes } = loaded;

  await initTelemetry(buildTelemetryRuntimeConfig({ telemetry: config.telemetry, resourceAttributes }));
  shutdownController.register('telemetry', async () => {
    await shutdownTelemetry();
  });

  const logSink = makeTTYLogSink({
    verbose: opts.verbose === true,
    traceA2A: opts.traceA2a === true,
    explicitFormat: config.telemetry.logging?.formats?.[0],
  });
  setWarningSink((message) => {
    logSink({
      timestamp: Date.now(),
      severity: 'WRN',
      component: 'runner',
      direction: 'response',
      remoteIdentifier: 'runner:warning',
      fatal: false,
      message,
    });
  });

  const transport = new UndiciTransport({ verifyTls: config.a2a.verifyTls });
  shutdownController.register('transport', async () => {
    await transport.close();
  });

  // First SIGINT lets the task in progress finish and prints the summary; a second one exits at once.
  const interrupt = new AbortController();
  process.on('SIGINT', () => {
    if (!interrupt.signal.aborted) {
      logSink({ ...fatalEntry('received SIGINT, stopping after the current task', 'runner:signal'), fatal: false, severity: 'WRN' });
      interrupt.abort();
      return;
    }
    logSink(fatalEntry('received second SIGINT, shutting down', 'runner:signal'));
    void exitAndShutdown(EXIT_INTERRUPTED, 'interrupted', logSink);
  });

  try {
    const summary = await runTasks(config, {
      transport,
      onLog: logSink,
      traceA2A: opts.traceA2a === true,
      signal: interrupt.signal,
    });
    process.stdout.write(`\n${formatSummaryTable(summary)}\n\n`);
    if (typeof opts.output === 'string' && opts.output.length > 0) {
      fs.writeFileSync(opts.output, `${JSON.stringify(summaryToJson(summary), null, 2)}\n`, 'utf-8');
    }
    if (summary.stopReason === 'interrupted') {
      await exitAndShutdown(EXIT_INTERRUPTED, 'interrupted', logSink);
    }
    const code = exitCodeFor(summary);
    await exitAndShutdown(code, code === EXIT_OK ? 'run completed' : 'no task succeeded', logSink);
  } catch (err) {
    const tag = err instanceof DatasetUnavailableError ? 'dataset:init' : 'runner:fatal';
    if (err instanceof ConfigurationError) {
      process.stderr.write(`${err.message}\n`);
    } else {
      logSink({ ...fatalEntry(`fatal error: ${describeError(err)}`, tag), stack: err instanceof Error ? err.stack : undefined });
    }
    await exitAndShutdown(EXIT_FAILURE, describeError(err), logSink);
  }
}

const program = new Command();

program
  .name('a2a-task-runner')
  .description('Runs dataset tasks sequentially against an A2A agent endpoint and reports latency statistics.')
  .version(VERSION)
  .option('--dataset-file <path>', 'JSON file holding the dataset tasks (DATASET_FILE)')
  .option('--dataset <name>', 'Dataset name (DATASET_NAME)')
  .option('--base-url <url>', 'A2A endpoint base URL (A2A_BASE_URL)')
  .option('--max-tasks <n>', 'Maximum number of tasks to process (MAX_TASKS)')
  .option('--abort-on-failure', 'Stop on the first failed task (ABORT_ON_FAILURE)')
  .option('--timeout <seconds>', 'Per-exchange timeout in seconds (A2A_TIMEOUT_SECONDS)')
  .option('--output <file>', 'Write the run summary as JSON to this file')
  .option('--env-file <path>', 'Read environment defaults from this file (default: ./.env when present)')
  .addOption(new Option('--log-format <format>', 'Log output format').choices(['logfmt', 'json', 'console', 'none']))
  .option('--verbose', 'Emit verbose (VRB) log lines')
  .option('--trace-a2a', 'Emit protocol-level trace (TRC) log lines')
  .option('--no-verify-tls', 'Disable TLS certificate verification (A2A_VERIFY_TLS=false)')
  .addHelpText('after', `
Environment Variables:
  A2A_BASE_URL                  A2A endpoint base URL (required)
  A2A_TIMEOUT_SECONDS           Request timeout in seconds (default: 300)
  A2A_AUTH_TOKEN                Bearer token for authentication
  A2A_VERIFY_TLS                Verify TLS certificates (default: true)
  A2A_ENDPOINT_PATH             Endpoint path (default: /v1/chat)
  A2A_POLL_INTERVAL_MS          Task poll interval (default: 500)
  DATASET_NAME                  Dataset name (required)
  DATASET_FILE                  Dataset JSON file
  MAX_TASKS                     Maximum number of tasks to process
  ABORT_ON_FAILURE              Stop on first failure (default: false)
  LOG_PROMPT / LOG_RESPONSE     Log prompt / response sizes (default: 0)
  OTEL_SERVICE_NAME             Service name for telemetry (default: a2a-task-runner)
  OTEL_EXPORTER_OTLP_ENDPOINT   OTLP gRPC exporter endpoint
  OTEL_RESOURCE_ATTRIBUTES      Additional resource attributes (k=v,k=v)
  OTEL_EXPORTER_OTLP_TIMEOUT_MS OTLP export timeout
  A2A_RUNNER_TRACES             Export traces (default: on with an OTLP endpoint)
  A2A_RUNNER_TRACE_SAMPLER      always_on | always_off | parent | ratio (default: parent)
  A2A_RUNNER_TRACE_RATIO        Sampling ratio for the ratio sampler
  A2A_RUNNER_PROMETHEUS_PORT    Serve Prometheus metrics on this port
  A2A_RUNNER_OTLP_LOGS          Also export log events over OTLP
  A2A_RUNNER_LABELS             Labels for metrics and log lines (k=v,k=v)
  A2A_RUNNER_LOG_FORMAT         logfmt | json | console | none
  A2A_RUNNER_TELEMETRY_DISABLE  Disable telemetry entirely
`)
  .action(async (opts: CliOptions) => {
    await main(opts);
  });

// Force commander to route exits through our single exit path
program.exitOverride((err: CommanderError) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    exitWith(EXIT_OK, err.code);
  }
  exitWith(err.exitCode === 0 ? EXIT_OK : EXIT_FAILURE, `commander: ${err.message}`);
});

process.on('unhandledRejection', (r) => {
  void exitAndShutdown(EXIT_FAILURE, `unhandled rejection: ${describeError(r)}`);
});

program.parseAsync().catch((err: unknown) => {
  void exitAndShutdown(EXIT_FAILURE, `fatal: ${describeError(err)}`);
});
