import { z } from 'zod';

import type { RunnerConfig, TelemetryConfig, TelemetryLogExtra, TelemetryLogFormat, TelemetryTraceSampler } from './types.js';

import { DEFAULT_ENDPOINT_PATH, DEFAULT_POLL_INTERVAL_MS } from './a2a/client.js';
import { DEFAULT_SERVICE_NAME } from './telemetry/runtime-config.js';

export type EnvSource = Readonly<Record<string, string | undefined>>;

export const DEFAULT_TIMEOUT_SECONDS = 300;

export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Configuration validation failed:\n${issues.map((issue) => `  ${issue}`).join('\n')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return fallback;
}

// Values that do not parse as an integer fall back to the default.
export function parseInteger(value: string | undefined, fallback?: number): number | undefined {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return fallback;
  return Number.parseInt(trimmed, 10);
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim().length === 0) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function optionalString(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Parses `k=v,k=v` as used by OTEL_RESOURCE_ATTRIBUTES. Malformed pairs are skipped. */
export function parseKeyValueList(value: string | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  (value ?? '').split(',').forEach((pair) => {
    const eq = pair.indexOf('=');
    if (eq <= 0) return;
    const key = pair.slice(0, eq).trim();
    const val = pair.slice(eq + 1).trim();
    if (key.length > 0) out[key] = val;
  });
  return out;
}

const HttpUrlSchema = z.string().url().refine(
  (value) => value.startsWith('http://') || value.startsWith('https://'),
  { message: 'must be an http(s) URL' },
);

const LogFormatSchema = z.enum(['logfmt', 'json', 'console', 'none']);
const TraceSamplerSchema = z.enum(['always_on', 'always_off', 'parent', 'ratio']);

const RawConfigSchema = z.object({
  baseUrl: HttpUrlSchema,
  timeoutSeconds: z.number().int().positive(),
  authToken: z.string().optional(),
  verifyTls: z.boolean(),
  endpointPath: z.string(),
  pollIntervalMs: z.number().int().positive(),
  datasetName: z.string().min(1),
  datasetFile: z.string().optional(),
  maxTasks: z.number().int().nonnegative().optional(),
  abortOnFailure: z.boolean(),
  logPrompt: z.boolean(),
  logResponse: z.boolean(),
  serviceName: z.string().min(1),
  otlpEndpoint: HttpUrlSchema.optional(),
  otlpTimeoutMs: z.number().positive().optional(),
  prometheusPort: z.number().int().min(1).max(65535).optional(),
  tracesEnabled: z.boolean(),
  traceSampler: TraceSamplerSchema,
  traceRatio: z.number().min(0).max(1).optional(),
  otlpLogs: z.boolean(),
  logFormat: LogFormatSchema.optional(),
  telemetryDisabled: z.boolean(),
});

const FIELD_TO_ENV: Record<string, string> = {
  baseUrl: 'A2A_BASE_URL',
  timeoutSeconds: 'A2A_TIMEOUT_SECONDS',
  endpointPath: 'A2A_ENDPOINT_PATH',
  pollIntervalMs: 'A2A_POLL_INTERVAL_MS',
  datasetName: 'DATASET_NAME',
  maxTasks: 'MAX_TASKS',
  serviceName: 'OTEL_SERVICE_NAME',
  otlpEndpoint: 'OTEL_EXPORTER_OTLP_ENDPOINT',
  otlpTimeoutMs: 'OTEL_EXPORTER_OTLP_TIMEOUT_MS',
  prometheusPort: 'A2A_RUNNER_PROMETHEUS_PORT',
  traceSampler: 'A2A_RUNNER_TRACE_SAMPLER',
  traceRatio: 'A2A_RUNNER_TRACE_RATIO',
  logFormat: 'A2A_RUNNER_LOG_FORMAT',
};

export interface LoadedRunnerConfig {
  config: RunnerConfig;
  resourceAttributes: Record<string, string>;
}

/**
 * Builds the runner configuration from an environment map. Every failing
 * field is reported in a single ConfigurationError.
 */
export function loadRunnerConfig(env: EnvSource): LoadedRunnerConfig {
  const otlpEndpoint = optionalString(env.OTEL_EXPORTER_OTLP_ENDPOINT);
  const timeoutSeconds = parseInteger(env.A2A_TIMEOUT_SECONDS, DEFAULT_TIMEOUT_SECONDS);
  const pollIntervalMs = parseInteger(env.A2A_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS);

  const parsed = RawConfigSchema.safeParse({
    baseUrl: optionalString(env.A2A_BASE_URL) ?? '',
    // 0 is not a usable timeout
    timeoutSeconds: timeoutSeconds === 0 ? DEFAULT_TIMEOUT_SECONDS : timeoutSeconds,
    authToken: optionalString(env.A2A_AUTH_TOKEN),
    verifyTls: parseBool(env.A2A_VERIFY_TLS, true),
    endpointPath: env.A2A_ENDPOINT_PATH ?? DEFAULT_ENDPOINT_PATH,
    pollIntervalMs: pollIntervalMs === 0 ? DEFAULT_POLL_INTERVAL_MS : pollIntervalMs,
    datasetName: optionalString(env.DATASET_NAME) ?? '',
    datasetFile: optionalString(env.DATASET_FILE),
    maxTasks: parseInteger(env.MAX_TASKS),
    abortOnFailure: parseBool(env.ABORT_ON_FAILURE, false),
    logPrompt: parseBool(env.LOG_PROMPT, false),
    logResponse: parseBool(env.LOG_RESPONSE, false),
    serviceName: optionalString(env.OTEL_SERVICE_NAME) ?? DEFAULT_SERVICE_NAME,
    otlpEndpoint,
    otlpTimeoutMs: parseNumber(env.OTEL_EXPORTER_OTLP_TIMEOUT_MS),
    prometheusPort: parseInteger(env.A2A_RUNNER_PROMETHEUS_PORT),
    tracesEnabled: parseBool(env.A2A_RUNNER_TRACES, otlpEndpoint !== undefined),
    traceSampler: optionalString(env.A2A_RUNNER_TRACE_SAMPLER)?.toLowerCase() ?? 'parent',
    traceRatio: parseNumber(env.A2A_RUNNER_TRACE_RATIO),
    otlpLogs: parseBool(env.A2A_RUNNER_OTLP_LOGS, false),
    logFormat: optionalString(env.A2A_RUNNER_LOG_FORMAT)?.toLowerCase(),
    telemetryDisabled: parseBool(env.A2A_RUNNER_TELEMETRY_DISABLE, false),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const field = issue.path.map((p) => String(p)).join('.');
      const name = FIELD_TO_ENV[field] ?? field;
      const missing = (field === 'baseUrl' || field === 'datasetName') && optionalString(env[name]) === undefined;
      return missing ? `${name}: is required` : `${name}: ${issue.message}`;
    });
    throw new ConfigurationError([...new Set(issues)]);
  }

  const raw = parsed.data;
  const telemetry = buildTelemetryConfig({
    enabled: !raw.telemetryDisabled && (raw.otlpEndpoint !== undefined || raw.prometheusPort !== undefined),
    serviceName: raw.serviceName,
    otlpEndpoint: raw.otlpEndpoint,
    otlpTimeoutMs: raw.otlpTimeoutMs,
    prometheusPort: raw.prometheusPort,
    tracesEnabled: raw.tracesEnabled,
    traceSampler: raw.traceSampler,
    traceRatio: raw.traceRatio,
    logFormat: raw.logFormat,
    otlpLogs: raw.otlpLogs,
    labels: parseKeyValueList(env.A2A_RUNNER_LABELS),
  });

  const config: RunnerConfig = {
    a2a: {
      baseUrl: raw.baseUrl,
      timeoutMs: raw.timeoutSeconds * 1000,
      authToken: raw.authToken,
      verifyTls: raw.verifyTls,
      endpointPath: raw.endpointPath,
      pollIntervalMs: raw.pollIntervalMs,
    },
    dataset: {
      name: raw.datasetName,
      file: raw.datasetFile,
      maxTasks: raw.maxTasks,
      abortOnFailure: raw.abortOnFailure,
    },
    telemetry,
    debug: {
      logPrompt: raw.logPrompt,
      logResponse: raw.logResponse,
    },
  };

  return { config, resourceAttributes: parseKeyValueList(env.OTEL_RESOURCE_ATTRIBUTES) };
}

function buildTelemetryConfig(params: {
  enabled: boolean;
  serviceName: string;
  otlpEndpoint?: string;
  otlpTimeoutMs?: number;
  prometheusPort?: number;
  tracesEnabled: boolean;
  traceSampler: TelemetryTraceSampler;
  traceRatio?: number;
  logFormat?: TelemetryLogFormat;
  otlpLogs: boolean;
  labels: Record<string, string>;
}): TelemetryConfig {
  const telemetry: TelemetryConfig = {
    enabled: params.enabled,
    serviceName: params.serviceName,
    traces: {
      enabled: params.tracesEnabled && params.otlpEndpoint !== undefined,
      sampler: params.traceSampler,
      ratio: params.traceRatio,
    },
  };
  if (params.otlpEndpoint !== undefined || params.otlpTimeoutMs !== undefined) {
    telemetry.otlp = { endpoint: params.otlpEndpoint, timeoutMs: params.otlpTimeoutMs };
  }
  if (params.prometheusPort !== undefined) {
    telemetry.prometheus = { enabled: true, port: params.prometheusPort };
  }
  if (Object.keys(params.labels).length > 0) {
    telemetry.labels = params.labels;
  }
  const extra: TelemetryLogExtra[] = params.otlpLogs && params.otlpEndpoint !== undefined ? ['otlp'] : [];
  if (params.logFormat !== undefined || extra.length > 0) {
    telemetry.logging = {};
    if (params.logFormat !== undefined) telemetry.logging.formats = [params.logFormat];
    if (extra.length > 0) telemetry.logging.extra = extra;
  }
  return telemetry;
}
