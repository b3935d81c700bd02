import { trace as otelTrace, SpanStatusCode } from '@opentelemetry/api';
import { logs as otelLogs } from '@opentelemetry/api-logs';

import { VERSION as PACKAGE_VERSION } from '../version.js';

import type { StructuredLogEvent } from '../logging/structured-log-event.js';
import type { TaskErrorKind, TelemetryLogExtra, TelemetryLogFormat, TelemetryTraceSampler } from '../types.js';
import type { Attributes, Span, SpanKind } from '@opentelemetry/api';
import type * as OtelApi from '@opentelemetry/api';
import type * as OtelLogsApi from '@opentelemetry/api-logs';
import type * as OtelCore from '@opentelemetry/core';
import type * as OtelLogsOtlp from '@opentelemetry/exporter-logs-otlp-grpc';
import type * as OtelOtlp from '@opentelemetry/exporter-metrics-otlp-grpc';
import type * as OtelProm from '@opentelemetry/exporter-prometheus';
import type * as OtelTraceOtlp from '@opentelemetry/exporter-trace-otlp-grpc';
import type * as OtelResources from '@opentelemetry/resources';
import type * as OtelLogs from '@opentelemetry/sdk-logs';
import type * as OtelMetrics from '@opentelemetry/sdk-metrics';
import type * as OtelTraceBase from '@opentelemetry/sdk-trace-base';
import type * as OtelTrace from '@opentelemetry/sdk-trace-node';

export interface TelemetryRuntimeTracesConfig {
  enabled: boolean;
  sampler: TelemetryTraceSampler;
  ratio?: number;
}

export interface TelemetryRuntimeLoggingConfig {
  formats?: TelemetryLogFormat[];
  extra?: TelemetryLogExtra[];
  otlpEndpoint?: string;
  otlpTimeoutMs?: number;
}

export interface TelemetryRuntimeConfig {
  enabled: boolean;
  serviceName: string;
  otlpEndpoint?: string;
  otlpTimeoutMs?: number;
  prometheus?: {
    enabled?: boolean;
    host?: string;
    port?: number;
  };
  labels?: Record<string, string>;
  resourceAttributes?: Record<string, string>;
  traces?: TelemetryRuntimeTracesConfig;
  logging?: TelemetryRuntimeLoggingConfig;
}

export interface TaskMetricsRecord {
  taskId: string;
  dataset: string;
  status: 'success' | 'failed';
  errorKind?: TaskErrorKind;
  latencyMs: number;
  exchangeLatencyMs: number;
  promptChars: number;
  responseChars: number;
}

/** Metric hooks the task executor reports through. */
export interface TaskTelemetrySink {
  recordTask: (record: TaskMetricsRecord) => void;
  inFlight: (delta: 1 | -1) => void;
}

interface TelemetryRecorder {
  recordTaskMetrics: (record: TaskMetricsRecord) => void;
  recordError: (errorType: string) => void;
  recordInFlight: (delta: number) => void;
  shutdown: () => Promise<void>;
}

class NoopRecorder implements TelemetryRecorder {
  recordTaskMetrics = (_record: TaskMetricsRecord): void => { /* noop */ };

  recordError = (_errorType: string): void => { /* noop */ };

  recordInFlight = (_delta: number): void => { /* noop */ };

  shutdown = async (): Promise<void> => {
    // noop
  };
}


export const TRACER_NAME = 'a2a-task-runner';
const METER_NAME = 'a2a-task-runner';

let recorder: TelemetryRecorder = new NoopRecorder();
let globalLabels: Record<string, string> = {};
let tracerProvider: OtelTrace.NodeTracerProvider | undefined;
let activeLoggingConfig: TelemetryRuntimeLoggingConfig | undefined;
let logProvider: OtelLogs.LoggerProvider | undefined;
let logEmitter: ((event: StructuredLogEvent) => void) | undefined;

export function getTelemetryLabels(): Record<string, string> {
  return { ...globalLabels };
}

export function getTelemetryLoggingConfig(): TelemetryRuntimeLoggingConfig | undefined {
  if (activeLoggingConfig === undefined) return undefined;
  const cloned: TelemetryRuntimeLoggingConfig = {};
  if (activeLoggingConfig.formats !== undefined) cloned.formats = [...activeLoggingConfig.formats];
  if (activeLoggingConfig.extra !== undefined) cloned.extra = [...activeLoggingConfig.extra];
  if (typeof activeLoggingConfig.otlpEndpoint === 'string') cloned.otlpEndpoint = activeLoggingConfig.otlpEndpoint;
  if (typeof activeLoggingConfig.otlpTimeoutMs === 'number') cloned.otlpTimeoutMs = activeLoggingConfig.otlpTimeoutMs;
  return cloned;
}

/** In-process readers and processors, used by tests and embedders in place of network exporters. */
export interface TelemetryInitOptions {
  metricReaders?: MetricReader[];
  // Replaces the OTLP log processor and enables log export on its own.
  logProcessors?: OtelLogs.LogRecordProcessor[];
}

export async function initTelemetry(config: TelemetryRuntimeConfig, options: TelemetryInitOptions = {}): Promise<void> {
  globalLabels = { ...(config.labels ?? {}) };
  activeLoggingConfig = cloneLoggingConfig(config.logging);

  const enableMetrics = config.enabled;
  const enablePrometheus = enableMetrics && Boolean(config.prometheus?.enabled);
  const enableTraces = enableMetrics && Boolean(config.traces?.enabled);
  const enableLogExporter = config.enabled
    && ((activeLoggingConfig?.extra?.includes('otlp') ?? false) || options.logProcessors !== undefined);

  if (!enableMetrics) {
    await shutdownTelemetry();
    return;
  }

  const otel = await loadOtelDependencies(enablePrometheus);

  otel.diag.setLogger(new otel.DiagConsoleLogger(), otel.DiagLogLevel.ERROR);

  const resourceAttrs: Record<string, string> = {
    ...(config.resourceAttributes ?? {}),
    [otel.serviceNameAttribute]: config.serviceName,
    [otel.serviceVersionAttribute]: PACKAGE_VERSION,
  };
  Object.entries(globalLabels).forEach(([key, value]) => {
    resourceAttrs[`telemetry.label.${key}`] = value;
  });
  const resource = otel.resourceFromAttributes(resourceAttrs);

  const exporterOptions: Record<string, unknown> = {};
  if (typeof config.otlpEndpoint === 'string' && config.otlpEndpoint.length > 0) {
    exporterOptions.url = config.otlpEndpoint;
  }
  if (typeof config.otlpTimeoutMs === 'number' && Number.isFinite(config.otlpTimeoutMs)) {
    exporterOptions.timeoutMillis = config.otlpTimeoutMs;
  }
  const readers: MetricReader[] = [...(options.metricReaders ?? [])];
  if (typeof config.otlpEndpoint === 'string' && config.otlpEndpoint.length > 0) {
    const otlpExporter = new otel.OTLPMetricExporter(exporterOptions);
    wrapMetricExporter(otlpExporter, otel);
    readers.push(new otel.PeriodicExportingMetricReader({
      exporter: otlpExporter,
      exportIntervalMillis: 5000,
      exportTimeoutMillis: config.otlpTimeoutMs ?? 2000,
    }));
  }
  let prometheusExporter: PrometheusExporter | undefined;
  if (enablePrometheus && otel.PrometheusExporter !== undefined) {
    prometheusExporter = new otel.PrometheusExporter({
      host: config.prometheus?.host ?? '127.0.0.1',
      port: config.prometheus?.port ?? 9464,
    });
    await prometheusExporter.startServer();
    // exporter-prometheus may resolve its own sdk-metrics copy; the reader contract is the same.
    readers.push(prometheusExporter as unknown as MetricReader);
  }

  const meterProvider = new otel.MeterProvider({ resource, readers });
  const meter = meterProvider.getMeter(METER_NAME, PACKAGE_VERSION);
  const recorderImpl = new OtelMetricsRecorder({
    meterProvider,
    meter,
    prometheusExporter,
    globalLabels,
  });

  await recorder.shutdown();
  recorder = recorderImpl;

  await shutdownTracing();
  if (enableTraces) {
    setupTracing(otel, resource, config);
  }

  if (enableLogExporter) {
    await setupLogExporter(otel, resource, config, options.logProcessors);
  } else {
    await shutdownLogExporter();
  }
}

export async function shutdownTelemetry(): Promise<void> {
  await recorder.shutdown();
  recorder = new NoopRecorder();
  await shutdownTracing();
  await shutdownLogExporter();
}

export function recordTaskMetrics(record: TaskMetricsRecord): void {
  recorder.recordTaskMetrics(record);
}

export function recordDiscoveryFailure(): void {
  recorder.recordError('discovery_failure');
}

export function recordInFlight(delta: 1 | -1): void {
  recorder.recordInFlight(delta);
}

export const defaultTaskTelemetry: TaskTelemetrySink = {
  recordTask: recordTaskMetrics,
  inFlight: recordInFlight,
};

export function emitTelemetryLog(event: StructuredLogEvent): void {
  if (logEmitter !== undefined) {
    try {
      logEmitter(event);
    } catch {
      // logging sinks must not throw
    }
  }
}

function cloneLoggingConfig(config?: TelemetryRuntimeLoggingConfig): TelemetryRuntimeLoggingConfig | undefined {
  if (config === undefined) return undefined;
  const clone: TelemetryRuntimeLoggingConfig = {};
  if (Array.isArray(config.formats) && config.formats.length > 0) clone.formats = [...config.formats];
  if (Array.isArray(config.extra) && config.extra.length > 0) clone.extra = [...config.extra];
  if (typeof config.otlpEndpoint === 'string' && config.otlpEndpoint.length > 0) clone.otlpEndpoint = config.otlpEndpoint;
  if (
    typeof config.otlpTimeoutMs === 'number'
    && Number.isFinite(config.otlpTimeoutMs)
    && config.otlpTimeoutMs > 0
  ) {
    clone.otlpTimeoutMs = config.otlpTimeoutMs;
  }
  return Object.keys(clone).length > 0 ? clone : undefined;
}

async function setupLogExporter(
  otel: OtelDependencies,
  resource: OtelResource,
  config: TelemetryRuntimeConfig,
  processors?: OtelLogs.LogRecordProcessor[],
): Promise<void> {
  await shutdownLogExporter();

  const provider = new otel.LoggerProvider({
    resource,
    processors: processors ?? [createOtlpLogProcessor(otel, config)],
  });
  installLogProvider(otel, provider);
}

function createOtlpLogProcessor(otel: OtelDependencies, config: TelemetryRuntimeConfig): OtelLogs.LogRecordProcessor {
  const loggingEndpoint = activeLoggingConfig?.otlpEndpoint ?? config.otlpEndpoint;
  const loggingTimeout = activeLoggingConfig?.otlpTimeoutMs ?? config.otlpTimeoutMs;

  const exporterOptions: Record<string, unknown> = {};
  if (typeof loggingEndpoint === 'string' && loggingEndpoint.length > 0) {
    exporterOptions.url = loggingEndpoint;
  }
  if (typeof loggingTimeout === 'number' && Number.isFinite(loggingTimeout)) {
    exporterOptions.timeoutMillis = loggingTimeout;
  }

  const exporter = new otel.OTLPLogExporter(exporterOptions);
  wrapLogExporter(exporter, otel);
  return new otel.BatchLogRecordProcessor(exporter, {
    scheduledDelayMillis: 200,
    exportTimeoutMillis: loggingTimeout ?? 2000,
  });
}

function installLogProvider(otel: OtelDependencies, provider: OtelLogs.LoggerProvider): void {
  otelLogs.setGlobalLoggerProvider(provider);
  const logger = provider.getLogger(TRACER_NAME);

  const severityMap = otel.SeverityNumber;
  logProvider = provider;
  logEmitter = (event) => {
    try {
      logger.emit({
        body: event.message,
        severityText: event.severity,
        severityNumber: mapSeverityNumber(event.severity, severityMap),
        timestamp: otel.millisToHrTime(event.timestamp),
        attributes: buildLogAttributes(event),
      });
    } catch {
      // drop log on exporter failure
    }
  };
}

async function shutdownLogExporter(): Promise<void> {
  if (logProvider !== undefined) {
    try {
      await logProvider.shutdown();
    } catch {
      // ignore shutdown errors
    }
    logProvider = undefined;
  }
  logEmitter = undefined;
  try {
    otelLogs.disable();
  } catch {
    // ignore disable errors
  }
}

function wrapLogExporter(
  exporter: InstanceType<OtelDependencies['OTLPLogExporter']>,
  deps: OtelDependencies,
): void {
  const originalExport = exporter.export.bind(exporter);
  exporter.export = (records, callback) => {
    const wrapped = (result: OtelCore.ExportResult) => {
      if (result.code === deps.ExportResultCode.FAILED) {
        deps.diag.error('OTLP log export failed (dropping batch)');
      }
      callback(result);
    };
    originalExport(records, wrapped);
  };
}

function mapSeverityNumber(
  severity: StructuredLogEvent['severity'],
  severityEnum: OtelDependencies['SeverityNumber'],
): OtelLogsApi.SeverityNumber {
  switch (severity) {
    case 'ERR':
      return severityEnum.ERROR;
    case 'WRN':
      return severityEnum.WARN;
    case 'FIN':
      return severityEnum.INFO;
    case 'TRC':
      return severityEnum.TRACE;
    case 'VRB':
    default:
      return severityEnum.DEBUG;
  }
}

function buildLogAttributes(event: StructuredLogEvent): OtelLogsApi.AnyValueMap {
  const attributes: OtelLogsApi.AnyValueMap = {
    component: event.component,
    direction: event.direction,
    priority: event.priority,
    severity: event.severity,
    ts: event.isoTimestamp,
    remote: event.remoteIdentifier,
  };
  if (event.messageId !== undefined) attributes.message_id = event.messageId;
  if (typeof event.taskId === 'string') attributes.task_id = event.taskId;
  if (typeof event.dataset === 'string') attributes.dataset = event.dataset;
  Object.entries(event.labels).forEach(([key, value]) => {
    attributes[`label.${key}`] = value;
  });
  return attributes;
}

type Meter = OtelApi.Meter;
type MeterProvider = OtelMetrics.MeterProvider;
type MetricReader = OtelMetrics.MetricReader;
type PrometheusExporter = OtelProm.PrometheusExporter;

type CounterInstrument = ReturnType<Meter['createCounter']>;
type HistogramInstrument = ReturnType<Meter['createHistogram']>;
type UpDownCounterInstrument = ReturnType<Meter['createUpDownCounter']>;

interface OtelDependencies {
  diag: OtelApi.DiagAPI;
  DiagConsoleLogger: typeof OtelApi.DiagConsoleLogger;
  DiagLogLevel: typeof OtelApi.DiagLogLevel;
  MeterProvider: typeof OtelMetrics.MeterProvider;
  PeriodicExportingMetricReader: typeof OtelMetrics.PeriodicExportingMetricReader;
  OTLPMetricExporter: typeof OtelOtlp.OTLPMetricExporter;
  PrometheusExporter?: typeof OtelProm.PrometheusExporter;
  resourceFromAttributes: typeof OtelResources.resourceFromAttributes;
  serviceNameAttribute: string;
  serviceVersionAttribute: string;
  ExportResultCode: typeof OtelCore.ExportResultCode;
  millisToHrTime: typeof OtelCore.millisToHrTime;
  NodeTracerProvider: typeof OtelTrace.NodeTracerProvider;
  BatchSpanProcessor: typeof OtelTrace.BatchSpanProcessor;
  ParentBasedSampler: typeof OtelTraceBase.ParentBasedSampler;
  TraceIdRatioBasedSampler: typeof OtelTraceBase.TraceIdRatioBasedSampler;
  AlwaysOnSampler: typeof OtelTraceBase.AlwaysOnSampler;
  AlwaysOffSampler: typeof OtelTraceBase.AlwaysOffSampler;
  OTLPTraceExporter: typeof OtelTraceOtlp.OTLPTraceExporter;
  LoggerProvider: typeof OtelLogs.LoggerProvider;
  BatchLogRecordProcessor: typeof OtelLogs.BatchLogRecordProcessor;
  OTLPLogExporter: typeof OtelLogsOtlp.OTLPLogExporter;
  SeverityNumber: typeof OtelLogsApi.SeverityNumber;
}

type OtelResource = ReturnType<OtelDependencies['resourceFromAttributes']>;

// SDK packages load only when telemetry is enabled.
async function loadOtelDependencies(includePrometheus: boolean): Promise<OtelDependencies> {
  const apiModule = await import('@opentelemetry/api');
  const metricsModule = await import('@opentelemetry/sdk-metrics');
  const metricExporterModule = await import('@opentelemetry/exporter-metrics-otlp-grpc');
  const resourcesModule = await import('@opentelemetry/resources');
  const semanticModule = await import('@opentelemetry/semantic-conventions');
  const coreModule = await import('@opentelemetry/core');
  const logsModule = await import('@opentelemetry/sdk-logs');
  const logExporterModule = await import('@opentelemetry/exporter-logs-otlp-grpc');
  const logsApiModule = await import('@opentelemetry/api-logs');
  const promModule = includePrometheus
    ? await import('@opentelemetry/exporter-prometheus')
    : undefined;
  const traceNodeModule = await import('@opentelemetry/sdk-trace-node');
  const traceBaseModule = await import('@opentelemetry/sdk-trace-base');
  const traceExporterModule = await import('@opentelemetry/exporter-trace-otlp-grpc');

  return {
    diag: apiModule.diag,
    DiagConsoleLogger: apiModule.DiagConsoleLogger,
    DiagLogLevel: apiModule.DiagLogLevel,
    MeterProvider: metricsModule.MeterProvider,
    PeriodicExportingMetricReader: metricsModule.PeriodicExportingMetricReader,
    OTLPMetricExporter: metricExporterModule.OTLPMetricExporter,
    PrometheusExporter: promModule?.PrometheusExporter,
    resourceFromAttributes: resourcesModule.resourceFromAttributes,
    serviceNameAttribute: semanticModule.ATTR_SERVICE_NAME,
    serviceVersionAttribute: semanticModule.ATTR_SERVICE_VERSION,
    ExportResultCode: coreModule.ExportResultCode,
    millisToHrTime: coreModule.millisToHrTime,
    NodeTracerProvider: traceNodeModule.NodeTracerProvider,
    BatchSpanProcessor: traceNodeModule.BatchSpanProcessor,
    ParentBasedSampler: traceBaseModule.ParentBasedSampler,
    TraceIdRatioBasedSampler: traceBaseModule.TraceIdRatioBasedSampler,
    AlwaysOnSampler: traceBaseModule.AlwaysOnSampler,
    AlwaysOffSampler: traceBaseModule.AlwaysOffSampler,
    OTLPTraceExporter: traceExporterModule.OTLPTraceExporter,
    LoggerProvider: logsModule.LoggerProvider,
    BatchLogRecordProcessor: logsModule.BatchLogRecordProcessor,
    OTLPLogExporter: logExporterModule.OTLPLogExporter,
    SeverityNumber: logsApiModule.SeverityNumber,
  };
}

function wrapMetricExporter(exporter: InstanceType<OtelDependencies['OTLPMetricExporter']>, deps: OtelDependencies): void {
  const originalExport = exporter.export.bind(exporter);
  exporter.export = (metrics, resultCallback) => {
    const wrapped = (result: OtelCore.ExportResult) => {
      if (result.code === deps.ExportResultCode.FAILED) {
        deps.diag.error('OTLP metric export failed (dropping batch)');
      }
      resultCallback(result);
    };
    originalExport(metrics, wrapped);
  };
}

class OtelMetricsRecorder implements TelemetryRecorder {
  private readonly meterProvider: MeterProvider;
  private readonly prometheusExporter?: PrometheusExporter;
  private readonly labels: Record<string, string>;
  private readonly tasks: CounterInstrument;
  private readonly errors: CounterInstrument;
  private readonly taskLatency: HistogramInstrument;
  private readonly exchangeLatency: HistogramInstrument;
  private readonly promptSize: HistogramInstrument;
  private readonly responseSize: HistogramInstrument;
  private readonly inflight: UpDownCounterInstrument;

  constructor(params: {
    meterProvider: MeterProvider;
    meter: Meter;
    prometheusExporter?: PrometheusExporter;
    globalLabels: Record<string, string>;
  }) {
    this.meterProvider = params.meterProvider;
    this.prometheusExporter = params.prometheusExporter;
    this.labels = params.globalLabels;
    const { meter } = params;

    this.tasks = meter.createCounter('a2a_runner_tasks_total', { description: 'Total number of tasks processed', unit: '1' });
    this.errors = meter.createCounter('a2a_runner_errors_total', { description: 'Total number of errors by kind', unit: '1' });
    this.taskLatency = meter.createHistogram('a2a_runner_task_latency_ms', { description: 'Task processing latency (milliseconds)', unit: 'ms' });
    this.exchangeLatency = meter.createHistogram('a2a_runner_a2a_latency_ms', { description: 'A2A exchange latency (milliseconds)', unit: 'ms' });
    this.promptSize = meter.createHistogram('a2a_runner_prompt_size_chars', { description: 'Prompt size in characters', unit: 'chars' });
    this.responseSize = meter.createHistogram('a2a_runner_response_size_chars', { description: 'Response size in characters', unit: 'chars' });
    this.inflight = meter.createUpDownCounter('a2a_runner_inflight_tasks', { description: 'Tasks currently in flight (0 or 1)', unit: '1' });
  }

  recordTaskMetrics(record: TaskMetricsRecord): void {
    const labels = buildLabelSet({ dataset: record.dataset, status: record.status }, this.labels);
    this.tasks.add(1, labels);
    this.taskLatency.record(nonNegative(record.latencyMs), labels);
    this.exchangeLatency.record(nonNegative(record.exchangeLatencyMs), labels);
    this.promptSize.record(nonNegative(record.promptChars), labels);
    this.responseSize.record(nonNegative(record.responseChars), labels);
    if (record.status === 'failed') {
      this.errors.add(1, { ...labels, error_type: record.errorKind ?? 'unknown' });
    }
  }

  recordError(errorType: string): void {
    this.errors.add(1, buildLabelSet({ error_type: errorType }, this.labels));
  }

  recordInFlight(delta: number): void {
    this.inflight.add(delta, buildLabelSet({}, this.labels));
  }

  async shutdown(): Promise<void> {
    const promises: Promise<unknown>[] = [this.meterProvider.shutdown()];
    if (this.prometheusExporter !== undefined) {
      promises.push(this.prometheusExporter.stopServer());
    }
    await Promise.allSettled(promises);
  }
}

function setupTracing(
  otel: OtelDependencies,
  resource: OtelResource,
  config: TelemetryRuntimeConfig,
): void {
  if (config.traces?.enabled !== true) return;

  const exporterOptions: Record<string, unknown> = {};
  if (typeof config.otlpEndpoint === 'string' && config.otlpEndpoint.length > 0) {
    exporterOptions.url = config.otlpEndpoint;
  }
  if (typeof config.otlpTimeoutMs === 'number' && Number.isFinite(config.otlpTimeoutMs)) {
    exporterOptions.timeoutMillis = config.otlpTimeoutMs;
  }
  const exporter = new otel.OTLPTraceExporter(exporterOptions);

  const spanProcessor = new otel.BatchSpanProcessor(exporter, {
    scheduledDelayMillis: 200,
    exportTimeoutMillis: config.otlpTimeoutMs ?? 2000,
  });
  const sampler = createSampler(otel, config.traces);
  const provider = new otel.NodeTracerProvider({
    resource,
    sampler,
    spanProcessors: [spanProcessor],
  });

  provider.register();
  tracerProvider = provider;
}

async function shutdownTracing(): Promise<void> {
  if (tracerProvider === undefined) return;
  try {
    await tracerProvider.shutdown();
  } catch {
    // ignore shutdown errors
  }
  tracerProvider = undefined;
  try {
    otelTrace.disable();
  } catch {
    // ignore disable errors
  }
}

function createSampler(otel: OtelDependencies, config: TelemetryRuntimeTracesConfig): OtelTraceBase.Sampler {
  switch (config.sampler) {
    case 'always_off':
      return new otel.AlwaysOffSampler();
    case 'always_on':
      return new otel.AlwaysOnSampler();
    case 'ratio': {
      const ratio = Math.min(Math.max(config.ratio ?? 0.1, 0), 1);
      return new otel.ParentBasedSampler({ root: new otel.TraceIdRatioBasedSampler(ratio) });
    }
    case 'parent':
    default:
      return new otel.ParentBasedSampler({ root: new otel.AlwaysOnSampler() });
  }
}

export interface RunWithSpanOptions {
  attributes?: Attributes;
  kind?: SpanKind;
}

export function runWithSpan<T>(name: string, fn: (span: Span) => Promise<T> | T): Promise<T>;
export function runWithSpan<T>(name: string, options: RunWithSpanOptions, fn: (span: Span) => Promise<T> | T): Promise<T>;
export function runWithSpan<T>(
  name: string,
  optionsOrFn: RunWithSpanOptions | ((span: Span) => Promise<T> | T),
  maybeFn?: (span: Span) => Promise<T> | T,
): Promise<T> {
  const options: RunWithSpanOptions = typeof optionsOrFn === 'function' ? {} : optionsOrFn;
  const handler: (span: Span) => Promise<T> | T = typeof optionsOrFn === 'function'
    ? optionsOrFn
    : (() => {
        if (maybeFn === undefined) {
          throw new Error('runWithSpan requires a callback');
        }
        return maybeFn;
      })();
  const tracer = otelTrace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, {
    kind: options.kind,
    attributes: options.attributes,
  }, async (span) => {
    try {
      return await handler(span);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}

function buildLabelSet(
  base: Record<string, string>,
  global: Record<string, string>,
): Record<string, string> {
  return { ...global, ...base };
}

function nonNegative(value: number): number {
  return Number.isFinite(value) ? Math.max(0, value) : 0;
}
