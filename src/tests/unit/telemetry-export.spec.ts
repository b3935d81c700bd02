import { InMemoryLogRecordExporter, SimpleLogRecordProcessor } from '@opentelemetry/sdk-logs';
import { AggregationTemporality, InMemoryMetricExporter, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { afterEach, describe, expect, it } from 'vitest';

import type { StructuredLogEvent } from '../../logging/structured-log-event.js';
import type { MetricData } from '@opentelemetry/sdk-metrics';

import {
  emitTelemetryLog,
  initTelemetry,
  recordDiscoveryFailure,
  recordInFlight,
  recordTaskMetrics,
  shutdownTelemetry,
} from '../../telemetry/index.js';

async function collect(reader: PeriodicExportingMetricReader, exporter: InMemoryMetricExporter): Promise<MetricData[]> {
  await reader.forceFlush();
  return exporter.getMetrics().flatMap((rm) => rm.scopeMetrics).flatMap((sm) => sm.metrics);
}

function metricNamed(metrics: MetricData[], name: string): MetricData | undefined {
  return metrics.find((m) => m.descriptor.name === name);
}

describe('metrics recorder', () => {
  afterEach(async () => {
    await shutdownTelemetry();
  });

  async function start(): Promise<{ reader: PeriodicExportingMetricReader; exporter: InMemoryMetricExporter }> {
    const exporter = new InMemoryMetricExporter(AggregationTemporality.CUMULATIVE);
    const reader = new PeriodicExportingMetricReader({ exporter, exportIntervalMillis: 60_000 });
    await initTelemetry({ enabled: true, serviceName: 'bench', labels: { suite: 'nightly' } }, { metricReaders: [reader] });
    return { reader, exporter };
  }

  it('counts discovery failures as errors', async () => {
    const { reader, exporter } = await start();
    recordDiscoveryFailure();
    recordDiscoveryFailure();

    const metrics = await collect(reader, exporter);

    expect(metricNamed(metrics, 'a2a_runner_errors_total')).toMatchObject({
      dataPoints: [{ attributes: { suite: 'nightly', error_type: 'discovery_failure' }, value: 2 }],
    });
  });

  it('records task counters and histograms with their labels', async () => {
    const { reader, exporter } = await start();
    recordTaskMetrics({
      taskId: 't1',
      dataset: 'demo',
      status: 'success',
      latencyMs: 40,
      exchangeLatencyMs: 35,
      promptChars: 12,
      responseChars: 5,
    });
    recordTaskMetrics({
      taskId: 't2',
      dataset: 'demo',
      status: 'failed',
      errorKind: 'timeout',
      latencyMs: 300,
      exchangeLatencyMs: 300,
      promptChars: 8,
      responseChars: 0,
    });

    const metrics = await collect(reader, exporter);
    const ok = { suite: 'nightly', dataset: 'demo', status: 'success' };
    const failed = { suite: 'nightly', dataset: 'demo', status: 'failed' };

    expect(metricNamed(metrics, 'a2a_runner_tasks_total')).toMatchObject({
      dataPoints: [{ attributes: ok, value: 1 }, { attributes: failed, value: 1 }],
    });
    expect(metricNamed(metrics, 'a2a_runner_errors_total')).toMatchObject({
      dataPoints: [{ attributes: { ...failed, error_type: 'timeout' }, value: 1 }],
    });
    expect(metricNamed(metrics, 'a2a_runner_task_latency_ms')).toMatchObject({
      dataPoints: [{ attributes: ok, value: { count: 1, sum: 40 } }, { attributes: failed, value: { count: 1, sum: 300 } }],
    });
    expect(metricNamed(metrics, 'a2a_runner_a2a_latency_ms')).toMatchObject({
      dataPoints: [{ value: { sum: 35 } }, { value: { sum: 300 } }],
    });
    expect(metricNamed(metrics, 'a2a_runner_prompt_size_chars')).toMatchObject({
      dataPoints: [{ value: { sum: 12 } }, { value: { sum: 8 } }],
    });
    expect(metricNamed(metrics, 'a2a_runner_response_size_chars')).toMatchObject({
      dataPoints: [{ value: { sum: 5 } }, { value: { sum: 0 } }],
    });
  });

  it('tracks tasks in flight', async () => {
    const { reader, exporter } = await start();
    recordInFlight(1);
    recordInFlight(-1);
    recordInFlight(1);

    const metrics = await collect(reader, exporter);

    expect(metricNamed(metrics, 'a2a_runner_inflight_tasks')).toMatchObject({
      dataPoints: [{ attributes: { suite: 'nightly' }, value: 1 }],
    });
  });
});

describe('log export', () => {
  afterEach(async () => {
    await shutdownTelemetry();
  });

  it('forwards structured log events to the configured processor', async () => {
    const exporter = new InMemoryLogRecordExporter();
    await initTelemetry({ enabled: true, serviceName: 'bench' }, { logProcessors: [new SimpleLogRecordProcessor(exporter)] });
    const event: StructuredLogEvent = {
      timestamp: 1_700_000_000_000,
      isoTimestamp: '2023-11-14T22:13:20.000Z',
      severity: 'WRN',
      priority: 4,
      message: 'agent card unavailable',
      component: 'a2a',
      direction: 'response',
      remoteIdentifier: 'a2a:discovery',
      fatal: false,
      taskId: 't1',
      dataset: 'demo',
      labels: { suite: 'nightly' },
    };

    emitTelemetryLog(event);

    const records = exporter.getFinishedLogRecords();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      body: 'agent card unavailable',
      severityText: 'WRN',
      attributes: {
        component: 'a2a',
        direction: 'response',
        remote: 'a2a:discovery',
        task_id: 't1',
        dataset: 'demo',
        'label.suite': 'nightly',
      },
    });
  });

  it('drops log events once telemetry shuts down', async () => {
    const exporter = new InMemoryLogRecordExporter();
    await initTelemetry({ enabled: true, serviceName: 'bench' }, { logProcessors: [new SimpleLogRecordProcessor(exporter)] });
    await shutdownTelemetry();

    emitTelemetryLog({
      timestamp: 0,
      isoTimestamp: '1970-01-01T00:00:00.000Z',
      severity: 'ERR',
      priority: 3,
      message: 'late',
      component: 'runner',
      direction: 'response',
      remoteIdentifier: 'runner:fatal',
      fatal: true,
      labels: {},
    });

    expect(exporter.getFinishedLogRecords()).toEqual([]);
  });
});
