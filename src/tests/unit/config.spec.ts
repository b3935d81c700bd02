import { describe, expect, it } from 'vitest';

import type { EnvSource } from '../../config.js';

import { ConfigurationError, loadRunnerConfig, parseBool, parseInteger, parseKeyValueList } from '../../config.js';

const BASE_ENV: EnvSource = { A2A_BASE_URL: 'http://agent.test', DATASET_NAME: 'demo' };

function issuesFor(env: EnvSource): readonly string[] {
  try {
    loadRunnerConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('scalar parsers', () => {
  it('parses booleans and keeps the fallback for unknown words', () => {
    expect(parseBool('YES', false)).toBe(true);
    expect(parseBool(' off ', true)).toBe(false);
    expect(parseBool('maybe', true)).toBe(true);
    expect(parseBool(undefined, false)).toBe(false);
  });

  it('parses integers and falls back on garbage', () => {
    expect(parseInteger('42')).toBe(42);
    expect(parseInteger(' -3 ')).toBe(-3);
    expect(parseInteger('4.5', 7)).toBe(7);
    expect(parseInteger('abc')).toBeUndefined();
  });

  it('parses key=value lists and skips malformed pairs', () => {
    expect(parseKeyValueList('deployment.environment=test, team=qa,bad,=x')).toEqual({
      'deployment.environment': 'test',
      team: 'qa',
    });
    expect(parseKeyValueList(undefined)).toEqual({});
  });
});

describe('loadRunnerConfig', () => {
  it('applies defaults to a minimal environment', () => {
    const { config, resourceAttributes } = loadRunnerConfig(BASE_ENV);
    expect(config).toEqual({
      a2a: {
        baseUrl: 'http://agent.test',
        timeoutMs: 300_000,
        verifyTls: true,
        endpointPath: '/v1/chat',
        pollIntervalMs: 500,
      },
      dataset: { name: 'demo', abortOnFailure: false },
      telemetry: {
        enabled: false,
        serviceName: 'a2a-task-runner',
        traces: { enabled: false, sampler: 'parent' },
      },
      debug: { logPrompt: false, logResponse: false },
    });
    expect(resourceAttributes).toEqual({});
  });

  it('reports every missing required variable at once', () => {
    expect(issuesFor({})).toEqual(['A2A_BASE_URL: is required', 'DATASET_NAME: is required']);
    expect(() => loadRunnerConfig({ DATASET_NAME: 'demo' })).toThrow('A2A_BASE_URL: is required');
  });

  it('rejects a base URL that is not http(s)', () => {
    expect(issuesFor({ ...BASE_ENV, A2A_BASE_URL: 'ftp://agent.test' })).toEqual(['A2A_BASE_URL: must be an http(s) URL']);
  });

  it('rejects a negative task limit', () => {
    const issues = issuesFor({ ...BASE_ENV, MAX_TASKS: '-1' });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('MAX_TASKS: ')).toBe(true);
  });

  it('converts timeouts to milliseconds and replaces zero with the default', () => {
    expect(loadRunnerConfig({ ...BASE_ENV, A2A_TIMEOUT_SECONDS: '12' }).config.a2a.timeoutMs).toBe(12_000);
    expect(loadRunnerConfig({ ...BASE_ENV, A2A_TIMEOUT_SECONDS: '0' }).config.a2a.timeoutMs).toBe(300_000);
    expect(loadRunnerConfig({ ...BASE_ENV, A2A_TIMEOUT_SECONDS: 'soon' }).config.a2a.timeoutMs).toBe(300_000);
    expect(loadRunnerConfig({ ...BASE_ENV, A2A_POLL_INTERVAL_MS: '0' }).config.a2a.pollIntervalMs).toBe(500);
  });

  it('reads run options and flags', () => {
    const { config } = loadRunnerConfig({
      ...BASE_ENV,
      A2A_AUTH_TOKEN: 'test-secret',
      A2A_VERIFY_TLS: 'false',
      A2A_ENDPOINT_PATH: '/rpc',
      DATASET_FILE: ' ./tasks.json ',
      MAX_TASKS: '3',
      ABORT_ON_FAILURE: 'yes',
      LOG_PROMPT: '1',
    });
    expect(config.a2a).toMatchObject({ authToken: 'test-secret', verifyTls: false, endpointPath: '/rpc' });
    expect(config.dataset).toEqual({ name: 'demo', file: './tasks.json', maxTasks: 3, abortOnFailure: true });
    expect(config.debug).toEqual({ logPrompt: true, logResponse: false });
  });

  it('enables telemetry and traces when an OTLP endpoint is set', () => {
    const { config, resourceAttributes } = loadRunnerConfig({
      ...BASE_ENV,
      OTEL_EXPORTER_OTLP_ENDPOINT: 'http://collector.test:4317',
      OTEL_SERVICE_NAME: 'bench',
      OTEL_RESOURCE_ATTRIBUTES: 'deployment.environment=ci',
      A2A_RUNNER_LABELS: 'suite=nightly',
      A2A_RUNNER_OTLP_LOGS: 'true',
      A2A_RUNNER_LOG_FORMAT: 'JSON',
    });
    expect(config.telemetry).toEqual({
      enabled: true,
      serviceName: 'bench',
      otlp: { endpoint: 'http://collector.test:4317' },
      traces: { enabled: true, sampler: 'parent' },
      labels: { suite: 'nightly' },
      logging: { formats: ['json'], extra: ['otlp'] },
    });
    expect(resourceAttributes).toEqual({ 'deployment.environment': 'ci' });
  });

  it('enables metrics without traces for a Prometheus port alone', () => {
    const { telemetry } = loadRunnerConfig({ ...BASE_ENV, A2A_RUNNER_PROMETHEUS_PORT: '9464' }).config;
    expect(telemetry.enabled).toBe(true);
    expect(telemetry.prometheus).toEqual({ enabled: true, port: 9464 });
    expect(telemetry.traces?.enabled).toBe(false);
  });

  it('keeps telemetry off when disabled explicitly', () => {
    const { telemetry } = loadRunnerConfig({
      ...BASE_ENV,
      OTEL_EXPORTER_OTLP_ENDPOINT: 'http://collector.test:4317',
      A2A_RUNNER_TELEMETRY_DISABLE: '1',
    }).config;
    expect(telemetry.enabled).toBe(false);
  });

  it('rejects an unknown trace sampler', () => {
    const issues = issuesFor({ ...BASE_ENV, A2A_RUNNER_TRACE_SAMPLER: 'sometimes' });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('A2A_RUNNER_TRACE_SAMPLER: ')).toBe(true);
  });
});
