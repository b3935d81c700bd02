import type { TelemetryConfig, TelemetryLogFormat, TelemetryTraceSampler } from '../types.js';
import type { TelemetryRuntimeConfig } from './index.js';

export const DEFAULT_SERVICE_NAME = 'a2a-task-runner';

export interface TelemetryOverrides {
  enabled?: boolean;
  tracesEnabled?: boolean;
  traceSampler?: TelemetryTraceSampler;
  logFormats?: TelemetryLogFormat[];
}

export function buildTelemetryRuntimeConfig(params: {
  telemetry?: TelemetryConfig;
  overrides?: TelemetryOverrides;
  resourceAttributes?: Record<string, string>;
}): TelemetryRuntimeConfig {
  const base = params.telemetry ?? {};
  const overrides = params.overrides ?? {};

  const enabled = overrides.enabled ?? base.enabled ?? false;
  const otlpEndpoint = base.otlp?.endpoint;
  const otlpTimeoutMs = base.otlp?.timeoutMs;
  const tracesEnabled = overrides.tracesEnabled ?? base.traces?.enabled ?? false;
  const traceSampler = overrides.traceSampler ?? base.traces?.sampler;

  const runtime: TelemetryRuntimeConfig = {
    enabled,
    serviceName: base.serviceName ?? DEFAULT_SERVICE_NAME,
  };

  if (base.labels !== undefined && Object.keys(base.labels).length > 0) {
    runtime.labels = { ...base.labels };
  }
  if (params.resourceAttributes !== undefined && Object.keys(params.resourceAttributes).length > 0) {
    runtime.resourceAttributes = { ...params.resourceAttributes };
  }
  if (typeof otlpEndpoint === 'string' && otlpEndpoint.length > 0) {
    runtime.otlpEndpoint = otlpEndpoint;
  }
  if (typeof otlpTimeoutMs === 'number' && Number.isFinite(otlpTimeoutMs) && otlpTimeoutMs > 0) {
    runtime.otlpTimeoutMs = otlpTimeoutMs;
  }

  if (base.prometheus !== undefined) {
    runtime.prometheus = {
      enabled: base.prometheus.enabled ?? false,
      host: base.prometheus.host,
      port: base.prometheus.port,
    };
  }

  if (base.traces !== undefined || overrides.tracesEnabled !== undefined) {
    runtime.traces = {
      enabled: tracesEnabled,
      sampler: traceSampler ?? 'parent',
      ratio: base.traces?.ratio,
    };
  }

  const loggingFormats = overrides.logFormats ?? base.logging?.formats;
  const loggingExtra = base.logging?.extra;
  const loggingOtlpEndpoint = base.logging?.otlp?.endpoint;
  const loggingOtlpTimeoutMs = base.logging?.otlp?.timeoutMs;

  if (
    loggingFormats !== undefined
    || loggingExtra !== undefined
    || loggingOtlpEndpoint !== undefined
    || loggingOtlpTimeoutMs !== undefined
  ) {
    runtime.logging = {};
    if (Array.isArray(loggingFormats) && loggingFormats.length > 0) {
      runtime.logging.formats = [...new Set(loggingFormats)];
    }
    if (Array.isArray(loggingExtra) && loggingExtra.length > 0) {
      runtime.logging.extra = [...new Set(loggingExtra)];
    }
    if (typeof loggingOtlpEndpoint === 'string' && loggingOtlpEndpoint.length > 0) {
      runtime.logging.otlpEndpoint = loggingOtlpEndpoint;
    }
    if (
      typeof loggingOtlpTimeoutMs === 'number'
      && Number.isFinite(loggingOtlpTimeoutMs)
      && loggingOtlpTimeoutMs > 0
    ) {
      runtime.logging.otlpTimeoutMs = loggingOtlpTimeoutMs;
    }
  }

  return runtime;
}
