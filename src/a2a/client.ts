import { randomUUID } from 'node:crypto';

import type { EndpointResolution, ExchangeOutcome, LogEntry, LogSink } from '../types.js';
import type { AgentCard, A2ATask, JsonRpcRequest, JsonRpcResponse } from './protocol.js';
import type { HttpRequest, HttpResponse, HttpTransport } from './transport.js';

import { recordDiscoveryFailure } from '../telemetry/index.js';
import { describeError, isPlainObject, sleep } from '../utils.js';

import { ExchangeError, isExchangeError } from './errors.js';
import {
  AGENT_CARD_PATH,
  AgentCardSchema,
  JsonRpcResponseSchema,
  METHOD_GET_TASK,
  METHOD_SEND_MESSAGE,
  SUCCESS_STATE,
  TaskSchema,
  buildUserMessage,
  describeTaskFailure,
  extractTextFromMessage,
  extractTextFromTask,
  isTerminalState,
} from './protocol.js';

export const DEFAULT_ENDPOINT_PATH = '/v1/chat';
export const DEFAULT_POLL_INTERVAL_MS = 500;

const BODY_PREVIEW_CHARS = 200;

export interface A2AClientOptions {
  baseUrl: string;
  timeoutMs: number;
  transport: HttpTransport;
  endpointPath?: string;
  pollIntervalMs?: number;
  authToken?: string;
  onLog?: LogSink;
  traceA2A?: boolean;
  now?: () => number;
  idFactory?: () => string;
}

/** What the task executor needs from a protocol client. */
export interface ExchangeClient {
  resolveEndpoint(): Promise<EndpointResolution>;
  exchange(prompt: string): Promise<ExchangeOutcome>;
}

export function normalizeEndpointPath(raw: string | undefined): string {
  const trimmed = (raw ?? '').trim();
  if (trimmed.length === 0) return '/';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

export function buildRpcUrl(baseUrl: string, endpointPath: string | undefined): string {
  return baseUrl.replace(/\/+$/, '') + normalizeEndpointPath(endpointPath);
}

/**
 * Decide the RPC endpoint from a fetched agent card.
 *
 * A card `url` with a non-root path is used verbatim. A root or empty path
 * keeps only the card's origin and appends the configured path; without a
 * `url` the configured base is used. Throws when the card URL is not an
 * absolute http(s) URL.
 */
export function resolveFromCard(card: AgentCard, baseUrl: string, endpointPath: string | undefined): EndpointResolution {
  const cardUrl = card.url?.trim();
  if (cardUrl === undefined || cardUrl.length === 0) {
    return { url: buildRpcUrl(baseUrl, endpointPath), source: 'card_base' };
  }
  const parsed = new URL(cardUrl);
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`agent card url has unsupported scheme '${parsed.protocol}'`);
  }
  if (parsed.pathname.length > 0 && parsed.pathname !== '/') {
    return { url: cardUrl, source: 'card' };
  }
  return { url: buildRpcUrl(parsed.origin, endpointPath), source: 'card_base' };
}

export class A2AClient implements ExchangeClient {
  private readonly baseUrl: string;
  private readonly endpointPath: string;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly authToken?: string;
  private readonly transport: HttpTransport;
  private readonly onLog?: LogSink;
  private readonly traceA2A: boolean;
  private readonly now: () => number;
  private readonly idFactory: () => string;
  private endpoint?: Promise<EndpointResolution>;

  constructor(options: A2AClientOptions) {
    this.baseUrl = options.baseUrl;
    this.endpointPath = normalizeEndpointPath(options.endpointPath ?? DEFAULT_ENDPOINT_PATH);
    this.timeoutMs = options.timeoutMs;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.authToken = options.authToken;
    this.transport = options.transport;
    this.onLog = options.onLog;
    this.traceA2A = options.traceA2A ?? false;
    this.now = options.now ?? Date.now;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /** Resolved once per client; later calls return the cached result. */
  resolveEndpoint(): Promise<EndpointResolution> {
    this.endpoint ??= this.discoverEndpoint();
    return this.endpoint;
  }

  /** Fetches the agent card and resolves the endpoint. Never rejects. */
  async discoverEndpoint(): Promise<EndpointResolution> {
    const cardUrl = `${this.baseUrl.replace(/\/+$/, '')}${AGENT_CARD_PATH}`;
    try {
      const res = await this.sendWithTimeout(
        { method: 'GET', url: cardUrl, headers: this.buildHeaders(false) },
        this.timeoutMs,
        'agent card',
      );
      if (res.status < 200 || res.status >= 300) {
        throw new Error(`HTTP ${String(res.status)}`);
      }
      const card = AgentCardSchema.parse(JSON.parse(res.body));
      const resolution = resolveFromCard(card, this.baseUrl, this.endpointPath);
      this.log('VRB', 'response', 'a2a:discovery', `resolved RPC endpoint ${resolution.url}`, {
        endpoint_source: resolution.source,
      });
      return resolution;
    } catch (error) {
      const url = buildRpcUrl(this.baseUrl, this.endpointPath);
      const message = describeError(error);
      recordDiscoveryFailure();
      this.log('WRN', 'response', 'a2a:discovery', `agent card unavailable (${message}), using configured endpoint ${url}`, {
        endpoint_source: 'fallback',
        error_type: 'discovery_failure',
      });
      return { url, source: 'fallback' };
    }
  }

  /**
   * Submit the prompt and poll until a terminal state or the deadline.
   * Never rejects: failures come back as `{ ok: false }` with their kind.
   */
  async exchange(prompt: string): Promise<ExchangeOutcome> {
    const { url } = await this.resolveEndpoint();
    const startedAt = this.now();
    try {
      const responseText = await this.sendPrompt(url, prompt, startedAt + this.timeoutMs);
      return { ok: true, responseText, durationMs: this.now() - startedAt };
    } catch (error) {
      const elapsed = this.now() - startedAt;
      if (isExchangeError(error)) {
        // Timers may fire a millisecond before the wall clock catches up.
        const durationMs = error.kind === 'timeout' ? Math.max(elapsed, this.timeoutMs) : elapsed;
        return { ok: false, errorKind: error.kind, message: error.message, durationMs };
      }
      return { ok: false, errorKind: 'internal_error', message: describeError(error), durationMs: elapsed };
    }
  }

  private async sendPrompt(url: string, prompt: string, deadline: number): Promise<string> {
    const message = buildUserMessage(prompt, this.idFactory());
    const result = await this.call(url, METHOD_SEND_MESSAGE, { message, metadata: {} }, deadline);

    if (!isPlainObject(result)) {
      throw new ExchangeError('malformed_response', `${METHOD_SEND_MESSAGE} result is not an object`);
    }

    if (result.kind !== 'task') {
      const text = extractTextFromMessage(result);
      if (text === undefined) {
        throw new ExchangeError('malformed_response', 'could not extract text from message response');
      }
      return text;
    }

    let task = this.parseTask(result, METHOD_SEND_MESSAGE);
    // eslint-disable-next-line functional/no-loop-statements -- sequential polling
    while (!isTerminalState(task.status?.state)) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        throw new ExchangeError('timeout', `task ${task.id} did not finish within ${String(this.timeoutMs)}ms`);
      }
      await sleep(Math.min(this.pollIntervalMs, remaining));
      const polled = await this.call(url, METHOD_GET_TASK, { id: task.id }, deadline);
      task = this.parseTask(polled, METHOD_GET_TASK);
      this.log('TRC', 'response', `a2a:${METHOD_GET_TASK}`, `task ${task.id} state ${task.status?.state ?? 'unknown'}`);
    }

    return this.finishTask(task);
  }

  private finishTask(task: A2ATask): string {
    if (task.status?.state !== SUCCESS_STATE) {
      throw new ExchangeError('terminal_error_status', describeTaskFailure(task));
    }
    const text = extractTextFromTask(task);
    if (text === undefined) {
      throw new ExchangeError('malformed_response', `could not extract text from task ${task.id} result`);
    }
    return text;
  }

  private parseTask(value: unknown, method: string): A2ATask {
    const parsed = TaskSchema.safeParse(value);
    if (!parsed.success) {
      throw new ExchangeError('malformed_response', `${method} returned an invalid task: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    return parsed.data;
  }

  private async call(url: string, method: string, params: Record<string, unknown>, deadline: number): Promise<unknown> {
    const remaining = deadline - this.now();
    if (remaining <= 0) {
      throw new ExchangeError('timeout', `${method} not sent: exchange exceeded ${String(this.timeoutMs)}ms`);
    }

    const payload: JsonRpcRequest = { jsonrpc: '2.0', id: this.idFactory(), method, params };
    const body = JSON.stringify(payload);
    this.trace('request', method, `A2A request: POST ${url}\nbody: ${body}`);

    const res = await this.sendWithTimeout({ method: 'POST', url, headers: this.buildHeaders(true), body }, remaining, method);
    this.trace('response', method, `A2A response: HTTP ${String(res.status)}\nbody: ${res.body}`);

    if (res.status < 200 || res.status >= 300) {
      throw new ExchangeError('http_error', `${method} returned HTTP ${String(res.status)}: ${preview(res.body)}`, { status: res.status });
    }

    const envelope = parseEnvelope(res.body, method);
    if (envelope.id !== undefined && envelope.id !== null && envelope.id !== payload.id) {
      throw new ExchangeError('malformed_response', `${method} response id ${String(envelope.id)} does not match request id ${payload.id}`);
    }
    if (envelope.error !== undefined) {
      const code = envelope.error.code !== undefined ? ` ${String(envelope.error.code)}` : '';
      throw new ExchangeError('terminal_error_status', `JSON-RPC error${code}: ${envelope.error.message ?? describeError(envelope.error)}`);
    }
    return envelope.result;
  }

  private async sendWithTimeout(req: Omit<HttpRequest, 'signal'>, timeoutMs: number, label: string): Promise<HttpResponse> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new ExchangeError('timeout', `${label} timed out after ${String(Math.trunc(timeoutMs))}ms`));
        controller.abort();
      }, Math.max(0, timeoutMs));
    });
    try {
      return await Promise.race([this.transport.send({ ...req, signal: controller.signal }), expired]);
    } catch (error) {
      if (isExchangeError(error)) throw error;
      throw new ExchangeError('http_error', `${label} failed: ${describeError(error)}`, { cause: error });
    } finally {
      if (timer !== undefined) clearTimeout(timer);
    }
  }

  private buildHeaders(withBody: boolean): Record<string, string> {
    const headers: Record<string, string> = { accept: 'application/json' };
    if (withBody) headers['content-type'] = 'application/json';
    if (typeof this.authToken === 'string' && this.authToken.length > 0) {
      headers.authorization = `Bearer ${this.authToken}`;
    }
    return headers;
  }

  private trace(direction: LogEntry['direction'], method: string, message: string): void {
    if (!this.traceA2A) return;
    this.log('TRC', direction, `a2a:${method}`, message);
  }

  private log(
    severity: LogEntry['severity'],
    direction: LogEntry['direction'],
    remoteIdentifier: string,
    message: string,
    details?: LogEntry['details'],
  ): void {
    if (this.onLog === undefined) return;
    this.onLog({
      timestamp: Date.now(),
      severity,
      component: 'a2a',
      direction,
      remoteIdentifier,
      fatal: false,
      message,
      details,
    });
  }
}

function parseEnvelope(body: string, method: string): JsonRpcResponse {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    throw new ExchangeError('malformed_response', `${method} response is not JSON: ${describeError(error)}`);
  }
  const parsed = JsonRpcResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ExchangeError('malformed_response', `${method} response is not a JSON-RPC envelope: ${preview(body)}`);
  }
  if (isPlainObject(raw) && !('result' in raw) && !('error' in raw)) {
    throw new ExchangeError('malformed_response', `${method} response has neither result nor error`);
  }
  return parsed.data;
}

function preview(body: string): string {
  return body.length > BODY_PREVIEW_CHARS ? `${body.slice(0, BODY_PREVIEW_CHARS)}...` : body;
}
