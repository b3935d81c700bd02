import type { HttpRequest, HttpResponse, HttpTransport } from '../a2a/transport.js';

import { isPlainObject } from '../utils.js';

export interface RpcCall {
  id: string;
  method: string;
  params: Record<string, unknown>;
}

export type RpcReply =
  | { result: unknown; id?: string }
  | { error: { code: number; message: string } }
  | { httpStatus: number; body: string }
  | { throws: Error }
  | { hang: true };

export type RpcHandler = (call: RpcCall, index: number) => RpcReply;

export function parseRpc(body: string | undefined): RpcCall {
  const parsed: unknown = JSON.parse(body ?? '{}');
  if (
    !isPlainObject(parsed)
    || typeof parsed.id !== 'string'
    || typeof parsed.method !== 'string'
    || !isPlainObject(parsed.params)
  ) {
    throw new Error(`not a JSON-RPC request: ${body ?? ''}`);
  }
  return { id: parsed.id, method: parsed.method, params: parsed.params };
}

/**
 * In-process stand-in for an A2A agent. GET requests answer with `card`,
 * POST requests are decoded and answered by the handler, echoing the
 * request id unless the reply overrides it.
 */
export class FakeA2ATransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];
  readonly calls: RpcCall[] = [];
  card: HttpResponse = { status: 404, body: 'not found' };
  closed = false;

  constructor(private readonly handler: RpcHandler) {}

  async send(req: HttpRequest): Promise<HttpResponse> {
    this.requests.push(req);
    if (req.method === 'GET') return this.card;

    const call = parseRpc(req.body);
    this.calls.push(call);
    const reply = this.handler(call, this.calls.length - 1);
    if ('hang' in reply) {
      return await new Promise<HttpResponse>((_resolve, reject) => {
        req.signal.addEventListener('abort', () => {
          reject(new Error('aborted'));
        });
      });
    }
    if ('throws' in reply) throw reply.throws;
    if ('httpStatus' in reply) return { status: reply.httpStatus, body: reply.body };
    if ('error' in reply) {
      return { status: 200, body: JSON.stringify({ jsonrpc: '2.0', id: call.id, error: reply.error }) };
    }
    return { status: 200, body: JSON.stringify({ jsonrpc: '2.0', id: reply.id ?? call.id, result: reply.result }) };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function messageResult(text: string): Record<string, unknown> {
  return { kind: 'message', role: 'agent', messageId: 'reply-1', parts: [{ kind: 'text', text }] };
}

export function taskResult(id: string, state: string, text?: string): Record<string, unknown> {
  return {
    kind: 'task',
    id,
    status: { state },
    artifacts: text !== undefined ? [{ artifactId: 'artifact-1', parts: [{ kind: 'text', text }] }] : [],
  };
}
