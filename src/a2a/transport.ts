import { Agent, request, type Dispatcher } from 'undici';

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Minimal request/response capability the protocol client depends on.
 * Implementations must honor `signal`; the client enforces its own deadline
 * on top regardless.
 */
export interface HttpTransport {
  send(req: HttpRequest): Promise<HttpResponse>;
  close?(): Promise<void>;
}

export interface UndiciTransportOptions {
  verifyTls?: boolean;
  // Injected dispatcher (e.g. MockAgent); the transport does not close it.
  dispatcher?: Dispatcher;
}

export class UndiciTransport implements HttpTransport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(options: UndiciTransportOptions = {}) {
    if (options.dispatcher !== undefined) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      // Per-call deadlines come from the caller's AbortSignal.
      this.dispatcher = new Agent({
        headersTimeout: 0,
        bodyTimeout: 0,
        connect: { rejectUnauthorized: options.verifyTls ?? true },
      });
      this.ownsDispatcher = true;
    }
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    const res = await request(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal: req.signal,
      dispatcher: this.dispatcher,
    });
    const body = await res.body.text();
    return { status: res.statusCode, body };
  }

  async close(): Promise<void> {
    if (!this.ownsDispatcher) return;
    await this.dispatcher.close();
  }
}
