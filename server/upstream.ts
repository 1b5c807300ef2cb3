import { UpstreamRequestError, UpstreamTimeoutError, UpstreamUnavailableError } from './errors.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type UpstreamOptions = {
  baseUrl: string;
  timeoutMs: number;
  fetch?: FetchLike;
};

export type UpstreamRequest = {
  method: string;
  /** Path and query of the incoming request, relayed unchanged. */
  path: string;
  headers: Record<string, string>;
  body?: string | Uint8Array;
  signal?: AbortSignal;
};

/**
 * Outbound HTTP client shared by all requests. It is only usable between
 * open() and close(); close() aborts whatever is still in flight.
 */
export class UpstreamClient {
  private lifecycle: AbortController | null = null;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: UpstreamOptions) {
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
  }

  get ready() {
    return this.lifecycle !== null;
  }

  get timeoutMs() {
    return this.opts.timeoutMs;
  }

  open() {
    this.lifecycle ??= new AbortController();
  }

  close() {
    this.lifecycle?.abort(new UpstreamUnavailableError());
    this.lifecycle = null;
  }

  urlFor(path: string) {
    return `${this.opts.baseUrl.replace(/\/$/, '')}${path}`;
  }

  /**
   * Sends one request. The timeout covers waiting for response headers;
   * callers reading the body apply their own idle timeout per read.
   */
  async send(req: UpstreamRequest): Promise<Response> {
    if (!this.lifecycle) throw new UpstreamUnavailableError();

    const controller = new AbortController();
    // the response body stays tied to this signal after headers arrive
    linkAbort(this.lifecycle.signal, controller);
    linkAbort(req.signal, controller);
    const timer = setTimeout(() => controller.abort(new UpstreamTimeoutError(this.opts.timeoutMs)), this.opts.timeoutMs);
    try {
      return await this.fetchImpl(this.urlFor(req.path), {
        method: req.method,
        headers: req.headers,
        body: req.body,
        signal: controller.signal,
      });
    } catch (err) {
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : err;
      if (reason instanceof UpstreamTimeoutError || reason instanceof UpstreamUnavailableError) throw reason;
      throw new UpstreamRequestError(reason);
    } finally {
      clearTimeout(timer);
    }
  }
}

function linkAbort(signal: AbortSignal | undefined, controller: AbortController) {
  if (!signal) return;
  if (signal.aborted) {
    controller.abort(signal.reason);
    return;
  }
  signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
}

export function withTimeout<T>(p: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const to = setTimeout(() => reject(onTimeout()), ms);
    p.then(
      (v) => {
        clearTimeout(to);
        resolve(v);
      },
      (e: unknown) => {
        clearTimeout(to);
        reject(e);
      },
    );
  });
}
