export class ProxyError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UpstreamUnavailableError extends ProxyError {
  constructor() {
    super('Service unavailable', 503);
  }
}

export class InvalidRequestError extends ProxyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 400, options);
  }
}

export class UpstreamRequestError extends ProxyError {
  constructor(cause: unknown) {
    super('Upstream request failed', 502, { cause });
  }
}

export class UpstreamTimeoutError extends ProxyError {
  constructor(readonly timeoutMs: number) {
    super(`Upstream did not respond within ${timeoutMs}ms`, 504);
  }
}
