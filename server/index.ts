import { buildServer } from './app.js';
import { CONFIG } from './config.js';
import { markerPair } from './scanner.js';
import { UpstreamClient } from './upstream.js';

const upstream = new UpstreamClient({ baseUrl: CONFIG.UPSTREAM_URL, timeoutMs: CONFIG.UPSTREAM_TIMEOUT_MS });

const app = buildServer({
  upstream,
  markers: markerPair(CONFIG.REASONING_START_MARKER, CONFIG.REASONING_END_MARKER),
  reasoningField: CONFIG.REASONING_FIELD,
  defaultReasoningEffort: CONFIG.DEFAULT_REASONING_EFFORT,
  bodyLimit: CONFIG.BODY_LIMIT_BYTES,
  logger: { level: CONFIG.LOG_LEVEL },
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, 'shutting down');
    void app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'shutdown failed');
        process.exit(1);
      },
    );
  });
}

void app.listen({ port: CONFIG.PORT, host: CONFIG.HOST }).then(
  (address) => {
    app.log.info({ upstream: CONFIG.UPSTREAM_URL }, `reasoning proxy listening at ${address}`);
  },
  (err: unknown) => {
    app.log.error({ err }, 'failed to start');
    process.exit(1);
  },
);
