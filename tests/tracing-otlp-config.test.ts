import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { initTracing, shutdownTracing } from '../src/tracing.js';

// Enabling OTLP_ENDPOINT must not throw; exporter internals are not asserted and nothing is exported.

describe('OTLP tracing config', () => {
  beforeAll(() => {
    process.env.TRACING_ENABLED = 'true';
    process.env.TRACING_EXPORTER = 'none'; // base exporter none
    process.env.OTLP_ENDPOINT = 'http://localhost:4318/v1/traces'; // dummy
    process.env.OTLP_HEADERS = 'X-Test=1,Authorization=Bearer test-secret';
    process.env.OTLP_TIMEOUT_MS = '1500';
  });
  afterAll(async () => {
    await shutdownTracing();
    for (const k of ['TRACING_ENABLED', 'TRACING_EXPORTER', 'OTLP_ENDPOINT', 'OTLP_HEADERS', 'OTLP_TIMEOUT_MS']) delete process.env[k];
  });
  it('initializes without error when OTLP env vars set', () => {
    expect(() => initTracing()).not.toThrow();
  });
});
