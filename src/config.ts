/**
 * Centralized environment configuration & validation.
 * Responsibility: Parse, validate, and expose strongly typed configuration.
 * Non-goals: Runtime mutation (treat as immutable), per-task overrides (see profiles).
 */

export interface Config {
  verifyTimeoutMs: number;
  verifyIntervalMs: number;
  invariantDurationMs: number;
  profilesPath: string;
  sourceBackend: 'memory' | 'redis';
  redisUrl?: string;
  auditBackend: 'stdout' | 'file' | 'redis' | 'memory';
  auditFile: string;
  auditStream: string;
  tracingEnabled: boolean;
  tracingExporter: 'console' | 'memory' | 'none';
  otlpEndpoint?: string;
  otlpHeaders: Record<string, string>;
  otlpTimeoutMs?: number;
}

function num(envVal: string | undefined, def: number, opts?: { min?: number; max?: number }): number {
  if (envVal === undefined || envVal === '') return def;
  const n = Number(envVal);
  if (Number.isNaN(n)) return def;
  if (opts?.min !== undefined && n < opts.min) return opts.min;
  if (opts?.max !== undefined && n > opts.max) return opts.max;
  return n;
}

function bool(envVal: string | undefined, def: boolean): boolean {
  if (envVal === undefined) return def;
  return envVal === 'true' || envVal === '1';
}

function headers(envVal: string | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  (envVal || '').split(',').map(s=>s.trim()).filter(Boolean).forEach(pair => {
    const eq = pair.indexOf('=');
    if (eq > 0) out[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  });
  return out;
}

function auditBackend(raw: string | undefined): Config['auditBackend'] {
  switch ((raw || 'stdout').toLowerCase()) {
    case 'file': return 'file';
    case 'redis': return 'redis';
    case 'memory': return 'memory';
    default: return 'stdout';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const sourceBackend = env.SOURCE_BACKEND === 'redis' ? 'redis' : 'memory';
  if (sourceBackend === 'redis' && !env.REDIS_URL && env.NODE_ENV === 'production') {
    throw new Error('REDIS_URL required when SOURCE_BACKEND=redis in production');
  }

  const tracingEnabled = bool(env.TRACING_ENABLED, false);
  let tracingExporter: Config['tracingExporter'] = 'none';
  if (tracingEnabled) {
    const raw = (env.TRACING_EXPORTER || 'console').toLowerCase();
    tracingExporter = raw === 'memory' ? 'memory' : raw === 'none' ? 'none' : 'console';
  }

  const verifyTimeoutMs = num(env.VERIFY_TIMEOUT_MS, 30 * 60_000, { min: 1, max: 24 * 3600_000 });

  const cfg: Config = {
    verifyTimeoutMs,
    verifyIntervalMs: num(env.VERIFY_INTERVAL_MS, 1000, { min: 1, max: verifyTimeoutMs }),
    invariantDurationMs: num(env.VERIFY_INVARIANT_DURATION_MS, 60_000, { min: 1, max: 24 * 3600_000 }),
    profilesPath: env.PROFILES_PATH || 'profiles/default.yml',
    sourceBackend,
    redisUrl: env.REDIS_URL || undefined,
    auditBackend: auditBackend(env.AUDIT_BACKEND),
    auditFile: env.AUDIT_FILE || 'audit.log.ndjson',
    auditStream: env.AUDIT_STREAM || 'audit:verification',
    tracingEnabled,
    tracingExporter,
    otlpEndpoint: env.OTLP_ENDPOINT || undefined,
    otlpHeaders: headers(env.OTLP_HEADERS),
    otlpTimeoutMs: env.OTLP_TIMEOUT_MS ? num(env.OTLP_TIMEOUT_MS, 10_000, { min: 100 }) : undefined
  };

  return cfg;
}

let cached: Config | undefined;
export function getConfig(): Config {
  if (!cached) cached = loadConfig();
  return cached;
}

/** Drop the cached config so the next getConfig() re-reads the environment. */
export function resetConfig() { cached = undefined; }
