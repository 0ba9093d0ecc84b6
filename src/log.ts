import fs from 'node:fs';
import path from 'node:path';
import { createClient } from 'redis';
import { z } from 'zod';
import { loadConfig } from './config.js';

/**
 * Structured audit trail (NDJSON rows: ts, event, ...fields).
 * Backends: stdout (default), file, redis stream, memory (tests).
 * Non-goals: log levels or pretty printing; rows are meant for export & grep.
 */

const AuditRowSchema = z.object({ ts: z.string(), event: z.string() }).passthrough();
export type AuditRow = z.infer<typeof AuditRowSchema>;

type AuditSink = {
  write: (row: AuditRow) => void | Promise<void>;
  export?: (opts: AuditExportOptions) => AsyncGenerator<AuditRow>;
};

interface AuditExportOptions {
  since?: Date;
  until?: Date;
  event?: string;
  label?: string; // matches rows carrying a task or run label
  limit?: number;
}

let sink: AuditSink | undefined;
const memoryRows: AuditRow[] = [];
let sinkErrorReported = false;

function reportSinkError(e: unknown) {
  if (sinkErrorReported) return;
  sinkErrorReported = true;
  // eslint-disable-next-line no-console
  console.error('[audit] sink error; further errors suppressed:', e);
}

function parseRow(raw: string): AuditRow | undefined {
  let obj: unknown;
  try { obj = JSON.parse(raw); } catch { return undefined; }
  const parsed = AuditRowSchema.safeParse(obj);
  return parsed.success ? parsed.data : undefined;
}

async function *filtered(rows: Iterable<AuditRow>, opts: AuditExportOptions): AsyncGenerator<AuditRow> {
  let count = 0;
  for (const row of rows) {
    if (!filterRow(row, opts)) continue;
    yield row;
    count++; if (opts.limit && count >= opts.limit) break;
  }
}

function initSink(): AuditSink {
  const cfg = loadConfig();
  if (cfg.auditBackend === 'memory') {
    return {
      write(row) { memoryRows.push(row); },
      export(opts) { return filtered([...memoryRows], opts); }
    };
  }
  if (cfg.auditBackend === 'file') {
    const full = path.resolve(cfg.auditFile);
    return {
      write(row) {
        fs.appendFileSync(full, JSON.stringify(row) + '\n');
      },
      export(opts) {
        if (!fs.existsSync(full)) return filtered([], opts);
        const rows = fs.readFileSync(full, 'utf8').split(/\n/).filter(Boolean)
          .map(parseRow).filter((r): r is AuditRow => r !== undefined);
        return filtered(rows, opts);
      }
    };
  }
  if (cfg.auditBackend === 'redis') {
    // Stream fields: ts, event, json
    const client = createClient({ url: cfg.redisUrl });
    client.on('error', reportSinkError);
    const ready = client.connect();
    const streamKey = cfg.auditStream;
    return {
      async write(row) {
        await ready;
        await client.xAdd(streamKey, '*', { ts: row.ts, event: row.event, json: JSON.stringify(row) });
      },
      async *export(opts) {
        await ready;
        // XREVRANGE latest N then filter; newest first.
        const cap = opts.limit ? Math.max(opts.limit * 3, opts.limit) : 500;
        const entries = await client.xRevRange(streamKey, '+', '-', { COUNT: cap });
        const rows = entries.map(e => parseRow(e.message.json ?? '')).filter((r): r is AuditRow => r !== undefined);
        yield * filtered(rows, opts);
      }
    };
  }
  // stdout default
  return {
    write(row) { process.stdout.write(JSON.stringify(row) + '\n'); }
  };
}

function filterRow(obj: AuditRow, opts: AuditExportOptions): boolean {
  if (opts.event && obj.event !== opts.event) return false;
  if (opts.label && obj.label !== opts.label && obj.run !== opts.label) return false;
  if (opts.since && new Date(obj.ts) < opts.since) return false;
  if (opts.until && new Date(obj.ts) > opts.until) return false;
  return true;
}

export function audit(event: string, data: Record<string, unknown>) {
  if (!sink) sink = initSink();
  const row: AuditRow = { ...data, ts: new Date().toISOString(), event };
  try {
    const pending = sink.write(row);
    if (pending) pending.catch(reportSinkError);
  } catch (e) { reportSinkError(e); }
}

export async function *exportAudit(opts: AuditExportOptions): AsyncGenerator<AuditRow> {
  if (!sink) sink = initSink();
  if (!sink.export) return; // stdout backend has no export
  yield * sink.export(opts);
}

/** Rows captured by the memory backend, oldest first. */
export function getAuditRows(): AuditRow[] { return [...memoryRows]; }

// Test-only: forget the sink so the next audit() re-reads AUDIT_* env vars.
export function __TEST_resetAudit() {
  sink = undefined;
  memoryRows.length = 0;
  sinkErrorReported = false;
}

export type { AuditExportOptions };
