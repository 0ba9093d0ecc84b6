#!/usr/bin/env node
import fs from 'node:fs';
import { pathToFileURL } from 'node:url';
import { exportAudit, type AuditExportOptions } from './log.js';

/** Usage: verify-audit-export [--since=ISO] [--until=ISO] [--event=name] [--label=task|run] [--limit=N] */
export function parseArgs(argv: string[]): AuditExportOptions {
  const args = new Map<string,string>();
  for (const a of argv) {
    if (a.startsWith('--')) { const eq = a.indexOf('='); args.set(eq < 0 ? a.slice(2) : a.slice(2, eq), eq < 0 ? '' : a.slice(eq + 1)); }
  }
  const opts: AuditExportOptions = {};
  const since = args.get('since'); if (since) opts.since = new Date(since);
  const until = args.get('until'); if (until) opts.until = new Date(until);
  const event = args.get('event'); if (event) opts.event = event;
  const label = args.get('label'); if (label) opts.label = label;
  const limit = args.get('limit'); if (limit) opts.limit = Number(limit);
  return opts;
}

async function main(){
  for await (const row of exportAudit(parseArgs(process.argv.slice(2)))) {
    process.stdout.write(JSON.stringify(row)+'\n');
  }
}

// Run only when executed directly (bin symlinks resolved), not when imported.
function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (invokedDirectly()) {
  main().catch(e=>{ console.error(e); process.exit(1); });
}
