import { describe, it, expect, vi, beforeEach, afterAll, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { createRedisSource } from '../src/source/redis.js';
import { createSource } from '../src/source.js';
import { audit, exportAudit, type AuditRow } from '../src/log.js';
import { sleep } from './utils/time.js';

/**
 * In-process stand-in for the redis client: hashes and streams only, enough for the source and audit sink.
 */
const fake = vi.hoisted(() => {
  const hashes = new Map<string, Map<string, string>>();
  const streams = new Map<string, Array<{ id: string; message: Record<string, string> }>>();
  const hash = (key: string) => {
    let h = hashes.get(key);
    if (!h) { h = new Map(); hashes.set(key, h); }
    return h;
  };
  const listeners = new Map<string, Array<(arg?: unknown) => void>>();
  const emit = (event: string, arg?: unknown) => { for (const l of listeners.get(event) ?? []) l(arg); };
  const client = {
    on(event: string, listener: (arg?: unknown) => void) {
      listeners.set(event, [...(listeners.get(event) ?? []), listener]);
      return client;
    },
    async connect() { return undefined; },
    async quit() { return 'OK'; },
    async hGetAll(key: string) { return Object.fromEntries(hash(key)); },
    async hGet(key: string, field: string) { return hash(key).get(field); },
    async hSet(key: string, field: string, value: string) { hash(key).set(field, value); return 1; },
    async hDel(key: string, field: string) { return hash(key).delete(field) ? 1 : 0; },
    async xAdd(key: string, _id: string, message: Record<string, string>) {
      const entries = streams.get(key) ?? [];
      const id = `${entries.length + 1}-0`;
      entries.push({ id, message });
      streams.set(key, entries);
      return id;
    },
    async xRevRange(key: string, _end: string, _start: string, opts: { COUNT: number }) {
      return [...(streams.get(key) ?? [])].reverse().slice(0, opts.COUNT);
    }
  };
  return { hashes, streams, listeners, emit, client };
});

vi.mock('redis', () => ({ createClient: () => fake.client }));

const entity = (name: string, labels: Record<string, string>, data: Record<string, unknown> = {}) =>
  JSON.stringify({ name, labels, revision: 0, data });

beforeEach(() => {
  fake.hashes.clear();
  fake.streams.clear();
  fake.listeners.clear();
  const members = new Map<string, string>();
  members.set('member-0', entity('member-0', { role: 'control' }, { spec: 'small' }));
  members.set('worker-0', entity('worker-0', { role: 'worker' }));
  fake.hashes.set('collection:members', members);
});

describe('redis collection source', () => {
  it('lists validated entities matching the selector', async () => {
    const source = await createRedisSource('redis://test');
    const control = await source.list('members', { role: 'control' });
    expect(control).toEqual([{ name: 'member-0', labels: { role: 'control' }, revision: 0, data: { spec: 'small' } }]);
    expect(await source.list('members')).toHaveLength(2);
  });

  it('persists updates with a bumped revision', async () => {
    const source = await createRedisSource('redis://test');
    const res = await source.update('members', 'member-0', d => { d.data.spec = 'large'; });
    expect(res.ok).toBe(true);
    expect(JSON.parse(fake.hashes.get('collection:members')?.get('member-0') ?? '{}')).toEqual({
      name: 'member-0', labels: { role: 'control' }, revision: 1, data: { spec: 'large' }
    });
  });

  it('reports missing entities and failing mutations', async () => {
    const source = await createRedisSource('redis://test');
    expect(await source.update('members', 'member-9', () => undefined)).toEqual({ ok: false, reason: 'not_found', message: 'members/member-9 not found' });
    expect(await source.update('members', 'member-0', () => { throw new Error('conflict'); })).toEqual({ ok: false, reason: 'error', message: 'conflict' });
  });

  it('removes entities', async () => {
    const source = await createRedisSource('redis://test');
    expect(await source.remove('members', 'worker-0')).toBe(true);
    expect(await source.remove('members', 'worker-0')).toBe(false);
    await source.close();
  });

  it('rejects stored values that are not entities', async () => {
    fake.hashes.get('collection:members')?.set('broken', JSON.stringify({ labels: {} }));
    const source = await createRedisSource('redis://test');
    await expect(source.list('members')).rejects.toThrow(ZodError);
  });

  it('is selected by SOURCE_BACKEND=redis and can be closed', async () => {
    const source = await createSource({ sourceBackend: 'redis', redisUrl: 'redis://test' });
    expect((await source.list('members')).map(e => e.name)).toEqual(['member-0', 'worker-0']);
    await expect(source.close()).resolves.toBeUndefined();
  });

  it('surfaces connection errors on the next call until reconnected', async () => {
    const source = await createRedisSource('redis://test');
    fake.emit('error', new Error('socket closed'));
    expect(await source.update('members', 'member-0', d => { d.data.spec = 'large'; }))
      .toEqual({ ok: false, reason: 'error', message: 'socket closed' });
    await expect(source.list('members')).rejects.toThrow('socket closed');

    fake.emit('ready');
    expect(await source.list('members')).toHaveLength(2);
    expect((await source.update('members', 'member-0', d => { d.data.spec = 'large'; })).ok).toBe(true);
  });
});

describe('redis audit stream', () => {
  beforeEach(() => {
    process.env.AUDIT_BACKEND = 'redis';
    process.env.REDIS_URL = 'redis://test';
  });
  afterEach(() => { vi.restoreAllMocks(); });
  afterAll(() => {
    process.env.AUDIT_BACKEND = 'memory';
    delete process.env.REDIS_URL;
  });

  it('reports client errors once instead of crashing', async () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    audit('verification_started', { run: 'r2' });
    await sleep(10);
    const dropped = new Error('connection reset');
    fake.emit('error', dropped);
    fake.emit('error', new Error('still down'));
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[audit] sink error; further errors suppressed:', dropped);
  });

  it('appends rows to the stream and exports newest first', async () => {
    audit('verification_started', { run: 'r1' });
    audit('verification_completed', { run: 'r1', outcome: 'all_succeeded' });
    await sleep(10);

    const entries = fake.streams.get('audit:verification') ?? [];
    expect(entries.map(e => e.message.event)).toEqual(['verification_started', 'verification_completed']);
    const rows: AuditRow[] = [];
    for await (const r of exportAudit({ label: 'r1' })) rows.push(r);
    expect(rows.map(r => r.event)).toEqual(['verification_completed', 'verification_started']);
  });
});
