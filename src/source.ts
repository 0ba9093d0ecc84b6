import type { Config } from './config.js';
import type { Entity } from './types.js';

/**
 * Collection source: the read/write boundary to the orchestrated system.
 * Responsibility: return snapshot copies (never live references) and apply single-entity mutations.
 * Non-goals: retries or backoff; scenario code retries the evaluation that performs these calls.
 */

export type UpdateResult =
  | { ok: true; entity: Entity }
  | { ok: false; reason: 'not_found' | 'error'; message: string };

export type Selector = Record<string, string>;

export interface CollectionSource {
  list(collection: string, selector?: Selector): Promise<Entity[]>;
  update(collection: string, name: string, mutate: (draft: Entity) => void): Promise<UpdateResult>;
  remove(collection: string, name: string): Promise<boolean>;
}

/** A source holding a connection; `close` releases it. */
export type ClosableSource = CollectionSource & { close(): Promise<void> };

export interface MemorySource extends ClosableSource {
  seed(collection: string, entities: Array<Omit<Entity, 'revision'> & { revision?: number }>): void;
  clear(): void;
}

export function matchesSelector(entity: Entity, selector?: Selector): boolean {
  if (!selector) return true;
  return Object.entries(selector).every(([k, v]) => entity.labels?.[k] === v);
}

// In-memory implementation (default)
export function createMemorySource(): MemorySource {
  const collections = new Map<string, Map<string, Entity>>();
  const bucket = (collection: string) => {
    let c = collections.get(collection);
    if (!c) { c = new Map(); collections.set(collection, c); }
    return c;
  };
  return {
    async list(collection, selector) {
      return [...bucket(collection).values()].filter(e => matchesSelector(e, selector)).map(e => structuredClone(e));
    },
    async update(collection, name, mutate) {
      const current = bucket(collection).get(name);
      if (!current) return { ok: false, reason: 'not_found', message: `${collection}/${name} not found` };
      const draft = structuredClone(current);
      try { mutate(draft); } catch (e) { return { ok: false, reason: 'error', message: e instanceof Error ? e.message : String(e) }; }
      // name is the key; a mutation cannot rename
      const next: Entity = { ...draft, name, revision: current.revision + 1 };
      bucket(collection).set(name, next);
      return { ok: true, entity: structuredClone(next) };
    },
    async remove(collection, name) {
      return bucket(collection).delete(name);
    },
    seed(collection, entities) {
      const c = bucket(collection);
      for (const e of entities) c.set(e.name, structuredClone({ ...e, revision: e.revision ?? 0 }));
    },
    clear() { collections.clear(); },
    async close() { collections.clear(); }
  };
}

/** Backend chosen by SOURCE_BACKEND; the redis module is only loaded when selected. */
export async function createSource(cfg: Pick<Config, 'sourceBackend' | 'redisUrl'>): Promise<ClosableSource> {
  if (cfg.sourceBackend === 'redis') {
    const mod = await import('./source/redis.js');
    return await mod.createRedisSource(cfg.redisUrl || 'redis://localhost:6379');
  }
  return createMemorySource();
}
