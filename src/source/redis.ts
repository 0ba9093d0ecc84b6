import { createClient } from 'redis';
import { EntitySchema, type Entity } from '../types.js';
import { matchesSelector, type ClosableSource } from '../source.js';

/**
 * Redis collection source.
 * Keys:
 *  collection:{name} -> hash of entity name -> JSON Entity
 * Values are parsed (and validated) on every read, so callers always receive fresh copies.
 */
export async function createRedisSource(url: string): Promise<ClosableSource> {
  const client = createClient({ url });
  // Socket errors surface on the next call until the client reconnects.
  let broken: Error | undefined;
  client.on('error', (e: unknown) => { broken = e instanceof Error ? e : new Error(String(e)); });
  client.on('ready', () => { broken = undefined; });
  await client.connect();
  const key = (collection: string) => `collection:${collection}`;

  function parse(raw: string): Entity {
    return EntitySchema.parse(JSON.parse(raw));
  }

  return {
    async list(collection, selector) {
      if (broken) throw broken;
      const all = await client.hGetAll(key(collection));
      return Object.values(all).map(parse).filter(e => matchesSelector(e, selector));
    },
    async update(collection, name, mutate) {
      if (broken) return { ok: false, reason: 'error', message: broken.message };
      try {
        const raw = await client.hGet(key(collection), name);
        if (!raw) return { ok: false, reason: 'not_found', message: `${collection}/${name} not found` };
        const current = parse(raw);
        const draft = structuredClone(current);
        mutate(draft);
        const next: Entity = { ...draft, name, revision: current.revision + 1 };
        await client.hSet(key(collection), name, JSON.stringify(next));
        return { ok: true, entity: next };
      } catch (e) {
        return { ok: false, reason: 'error', message: e instanceof Error ? e.message : String(e) };
      }
    },
    async remove(collection, name) {
      return (await client.hDel(key(collection), name)) > 0;
    },
    async close() {
      await client.quit();
    }
  };
}
