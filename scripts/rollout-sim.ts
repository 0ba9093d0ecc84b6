#!/usr/bin/env tsx
/**
 * Rollout simulation: a fake controller replaces the member in one index while three checks run
 * concurrently under one shared deadline. Exits 0 when verification succeeds, 1 otherwise.
 * Usage: npm run simulate [-- --index=1 --surge=2 --timeout-ms=10000]
 *  --surge=2 lets the controller exceed surge capacity, so the run should fail early.
 */
import { createMemorySource, type CollectionSource, type MemorySource } from '../src/source.js';
import { runConcurrently } from '../src/supervisor.js';
import { entityForIndex, updateEntityAtIndex, describeResult } from '../src/scenario.js';
import { trailingIndex } from '../src/lookup.js';
import { serializePrometheus } from '../src/metrics.js';

const MEMBERS = 'members';
const SETS = 'sets';
const SELECTOR = { role: 'control' };
const indexOf = trailingIndex();

function arg(name: string, def: number): number {
  const hit = process.argv.find(a => a.startsWith(`--${name}=`));
  return hit ? Number(hit.split('=')[1]) : def;
}

function seed(source: MemorySource, desired: number) {
  source.seed(SETS, [{ name: 'group', data: { desired, spec: 'small', replicas: desired, updated: desired, ready: desired } }]);
  source.seed(MEMBERS, Array.from({ length: desired }, (_, i) => ({
    name: `member-${i}`, labels: SELECTOR, data: { spec: 'small', phase: 'Running' }
  })));
}

/** One reconcile step per tick: provision, promote, retire, then publish status. */
async function startController(source: MemorySource, surge: number): Promise<() => void> {
  let generation = 0;
  async function tick() {
    const [set] = await source.list(SETS);
    if (!set) return;
    const desired = Number(set.data.desired);
    const want = set.data.spec;
    let members = await source.list(MEMBERS, SELECTOR);
    for (const m of members.filter(x => x.data.phase === 'Provisioning')) {
      await source.update(MEMBERS, m.name, d => { d.data.phase = 'Running'; });
    }
    for (const old of members.filter(x => x.data.spec !== want)) {
      const idx = indexOf(old.name);
      const replacement = members.find(x => x.name !== old.name && indexOf(x.name) === idx && x.data.spec === want);
      if (replacement?.data.phase === 'Running') {
        await source.remove(MEMBERS, old.name);
      } else if (!replacement) {
        for (let i = 0; i < surge && members.length < desired + surge; i++) {
          generation++;
          source.seed(MEMBERS, [{ name: `member-g${generation}-${idx}`, labels: SELECTOR, data: { spec: want, phase: 'Provisioning' } }]);
          members = await source.list(MEMBERS, SELECTOR);
        }
      }
    }
    members = await source.list(MEMBERS, SELECTOR);
    await source.update(SETS, 'group', d => {
      d.data.replicas = members.length;
      d.data.updated = members.filter(x => x.data.spec === want).length;
      d.data.ready = members.filter(x => x.data.phase === 'Running').length;
    });
  }
  // First pass before returning so status already reflects the outdated member.
  await tick();
  const timer = setInterval(() => { tick().catch(e => console.error('controller tick failed', e)); }, 100);
  return () => clearInterval(timer);
}

async function groupStatus(source: CollectionSource) {
  const [set] = await source.list(SETS);
  return set?.data;
}

async function main() {
  const index = arg('index', 1);
  const surge = arg('surge', 1);
  const timeoutMs = arg('timeout-ms', 10_000);
  const source = createMemorySource();
  seed(source, 3);

  const original = await updateEntityAtIndex(source, MEMBERS, index, d => { d.data.spec = 'large'; }, { timeoutMs: 2000, intervalMs: 100 }, { selector: SELECTOR });
  console.log(`Simulate: ${original.name} marked outdated`);
  const stop = await startController(source, surge);

  const result = await runConcurrently([
    {
      label: 'surge capacity',
      kind: 'consistently',
      check: async () => (await source.list(MEMBERS, SELECTOR)).length <= 4
    },
    {
      label: 'desired replicas',
      check: async () => {
        const s = await groupStatus(source);
        return !!s && s.replicas === s.desired && s.updated === s.desired && s.ready === s.desired;
      }
    },
    {
      label: `rollout for index ${index}`,
      check: async () => {
        // Two members share the index mid-rollout; that is "not yet", not a failure.
        const res = await entityForIndex(source, MEMBERS, index, { selector: SELECTOR });
        return res.status === 'found' && res.entity.name !== original.name && res.entity.data.phase === 'Running';
      }
    }
  ], { timeoutMs, intervalMs: 50, name: 'rollout-sim' });
  stop();

  console.log(describeResult(result));
  console.log(serializePrometheus());
  if (result.status !== 'all_succeeded') process.exit(1);
}

main().catch(err => { console.error('SIMULATE_FAIL', err instanceof Error ? err.message : err); process.exit(1); });
