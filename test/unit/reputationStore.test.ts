import { describe, expect, it } from 'vitest';
import { createClassifier } from '../../src/reputation/classifier.js';
import { createSnapshot, snapshotContains } from '../../src/reputation/snapshot.js';
import { ReputationStore } from '../../src/reputation/store.js';
import { VERDICT_PRECEDENCE } from '../../src/reputation/verdict.js';
import { addr, entries, snapshot } from './_helpers.js';

describe('ReputationStore', () => {
  it('answers SAFE before any feed has loaded', () => {
    const store = new ReputationStore();
    expect(store.classify(addr('203.0.113.5'))).toBe('SAFE');
    expect(store.snapshots()).toEqual([]);
    expect(store.get('firehol_level1')).toBeUndefined();
  });

  it('checks categories in precedence order', () => {
    expect(VERDICT_PRECEDENCE).toEqual(['FLAGGED', 'DATACENTER', 'TOR_EXIT']);

    const store = new ReputationStore();
    store.replace('tor', snapshot('tor', 'TOR_EXIT', '192.0.2.99', '198.51.100.7'));
    store.replace('dc', snapshot('dc', 'DATACENTER', '192.0.2.0/24', '203.0.113.0/24'));
    store.replace('fh', snapshot('fh', 'FLAGGED', '203.0.113.0/24'));

    expect(store.classify(addr('203.0.113.5'))).toBe('FLAGGED');
    expect(store.classify(addr('192.0.2.99'))).toBe('DATACENTER');
    expect(store.classify(addr('198.51.100.7'))).toBe('TOR_EXIT');
    expect(store.classify(addr('198.51.100.8'))).toBe('SAFE');
  });

  it('matches exact addresses and ranges across several feeds of one category', () => {
    const store = new ReputationStore();
    store.replace('oci', snapshot('oci', 'DATACENTER', '192.0.2.0/25'));
    store.replace('do', snapshot('do', 'DATACENTER', '2001:db8::/32'));

    expect(store.matches('DATACENTER', addr('192.0.2.100'))).toBe(true);
    expect(store.matches('DATACENTER', addr('192.0.2.200'))).toBe(false);
    expect(store.matches('DATACENTER', addr('2001:db8::5'))).toBe(true);
    expect(store.matches('FLAGGED', addr('2001:db8::5'))).toBe(false);
  });

  it('replaces a feed snapshot as a whole', () => {
    const store = new ReputationStore();
    store.replace('fh', snapshot('fh', 'FLAGGED', '10.0.0.0/8'));
    store.replace('fh', snapshot('fh', 'FLAGGED', '172.16.0.0/12'));

    expect(store.classify(addr('10.1.1.1'))).toBe('SAFE');
    expect(store.classify(addr('172.16.5.5'))).toBe('FLAGGED');
    expect(store.snapshots()).toHaveLength(1);
  });

  it('moves a feed that changed category', () => {
    const store = new ReputationStore();
    store.replace('x', snapshot('x', 'TOR_EXIT', '192.0.2.1'));
    store.replace('x', snapshot('x', 'DATACENTER', '192.0.2.1'));

    expect(store.classify(addr('192.0.2.1'))).toBe('DATACENTER');
    expect(store.matches('TOR_EXIT', addr('192.0.2.1'))).toBe(false);
    expect(store.get('x')?.category).toBe('DATACENTER');
  });

  it('rejects a snapshot installed under another feed id', () => {
    const store = new ReputationStore();
    expect(() => store.replace('a', snapshot('b', 'FLAGGED', '192.0.2.1'))).toThrow(
      'snapshot for "b" cannot be installed as "a"'
    );
  });

  it('keeps the last installed snapshot when no replacement arrives', () => {
    const store = new ReputationStore();
    store.replace('fh', snapshot('fh', 'FLAGGED', '203.0.113.0/24'));

    // A failed refresh never calls replace(); reads keep seeing the old data.
    for (let i = 0; i < 3; i++) expect(store.classify(addr('203.0.113.5'))).toBe('FLAGGED');
  });

  it('never exposes a partially installed snapshot to concurrent readers', async () => {
    const store = new ReputationStore();
    const size = 500;
    const oldSet = createSnapshot({
      feedId: 'fh',
      category: 'FLAGGED',
      entries: entries(...Array.from({ length: size }, (_, i) => `10.${Math.floor(i / 256)}.${i % 256}.1`))
    });
    const newSet = createSnapshot({
      feedId: 'fh',
      category: 'FLAGGED',
      entries: entries(...Array.from({ length: size }, (_, i) => `172.16.${Math.floor(i / 256)}.${i % 256}`))
    });
    store.replace('fh', oldSet);

    const probes = [addr('10.0.0.1'), addr('10.1.243.1'), addr('172.16.0.0'), addr('172.16.1.243')];
    const observed = new Set<string>();

    const writer = (async () => {
      for (let i = 0; i < 200; i++) {
        store.replace('fh', i % 2 === 0 ? newSet : oldSet);
        await Promise.resolve();
      }
    })();

    const readers = Array.from({ length: 8 }, async () => {
      for (let i = 0; i < 200; i++) {
        const current = store.get('fh');
        observed.add(probes.map((p) => store.matches('FLAGGED', p)).join(','));
        expect(current === oldSet || current === newSet).toBe(true);
        expect(current?.entries).toHaveLength(size);
        await Promise.resolve();
      }
    });

    await Promise.all([writer, ...readers]);

    for (const result of observed) {
      expect(['true,true,false,false', 'false,false,true,true']).toContain(result);
    }
  });
});

describe('snapshots', () => {
  it('are frozen', () => {
    const snap = snapshot('fh', 'FLAGGED', '192.0.2.1', '10.0.0.0/8');
    expect(Object.isFrozen(snap)).toBe(true);
    expect(Object.isFrozen(snap.entries)).toBe(true);
    expect(snap.networks).toHaveLength(1);
    expect(snap.addresses.size).toBe(1);
    expect(snapshotContains(snap, addr('192.0.2.1'))).toBe(true);
  });
});

describe('classifier', () => {
  it('classifies address text and rejects non-literals', () => {
    const store = new ReputationStore();
    store.replace('tor', snapshot('tor', 'TOR_EXIT', '192.0.2.99'));
    const classifier = createClassifier(store);

    expect(classifier.classifyText('192.0.2.99')).toBe('TOR_EXIT');
    expect(classifier.classifyText('::ffff:192.0.2.99')).toBe('TOR_EXIT');
    expect(classifier.classifyText('198.51.100.7')).toBe('SAFE');
    expect(classifier.classifyText('not-an-ip')).toBeNull();
    expect(classifier.classify(addr('192.0.2.99'))).toBe('TOR_EXIT');
  });
});
