import { describe, expect, it } from 'vitest';
import { MemoryCollectionStore } from './memoryCollectionStore.js';
import { createSequenceClock, createSequenceIds } from './testClock.js';

const T1 = '2024-03-01T10:00:00.000Z';
const T2 = '2024-03-02T11:30:00.000Z';

const createStore = () =>
  new MemoryCollectionStore('resumes', {
    now: createSequenceClock(T1, T2),
    generateId: createSequenceIds()
  });

describe('MemoryCollectionStore', () => {
  it('returns an empty list for a new collection', async () => {
    const store = createStore();
    expect(await store.readAll()).toEqual([]);
  });

  it('returns the added fields plus the generated id and timestamps', async () => {
    const store = createStore();
    const id = await store.addItem({ name: 'Ada', skills: ['TypeScript'] });

    expect(id).toBe('rec-1');
    expect(await store.getItem(id)).toEqual({
      name: 'Ada',
      skills: ['TypeScript'],
      id: 'rec-1',
      created_at: T1,
      updated_at: T1
    });
  });

  it('ignores caller supplied ids and timestamps', async () => {
    const store = createStore();
    const id = await store.addItem({ name: 'Ada', id: 'forged', created_at: '1999-01-01T00:00:00.000Z' });

    expect(id).toBe('rec-1');
    expect(await store.getItem('forged')).toBeNull();
    expect((await store.getItem('rec-1'))?.created_at).toBe(T1);
  });

  it('returns null for an unknown id', async () => {
    const store = createStore();
    await store.addItem({ name: 'Ada' });
    expect(await store.getItem('missing')).toBeNull();
  });

  it('returns identical sequences for repeated reads', async () => {
    const store = createStore();
    await store.addItem({ name: 'Ada' });
    await store.addItem({ name: 'Grace' });

    const first = await store.readAll();
    const second = await store.readAll();
    expect(second).toEqual(first);
    expect(first.map((record) => record.name)).toEqual(['Ada', 'Grace']);
  });

  it('merges only the supplied fields and refreshes updated_at', async () => {
    const store = new MemoryCollectionStore('resumes', {
      now: createSequenceClock(T1, T2),
      generateId: createSequenceIds()
    });
    const id = await store.addItem({ name: 'Ada', position: 'Engineer', experience: 3 });

    const updated = await store.updateItem(id, { experience: 5, id: 'other', created_at: 'x' });

    expect(updated).toBe(true);
    expect(await store.getItem(id)).toEqual({
      name: 'Ada',
      position: 'Engineer',
      experience: 5,
      id: 'rec-1',
      created_at: T1,
      updated_at: T2
    });
  });

  it('reports not-found when updating an unknown id', async () => {
    const store = createStore();
    await store.addItem({ name: 'Ada' });
    const before = await store.readAll();

    expect(await store.updateItem('missing', { name: 'Grace' })).toBe(false);
    expect(await store.readAll()).toEqual(before);
  });

  it('deletes a record and reports not-found for an unknown id', async () => {
    const store = createStore();
    const first = await store.addItem({ name: 'Ada' });
    await store.addItem({ name: 'Grace' });
    const before = await store.readAll();

    expect(await store.deleteItem('missing')).toBe(false);
    expect(await store.readAll()).toEqual(before);

    expect(await store.deleteItem(first)).toBe(true);
    expect((await store.readAll()).map((record) => record.id)).toEqual(['rec-2']);
  });

  it('filters by conjunctive deep equality', async () => {
    const store = createStore();
    await store.addItem({ name: 'Ada', position: 'Engineer', skills: ['Go', 'SQL'] });
    await store.addItem({ name: 'Grace', position: 'Engineer', skills: ['COBOL'] });
    await store.addItem({ name: 'Linus', position: 'Maintainer', skills: ['Go', 'SQL'] });

    const engineers = await store.findItems({ position: 'Engineer' });
    expect(engineers.map((record) => record.name)).toEqual(['Ada', 'Grace']);

    const goEngineers = await store.findItems({ position: 'Engineer', skills: ['Go', 'SQL'] });
    expect(goEngineers.map((record) => record.name)).toEqual(['Ada']);

    expect(await store.findItems({ skills: ['SQL', 'Go'] })).toEqual([]);
    expect(await store.findItems({})).toHaveLength(3);
  });

  it('keeps every record when adds overlap', async () => {
    const store = new MemoryCollectionStore('resumes');
    const ids = await Promise.all(Array.from({ length: 20 }, (_, index) => store.addItem({ index })));

    const records = await store.readAll();
    expect(new Set(ids).size).toBe(20);
    expect(records).toHaveLength(20);
  });

  it('does not expose its internal state through returned records', async () => {
    const store = createStore();
    const id = await store.addItem({ skills: ['Go'] });
    const record = await store.getItem(id);
    if (record && Array.isArray(record.skills)) {
      record.skills.push('Rust');
    }
    expect((await store.getItem(id))?.skills).toEqual(['Go']);
  });
});
