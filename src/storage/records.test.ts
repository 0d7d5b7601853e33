import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile, mkdir } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { RecordStore } from './records.js';
import { StoreError } from '../errors.js';

const schema = z.object({ value: z.string() });

describe('RecordStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'jira-git-issue-records-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createStore(storeDir = dir): RecordStore<{ value: string }> {
    return new RecordStore({ dir: storeDir, fileName: 'records.json', schema });
  }

  it('reads an empty store when the file does not exist', async () => {
    const store = createStore();
    expect(await store.load()).toEqual({});
    expect(await store.get('a')).toBeUndefined();
  });

  it('writes a versioned file and returns the previous value', async () => {
    const store = createStore();
    expect(await store.put('a', { value: 'one' })).toBeUndefined();
    expect(await store.put('a', { value: 'two' })).toEqual({ value: 'one' });

    const content = JSON.parse(await readFile(join(dir, 'records.json'), 'utf-8'));
    expect(content).toEqual({ version: 1, records: { a: { value: 'two' } } });
  });

  it('leaves no temp files behind', async () => {
    const store = createStore();
    await store.put('a', { value: 'one' });
    await store.put('b', { value: 'two' });
    expect(await readdir(dir)).toEqual(['records.json']);
  });

  it('creates a missing config directory', async () => {
    const nested = join(dir, 'nested', 'config');
    const store = createStore(nested);
    await store.put('a', { value: 'one' });
    expect(await createStore(nested).get('a')).toEqual({ value: 'one' });
  });

  it('deletes entries', async () => {
    const store = createStore();
    await store.put('a', { value: 'one' });
    expect(await store.delete('a')).toBe(true);
    expect(await store.delete('a')).toBe(false);
    expect(await store.entries()).toEqual([]);
  });

  it('treats corrupt or foreign files as empty', async () => {
    const file = join(dir, 'records.json');
    const store = createStore();

    await writeFile(file, '{ not json');
    expect(await store.load()).toEqual({});

    await writeFile(file, JSON.stringify({ version: 1, records: { a: { value: 42 } } }));
    expect(await store.load()).toEqual({});

    await writeFile(file, JSON.stringify({ version: 2, records: {} }));
    expect(await store.load()).toEqual({});

    await store.put('b', { value: 'fresh' });
    expect(await store.load()).toEqual({ b: { value: 'fresh' } });
  });

  it('drops only the records that fail the schema', async () => {
    const file = join(dir, 'records.json');
    await writeFile(file, JSON.stringify({
      version: 1,
      records: { a: { value: 'one' }, b: { value: 42 } },
    }));
    const store = createStore();

    expect(await store.load()).toEqual({ a: { value: 'one' } });

    await store.put('c', { value: 'three' });
    expect(await store.load()).toEqual({ a: { value: 'one' }, c: { value: 'three' } });
  });

  it('does not treat inherited properties as records', async () => {
    expect(await createStore().get('toString')).toBeUndefined();
  });

  it('raises PersistError when the target cannot be written', async () => {
    // a directory where the file should be makes rename fail
    await mkdir(join(dir, 'records.json'));
    const store = createStore();

    await expect(store.put('a', { value: 'one' })).rejects.toBeInstanceOf(StoreError);
    await expect(store.put('a', { value: 'one' })).rejects.toMatchObject({ kind: 'PersistError' });
    expect(await readdir(dir)).toEqual(['records.json']);
  });
});
