import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as Y from 'yjs';

import { RoomLoadError, UpdateStoreNotFound } from '../src/errors.js';
import {
  decodeUpdateRecords,
  encodeUpdateRecord,
  FileUpdateStore,
  STORE_ORIGIN,
} from '../src/rooms/update-store.js';
import { createTempDir, removeTempDir } from './helpers.js';

function captureUpdates(doc: Y.Doc): Uint8Array[] {
  const updates: Uint8Array[] = [];
  doc.on('update', (update: Uint8Array) => {
    updates.push(update);
  });
  return updates;
}

describe('update records', () => {
  it('prefixes each update with its var-uint length', () => {
    expect([...encodeUpdateRecord(new Uint8Array([7, 8, 9]))]).toEqual([
      3, 7, 8, 9,
    ]);
  });

  it('splits concatenated records', () => {
    const data = new Uint8Array([
      ...encodeUpdateRecord(new Uint8Array([1])),
      ...encodeUpdateRecord(new Uint8Array([2, 3])),
    ]);
    const log = decodeUpdateRecords(data);

    expect(log.updates.map((record) => [...record])).toEqual([[1], [2, 3]]);
    expect(log.validLength).toBe(5);
    expect(log.failure).toBeNull();
  });

  it('stops at a record that runs past the end and keeps the prefix', () => {
    const log = decodeUpdateRecords(new Uint8Array([1, 9, 5, 1]));

    expect(log.updates.map((record) => [...record])).toEqual([[9]]);
    expect(log.validLength).toBe(2);
    expect(log.failure).toBe('Record declares 5 bytes but only 1 remain');
  });
});

describe('FileUpdateStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir('store');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('names the log after the encoded room name', () => {
    expect(FileUpdateStore.forRoom('/data', 'lean/main doc').path).toBe(
      '/data/lean%2Fmain%20doc.ystore',
    );
  });

  it('throws UpdateStoreNotFound when nothing was written', async () => {
    const store = FileUpdateStore.forRoom(dir, 'empty');
    await expect(store.applyUpdates(new Y.Doc())).rejects.toBeInstanceOf(
      UpdateStoreNotFound,
    );
  });

  it('replays appended updates into a fresh document', async () => {
    const source = new Y.Doc();
    const updates = captureUpdates(source);
    source.getText('content').insert(0, 'theorem t : True');
    source.getText('content').insert(16, ' := trivial');

    const store = FileUpdateStore.forRoom(dir, 'main');
    for (const update of updates) {
      void store.write(update);
    }
    await store.flush();

    const target = new Y.Doc();
    const origins: unknown[] = [];
    target.on('update', (_update: Uint8Array, origin: unknown) => {
      origins.push(origin);
    });
    await store.applyUpdates(target);

    expect(target.getText('content').toString()).toBe(
      'theorem t : True := trivial',
    );
    expect(origins).toEqual([STORE_ORIGIN]);
  });

  it('reports a corrupt log as RoomLoadError', async () => {
    const store = FileUpdateStore.forRoom(dir, 'broken');
    await writeFile(store.path, new Uint8Array([5, 1]));

    await expect(store.applyUpdates(new Y.Doc())).rejects.toBeInstanceOf(
      RoomLoadError,
    );
  });

  it('replays the intact prefix of a torn log and cuts the damaged tail', async () => {
    const source = new Y.Doc();
    source.getText('content').insert(0, 'hello');
    const intact = encodeUpdateRecord(Y.encodeStateAsUpdate(source));
    const store = FileUpdateStore.forRoom(dir, 'torn');
    await writeFile(store.path, new Uint8Array([...intact, 50, 1, 2, 3]));

    const target = new Y.Doc();
    await expect(store.applyUpdates(target)).rejects.toThrow(
      `Update log ${store.path} is corrupt after 1 records (Record declares 50 bytes but only 3 remain); truncated to ${intact.length} bytes`,
    );

    expect(target.getText('content').toString()).toBe('hello');
    expect([...(await readFile(store.path))]).toEqual([...intact]);
  });

  it('keeps edits made after recovering a torn log', async () => {
    const source = new Y.Doc();
    source.getText('content').insert(0, 'hello');
    const store = FileUpdateStore.forRoom(dir, 'torn');
    await writeFile(
      store.path,
      new Uint8Array([
        ...encodeUpdateRecord(Y.encodeStateAsUpdate(source)),
        50,
        1,
        2,
        3,
      ]),
    );

    const live = new Y.Doc();
    await expect(store.applyUpdates(live)).rejects.toBeInstanceOf(
      RoomLoadError,
    );
    const edits = captureUpdates(live);
    live.getText('content').insert(0, 'NEW EDIT ');
    for (const update of edits) {
      void store.write(update);
    }
    await store.flush();

    const reloaded = new Y.Doc();
    await store.applyUpdates(reloaded);
    expect(reloaded.getText('content').toString()).toBe('NEW EDIT hello');
  });

  it('rejects a write whose directory is missing, then keeps working', async () => {
    const store = new FileUpdateStore(join(dir, 'missing', 'room.ystore'));
    await expect(store.write(new Uint8Array([1]))).rejects.toThrow();
    await expect(store.flush()).resolves.toBeUndefined();
  });
});
