import path from 'path';
import fs from 'fs-extra';
import { SQLiteStore } from '../store_sqlite';
import { KnowledgeDocument } from '../types';
import { makeTempDir } from '../../../__tests__/helpers/fakes';

function doc(id: string, text: string, vector: number[], offset: number = 0): KnowledgeDocument {
  return { id, text, source: 'notes.txt', offset, vector, created_at: 1700000000000 };
}

describe('SQLiteStore', () => {
  let dir: string;
  let storagePath: string;
  let store: SQLiteStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    storagePath = path.join(dir, 'knowledge');
    store = new SQLiteStore(storagePath);
    await store.initialize();
  });

  afterEach(async () => {
    await store.close();
    await fs.remove(dir);
  });

  it('creates the storage directory', async () => {
    await expect(fs.pathExists(storagePath)).resolves.toBe(true);
  });

  it('tags a new collection with its embedding model', async () => {
    await store.createCollection('manual', 'ollama:nomic-embed-text');

    await expect(store.hasCollection('manual')).resolves.toBe(true);
    await expect(store.getCollectionInfo('manual')).resolves.toEqual({
      name: 'manual',
      embeddingModel: 'ollama:nomic-embed-text',
      documentCount: 0,
    });
    await expect(store.search('manual', [1, 0, 0], 4)).resolves.toEqual([]);
  });

  it('reports unknown collections as missing', async () => {
    await expect(store.hasCollection('ghost')).resolves.toBe(false);
    await expect(store.getCollectionInfo('ghost')).resolves.toBeUndefined();
  });

  it('returns nearest documents with cosine scores', async () => {
    await store.createCollection('manual', 'test:model');
    await store.addDocuments('manual', [
      doc('a', 'east', [1, 0, 0], 0),
      doc('b', 'north', [0, 1, 0], 10),
      doc('c', 'north-east', [0.6, 0.8, 0], 20),
    ]);

    const results = await store.search('manual', [2, 0, 0], 2);
    expect(results.map((r) => r.document.id)).toEqual(['a', 'c']);
    expect(results[0].score).toBeCloseTo(1, 5);
    expect(results[1].score).toBeCloseTo(0.6, 5);
    expect(results[1].document).toEqual({
      id: 'c',
      text: 'north-east',
      source: 'notes.txt',
      offset: 20,
      created_at: 1700000000000,
    });
    await expect(store.getCollectionInfo('manual')).resolves.toMatchObject({ dimension: 3, documentCount: 3 });
  });

  it('rejects vectors of another dimension', async () => {
    await store.createCollection('manual', 'test:model');
    await store.addDocuments('manual', [doc('a', 'east', [1, 0, 0])]);

    await expect(store.addDocuments('manual', [doc('b', 'flat', [1, 0])])).rejects.toThrow(
      'Collection stores 3-dimensional vectors but received 2'
    );
  });

  it('lists collections by name', async () => {
    await store.createCollection('zeta', 'test:model');
    await store.createCollection('alpha', 'test:model');

    await expect(store.listCollections()).resolves.toEqual(['alpha', 'zeta']);
  });

  it('deletes the database files of a collection', async () => {
    await store.createCollection('manual', 'test:model');
    await store.addDocuments('manual', [doc('a', 'east', [1, 0, 0])]);

    await store.deleteCollection('manual');
    await expect(store.hasCollection('manual')).resolves.toBe(false);
    await expect(fs.readdir(storagePath)).resolves.toEqual([]);
  });

  it('never creates a database file when reading', async () => {
    await store.createCollection('manual', 'test:model');
    await store.addDocuments('manual', [doc('a', 'east', [1, 0, 0])]);
    await store.deleteCollection('manual');

    await expect(store.search('manual', [1, 0, 0], 4)).resolves.toEqual([]);
    await expect(store.search('ghost', [1, 0, 0], 4)).resolves.toEqual([]);
    await expect(store.getCollectionInfo('manual')).resolves.toBeUndefined();
    await expect(fs.readdir(storagePath)).resolves.toEqual([]);
    await expect(store.listCollections()).resolves.toEqual([]);
  });

  it('keeps collections across store instances', async () => {
    await store.createCollection('manual', 'test:model');
    await store.addDocuments('manual', [doc('a', 'east', [1, 0, 0]), doc('b', 'north', [0, 1, 0])]);
    await store.close();

    store = new SQLiteStore(storagePath);
    await store.initialize();
    await expect(store.getCollectionInfo('manual')).resolves.toEqual({
      name: 'manual',
      embeddingModel: 'test:model',
      dimension: 3,
      documentCount: 2,
    });
    const results = await store.search('manual', [0, 1, 0], 1);
    expect(results.map((r) => r.document.text)).toEqual(['north']);
  });
});
