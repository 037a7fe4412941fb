import path from 'path';
import fs from 'fs-extra';
import { KnowledgeBaseService } from '../service';
import { EmbeddingModelMismatchError, IndexNotFoundError, LoadError } from '../../../errors';
import { HashEmbeddingProvider, InMemoryStore, makeTempDir } from '../../../__tests__/helpers/fakes';

const PARAGRAPHS = [
  'Solar panels convert sunlight into electricity for homes.',
  'The bakery sells sourdough bread every morning.',
  'Mountain bikes need wide tires for rocky trails.',
];

describe('KnowledgeBaseService', () => {
  let dir: string;
  let store: InMemoryStore;
  let embeddings: HashEmbeddingProvider;
  let service: KnowledgeBaseService;
  let guide: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    guide = path.join(dir, 'guide.txt');
    await fs.writeFile(guide, PARAGRAPHS.join('\n\n'));

    store = new InMemoryStore();
    embeddings = new HashEmbeddingProvider();
    service = new KnowledgeBaseService({
      store,
      embeddingProvider: embeddings,
      split: { chunkSize: 80, chunkOverlap: 0 },
    });
    await service.start();
  });

  afterEach(async () => {
    await service.stop();
    await fs.remove(dir);
  });

  it('refuses work before start', async () => {
    const idle = new KnowledgeBaseService({
      store: new InMemoryStore(),
      embeddingProvider: embeddings,
      split: { chunkSize: 80, chunkOverlap: 0 },
    });
    await expect(idle.list()).rejects.toThrow('KnowledgeBaseService not initialized');
  });

  describe('build', () => {
    it('indexes every segment and tags the collection with the embedding model', async () => {
      const handle = await service.build([{ kind: 'text', path: guide }], 'guide');

      expect(handle).toEqual({ collection: 'guide', embeddingModel: 'fake:hash-test' });
      await expect(service.describe('guide')).resolves.toEqual({
        name: 'guide',
        embeddingModel: 'fake:hash-test',
        documentCount: 3,
      });
      const stored = store.collections.get('guide');
      expect(stored?.documents.map((d) => d.offset)).toEqual([0, 59, 108]);
      expect(stored?.documents.every((d) => d.source === 'guide.txt')).toBe(true);
    });

    it('normalizes the collection name', async () => {
      const handle = await service.build([{ kind: 'text', path: guide }], 'my guide-v2');
      expect(handle.collection).toBe('my_guide_v2');
      await expect(service.list()).resolves.toEqual(['my_guide_v2']);
    });

    it('overwrites an existing collection of the same name', async () => {
      await service.build([{ kind: 'text', path: guide }], 'guide');
      await service.build([{ kind: 'text', path: guide }], 'guide');
      await expect(service.describe('guide')).resolves.toMatchObject({ documentCount: 3 });

      const short = path.join(dir, 'short.txt');
      await fs.writeFile(short, 'Only one line here.');
      await service.build([{ kind: 'text', path: short }], 'guide');
      await expect(service.describe('guide')).resolves.toMatchObject({ documentCount: 1 });
    });

    it('combines several sources into one collection', async () => {
      const extra = path.join(dir, 'extra.md');
      await fs.writeFile(extra, 'Lighthouses guide ships along the coast.');

      await service.build([{ kind: 'text', path: guide }, { kind: 'text', path: extra }], 'mixed');
      const sources = store.collections.get('mixed')?.documents.map((d) => d.source);
      expect(sources).toEqual(['guide.txt', 'guide.txt', 'guide.txt', 'extra.md']);
    });

    it('leaves the previous contents in place when a source cannot be loaded', async () => {
      await service.build([{ kind: 'text', path: guide }], 'guide');
      const binary = path.join(dir, 'binary.txt');
      await fs.writeFile(binary, Buffer.from([0x41, 0x00, 0x42]));

      await expect(service.build([{ kind: 'text', path: binary }], 'guide')).rejects.toBeInstanceOf(LoadError);
      await expect(service.describe('guide')).resolves.toMatchObject({ documentCount: 3 });
    });
  });

  describe('open', () => {
    it('returns a handle for an existing collection', async () => {
      await service.build([{ kind: 'text', path: guide }], 'guide');
      await expect(service.open('guide')).resolves.toEqual({ collection: 'guide', embeddingModel: 'fake:hash-test' });
    });

    it('fails for a collection that was never built', async () => {
      await expect(service.open('nothing')).rejects.toBeInstanceOf(IndexNotFoundError);
    });

    it('fails when the collection was embedded with another model', async () => {
      await service.build([{ kind: 'text', path: guide }], 'guide');
      const other = new KnowledgeBaseService({
        store,
        embeddingProvider: new HashEmbeddingProvider('other'),
        split: { chunkSize: 80, chunkOverlap: 0 },
      });
      await other.start();

      await expect(other.open('guide')).rejects.toThrow(
        'Knowledge base "guide" was embedded with fake:hash-test but the configured embedding model is fake:other; rebuild it'
      );
    });
  });

  describe('retrieve', () => {
    it('returns the closest passages first', async () => {
      const handle = await service.build([{ kind: 'text', path: guide }], 'guide');

      const context = await service.retrieve(handle, 'Where can I buy sourdough bread?', 2);
      expect(context).toHaveLength(2);
      expect(context[0]).toMatchObject({ text: PARAGRAPHS[1], source: 'guide.txt', offset: 59 });
      expect(context[0].score).toBeGreaterThan(context[1].score);
    });

    it('returns at most as many passages as the collection holds', async () => {
      const handle = await service.build([{ kind: 'text', path: guide }], 'guide');
      await expect(service.retrieve(handle, 'bikes', 10)).resolves.toHaveLength(3);
    });

    it('returns nothing for an empty collection without embedding the query', async () => {
      const empty = path.join(dir, 'empty.txt');
      await fs.writeFile(empty, '');
      const handle = await service.build([{ kind: 'text', path: empty }], 'empty');
      embeddings.calls = [];

      await expect(service.retrieve(handle, 'anything', 4)).resolves.toEqual([]);
      expect(embeddings.calls).toEqual([]);
    });

    it('fails for a deleted collection', async () => {
      const handle = await service.build([{ kind: 'text', path: guide }], 'guide');
      await service.delete('guide');

      await expect(service.retrieve(handle, 'bread', 4)).rejects.toBeInstanceOf(IndexNotFoundError);
      await expect(service.list()).resolves.toEqual([]);
    });

    it('fails for a handle from another embedding model', async () => {
      await service.build([{ kind: 'text', path: guide }], 'guide');
      await expect(
        service.retrieve({ collection: 'guide', embeddingModel: 'fake:other' }, 'bread', 4)
      ).rejects.toBeInstanceOf(EmbeddingModelMismatchError);
    });
  });

  it('closes the store on stop', async () => {
    await service.stop();
    expect(store.closed).toBe(true);
  });
});
