import { v4 as uuidv4 } from 'uuid';
import {
  CollectionInfo,
  EmbeddingProvider,
  IndexHandle,
  KnowledgeBaseStore,
  KnowledgeDocument,
  KnowledgeSource,
  RetrievedContext,
  Segment,
  toCollectionName,
} from './types';
import { loadSegments, SplitOptions } from './loader';
import { SQLiteStore } from './store_sqlite';
import { createEmbeddingProvider } from './embedding';
import { KnowledgeBaseConfig } from '../../config/schema';
import { EmbeddingModelMismatchError, IndexNotFoundError } from '../../errors';
import { resolveFromRoot } from '../../utils/paths';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Knowledge' });

export interface KnowledgeBaseServiceOptions {
  store: KnowledgeBaseStore;
  embeddingProvider: EmbeddingProvider;
  split: SplitOptions;
}

export class KnowledgeBaseService {
  private store: KnowledgeBaseStore;
  private embeddingProvider: EmbeddingProvider;
  private split: SplitOptions;
  private initialized: boolean = false;

  constructor(options: KnowledgeBaseServiceOptions) {
    this.store = options.store;
    this.embeddingProvider = options.embeddingProvider;
    this.split = options.split;
  }

  static fromConfig(config: KnowledgeBaseConfig): KnowledgeBaseService {
    return new KnowledgeBaseService({
      store: new SQLiteStore(resolveFromRoot(config.storage_path)),
      embeddingProvider: createEmbeddingProvider(config.embedding),
      split: { chunkSize: config.chunk_size, chunkOverlap: config.chunk_overlap },
    });
  }

  get embeddingModel(): string {
    return this.embeddingProvider.modelId;
  }

  async start(): Promise<void> {
    if (this.initialized) return;
    await this.store.initialize();
    this.initialized = true;
    log.info(`KnowledgeBaseService started (embedding model ${this.embeddingModel})`);
  }

  async stop(): Promise<void> {
    await this.store.close();
    this.initialized = false;
  }

  private ensureStarted(): void {
    if (!this.initialized) throw new Error('KnowledgeBaseService not initialized');
  }

  /**
   * Replaces the contents of `collectionName` with the segments of `sources`.
   * Every source is parsed before anything is written, so a LoadError leaves
   * the previous contents in place.
   */
  async build(sources: KnowledgeSource[], collectionName: string): Promise<IndexHandle> {
    this.ensureStarted();
    const collection = toCollectionName(collectionName);

    const segments: Segment[] = [];
    for (const source of sources) {
      segments.push(...(await loadSegments(source, this.split)));
    }

    const documents: KnowledgeDocument[] = [];
    for (const segment of segments) {
      documents.push({
        id: uuidv4(),
        text: segment.text,
        source: segment.source,
        offset: segment.offset,
        vector: await this.embeddingProvider.getEmbedding(segment.text),
        created_at: Date.now(),
      });
    }

    if (await this.store.hasCollection(collection)) {
      await this.store.deleteCollection(collection);
    }
    await this.store.createCollection(collection, this.embeddingModel);
    await this.store.addDocuments(collection, documents);

    log.info(`Built knowledge base ${collection}: ${documents.length} segments from ${sources.length} file(s)`);
    return { collection, embeddingModel: this.embeddingModel };
  }

  private async requireCollection(collection: string, embeddingModel: string): Promise<CollectionInfo> {
    const info = await this.store.getCollectionInfo(collection);
    if (!info) throw new IndexNotFoundError(collection);
    if (info.embeddingModel !== embeddingModel) {
      throw new EmbeddingModelMismatchError(collection, info.embeddingModel, embeddingModel);
    }
    return info;
  }

  /** Handle for a collection built earlier, possibly by another process. */
  async open(collectionName: string): Promise<IndexHandle> {
    this.ensureStarted();
    const collection = toCollectionName(collectionName);
    await this.requireCollection(collection, this.embeddingModel);
    return { collection, embeddingModel: this.embeddingModel };
  }

  async retrieve(handle: IndexHandle, query: string, k: number): Promise<RetrievedContext> {
    this.ensureStarted();
    if (handle.embeddingModel !== this.embeddingModel) {
      throw new EmbeddingModelMismatchError(handle.collection, handle.embeddingModel, this.embeddingModel);
    }
    const info = await this.requireCollection(handle.collection, handle.embeddingModel);
    if (info.documentCount === 0 || k < 1) return [];

    const vector = await this.embeddingProvider.getEmbedding(query);
    const results = await this.store.search(handle.collection, vector, k);

    return results
      .map((r) => ({
        text: r.document.text,
        score: r.score,
        source: r.document.source,
        offset: r.document.offset,
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  async list(): Promise<string[]> {
    this.ensureStarted();
    return this.store.listCollections();
  }

  async describe(collectionName: string): Promise<CollectionInfo | undefined> {
    this.ensureStarted();
    return this.store.getCollectionInfo(toCollectionName(collectionName));
  }

  async delete(collectionName: string): Promise<void> {
    this.ensureStarted();
    await this.store.deleteCollection(toCollectionName(collectionName));
  }
}
