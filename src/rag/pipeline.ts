import path from 'path';
import { KnowledgeBaseService } from '../services/knowledge/service';
import { resolveKnowledgeSource } from '../services/knowledge/loader';
import { IndexHandle, KnowledgeSource, RetrievedContext, toCollectionName } from '../services/knowledge/types';
import { ModelConnector } from '../providers/base';
import { FragmentStream } from '../providers/stream';
import { ChatTurn, composePrompt } from './prompt';
import {
  EmbeddingModelMismatchError,
  KnowledgeBaseState,
  ModelConnectorError,
  NotReadyError,
  errorMessage,
} from '../errors';
import logger from '../utils/logger';

const log = logger.child({ module: 'RAG' });

/** Everything the pipeline needs, built once at startup and passed in. */
export interface RagContext {
  knowledge: KnowledgeBaseService;
  connector: ModelConnector;
  topK: number;
}

export interface KnowledgeBaseStatus {
  name: string;
  state: KnowledgeBaseState;
  segmentCount?: number;
  error?: string;
  updatedAt: number;
}

export interface AnswerOptions {
  model?: string;
  history?: ChatTurn[];
  options?: Record<string, number>;
  stream?: boolean;
  signal?: AbortSignal;
}

export interface BuildHooks {
  /** Runs inside the build's exclusive section once the knowledge base is ready */
  onReady?: (status: KnowledgeBaseStatus) => Promise<void>;
}

export interface DeleteHooks {
  /** Runs inside the delete's exclusive section after the collection is gone */
  onDeleted?: () => Promise<void>;
}

const ERROR_PREFIX = '[error] ';

export function surfaceError(err: ModelConnectorError): string {
  return `${ERROR_PREFIX}${err.message}`;
}

/** True for an answer that reports a model server failure instead of model text. */
export function isSurfacedError(answer: string): boolean {
  return answer.startsWith(ERROR_PREFIX);
}

export class RagPipeline {
  private states: Map<string, KnowledgeBaseStatus> = new Map();
  private locks: Map<string, Promise<void>> = new Map();
  private readers: Map<string, Set<Promise<void>>> = new Map();

  constructor(private readonly context: RagContext) {}

  get knowledge(): KnowledgeBaseService {
    return this.context.knowledge;
  }

  get connector(): ModelConnector {
    return this.context.connector;
  }

  getStatus(name: string): KnowledgeBaseStatus {
    const collection = toCollectionName(name);
    return this.states.get(collection) ?? { name: collection, state: 'unbuilt', updatedAt: 0 };
  }

  getHandle(name: string): IndexHandle {
    return { collection: toCollectionName(name), embeddingModel: this.context.knowledge.embeddingModel };
  }

  private setStatus(
    name: string,
    state: KnowledgeBaseState,
    extra: Partial<KnowledgeBaseStatus> = {}
  ): KnowledgeBaseStatus {
    const status = { name, state, updatedAt: Date.now(), ...extra };
    this.states.set(name, status);
    log.info(`Knowledge base ${name}: ${state}${extra.error ? ` (${extra.error})` : ''}`);
    return status;
  }

  private requireReady(name: string): void {
    const status = this.getStatus(name);
    if (status.state !== 'ready') {
      throw new NotReadyError(name, status.state);
    }
  }

  // Builds, opens and deletes of one knowledge base run one at a time, each
  // after the queries already running against it have finished
  private async exclusive<T>(name: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(name) ?? Promise.resolve();
    const run = previous.then(async () => {
      await this.drainReaders(name);
      return task();
    });
    const tail = run.then(() => undefined, () => undefined);
    this.locks.set(name, tail);
    try {
      return await run;
    } finally {
      if (this.locks.get(name) === tail) this.locks.delete(name);
    }
  }

  private async drainReaders(name: string): Promise<void> {
    for (let readers = this.readers.get(name); readers && readers.size > 0; readers = this.readers.get(name)) {
      await Promise.all(readers);
    }
  }

  // Queries share a knowledge base with each other but wait for any queued write
  private async shared<T>(name: string, task: () => Promise<T>): Promise<T> {
    for (let pending = this.locks.get(name); pending; pending = this.locks.get(name)) {
      await pending;
    }

    let readers = this.readers.get(name);
    if (!readers) {
      readers = new Set();
      this.readers.set(name, readers);
    }
    const run = task();
    const done = run.then(() => undefined, () => undefined);
    readers.add(done);
    try {
      return await run;
    } finally {
      readers.delete(done);
      if (readers.size === 0 && this.readers.get(name) === readers) this.readers.delete(name);
    }
  }

  /**
   * Builds (or rebuilds) a knowledge base from one or more files. The name
   * defaults to the base name of the first file.
   */
  async buildKnowledgeBase(filePaths: string | string[], name?: string, hooks: BuildHooks = {}): Promise<IndexHandle> {
    const paths = Array.isArray(filePaths) ? filePaths : [filePaths];
    if (paths.length === 0) throw new Error('At least one file is required');
    const collection = toCollectionName(name ?? path.parse(paths[0]).name);

    return this.exclusive(collection, async () => {
      this.setStatus(collection, 'building');
      try {
        const sources: KnowledgeSource[] = [];
        for (const p of paths) {
          sources.push(await resolveKnowledgeSource(p));
        }
        const handle = await this.context.knowledge.build(sources, collection);
        const info = await this.context.knowledge.describe(collection);
        const status = this.setStatus(collection, 'ready', { segmentCount: info?.documentCount ?? 0 });
        await hooks.onReady?.(status);
        return handle;
      } catch (err) {
        this.setStatus(collection, 'failed', { error: errorMessage(err) });
        throw err;
      }
    });
  }

  /** Marks a knowledge base built by an earlier run as ready. */
  async openKnowledgeBase(name: string): Promise<IndexHandle> {
    const collection = toCollectionName(name);
    return this.exclusive(collection, async () => {
      try {
        const handle = await this.context.knowledge.open(collection);
        const info = await this.context.knowledge.describe(collection);
        this.setStatus(collection, 'ready', { segmentCount: info?.documentCount ?? 0 });
        return handle;
      } catch (err) {
        if (err instanceof EmbeddingModelMismatchError) {
          this.setStatus(collection, 'failed', { error: err.message });
        }
        throw err;
      }
    });
  }

  /** Opens every knowledge base found on disk; failures are logged and skipped. */
  async loadExisting(): Promise<string[]> {
    const loaded: string[] = [];
    for (const name of await this.context.knowledge.list()) {
      try {
        await this.openKnowledgeBase(name);
        loaded.push(name);
      } catch (err) {
        log.warn(`Skipping knowledge base ${name}: ${errorMessage(err)}`);
      }
    }
    return loaded;
  }

  async deleteKnowledgeBase(name: string, hooks: DeleteHooks = {}): Promise<void> {
    const collection = toCollectionName(name);
    await this.exclusive(collection, async () => {
      await this.context.knowledge.delete(collection);
      this.states.delete(collection);
      await hooks.onDeleted?.();
    });
  }

  async listKnowledgeBases(): Promise<KnowledgeBaseStatus[]> {
    const names = new Set([...(await this.context.knowledge.list()), ...this.states.keys()]);
    return [...names].sort().map((name) => this.getStatus(name));
  }

  async retrieve(handle: IndexHandle, query: string): Promise<RetrievedContext> {
    return this.shared(handle.collection, () => this.context.knowledge.retrieve(handle, query, this.context.topK));
  }

  answer(handle: IndexHandle, query: string, options: AnswerOptions & { stream: true }): Promise<FragmentStream>;
  answer(handle: IndexHandle, query: string, options?: AnswerOptions & { stream?: false }): Promise<string>;
  answer(handle: IndexHandle, query: string, options?: AnswerOptions): Promise<string | FragmentStream>;
  async answer(handle: IndexHandle, query: string, options: AnswerOptions = {}): Promise<string | FragmentStream> {
    this.requireReady(handle.collection);

    let prompt: string;
    try {
      const context = await this.shared(handle.collection, async () => {
        // A delete or rebuild queued ahead of this query has run by now
        this.requireReady(handle.collection);
        return this.context.knowledge.retrieve(handle, query, this.context.topK);
      });
      log.info(`Retrieved ${context.length} passages from ${handle.collection}`);
      prompt = composePrompt({ query, context, history: options.history });
    } catch (err) {
      // The embedding call goes to the same kind of server as generation
      if (err instanceof ModelConnectorError) {
        log.error(`Retrieval failed: ${err.message}`);
        const surfaced = surfaceError(err);
        return options.stream ? FragmentStream.of(surfaced) : surfaced;
      }
      throw err;
    }

    const request = {
      model: options.model,
      prompt,
      options: options.options,
      signal: options.signal,
    };

    if (!options.stream) {
      try {
        return await this.context.connector.generate({ ...request, stream: false });
      } catch (err) {
        if (err instanceof ModelConnectorError) {
          log.error(`Generation failed: ${err.message}`);
          return surfaceError(err);
        }
        throw err;
      }
    }

    const controller = new AbortController();
    const signal = options.signal;
    if (signal) {
      if (signal.aborted) controller.abort();
      else signal.addEventListener('abort', () => controller.abort(), { once: true });
    }
    const connector = this.context.connector;

    async function* fragments(): AsyncGenerator<string> {
      try {
        const inner = await connector.generate({ ...request, stream: true, signal: controller.signal });
        yield* inner;
      } catch (err) {
        if (err instanceof ModelConnectorError && !controller.signal.aborted) {
          log.error(`Generation failed: ${err.message}`);
          yield surfaceError(err);
          return;
        }
        throw err;
      }
    }

    return new FragmentStream(fragments(), controller);
  }
}
