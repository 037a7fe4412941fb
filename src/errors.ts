export class RagError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The source document could not be read, classified or parsed. */
export class LoadError extends RagError {
  constructor(
    message: string,
    readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class IndexNotFoundError extends RagError {
  constructor(readonly collection: string) {
    super(`Knowledge base "${collection}" has not been built`);
  }
}

/**
 * A collection is tagged with the embedding model that produced its vectors.
 * Querying it with another model would compare vectors from different spaces.
 */
export class EmbeddingModelMismatchError extends RagError {
  constructor(
    readonly collection: string,
    readonly storedModel: string,
    readonly requestedModel: string
  ) {
    super(
      `Knowledge base "${collection}" was embedded with ${storedModel} but the configured embedding model is ${requestedModel}; rebuild it`
    );
  }
}

export type KnowledgeBaseState = 'unbuilt' | 'building' | 'ready' | 'failed';

export class NotReadyError extends RagError {
  constructor(
    readonly collection: string,
    readonly state: KnowledgeBaseState
  ) {
    super(`Knowledge base "${collection}" is not ready (state: ${state})`);
  }
}

export class ModelConnectorError extends RagError {}

export class ConnectionError extends ModelConnectorError {}

export class TimeoutError extends ModelConnectorError {}

export class ModelError extends ModelConnectorError {
  constructor(
    message: string,
    readonly model?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
