export type SourceKind = 'pdf' | 'text';

/** A document to index. New formats are added as variants here. */
export type KnowledgeSource =
  | { kind: 'pdf'; path: string }
  | { kind: 'text'; path: string };

/** A contiguous span of extracted text. */
export interface Segment {
  text: string;
  /** Character offset of the span in the extracted document text */
  offset: number;
  source: string;
}

export interface KnowledgeDocument {
  id: string;
  text: string;
  source: string;
  offset: number;
  vector: number[];
  created_at?: number;
}

export interface SearchResult {
  document: Omit<KnowledgeDocument, 'vector'>;
  score: number;
}

export interface CollectionInfo {
  name: string;
  embeddingModel: string;
  dimension?: number;
  documentCount: number;
}

export interface IndexHandle {
  collection: string;
  embeddingModel: string;
}

export interface RetrievedPassage {
  text: string;
  score: number;
  source: string;
  offset: number;
}

/** Ordered by descending score, at most K entries. */
export type RetrievedContext = RetrievedPassage[];

export interface KnowledgeBaseStore {
  initialize(): Promise<void>;
  hasCollection(name: string): Promise<boolean>;
  createCollection(name: string, embeddingModel: string): Promise<void>;
  getCollectionInfo(name: string): Promise<CollectionInfo | undefined>;
  addDocuments(collection: string, documents: KnowledgeDocument[]): Promise<void>;
  search(collection: string, vector: number[], limit: number): Promise<SearchResult[]>;
  listCollections(): Promise<string[]>;
  deleteCollection(name: string): Promise<void>;
  close(): Promise<void>;
}

export interface EmbeddingProvider {
  /** `<provider>:<model>`, stored with every collection built by this provider */
  readonly modelId: string;
  getEmbedding(text: string): Promise<number[]>;
}

/** Collection names double as file names; keep them to [A-Za-z0-9_]. */
export function toCollectionName(raw: string): string {
  const cleaned = raw.trim().replace(/[^a-zA-Z0-9_]/g, '_');
  return cleaned || 'knowledge_base';
}
