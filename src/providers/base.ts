import { FragmentStream } from './stream';

export interface GenerationRequest {
  /** Falls back to the connector's default model */
  model?: string;
  prompt: string;
  stream?: boolean;
  options?: Record<string, number>;
  /** Aborting closes the connection of an in-flight generation */
  signal?: AbortSignal;
}

export interface ModelInfo {
  name: string;
  size?: number;
  modifiedAt?: string;
}

export interface ModelConnector {
  generate(request: GenerationRequest & { stream: true }): Promise<FragmentStream>;
  generate(request: GenerationRequest & { stream?: false }): Promise<string>;
  generate(request: GenerationRequest): Promise<string | FragmentStream>;
  listModels(): Promise<ModelInfo[]>;
  getDefaultModel(): string;
  /** Human-readable endpoint address for status output */
  readonly endpoint: string;
}
