import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { EmbeddingProvider } from './types';
import { EmbeddingConfig } from '../../config/schema';
import { toConnectorError } from '../../providers/errors';
import { ModelError } from '../../errors';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Knowledge:Embedding' });

const OllamaEmbeddingSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

const OpenAIEmbeddingSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()).min(1) })).min(1),
});

const DEFAULT_TIMEOUT_SECONDS = 60;

function toEmbeddingError(err: unknown, baseUrl: string, model: string, timeoutMs: number): unknown {
  if (err instanceof z.ZodError) {
    return new ModelError(`Unexpected embedding response from ${baseUrl}`, model, { cause: err });
  }
  return toConnectorError(err, { baseUrl, model, timeoutMs });
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  private client: AxiosInstance;
  private baseUrl: string;
  private model: string;
  private timeoutMs: number;

  constructor(
    baseUrl: string = 'http://localhost:11434',
    model: string = 'nomic-embed-text',
    timeoutSeconds: number = DEFAULT_TIMEOUT_SECONDS
  ) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.model = model;
    this.timeoutMs = timeoutSeconds * 1000;
    this.client = axios.create({ baseURL: this.baseUrl, timeout: this.timeoutMs });
  }

  get modelId(): string {
    return `ollama:${this.model}`;
  }

  async getEmbedding(text: string): Promise<number[]> {
    try {
      const response = await this.client.post('/api/embeddings', {
        model: this.model,
        prompt: text,
      });
      return OllamaEmbeddingSchema.parse(response.data).embedding;
    } catch (error) {
      log.error(`Failed to get embedding from Ollama: ${error}`);
      throw toEmbeddingError(error, this.baseUrl, this.model, this.timeoutMs);
    }
  }
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private client: AxiosInstance;
  private model: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(
    apiKey: string,
    model: string = 'text-embedding-3-small',
    baseUrl: string = 'https://api.openai.com/v1',
    timeoutSeconds: number = DEFAULT_TIMEOUT_SECONDS
  ) {
    this.model = model;
    this.baseUrl = baseUrl.replace(/\/$/, '');
    this.timeoutMs = timeoutSeconds * 1000;
    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
      headers: {
        'Authorization': `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
    });
  }

  get modelId(): string {
    return `openai:${this.model}`;
  }

  async getEmbedding(text: string): Promise<number[]> {
    try {
      const response = await this.client.post('/embeddings', {
        model: this.model,
        input: text,
      });
      return OpenAIEmbeddingSchema.parse(response.data).data[0].embedding;
    } catch (error) {
      log.error(`Failed to get embedding from OpenAI: ${error}`);
      throw toEmbeddingError(error, this.baseUrl, this.model, this.timeoutMs);
    }
  }
}

export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  switch (config.provider) {
    case 'ollama':
      return new OllamaEmbeddingProvider(config.ollama.baseUrl, config.ollama.model, config.timeoutSeconds);
    case 'openai':
      if (!config.openai.apiKey) throw new Error('API Key required for OpenAI embedding');
      return new OpenAIEmbeddingProvider(
        config.openai.apiKey,
        config.openai.model,
        config.openai.baseUrl,
        config.timeoutSeconds
      );
  }
}
