import axios, { AxiosInstance } from 'axios';
import http from 'http';
import https from 'https';
import readline from 'readline';
import { Readable } from 'stream';
import { z } from 'zod';
import { GenerationRequest, ModelConnector, ModelInfo } from './base';
import { FragmentStream } from './stream';
import { toConnectorError } from './errors';
import { LLMConfig } from '../config/schema';
import { ConnectionError, ModelConnectorError, ModelError } from '../errors';
import logger from '../utils/logger';

const log = logger.child({ module: 'LLM' });

const GenerateResponseSchema = z.object({
  response: z.string(),
});

// One line of the newline-delimited stream; `done: true` marks the end
const GenerateChunkSchema = z.object({
  response: z.string().optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({
    name: z.string(),
    size: z.number().optional(),
    modified_at: z.string().optional(),
  })),
});

interface GeneratePayload {
  model: string;
  prompt: string;
  stream: boolean;
  options?: Record<string, number>;
}

export type OllamaConnectorConfig = Pick<LLMConfig, 'baseUrl' | 'defaultModel' | 'timeoutSeconds' | 'options'>;

export class OllamaConnector implements ModelConnector {
  private client: AxiosInstance;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(private readonly config: OllamaConnectorConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.timeoutMs = config.timeoutSeconds * 1000;
    // Every request gets its own connection: nothing is shared between concurrent generations
    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: this.timeoutMs,
      httpAgent: new http.Agent({ keepAlive: false }),
      httpsAgent: new https.Agent({ keepAlive: false }),
    });
    log.info(`OllamaConnector initialized with base URL: ${this.baseUrl}`);
  }

  get endpoint(): string {
    return this.baseUrl;
  }

  getDefaultModel(): string {
    return this.config.defaultModel;
  }

  generate(request: GenerationRequest & { stream: true }): Promise<FragmentStream>;
  generate(request: GenerationRequest & { stream?: false }): Promise<string>;
  generate(request: GenerationRequest): Promise<string | FragmentStream>;
  async generate(request: GenerationRequest): Promise<string | FragmentStream> {
    const model = request.model || this.getDefaultModel();
    const options = { ...this.config.options, ...request.options };
    const payload: GeneratePayload = {
      model,
      prompt: request.prompt,
      stream: request.stream === true,
      ...(Object.keys(options).length > 0 ? { options } : {}),
    };

    log.info(`Calling model ${model} (stream: ${payload.stream})`);
    if (payload.stream) {
      return this.generateStream(payload, request.signal);
    }

    try {
      const response = await this.client.post('/api/generate', payload, { signal: request.signal });
      return GenerateResponseSchema.parse(response.data).response;
    } catch (err) {
      throw this.mapError(err, model);
    }
  }

  private async generateStream(payload: GeneratePayload, external?: AbortSignal): Promise<FragmentStream> {
    const controller = new AbortController();
    if (external) {
      if (external.aborted) controller.abort();
      else external.addEventListener('abort', () => controller.abort(), { once: true });
    }

    let body: Readable;
    try {
      const response = await this.client.post<Readable>('/api/generate', payload, {
        responseType: 'stream',
        signal: controller.signal,
      });
      body = response.data;
    } catch (err) {
      throw this.mapError(err, payload.model);
    }

    return new FragmentStream(this.readFragments(body, payload.model, controller.signal), controller);
  }

  private async *readFragments(body: Readable, model: string, signal: AbortSignal): AsyncGenerator<string> {
    const lines = readline.createInterface({ input: body, crlfDelay: Infinity });
    // An aborted body is not guaranteed to end or error, so stop reading explicitly
    const stop = () => lines.close();
    signal.addEventListener('abort', stop, { once: true });
    try {
      for await (const line of lines) {
        if (!line.trim()) continue;
        const chunk = GenerateChunkSchema.parse(JSON.parse(line));
        if (chunk.error) throw new ModelError(chunk.error, model);
        if (chunk.response) yield chunk.response;
        if (chunk.done) return;
      }
    } catch (err) {
      const mapped = this.mapError(err, model);
      if (mapped instanceof ModelConnectorError) throw mapped;
      throw new ConnectionError(`Lost the connection to the model server at ${this.baseUrl}`, { cause: err });
    } finally {
      signal.removeEventListener('abort', stop);
      lines.close();
      body.destroy();
    }
    throw new ConnectionError(`The model server at ${this.baseUrl} closed the stream before it finished`);
  }

  async listModels(): Promise<ModelInfo[]> {
    try {
      const response = await this.client.get('/api/tags');
      return TagsResponseSchema.parse(response.data).models.map((m) => ({
        name: m.name,
        size: m.size,
        modifiedAt: m.modified_at,
      }));
    } catch (err) {
      throw this.mapError(err);
    }
  }

  private mapError(err: unknown, model?: string): unknown {
    if (err instanceof ModelConnectorError) return err;
    if (err instanceof z.ZodError || err instanceof SyntaxError) {
      return new ModelError(`Unexpected response from the model server at ${this.baseUrl}`, model, { cause: err });
    }
    const mapped = toConnectorError(err, { baseUrl: this.baseUrl, model, timeoutMs: this.timeoutMs });
    if (mapped instanceof ModelConnectorError) {
      log.error(mapped.message);
    }
    return mapped;
  }
}
