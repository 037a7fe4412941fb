import { z } from 'zod';

export const LLMConfigSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:11434'),
  defaultModel: z.string().min(1).default('llama3'),
  timeoutSeconds: z.number().positive().default(120),
  // Passed through to the inference server (temperature, top_p, num_ctx, ...)
  options: z.record(z.number()).optional(),
  // Offered by the web UI when the server cannot be asked for its model list
  models: z.array(z.string()).default(['llama3', 'llama3.1', 'mistral']),
});

export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['ollama', 'openai']).default('ollama'),
  timeoutSeconds: z.number().positive().default(60),
  ollama: z.object({
    model: z.string().default('nomic-embed-text'),
    baseUrl: z.string().default('http://localhost:11434'),
  }).default({}),
  openai: z.object({
    model: z.string().default('text-embedding-3-small'),
    apiKey: z.string().default(''),
    baseUrl: z.string().default('https://api.openai.com/v1'),
  }).default({}),
});

export const KnowledgeBaseConfigSchema = z.object({
  storage_path: z.string().default('./data/knowledge'),
  upload_path: z.string().default('./data/uploads'),
  top_k: z.number().int().positive().default(4),
  chunk_size: z.number().int().positive().default(1024),
  chunk_overlap: z.number().int().min(0).default(128),
  history_turns: z.number().int().min(0).default(5), // 0 disables history
  embedding: EmbeddingConfigSchema.default({}),
}).refine((kb) => kb.chunk_overlap < kb.chunk_size, {
  message: 'chunk_overlap must be smaller than chunk_size',
  path: ['chunk_overlap'],
});

export const CliConfigSchema = z.object({
  stream: z.boolean().default(true),
  exit_commands: z.array(z.string()).default(['exit', 'quit']),
});

export const WebConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(5000),
});

export const ConfigSchema = z.object({
  llm: LLMConfigSchema.default({}),
  knowledge_base: KnowledgeBaseConfigSchema.default({}),
  channels: z.object({
    cli: CliConfigSchema.default({}),
    web: WebConfigSchema.default({}),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type KnowledgeBaseConfig = z.infer<typeof KnowledgeBaseConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
