import { Config, ConfigSchema } from './config/schema';
import { mergeDeep } from './config/loader';
import { KnowledgeBaseService } from './services/knowledge/service';
import { OllamaConnector } from './providers/ollama';
import { RagPipeline } from './rag/pipeline';
import logger from './utils/logger';

const log = logger.child({ module: 'System' });

/** Command-line values that take precedence over the config file. */
export interface ConfigOverrides {
  model?: string;
  baseUrl?: string;
  storage?: string;
  host?: string;
  port?: number;
  stream?: boolean;
}

export interface AppContext {
  config: Config;
  knowledge: KnowledgeBaseService;
  connector: OllamaConnector;
  pipeline: RagPipeline;
}

export function applyOverrides(config: Config, overrides: ConfigOverrides): Config {
  const llm: Record<string, unknown> = {};
  const knowledgeBase: Record<string, unknown> = {};
  const web: Record<string, unknown> = {};
  const cli: Record<string, unknown> = {};

  if (overrides.model) llm.defaultModel = overrides.model;
  if (overrides.baseUrl) {
    llm.baseUrl = overrides.baseUrl;
    // Ollama embeddings follow the override, replacing any configured embedding server
    knowledgeBase.embedding = { ollama: { baseUrl: overrides.baseUrl } };
  }
  if (overrides.storage) knowledgeBase.storage_path = overrides.storage;
  if (overrides.host) web.host = overrides.host;
  if (overrides.port !== undefined) web.port = overrides.port;
  if (overrides.stream !== undefined) cli.stream = overrides.stream;

  const merged = mergeDeep(config, {
    llm,
    knowledge_base: knowledgeBase,
    channels: { web, cli },
  });
  return ConfigSchema.parse(merged);
}

/**
 * Builds the services the front ends share. The storage directory is created
 * here, so an unusable path fails at startup rather than on the first query.
 */
export async function createContext(config: Config): Promise<AppContext> {
  const knowledge = KnowledgeBaseService.fromConfig(config.knowledge_base);
  await knowledge.start();

  const connector = new OllamaConnector(config.llm);
  const pipeline = new RagPipeline({
    knowledge,
    connector,
    topK: config.knowledge_base.top_k,
  });

  log.info(`Context ready (model ${connector.getDefaultModel()} at ${connector.endpoint})`);
  return { config, knowledge, connector, pipeline };
}

export async function closeContext(context: AppContext): Promise<void> {
  await context.knowledge.stop();
}
