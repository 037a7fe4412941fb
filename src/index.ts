#!/usr/bin/env node
/**
 * ragchat entry point.
 *
 * Loads the configuration, applies command-line overrides, builds the shared
 * context and starts either the interactive CLI or the web server.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { loadConfig } from './config/loader';
import { AppContext, applyOverrides, closeContext, createContext } from './context';
import { BaseChannel } from './channels/base';
import { CLIChannel } from './channels/cli';
import { WebChannel } from './channels/web';
import { IndexHandle } from './services/knowledge/types';
import { errorMessage } from './errors';
import logger from './utils/logger';

const log = logger.child({ module: 'System' });

interface CommandLineOptions {
  config?: string;
  mode: 'cli' | 'web';
  file?: string[];
  kb?: string;
  model?: string;
  baseUrl?: string;
  storage?: string;
  host?: string;
  port?: number;
  stream: boolean;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

const program = new Command()
  .name('ragchat')
  .description('Chat with your documents through a local Ollama model')
  .version('0.1.0')
  .option('-c, --config <path>', 'path to config.json')
  .addOption(new Option('-m, --mode <mode>', 'front end to start').choices(['cli', 'web']).default('cli'))
  .option('-f, --file <paths...>', 'PDF or text files to build the knowledge base from')
  .option('--kb <name>', 'knowledge base name (defaults to the first file name)')
  .option('--model <name>', 'generation model')
  .option('--base-url <url>', 'Ollama server URL')
  .option('--storage <path>', 'knowledge base storage directory')
  .option('--host <host>', 'web server host')
  .option('--port <port>', 'web server port', parsePort)
  .option('--no-stream', 'print CLI answers only once complete');

async function prepareCliKnowledgeBase(context: AppContext, opts: CommandLineOptions): Promise<IndexHandle> {
  if (opts.file && opts.file.length > 0) {
    log.info(`Building knowledge base from ${opts.file.join(', ')}`);
    return context.pipeline.buildKnowledgeBase(opts.file, opts.kb);
  }
  if (opts.kb) {
    return context.pipeline.openKnowledgeBase(opts.kb);
  }
  throw new Error('Pass --file to build a knowledge base or --kb to open an existing one.');
}

async function checkEndpoint(context: AppContext): Promise<void> {
  const model = context.connector.getDefaultModel();
  const models = await context.connector.listModels();
  const names = models.map((m) => m.name);
  if (!names.some((name) => name === model || name.startsWith(`${model}:`))) {
    log.warn(`Model ${model} is not installed on ${context.connector.endpoint} (available: ${names.join(', ') || 'none'})`);
  }
}

// Resolves to an exit code, or undefined while the web server keeps the process alive
async function main(): Promise<number | undefined> {
  program.parse();
  const opts = program.opts<CommandLineOptions>();

  const config = applyOverrides(await loadConfig(opts.config), {
    model: opts.model,
    baseUrl: opts.baseUrl,
    storage: opts.storage,
    host: opts.host,
    port: opts.port,
    // commander defaults `stream` to true; only an explicit --no-stream overrides the file
    stream: opts.stream ? undefined : false,
  });

  const context = await createContext(config);
  let channel: BaseChannel | undefined;

  const shutdown = async () => {
    await channel?.stop();
    await closeContext(context);
  };

  const onSignal = () => {
    log.info('Shutting down...');
    shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    if (opts.mode === 'web') {
      await context.pipeline.loadExisting();
      if (opts.file && opts.file.length > 0) {
        await context.pipeline.buildKnowledgeBase(opts.file, opts.kb);
      }
      channel = new WebChannel(context.pipeline, { config, configPath: opts.config });
      await channel.start();
      return undefined;
    }

    const handle = await prepareCliKnowledgeBase(context, opts);
    await checkEndpoint(context);

    const cli = new CLIChannel(context.pipeline, {
      handle,
      stream: config.channels.cli.stream,
      exitCommands: config.channels.cli.exit_commands,
      historyTurns: config.knowledge_base.history_turns,
    });
    channel = cli;
    await cli.start();
    await cli.waitForExit();
    await shutdown();
    return 0;
  } catch (err) {
    log.error(`ragchat failed: ${errorMessage(err)}`);
    await shutdown();
    return 1;
  }
}

main()
  .then((code) => {
    if (code !== undefined) process.exit(code);
  })
  .catch((err: unknown) => {
    log.fatal(`Fatal error: ${errorMessage(err)}`);
    process.exit(1);
  });
