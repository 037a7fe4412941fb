import readline from 'readline';
import chalk from 'chalk';
import { BaseChannel } from './base';
import { RagPipeline, isSurfacedError } from '../rag/pipeline';
import { ChatTurn } from '../rag/prompt';
import { IndexHandle } from '../services/knowledge/types';
import { FragmentStream } from '../providers/stream';
import { errorMessage } from '../errors';
import logger from '../utils/logger';

const log = logger.child({ module: 'CLI' });

export interface CLIChannelOptions {
  handle: IndexHandle;
  model?: string;
  stream: boolean;
  exitCommands: string[];
  historyTurns: number;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class CLIChannel extends BaseChannel {
  private rl?: readline.Interface;
  private history: ChatTurn[] = [];
  private activeStream?: FragmentStream;
  private finished: Promise<void> = Promise.resolve();
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;

  constructor(pipeline: RagPipeline, private readonly options: CLIChannelOptions) {
    super(pipeline);
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  get name() { return 'cli'; }

  async start(): Promise<void> {
    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
      prompt: 'You: ',
    });
    this.rl = rl;

    const exitHint = this.options.exitCommands[0] ?? 'exit';
    this.write(`RAG chat with knowledge base "${this.options.handle.collection}" (type '${exitHint}' to quit)\n`);
    this.finished = this.readLoop(rl);
    log.info('CLI channel started');
  }

  /** Resolves when the user leaves the chat or input ends. */
  waitForExit(): Promise<void> {
    return this.finished;
  }

  async stop(): Promise<void> {
    this.activeStream?.cancel();
    this.rl?.close();
  }

  private write(text: string): void {
    this.output.write(text);
  }

  private isExitCommand(line: string): boolean {
    const lower = line.toLowerCase();
    return this.options.exitCommands.some((cmd) => cmd.toLowerCase() === lower);
  }

  // One query is answered completely before the next line is read
  private async readLoop(rl: readline.Interface): Promise<void> {
    rl.prompt();
    for await (const line of rl) {
      const query = line.trim();
      if (!query) {
        rl.prompt();
        continue;
      }
      if (this.isExitCommand(query)) {
        log.info('User exited the chat.');
        this.write('Goodbye!\n');
        break;
      }

      await this.handleQuery(query);
      rl.prompt();
    }
    log.info('CLI session ended');
  }

  private async handleQuery(query: string): Promise<void> {
    log.info(`User query: ${query}`);
    const { handle, model } = this.options;

    try {
      let answer: string;
      let failed = false;
      if (this.options.stream) {
        const stream = await this.pipeline.answer(handle, query, { model, history: this.history, stream: true });
        this.activeStream = stream;
        this.write(`${chalk.green('Assistant:')} `);
        answer = '';
        for await (const fragment of stream) {
          answer += fragment;
          failed = failed || isSurfacedError(fragment);
          this.write(fragment);
        }
        this.write('\n');
      } else {
        answer = await this.pipeline.answer(handle, query, { model, history: this.history });
        failed = isSurfacedError(answer);
        this.write(`${chalk.green('Assistant:')} ${answer}\n`);
      }
      // A model server failure is shown but kept out of the conversation
      if (!failed) this.remember(query, answer);
    } catch (err) {
      log.error(`Query failed: ${errorMessage(err)}`);
      this.write(`[error] ${errorMessage(err)}\n`);
    } finally {
      this.activeStream = undefined;
    }
  }

  private remember(query: string, answer: string): void {
    const limit = this.options.historyTurns * 2;
    if (limit === 0) return;
    this.history.push({ role: 'user', content: query }, { role: 'assistant', content: answer.trim() });
    if (this.history.length > limit) {
      this.history = this.history.slice(-limit);
    }
  }
}
