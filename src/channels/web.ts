import express, { Request, RequestHandler, Response } from 'express';
import { Server, Socket } from 'socket.io';
import http from 'http';
import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { BaseChannel } from './base';
import { KnowledgeBaseStatus, RagPipeline, isSurfacedError } from '../rag/pipeline';
import { ChatTurn } from '../rag/prompt';
import { FragmentStream } from '../providers/stream';
import { Config } from '../config/schema';
import { updateConfig } from '../config/loader';
import { getProjectRoot, resolveFromRoot } from '../utils/paths';
import { toCollectionName } from '../services/knowledge/types';
import {
  EmbeddingModelMismatchError,
  IndexNotFoundError,
  LoadError,
  ModelConnectorError,
  NotReadyError,
  errorMessage,
} from '../errors';
import logger from '../utils/logger';

const log = logger.child({ module: 'Web' });

const STAGING_DIR = '.staging';

const ChatTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

const ChatRequestSchema = z.object({
  message: z.string().trim().min(1),
  knowledgeBase: z.string().min(1),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).optional(),
  history: z.array(ChatTurnSchema).optional(),
  stream: z.boolean().optional(),
});

const SettingsRequestSchema = z.object({
  model: z.string().min(1).optional(),
  port: z.number().int().min(0).max(65535).optional(),
});

const UploadRequestSchema = z.object({
  name: z.string().trim().min(1),
  files: z.array(z.object({
    filename: z.string().min(1),
    // base64
    content: z.string(),
  })).min(1),
});

const SocketMessageSchema = z.object({
  text: z.string().trim().min(1),
  knowledgeBase: z.string().min(1),
  model: z.string().min(1).optional(),
});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

export interface WebChannelOptions {
  config: Config;
  /** File that settings changes are written to */
  configPath?: string;
}

/** Keeps only characters that are safe in a file name inside the upload directory. */
export function sanitizeFilename(filename: string, fallback: string): string {
  const cleaned = path.basename(filename)
    .replace(/[^A-Za-z0-9._-]/g, '_')
    .replace(/^\.+/, '');
  return cleaned || fallback;
}

function describeZodError(err: z.ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
    .join('; ');
}

export class WebChannel extends BaseChannel {
  private app: express.Express;
  private server: http.Server;
  private io: Server;
  private host: string;
  private port: number;
  private activeModel: string;
  private readonly uploadPath: string;
  private readonly storagePath: string;
  private readonly activeStreams: Set<FragmentStream> = new Set();

  constructor(pipeline: RagPipeline, private readonly options: WebChannelOptions) {
    super(pipeline);
    const { config } = options;
    this.host = config.channels.web.host;
    this.port = config.channels.web.port;
    this.activeModel = pipeline.connector.getDefaultModel();
    this.uploadPath = resolveFromRoot(config.knowledge_base.upload_path);
    this.storagePath = resolveFromRoot(config.knowledge_base.storage_path);

    this.app = express();
    this.server = http.createServer(this.app);
    this.io = new Server(this.server);

    this.setupRoutes();
    this.setupSocket();
  }

  get name() { return 'web'; }

  /** Base URL of the running server; reflects the real port when started on port 0. */
  get url(): string {
    return `http://${this.host}:${this.port}`;
  }

  get model(): string {
    return this.activeModel;
  }

  private route(handler: AsyncHandler): RequestHandler {
    return (req, res) => {
      handler(req, res).catch((err: unknown) => this.sendError(res, err));
    };
  }

  private sendError(res: Response, err: unknown): void {
    if (res.headersSent) {
      log.error(`Request failed after the response started: ${errorMessage(err)}`);
      if (!res.writableEnded) res.end();
      return;
    }

    let status = 500;
    let message = errorMessage(err);
    if (err instanceof z.ZodError) {
      status = 400;
      message = `Invalid request: ${describeZodError(err)}`;
    } else if (err instanceof LoadError) {
      status = 400;
    } else if (err instanceof IndexNotFoundError) {
      status = 404;
    } else if (err instanceof NotReadyError || err instanceof EmbeddingModelMismatchError) {
      status = 409;
    } else if (err instanceof ModelConnectorError) {
      status = 503;
    }

    if (status === 500) log.error(`Request failed: ${message}`);
    else log.warn(`Request rejected (${status}): ${message}`);
    res.status(status).json({ error: message });
  }

  private async requireKnowledgeBase(name: string): Promise<string> {
    const collection = toCollectionName(name);
    const status = this.pipeline.getStatus(collection);
    if (status.state === 'unbuilt' && !(await this.pipeline.knowledge.describe(collection))) {
      throw new IndexNotFoundError(collection);
    }
    return collection;
  }

  private setupRoutes() {
    const publicPath = path.join(getProjectRoot(), 'public');
    if (!fs.existsSync(publicPath)) {
      log.warn(`Web Channel public directory not found at ${publicPath}`);
    }
    this.app.use(express.static(publicPath, { index: 'index.html' }));
    // Uploads arrive as base64 inside the JSON body
    this.app.use(express.json({ limit: '50mb' }));

    this.app.get('/api/status', this.route(async (_req, res) => {
      const knowledgeBases = await this.pipeline.listKnowledgeBases();
      res.json({
        ready: knowledgeBases.some((kb) => kb.state === 'ready'),
        storagePath: this.storagePath,
        model: this.activeModel,
        endpoint: this.pipeline.connector.endpoint,
        embeddingModel: this.pipeline.knowledge.embeddingModel,
        knowledgeBases,
      });
    }));

    this.app.get('/api/models', this.route(async (_req, res) => {
      try {
        const models = await this.pipeline.connector.listModels();
        res.json({ models: models.map((m) => m.name), current: this.activeModel });
      } catch (err) {
        if (!(err instanceof ModelConnectorError)) throw err;
        res.status(503).json({
          error: err.message,
          models: this.options.config.llm.models,
          current: this.activeModel,
        });
      }
    }));

    this.app.get('/api/settings', (_req, res) => {
      res.json({ model: this.activeModel, host: this.host, port: this.port });
    });

    this.app.post('/api/settings', this.route(async (req, res) => {
      const body = SettingsRequestSchema.parse(req.body);
      if (body.model) {
        this.activeModel = body.model;
        log.info(`Active model set to ${body.model}`);
      }

      let restartRequired = false;
      if (body.port !== undefined && body.port !== this.port) {
        await updateConfig({ channels: { web: { port: body.port } } }, this.options.configPath);
        restartRequired = true;
        log.info(`Port ${body.port} saved; takes effect after a restart`);
      }

      res.json({ model: this.activeModel, port: body.port ?? this.port, restartRequired });
    }));

    this.app.get('/api/knowledge-bases', this.route(async (_req, res) => {
      res.json({ knowledgeBases: await this.pipeline.listKnowledgeBases() });
    }));

    this.app.post('/api/knowledge-bases', this.route(async (req, res) => {
      const body = UploadRequestSchema.parse(req.body);
      const collection = toCollectionName(body.name);
      const dir = path.join(this.uploadPath, collection);
      const staging = path.join(this.uploadPath, STAGING_DIR, uuidv4());

      await fs.ensureDir(staging);
      const built: { status?: KnowledgeBaseStatus } = {};
      try {
        const paths: string[] = [];
        for (const [i, file] of body.files.entries()) {
          const target = path.join(staging, sanitizeFilename(file.filename, `file_${i + 1}`));
          await fs.writeFile(target, Buffer.from(file.content, 'base64'));
          paths.push(target);
        }
        log.info(`Staged ${paths.length} upload(s) for knowledge base ${collection}`);

        // The new files replace the previous set only once they are indexed
        await this.pipeline.buildKnowledgeBase(paths, collection, {
          onReady: async (status) => {
            await fs.move(staging, dir, { overwrite: true });
            built.status = status;
          },
        });
      } finally {
        await fs.remove(staging);
      }
      res.status(201).json(built.status ?? this.pipeline.getStatus(collection));
    }));

    this.app.get('/api/knowledge-bases/:name', this.route(async (req, res) => {
      const collection = await this.requireKnowledgeBase(req.params.name);
      const info = await this.pipeline.knowledge.describe(collection);
      res.json({
        ...this.pipeline.getStatus(collection),
        embeddingModel: info?.embeddingModel,
        documentCount: info?.documentCount,
      });
    }));

    this.app.delete('/api/knowledge-bases/:name', this.route(async (req, res) => {
      const collection = await this.requireKnowledgeBase(req.params.name);
      await this.pipeline.deleteKnowledgeBase(collection, {
        onDeleted: () => fs.remove(path.join(this.uploadPath, collection)),
      });
      res.json({ deleted: collection });
    }));

    this.app.post('/api/chat', this.route(async (req, res) => {
      const body = ChatRequestSchema.parse(req.body);
      const collection = await this.requireKnowledgeBase(body.knowledgeBase);
      const handle = this.pipeline.getHandle(collection);
      const answerOptions = {
        model: body.model ?? this.activeModel,
        history: body.history,
        options: body.temperature !== undefined ? { temperature: body.temperature } : undefined,
      };

      if (!body.stream) {
        const response = await this.pipeline.answer(handle, body.message, answerOptions);
        res.json({ response });
        return;
      }

      const stream = await this.pipeline.answer(handle, body.message, { ...answerOptions, stream: true });
      this.activeStreams.add(stream);
      res.on('close', () => {
        // The client went away before the answer was complete
        if (!res.writableEnded) stream.cancel();
      });

      res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
      });
      try {
        for await (const fragment of stream) {
          res.write(`data: ${JSON.stringify({ response: fragment })}\n\n`);
        }
        if (!stream.isCancelled) {
          res.write(`data: ${JSON.stringify({ done: true })}\n\n`);
        }
      } catch (err) {
        log.error(`Streaming failed: ${errorMessage(err)}`);
        res.write(`data: ${JSON.stringify({ error: errorMessage(err) })}\n\n`);
      } finally {
        this.activeStreams.delete(stream);
        res.end();
      }
    }));
  }

  private setupSocket() {
    this.io.on('connection', (socket) => {
      log.info(`Web client connected: ${socket.id}`);
      const session: { active?: FragmentStream; history: ChatTurn[] } = { history: [] };

      socket.on('message', (payload: unknown) => {
        this.handleSocketMessage(socket, session, payload).catch((err: unknown) => {
          log.error(`Socket message failed: ${errorMessage(err)}`);
        });
      });

      socket.on('stop_generation', () => {
        if (session.active) {
          log.info(`Generation stopped by client ${socket.id}`);
          session.active.cancel();
        }
      });

      socket.on('disconnect', () => {
        session.active?.cancel();
        log.info(`Web client disconnected: ${socket.id}`);
      });
    });
  }

  private async handleSocketMessage(
    socket: Socket,
    session: { active?: FragmentStream; history: ChatTurn[] },
    payload: unknown
  ): Promise<void> {
    const parsed = SocketMessageSchema.safeParse(payload);
    if (!parsed.success) {
      socket.emit('error_message', { error: `Invalid message: ${describeZodError(parsed.error)}` });
      return;
    }
    const { text, knowledgeBase, model } = parsed.data;

    // A new question replaces the one still being answered
    session.active?.cancel();

    let stream: FragmentStream | undefined;
    try {
      const collection = await this.requireKnowledgeBase(knowledgeBase);
      stream = await this.pipeline.answer(this.pipeline.getHandle(collection), text, {
        model: model ?? this.activeModel,
        history: session.history,
        stream: true,
      });
      session.active = stream;
      this.activeStreams.add(stream);

      let content = '';
      let failed = false;
      for await (const fragment of stream) {
        content += fragment;
        failed = failed || isSurfacedError(fragment);
        socket.emit('chunk', { content: fragment });
      }

      if (stream.isCancelled) {
        socket.emit('done', { content, stopped: true });
        return;
      }
      socket.emit('done', { content });
      if (!failed) this.remember(session.history, text, content);
    } catch (err) {
      socket.emit('error_message', { error: errorMessage(err) });
    } finally {
      if (stream) {
        this.activeStreams.delete(stream);
        if (session.active === stream) session.active = undefined;
      }
    }
  }

  private remember(history: ChatTurn[], query: string, answer: string): void {
    const limit = this.options.config.knowledge_base.history_turns * 2;
    if (limit === 0) return;
    history.push({ role: 'user', content: query }, { role: 'assistant', content: answer.trim() });
    if (history.length > limit) history.splice(0, history.length - limit);
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', reject);
        resolve();
      });
    });

    const address = this.server.address();
    if (address && typeof address === 'object') {
      this.port = address.port;
    }
    log.info(`Web Channel started at ${this.url}`);
  }

  async stop(): Promise<void> {
    for (const stream of this.activeStreams) stream.cancel();
    this.activeStreams.clear();
    if (!this.server.listening) return;

    await new Promise<void>((resolve, reject) => {
      void this.io.close((err) => (err ? reject(err) : resolve()));
      this.server.closeAllConnections();
    });
    log.info('Web Channel stopped');
  }
}
