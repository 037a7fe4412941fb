import { RagPipeline } from '../rag/pipeline';

/** A front end that turns user input into pipeline calls. */
export abstract class BaseChannel {
  constructor(protected readonly pipeline: RagPipeline) {}

  abstract get name(): string;

  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;
}
