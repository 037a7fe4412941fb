/**
 * A lazy, finite sequence of generated text fragments. It can be iterated
 * once; `cancel()` closes the connection behind it and ends the iteration
 * without an error.
 */
export class FragmentStream implements AsyncIterable<string> {
  private consumed = false;
  private cancelled = false;

  constructor(
    private readonly source: AsyncIterable<string>,
    private readonly controller?: AbortController
  ) {}

  static of(...fragments: string[]): FragmentStream {
    async function* emit(): AsyncGenerator<string> {
      yield* fragments;
    }
    return new FragmentStream(emit());
  }

  /** True after `cancel()` or once the controller's signal was aborted from outside. */
  get isCancelled(): boolean {
    return this.cancelled || this.controller?.signal.aborted === true;
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.controller?.abort();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string> {
    if (this.consumed) {
      throw new Error('FragmentStream can only be consumed once');
    }
    this.consumed = true;

    try {
      for await (const fragment of this.source) {
        if (this.isCancelled) return;
        yield fragment;
      }
    } catch (err) {
      if (this.isCancelled) return;
      throw err;
    }
  }

  async collect(): Promise<string> {
    let text = '';
    for await (const fragment of this) {
      text += fragment;
    }
    return text;
  }
}
