/**
 * ByteSource - the pipeline's only view of the transport.
 *
 * Shaped like ReadableStreamDefaultReader.read(), so a WHATWG stream reader
 * from a serial port binding is already a ByteSource. Node streams and other
 * async iterables go through fromAsyncIterable().
 *
 * `done: true` means the sensor is gone. A read with no bytes is allowed and
 * means "nothing yet".
 */

export interface ByteReadResult {
  value?: Uint8Array;
  done: boolean;
}

export interface ByteSource {
  read(): Promise<ByteReadResult>;
  /** Optional: release the transport when the pipeline stops */
  cancel?(reason?: unknown): Promise<void>;
}

/** Adapt a Node Readable, serial port stream or async generator. */
export function fromAsyncIterable(
  iterable: AsyncIterable<Uint8Array | string>,
): ByteSource {
  const iterator = iterable[Symbol.asyncIterator]();
  const encoder = new TextEncoder();
  return {
    async read() {
      const result = await iterator.next();
      if (result.done) return { done: true };
      const chunk = result.value;
      return {
        value: typeof chunk === "string" ? encoder.encode(chunk) : chunk,
        done: false,
      };
    },
    async cancel() {
      await iterator.return?.();
    },
  };
}

/**
 * In-memory source for tests and replay. Chunks are handed out in order;
 * once exhausted the source reports done unless `keepOpen` is set, in which
 * case it yields empty reads until more data is pushed or it is ended.
 */
export class MemoryByteSource implements ByteSource {
  private readonly chunks: Uint8Array[];
  private ended: boolean;
  private failure: Error | null = null;
  readCount = 0;

  constructor(chunks: Iterable<Uint8Array> = [], options?: { keepOpen?: boolean }) {
    this.chunks = [...chunks];
    this.ended = !options?.keepOpen;
  }

  push(...chunks: Uint8Array[]): void {
    this.chunks.push(...chunks);
  }

  /** Report done once the queued chunks are consumed. */
  end(): void {
    this.ended = true;
  }

  /** Make the next read reject (simulated unplug). */
  fail(error: Error): void {
    this.failure = error;
  }

  async read(): Promise<ByteReadResult> {
    this.readCount++;
    if (this.failure) throw this.failure;
    const value = this.chunks.shift();
    if (value) return { value, done: false };
    if (this.ended) return { done: true };
    return { value: new Uint8Array(0), done: false };
  }
}
