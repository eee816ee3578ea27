import type { Readable } from "node:stream";

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === "string") return Buffer.from(chunk, "utf8");
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  throw new TypeError(`Unsupported chunk type from readable stream: ${typeof chunk}`);
}

/** The stream was destroyed before it ended, e.g. because its process was killed. */
export function isPrematureClose(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ERR_STREAM_PREMATURE_CLOSE"
  );
}

/**
 * Pull-based reader over a Node readable. A chunk is only requested from the
 * stream when a read cannot be satisfied from what is already buffered, so an
 * idle caller leaves the stream paused and the writer back-pressured.
 */
export class ByteReader {
  private readonly chunks: AsyncIterator<unknown>;
  private buffered: Buffer[] = [];
  private bufferedLength = 0;
  private ended = false;

  constructor(private readonly stream: Readable) {
    this.chunks = stream[Symbol.asyncIterator]();
  }

  public get isEnded(): boolean {
    return this.ended && this.bufferedLength === 0;
  }

  /**
   * Exactly `size` bytes, or `null` if the stream ends first.
   * Bytes of a trailing partial read are discarded.
   */
  public async readExact(size: number): Promise<Buffer | null> {
    while (this.bufferedLength < size) {
      if (!(await this.fill())) {
        this.clear();
        return null;
      }
    }
    return this.take(size);
  }

  /** Between 1 and `maxSize` bytes, or `null` at end of stream. */
  public async readSome(maxSize: number): Promise<Buffer | null> {
    if (this.bufferedLength === 0 && !(await this.fill())) return null;
    return this.take(Math.min(maxSize, this.bufferedLength));
  }

  /**
   * Reads up to the next delimiter byte and returns the bytes before it.
   * Delimiters at the start of a line are skipped, so `\r\n` and blank lines
   * never produce empty results. Returns `null` at end of stream, including
   * when only delimiters remain.
   */
  public async readUntilAny(delimiters: readonly number[]): Promise<Buffer | null> {
    let searchFrom = 0;
    for (;;) {
      let buffer = this.compact();
      if (searchFrom === 0) {
        let skip = 0;
        while (skip < buffer.length && delimiters.includes(buffer[skip])) skip++;
        if (skip > 0) {
          this.take(skip);
          buffer = this.compact();
        }
      }

      for (let i = searchFrom; i < buffer.length; i++) {
        if (delimiters.includes(buffer[i])) {
          const line = this.take(i);
          this.take(1);
          return line;
        }
      }
      searchFrom = buffer.length;

      if (!(await this.fill())) {
        return this.bufferedLength > 0 ? this.take(this.bufferedLength) : null;
      }
    }
  }

  /** Stops reading and releases the underlying stream. */
  public async close(): Promise<void> {
    this.clear();
    this.ended = true;
    // Destroy first: return() waits behind a pending read, and does nothing
    // for an iterator that never started.
    this.stream.destroy();
    await this.chunks.return?.();
  }

  private async fill(): Promise<boolean> {
    if (this.ended) return false;
    const result = await this.chunks.next();
    if (result.done) {
      this.ended = true;
      return false;
    }
    const chunk = toBuffer(result.value);
    if (chunk.length > 0) {
      this.buffered.push(chunk);
      this.bufferedLength += chunk.length;
    }
    return true;
  }

  private compact(): Buffer {
    if (this.buffered.length === 0) return Buffer.alloc(0);
    if (this.buffered.length > 1) {
      this.buffered = [Buffer.concat(this.buffered, this.bufferedLength)];
    }
    return this.buffered[0];
  }

  private take(size: number): Buffer {
    const buffer = this.compact();
    const head = buffer.subarray(0, size);
    const rest = buffer.subarray(size);
    this.buffered = rest.length > 0 ? [rest] : [];
    this.bufferedLength = rest.length;
    return head;
  }

  private clear(): void {
    this.buffered = [];
    this.bufferedLength = 0;
  }
}
