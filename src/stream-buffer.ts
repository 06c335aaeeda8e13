import type { CharSource } from './sources.js';
import { log, silentLogger, type Logger } from './logging.js';

/**
 * Fixed read window over a `CharSource`. The cursor moves one character at a
 * time and the window is refilled when the cursor leaves it.
 */
export class StreamBuffer {
  private buffer = '';
  private position = 0;
  /** UTF-8 bytes delivered by all fills before the current one */
  private consumed = 0;
  private fills = 0;
  private ended = false;
  private error: unknown = undefined;
  private readFailed = false;

  constructor(
    private readonly source: CharSource,
    private readonly capacity = 4096,
    private readonly logger: Logger = silentLogger,
  ) {
    this.fill();
  }

  /** Character at the cursor, `undefined` once the window is exhausted. */
  peek(): string | undefined {
    return this.buffer[this.position];
  }

  /**
   * Moves the cursor by one. Returns `false` only when a refill was needed
   * and the source failed.
   */
  increment(): boolean {
    this.position += 1;
    if (this.isValidPosition()) return true;
    if (this.ended) {
      this.position = Math.min(this.position, this.buffer.length);
      return true;
    }
    return this.fill();
  }

  /**
   * True when `step` characters past the cursor lie outside the window and the
   * source has nothing more to deliver.
   */
  isEndOfStream(step = 0): boolean {
    return this.position + step >= this.buffer.length && this.ended;
  }

  /** Absolute UTF-8 byte offset of the cursor from the start of the stream. */
  tell(): number {
    return this.consumed + Buffer.byteLength(this.buffer.slice(0, this.position));
  }

  get failed(): boolean {
    return this.readFailed;
  }

  /** Error thrown by the source on the failed refill. */
  get failure(): unknown {
    return this.error;
  }

  private fill(): boolean {
    this.consumed += Buffer.byteLength(this.buffer);
    this.position = 0;
    let chunk: string;
    try {
      chunk = this.source.read(this.capacity - 1);
    } catch (e) {
      this.error = e;
      this.readFailed = true;
      this.ended = true;
      this.buffer = '';
      log(this.logger, 'error', 'buffer.read-failed', { offset: this.consumed, error: String(e) });
      return false;
    }
    this.buffer = chunk;
    this.ended = chunk.length === 0;
    this.fills += 1;
    log(this.logger, 'debug', 'buffer.refill', { fill: this.fills, length: chunk.length, offset: this.consumed });
    return true;
  }

  private isValidPosition(offset = 0): boolean {
    return this.position + offset < this.buffer.length;
  }
}
