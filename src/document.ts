import { resolveReaderConfig, type ReaderConfig, type ReaderOptions } from './config.js';
import { DepthCounter } from './depth-counter.js';
import { JsonErrc } from './errors.js';
import { silentLogger, type Logger } from './logging.js';
import { makeResult, type Result } from './result.js';
import type { CharSource } from './sources.js';
import { StreamBuffer } from './stream-buffer.js';

/**
 * Reusable text buffer for the token being read. `push` refuses characters
 * beyond `limit` and marks the buffer as overflowed until the next `clear`.
 */
export class ScratchBuffer {
  private parts: string[] = [];
  private refused = false;

  constructor(readonly limit: number) {}

  get length(): number {
    return this.parts.length;
  }

  get overflowed(): boolean {
    return this.refused;
  }

  push(char: string): boolean {
    if (this.parts.length >= this.limit) {
      this.refused = true;
      return false;
    }
    this.parts.push(char);
    return true;
  }

  clear(): this {
    this.parts.length = 0;
    this.refused = false;
    return this;
  }

  toString(): string {
    return this.parts.join('');
  }
}

/**
 * Mutable state of one parse session: the stream window, the depth stack and
 * the scratch buffers for the current key and string.
 *
 * The source stays owned by the caller and must outlive the document. A
 * document is not meant to be shared between concurrent parses.
 */
export class JsonDocument {
  readonly config: ReaderConfig;
  readonly logger: Logger;
  readonly state: DepthCounter;

  private readonly streamBuffer: StreamBuffer;
  private readonly stringBuffer: ScratchBuffer;
  private key = '';

  constructor(source: CharSource, options: ReaderOptions = {}) {
    this.config = resolveReaderConfig(options);
    this.logger = options.logger ?? silentLogger;
    this.streamBuffer = new StreamBuffer(source, this.config.bufferSize, this.logger);
    this.state = new DepthCounter(this.config.maxDepth, this.config.singleValue);
    this.stringBuffer = new ScratchBuffer(this.config.maxStringLength);
  }

  /** Window over the source, for the lexer primitives only. @internal */
  getStreamBuffer(): StreamBuffer {
    return this.streamBuffer;
  }

  storeCurrentKey(key: string): Result<void> {
    const fits = key.length <= this.config.maxKeyLength;
    if (fits) this.key = key;
    return makeResult(fits, JsonErrc.KeyTooLong, `Keys are limited to ${this.config.maxKeyLength} characters`);
  }

  get currentKey(): string {
    return this.key;
  }

  get currentString(): string {
    return this.stringBuffer.toString();
  }

  getClearedStringBuffer(): ScratchBuffer {
    return this.stringBuffer.clear();
  }

  getStringBuffer(): ScratchBuffer {
    return this.stringBuffer;
  }
}
