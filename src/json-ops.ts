import type { JsonDocument, ScratchBuffer } from './document.js';
import { JsonErrc } from './errors.js';
import { err, makeResult, ok, type Result } from './result.js';
import type { StreamBuffer } from './stream-buffer.js';

const WHITESPACE = ' \r\n\t';

type CharPredicate = (char: string) => boolean;
type CharAction = (char: string) => void;

const doNothing: CharAction = () => {};

export const isCharacter = (expected: string): CharPredicate => (char) => char === expected;

/**
 * Lexer primitives over a document's stream window.
 */
export class JsonOps {
  private readonly buffer: StreamBuffer;

  constructor(document: JsonDocument) {
    this.buffer = document.getStreamBuffer();
  }

  isEndOfStream(step = 0): boolean {
    return this.buffer.isEndOfStream(step);
  }

  checkNoEndOfStream(step = 0): Result<void> {
    return makeResult(!this.isEndOfStream(step), JsonErrc.UnexpectedEOF, 'JsonOps.checkNoEndOfStream');
  }

  /** Current character. Reading past the end is a programming error. */
  peek(): string {
    const char = this.buffer.peek();
    if (char === undefined || this.isEndOfStream()) {
      throw new RangeError('JsonOps.peek: read past the end of the stream');
    }
    return char;
  }

  /** Current character, then advance. Yields `''` at the end of the stream. */
  take(): string {
    const char = this.buffer.peek() ?? '';
    this.move();
    return char;
  }

  tryTake(): Result<string> {
    return this.checkNoEndOfStream().map(() => this.take());
  }

  move(): boolean {
    return this.buffer.increment();
  }

  tell(): number {
    return this.buffer.tell();
  }

  get failed(): boolean {
    return this.buffer.failed;
  }

  get failure(): unknown {
    return this.buffer.failure;
  }

  /**
   * Runs `action` on the current character and advances if `predicate`
   * accepts it. Must not be called at the end of the stream.
   */
  doIf(predicate: CharPredicate, action: CharAction): boolean {
    const char = this.buffer.peek();
    if (char === undefined || this.isEndOfStream()) {
      throw new RangeError('JsonOps.doIf: access stream out of bounds');
    }
    if (!predicate(char)) return false;
    action(char);
    return this.buffer.increment();
  }

  doWhile(predicate: CharPredicate, action: CharAction): void {
    while (!this.isEndOfStream()) {
      const char = this.buffer.peek();
      if (char === undefined || !predicate(char)) break;
      action(char);
      this.buffer.increment();
    }
  }

  /** Appends the current character to `buffer` and advances if it is one of `charset`. */
  pushIfAny(buffer: ScratchBuffer, charset: string): boolean {
    return this.doIf(
      (char) => charset.includes(char),
      (char) => {
        buffer.push(char);
      },
    );
  }

  skip(char: string): boolean {
    return this.doIf(isCharacter(char), doNothing);
  }

  /** Consumes `literal` character by character, failing on the first mismatch. */
  skipString(literal: string, message: string): Result<void> {
    if (literal.length === 0) {
      return err(JsonErrc.InvalidString, 'JsonOps.skipString: cannot skip an empty string');
    }
    for (const expected of literal) {
      if (this.take() !== expected) return err(JsonErrc.InvalidString, message);
    }
    return ok();
  }

  skipWhitespace(): void {
    this.doWhile((char) => WHITESPACE.includes(char), doNothing);
  }
}
