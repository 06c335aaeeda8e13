import type { JsonDocument } from './document.js';
import type { ErrorCode } from './errors.js';
import type { NumberKind, NumberKinds } from './number.js';
import { err, ok, type Result } from './result.js';
import { StrictParser } from './strict-parser.js';
import { ParserState, type ElementHandler, type HookResult, type ParserResult, type ValueHandler } from './types.js';

class StartObjectParser extends StrictParser {
  protected override onStartObject(): HookResult {
    return ParserState.Finished;
  }
}

class EndObjectParser extends StrictParser {
  protected override onEndObject(_count: number): HookResult {
    return ParserState.Finished;
  }
}

class StartArrayParser extends StrictParser {
  protected override onStartArray(): HookResult {
    return ParserState.Finished;
  }
}

class EndArrayParser extends StrictParser {
  protected override onEndArray(_count: number): HookResult {
    return ParserState.Finished;
  }
}

/**
 * Reads a document with a fixed layout as a chain of expectations. Each step
 * consumes one token or value; after the first failure the remaining steps
 * are skipped and `finish` reports that failure.
 *
 * ```ts
 * const result = new JsonParser(document)
 *   .startObject()
 *   .key('port')
 *   .number('uint16', (port) => { config.port = port; })
 *   .endObject()
 *   .finish();
 * ```
 */
export class JsonParser {
  private readonly parser: StrictParser;
  private result: Result<void> = ok();
  private customized = false;

  constructor(private readonly document: JsonDocument) {
    this.parser = new StrictParser(document);
  }

  /** Outcome of the chain, with `state` in place of success. */
  finish(state: ParserState = ParserState.Finished): ParserResult {
    return this.result.map(() => state);
  }

  /** Expects the key `expected`, or hands whatever key comes next to a callback. */
  key(expected: string | ValueHandler<string>): this {
    return this.ifValid(() =>
      (typeof expected === 'string' ? this.parser.checkKey(expected) : this.parser.parseKey(expected)).drop(),
    );
  }

  startObject(): this {
    return this.ifValid(() => new StartObjectParser(this.document).parse().drop());
  }

  endObject(): this {
    return this.ifValid(() => new EndObjectParser(this.document).parse().drop());
  }

  startArray(): this {
    return this.ifValid(() => new StartArrayParser(this.document).parse().drop());
  }

  endArray(): this {
    return this.ifValid(() => new EndArrayParser(this.document).parse().drop());
  }

  bool(fn: ValueHandler<boolean>): this {
    return this.ifValid(() => this.parser.parseBool(fn).drop());
  }

  string(fn: ValueHandler<string>): this {
    return this.ifValid(() => this.parser.parseString(fn).drop());
  }

  number<K extends NumberKind>(kind: K, fn: ValueHandler<NumberKinds[K]>): this {
    return this.ifValid(() => this.parser.parseNumber(kind, fn).drop());
  }

  array(fn: ValueHandler<number>): this {
    return this.ifValid(() => this.parser.parseArray(fn).drop());
  }

  stringArray(fn: ElementHandler<string>): this {
    return this.ifValid(() => this.parser.parseStringArray(fn).drop());
  }

  numberArray<K extends NumberKind>(kind: K, fn: ElementHandler<NumberKinds[K]>): this {
    return this.ifValid(() => this.parser.parseNumberArray(kind, fn).drop());
  }

  /**
   * Attaches context to a failure of the preceding steps. A message is added
   * to the existing error; an `ErrorCode` replaces it. Only the first call
   * after a failure has an effect.
   */
  addErrorInfo(info: string | ErrorCode): this {
    const current = this.result;
    if (this.customized || current.ok) return this;
    this.result = err(typeof info === 'string' ? current.error.withUserMessage(info) : info);
    this.customized = true;
    return this;
  }

  private ifValid(step: () => Result<void>): this {
    if (this.result.ok) {
      this.result = step();
    }
    return this;
  }
}
