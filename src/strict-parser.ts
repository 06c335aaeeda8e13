import type { JsonDocument } from './document.js';
import { JsonErrc } from './errors.js';
import { LevelValidator } from './level-validator.js';
import type { JsonNumber, NumberKind, NumberKinds } from './number.js';
import { Parser, toParserResult } from './parser.js';
import { err, isResult, makeResult, ok, type Result } from './result.js';
import {
  ParserState,
  type ElementHandler,
  type HookResult,
  type ParserResult,
  type ValueHandler,
} from './types.js';

// Sub-parsers extend StrictParser and StrictParser creates them, so the whole
// family lives in this module.

function settle(value: Result<void> | void): Result<void> {
  return isResult(value) ? value : ok();
}

/**
 * Parser that rejects every event its subclass does not handle. Its helpers
 * run a nested parser on the same document to read exactly one token or
 * value, so a hook can consume the value that belongs to a key:
 *
 * ```ts
 * class PointParser extends SingleObjectParser {
 *   x = 0;
 *   protected override onKey(key: string): HookResult {
 *     return key === 'x' ? this.parseNumber('int32', (v) => { this.x = v; }) : this.onUnexpectedEvent();
 *   }
 * }
 * ```
 */
export class StrictParser extends Parser {
  protected override onUnexpectedEvent(): HookResult {
    return err(JsonErrc.UserValidationFailed, 'Use of default method not allowed in this context.');
  }

  parseKey(fn: ValueHandler<string>): ParserResult {
    return new KeyParser(this.document, fn).subParse();
  }

  /** Reads the next key and fails unless it equals `expected`. */
  checkKey(expected: string): ParserResult {
    return this.parseKey((key) => makeResult(key === expected, JsonErrc.UserValidationFailed, 'Incorrect key received'));
  }

  parseBool(fn: ValueHandler<boolean>): ParserResult {
    return new BoolParser(this.document, fn).subParse();
  }

  /** Reads the next number and converts it to `kind` before handing it over. */
  parseNumber<K extends NumberKind>(kind: K, fn: ValueHandler<NumberKinds[K]>): ParserResult {
    return new NumberParser(this.document, kind, fn).subParse();
  }

  parseString(fn: ValueHandler<string>): ParserResult {
    return new StringParser(this.document, fn).subParse();
  }

  /**
   * Reads one array. `fn` is called with the index of every element and must
   * consume that element, usually through another helper.
   */
  parseArray(fn: ValueHandler<number>): ParserResult {
    return new ArrayParser(this.document, fn).subParse();
  }

  parseStringArray(fn: ElementHandler<string>): ParserResult {
    return this.parseArray((index) => this.parseString((value) => fn(index, value)).drop());
  }

  parseNumberArray<K extends NumberKind>(kind: K, fn: ElementHandler<NumberKinds[K]>): ParserResult {
    return this.parseArray((index) => this.parseNumber(kind, (value) => fn(index, value)).drop());
  }
}

/**
 * Reads exactly one object. Subclasses handle `onKey` and consume each value;
 * nested containers must be read through a helper.
 */
export class SingleObjectParser extends StrictParser {
  private readonly validator = new LevelValidator();

  protected override onStartObject(): HookResult {
    return this.validator.enter();
  }

  protected override onEndObject(_count: number): HookResult {
    return this.validator.leave().andThen((state) => this.finalize().map(() => state));
  }

  protected override onStartArray(): HookResult {
    return err(JsonErrc.UserValidationFailed, 'SingleObjectParser: Did not expect start of array.');
  }

  protected override onEndArray(_count: number): HookResult {
    return err(JsonErrc.UserValidationFailed, 'SingleObjectParser: Did not expect end of array.');
  }

  protected override onUnexpectedEvent(): HookResult {
    return err(JsonErrc.UserValidationFailed, 'Expected to parse an object of elements.');
  }

  /** Runs once the object is closed; a failure fails the parse. */
  protected finalize(): Result<void> {
    return ok();
  }
}

/**
 * Reads exactly one array, calling `onElement` once per element with
 * `index` pointing at it.
 */
export abstract class SingleArrayParser extends StrictParser {
  private readonly validator = new LevelValidator();
  private elements = 0;

  /** Index of the element being read. */
  get index(): number {
    return this.elements;
  }

  protected abstract onElement(): HookResult;

  protected override onStartObject(): HookResult {
    return err(JsonErrc.UserValidationFailed, 'SingleArrayParser: Did not expect start of object.');
  }

  protected override onEndObject(_count: number): HookResult {
    return err(JsonErrc.UserValidationFailed, 'SingleArrayParser: Did not expect end of object.');
  }

  protected override onStartArray(): HookResult {
    return this.validator
      .enter()
      .andThen((state) => (this.peekSignificant() === ']' ? ok(state) : this.processElement()));
  }

  protected override onComma(): HookResult {
    return this.processElement();
  }

  protected override onEndArray(_count: number): HookResult {
    return this.validator.leave().andThen((state) => this.finalize().map(() => state));
  }

  protected override onUnexpectedEvent(): HookResult {
    return err(JsonErrc.UserValidationFailed, 'Expected to parse an array of elements.');
  }

  protected finalize(): Result<void> {
    return ok();
  }

  private processElement(): ParserResult {
    const result = toParserResult(this.onElement());
    this.elements += 1;
    return result;
  }
}

class KeyParser extends StrictParser {
  constructor(
    document: JsonDocument,
    private readonly fn: ValueHandler<string>,
  ) {
    super(document);
  }

  protected override onKey(key: string): HookResult {
    return settle(this.fn(key)).map(() => ParserState.Finished);
  }

  protected override onUnexpectedEvent(): HookResult {
    return err(JsonErrc.UserValidationFailed, 'Expected to parse a key.');
  }
}

class BoolParser extends StrictParser {
  constructor(
    document: JsonDocument,
    private readonly fn: ValueHandler<boolean>,
  ) {
    super(document);
  }

  protected override onBool(value: boolean): HookResult {
    return settle(this.fn(value)).map(() => ParserState.Finished);
  }

  protected override onUnexpectedEvent(): HookResult {
    return err(JsonErrc.UserValidationFailed, 'Expected to parse a boolean.');
  }
}

class NumberParser<K extends NumberKind> extends StrictParser {
  constructor(
    document: JsonDocument,
    private readonly kind: K,
    private readonly fn: ValueHandler<NumberKinds[K]>,
  ) {
    super(document);
  }

  protected override onNumber(value: JsonNumber): HookResult {
    return value
      .tryAs(this.kind)
      .andThen((converted) => settle(this.fn(converted)))
      .map(() => ParserState.Finished);
  }

  protected override onUnexpectedEvent(): HookResult {
    return err(JsonErrc.UserValidationFailed, 'Expected to parse a number.');
  }
}

class StringParser extends StrictParser {
  constructor(
    document: JsonDocument,
    private readonly fn: ValueHandler<string>,
  ) {
    super(document);
  }

  protected override onString(value: string): HookResult {
    return settle(this.fn(value)).map(() => ParserState.Finished);
  }

  protected override onUnexpectedEvent(): HookResult {
    return err(JsonErrc.UserValidationFailed, 'Expected to parse a string.');
  }
}

class ArrayParser extends SingleArrayParser {
  constructor(
    document: JsonDocument,
    private readonly fn: ValueHandler<number>,
  ) {
    super(document);
  }

  protected override onElement(): HookResult {
    return settle(this.fn(this.index)).map(() => ParserState.Running);
  }
}
