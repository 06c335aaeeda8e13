import { JsonDocument } from './document.js';
import { JsonErrc } from './errors.js';
import { JsonOps } from './json-ops.js';
import { log } from './logging.js';
import { isDigit, JsonNumber } from './number.js';
import { err, isResult, ok, type Result } from './result.js';
import type { ReaderOptions } from './config.js';
import { StringSource, type CharSource } from './sources.js';
import type { DepthCounter } from './depth-counter.js';
import { NumberBase, ParserState, type HookResult, type ParserEvents, type ParserResult } from './types.js';

const VALUE_START = '"{[-0123456789tfn';
const NUMBER_MARKERS = '.Ee-+';

const ESCAPES: Record<string, string> = {
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  '"': '"',
  '\\': '\\',
  '/': '/',
};

export function toParserResult(value: HookResult | void): ParserResult {
  if (isResult(value)) return value;
  return ok(value === ParserState.Finished ? ParserState.Finished : ParserState.Running);
}

/**
 * Event-driven JSON reader. Each call to the dispatch loop reads one token,
 * validates it against the document's depth stack and hands it to the
 * matching hook.
 *
 * Subclasses override the hooks they care about; every hook that is not
 * overridden is routed to `onUnexpectedEvent`, which lets the parse continue.
 * A hook returning `Finished` stops the loop after the current token.
 */
export class Parser {
  protected readonly ops: JsonOps;

  constructor(protected readonly document: JsonDocument) {
    this.ops = new JsonOps(document);
  }

  /**
   * Reads tokens until a hook reports `Finished`, the stream ends on a
   * balanced structure, or a step fails. Errors carry the stream offset at
   * which they were detected as support data.
   */
  parse(): ParserResult {
    this.ops.skipWhitespace();
    let result: ParserResult = this.ops.checkNoEndOfStream().map(() => ParserState.Running);
    while (result.ok && result.value === ParserState.Running) {
      result = this.readToken();
    }
    if (this.ops.failed) {
      result = err(JsonErrc.StreamError, String(this.ops.failure));
    }
    const offset = this.ops.tell();
    if (result.ok) {
      log(this.document.logger, 'debug', 'parse.finished', { state: result.value, offset });
      return result;
    }
    log(this.document.logger, 'debug', 'parse.failed', { code: result.error.name, offset, message: result.error.userMessage });
    return err(result.error.withSupportData(offset));
  }

  /**
   * Runs the loop for a nested value on the same document. A finished
   * sub-parse reports `Running` so the enclosing loop keeps going.
   */
  subParse(): ParserResult {
    return this.parse().map(() => ParserState.Running);
  }

  protected get currentKey(): string {
    return this.document.currentKey;
  }

  protected get state(): DepthCounter {
    return this.document.state;
  }

  /** Next significant character without consuming it, `undefined` at the end. */
  protected peekSignificant(): string | undefined {
    this.ops.skipWhitespace();
    return this.ops.isEndOfStream() ? undefined : this.ops.peek();
  }

  protected onNull(): HookResult {
    return this.onUnexpectedEvent();
  }

  protected onBool(_value: boolean): HookResult {
    return this.onUnexpectedEvent();
  }

  protected onNumber(_value: JsonNumber): HookResult {
    return this.onUnexpectedEvent();
  }

  protected onString(_value: string): HookResult {
    return this.onUnexpectedEvent();
  }

  protected onKey(_key: string): HookResult {
    return this.onUnexpectedEvent();
  }

  protected onStartObject(): HookResult {
    return this.onUnexpectedEvent();
  }

  protected onEndObject(_count: number): HookResult {
    return this.onUnexpectedEvent();
  }

  protected onStartArray(): HookResult {
    return this.onUnexpectedEvent();
  }

  protected onEndArray(_count: number): HookResult {
    return this.onUnexpectedEvent();
  }

  protected onComma(): HookResult {
    return ParserState.Running;
  }

  protected onUnexpectedEvent(): HookResult {
    return ParserState.Running;
  }

  private readToken(): ParserResult {
    this.ops.skipWhitespace();
    if (this.ops.isEndOfStream()) {
      return this.state.checkEndOfFile().map(() => ParserState.Finished);
    }
    this.document.getClearedStringBuffer();
    const char = this.ops.peek();
    switch (char) {
      case 'n':
        return this.readLiteral('null', () => this.onNull());
      case 't':
        return this.readLiteral('true', () => this.onBool(true));
      case 'f':
        return this.readLiteral('false', () => this.onBool(false));
      case '"':
        return this.readStringToken();
      case '{':
        return this.readStartObject();
      case '}':
        return this.readEndObject();
      case '[':
        return this.readStartArray();
      case ']':
        return this.readEndArray();
      case ',':
        return this.readComma();
      case '-':
        this.document.getStringBuffer().push('-');
        this.ops.move();
        return this.ops.checkNoEndOfStream().andThen(() => this.readNumberToken(this.readNumberBase()));
      case '0':
        return this.readNumberToken(this.readNumberBase());
      default:
        if (char >= '1' && char <= '9') return this.readNumberToken(NumberBase.Decimal);
        return err(JsonErrc.InvalidType, 'Parser.readToken: expected a valid JSON token');
    }
  }

  private readLiteral(literal: string, hook: () => HookResult): ParserResult {
    return this.ops
      .skipString(literal, `Parser.readLiteral: expected '${literal}'`)
      .andThen(() => this.state.addValue())
      .andThen(() => toParserResult(hook()));
  }

  private readStringToken(): ParserResult {
    return this.readUnescapedString().andThen((text) => {
      this.ops.skipWhitespace();
      if (!this.ops.isEndOfStream() && this.ops.skip(':')) {
        return this.state
          .addKey()
          .andThen(() => this.document.storeCurrentKey(text))
          .andThen(() => toParserResult(this.onKey(text)));
      }
      return this.state.addValue().andThen(() => toParserResult(this.onString(text)));
    });
  }

  private readUnescapedString(): Result<string> {
    this.ops.move();
    const buffer = this.document.getClearedStringBuffer();
    for (;;) {
      const taken = this.ops.tryTake();
      if (!taken.ok) return err(taken.error);
      let char = taken.value;
      if (char === '"') return ok(buffer.toString());
      if (char === '\\') {
        const escape = this.ops.tryTake();
        if (!escape.ok) return err(escape.error);
        if (escape.value === 'u') return err(JsonErrc.UnicodeEscape, '\\u notation is not supported');
        const unescaped = ESCAPES[escape.value];
        if (unescaped === undefined) return err(JsonErrc.InvalidString, `Invalid escape sequence '\\${escape.value}'`);
        char = unescaped;
      }
      if (!buffer.push(char)) {
        return err(JsonErrc.StringTooLong, `Strings are limited to ${buffer.limit} characters`);
      }
    }
  }

  private readStartObject(): ParserResult {
    this.ops.move();
    return this.state
      .addValue()
      .andThen(() => this.state.addObject())
      .andThen(() => toParserResult(this.onStartObject()));
  }

  private readEndObject(): ParserResult {
    this.ops.move();
    return this.state.popObject().andThen((count) => toParserResult(this.onEndObject(count)));
  }

  private readStartArray(): ParserResult {
    this.ops.move();
    return this.state
      .addValue()
      .andThen(() => this.state.addArray())
      .andThen(() => toParserResult(this.onStartArray()));
  }

  private readEndArray(): ParserResult {
    this.ops.move();
    return this.state.popArray().andThen((count) => toParserResult(this.onEndArray(count)));
  }

  private readComma(): ParserResult {
    return this.state
      .checkNonEmpty()
      .andThen(() => this.state.addSeparator())
      .andThen(() => {
        this.ops.move();
        this.ops.skipWhitespace();
        return this.ops.checkNoEndOfStream();
      })
      .andThen(() =>
        VALUE_START.includes(this.ops.peek())
          ? toParserResult(this.onComma())
          : err(JsonErrc.InvalidType, "Parser.readComma: expected a value after ','"),
      );
  }

  private readNumberToken(base: NumberBase): ParserResult {
    return this.state
      .addValue()
      .andThen(() => this.readNumberText(base))
      .andThen((text) =>
        /[0-9]/.test(text)
          ? toParserResult(this.onNumber(new JsonNumber(text, base)))
          : err(JsonErrc.InvalidNumber, `Parser.readNumberToken: '${text}' has no digits`),
      );
  }

  private readNumberText(base: NumberBase): Result<string> {
    const buffer = this.document.getStringBuffer();
    if (base !== NumberBase.ZeroOnly) {
      this.ops.doWhile(
        (char) => !buffer.overflowed && (isDigit(char, base) || NUMBER_MARKERS.includes(char)),
        (char) => {
          buffer.push(char);
        },
      );
    }
    if (buffer.overflowed) {
      return err(JsonErrc.StringTooLong, `Numbers are limited to ${buffer.limit} characters`);
    }
    return ok(buffer.toString());
  }

  /** Consumes a leading `0` and the marker after it, if any, to pick the base. */
  private readNumberBase(): NumberBase {
    if (this.ops.peek() !== '0') return NumberBase.Decimal;
    const buffer = this.document.getStringBuffer();
    this.ops.move();
    buffer.push('0');
    if (this.ops.isEndOfStream()) return NumberBase.ZeroOnly;
    if (this.ops.pushIfAny(buffer, 'xX')) return NumberBase.Hex;
    // floats may start with 0 but are always decimal
    if (this.ops.pushIfAny(buffer, '.eE')) return NumberBase.Decimal;
    if (this.ops.pushIfAny(buffer, '1234567')) return NumberBase.Octal;
    return NumberBase.ZeroOnly;
  }
}

type Handler<A extends unknown[]> = ((...args: A) => HookResult | void) | undefined;

/**
 * Parser driven by a closure table instead of a subclass.
 */
export class EventParser extends Parser {
  constructor(
    document: JsonDocument,
    private readonly events: ParserEvents,
  ) {
    super(document);
  }

  protected override onNull(): HookResult {
    return this.handle(this.events.onNull);
  }

  protected override onBool(value: boolean): HookResult {
    return this.handle(this.events.onBool, value);
  }

  protected override onNumber(value: JsonNumber): HookResult {
    return this.handle(this.events.onNumber, value);
  }

  protected override onString(value: string): HookResult {
    return this.handle(this.events.onString, value);
  }

  protected override onKey(key: string): HookResult {
    return this.handle(this.events.onKey, key);
  }

  protected override onStartObject(): HookResult {
    return this.handle(this.events.onStartObject);
  }

  protected override onEndObject(count: number): HookResult {
    return this.handle(this.events.onEndObject, count);
  }

  protected override onStartArray(): HookResult {
    return this.handle(this.events.onStartArray);
  }

  protected override onEndArray(count: number): HookResult {
    return this.handle(this.events.onEndArray, count);
  }

  protected override onComma(): HookResult {
    const handler = this.events.onComma;
    return handler ? toParserResult(handler()) : ParserState.Running;
  }

  protected override onUnexpectedEvent(): HookResult {
    const handler = this.events.onUnexpectedEvent;
    return handler ? toParserResult(handler()) : ParserState.Running;
  }

  /** A missing handler counts as an unexpected event. */
  private handle<A extends unknown[]>(handler: Handler<A>, ...args: A): HookResult {
    return handler ? toParserResult(handler(...args)) : this.onUnexpectedEvent();
  }
}

/**
 * Create a parser that reports events to `events`
 */
export function createParser(document: JsonDocument, events: ParserEvents = {}): Parser {
  return new EventParser(document, events);
}

/**
 * Parse `input` in one call. Strings are read from memory; anything else is
 * treated as a character source owned by the caller.
 */
export function readJson(input: string | CharSource, events: ParserEvents = {}, options: ReaderOptions = {}): ParserResult {
  const source = typeof input === 'string' ? new StringSource(input) : input;
  return createParser(new JsonDocument(source, options), events).parse();
}

