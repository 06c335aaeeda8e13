import { DepthCounter } from './depth-counter.js';
import { JsonErrc } from './errors.js';
import { JsonNumber } from './number.js';
import { err, ok, type Result } from './result.js';
import { ContainerType, type JsonValue } from './types.js';

const ESCAPES: Record<string, string> = {
  '"': '\\"',
  '\\': '\\\\',
  '/': '\\/',
  '\b': '\\b',
  '\f': '\\f',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

const ESCAPED_CHARS = /["\\/\b\f\n\r\t]/g;

/**
 * Destination of a writer's output.
 */
export interface CharSink {
  write(chunk: string): void;
}

export class StringSink implements CharSink {
  private readonly parts: string[] = [];

  write(chunk: string): void {
    this.parts.push(chunk);
  }

  toString(): string {
    return this.parts.join('');
  }
}

export function escapeJsonString(value: string): string {
  return `"${value.replace(ESCAPED_CHARS, (char) => ESCAPES[char] ?? char)}"`;
}

export interface WriterOptions {
  maxDepth?: number;
}

/**
 * Event-driven JSON writer. Every call is checked against the same depth
 * stack the reader uses, so a rejected call writes nothing. Separators are
 * inserted automatically and only one top-level value is accepted.
 */
export class JsonWriter {
  private readonly state: DepthCounter;

  constructor(
    private readonly sink: CharSink,
    options: WriterOptions = {},
  ) {
    this.state = new DepthCounter(options.maxDepth ?? 32, true);
  }

  startObject(): Result<void> {
    return this.beginValue().andThen((prefix) => this.state.addObject().map(() => this.sink.write(`${prefix}{`)));
  }

  endObject(): Result<void> {
    return this.state.popObject().map(() => this.sink.write('}'));
  }

  startArray(): Result<void> {
    return this.beginValue().andThen((prefix) => this.state.addArray().map(() => this.sink.write(`${prefix}[`)));
  }

  endArray(): Result<void> {
    return this.state.popArray().map(() => this.sink.write(']'));
  }

  key(name: string): Result<void> {
    const active = this.state.active;
    const needsComma = active?.type === ContainerType.Object && active.expectsKey() && active.separatorPending;
    return (needsComma ? this.state.addSeparator() : ok())
      .andThen(() => this.state.addKey())
      .map(() => this.sink.write(`${needsComma ? ',' : ''}${escapeJsonString(name)}:`));
  }

  null(): Result<void> {
    return this.scalar('null');
  }

  bool(value: boolean): Result<void> {
    return this.scalar(value ? 'true' : 'false');
  }

  /** Writes a number; a `JsonNumber` is copied as read. */
  number(value: number | bigint | JsonNumber): Result<void> {
    if (typeof value === 'number' && !Number.isFinite(value)) {
      return err(JsonErrc.InvalidNumber, `JsonWriter.number: ${value} has no JSON representation`);
    }
    return this.scalar(value instanceof JsonNumber ? value.text : String(value));
  }

  string(value: string): Result<void> {
    return this.scalar(escapeJsonString(value));
  }

  /** Writes a plain value, recursing into arrays and objects. */
  value(value: JsonValue): Result<void> {
    if (value === null) return this.null();
    if (typeof value === 'boolean') return this.bool(value);
    if (typeof value === 'number') return this.number(value);
    if (typeof value === 'string') return this.string(value);
    if (Array.isArray(value)) {
      let result = this.startArray();
      for (const item of value) {
        result = result.andThen(() => this.value(item));
      }
      return result.andThen(() => this.endArray());
    }
    let result = this.startObject();
    for (const [name, item] of Object.entries(value)) {
      result = result.andThen(() => this.key(name)).andThen(() => this.value(item));
    }
    return result.andThen(() => this.endObject());
  }

  /** Fails while a container is still open. */
  finish(): Result<void> {
    return this.state.checkEndOfFile();
  }

  private scalar(text: string): Result<void> {
    return this.beginValue().map((prefix) => this.sink.write(prefix + text));
  }

  /** Registers a value with the depth stack and yields the separator to write before it. */
  private beginValue(): Result<string> {
    const active = this.state.active;
    const needsComma = active?.type === ContainerType.Array && active.separatorPending;
    return (needsComma ? this.state.addSeparator() : ok())
      .andThen(() => this.state.addValue())
      .map(() => (needsComma ? ',' : ''));
  }
}

/**
 * Serialises `value` without whitespace. Fails on non-finite numbers and on
 * nesting deeper than `maxDepth`.
 */
export function stringifyJson(value: JsonValue, options: WriterOptions = {}): Result<string> {
  const sink = new StringSink();
  const writer = new JsonWriter(sink, options);
  return writer
    .value(value)
    .andThen(() => writer.finish())
    .map(() => sink.toString());
}
