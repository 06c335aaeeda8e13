import type { ReaderOptions } from '../src/config.js';
import { readJson } from '../src/parser.js';
import type { CharSource } from '../src/sources.js';
import type { JsonArray, JsonObject, JsonValue, ParserResult } from '../src/types.js';

export interface Recording {
  events: string[];
  result: ParserResult;
}

/** Reads `input` and records every event as a short string. */
export function record(input: string | CharSource, options: ReaderOptions = {}): Recording {
  const events: string[] = [];
  const result = readJson(
    input,
    {
      onNull: () => {
        events.push('null');
      },
      onBool: (value) => {
        events.push(`bool(${value})`);
      },
      onNumber: (value) => {
        events.push(`number(${value.text})`);
      },
      onString: (value) => {
        events.push(`string(${value})`);
      },
      onKey: (key) => {
        events.push(`key(${key})`);
      },
      onStartObject: () => {
        events.push('{');
      },
      onEndObject: (count) => {
        events.push(`}(${count})`);
      },
      onStartArray: () => {
        events.push('[');
      },
      onEndArray: (count) => {
        events.push(`](${count})`);
      },
    },
    options,
  );
  return { events, result };
}

interface OpenContainer {
  container: JsonArray | JsonObject;
  key: string;
}

/** Builds the value of a single-value document from its events. */
export function buildValue(input: string, options: ReaderOptions = {}): { value: JsonValue | undefined; result: ParserResult } {
  const stack: OpenContainer[] = [];
  let root: JsonValue | undefined;
  const add = (value: JsonValue) => {
    const top = stack[stack.length - 1];
    if (top === undefined) {
      root = value;
    } else if (Array.isArray(top.container)) {
      top.container.push(value);
    } else {
      top.container[top.key] = value;
    }
  };
  const open = (container: JsonArray | JsonObject) => {
    add(container);
    stack.push({ container, key: '' });
  };

  const result = readJson(
    input,
    {
      onNull: () => add(null),
      onBool: (value) => add(value),
      onNumber: (value) => add(Number(value.text)),
      onString: (value) => add(value),
      onKey: (key) => {
        const top = stack[stack.length - 1];
        if (top !== undefined) top.key = key;
      },
      onStartObject: () => open({}),
      onEndObject: () => {
        stack.pop();
      },
      onStartArray: () => open([]),
      onEndArray: () => {
        stack.pop();
      },
    },
    options,
  );
  return { value: root, result };
}
