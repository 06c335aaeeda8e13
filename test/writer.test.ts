import { describe, it, expect } from 'vitest';
import { JsonErrc } from '../src/errors.js';
import { JsonNumber } from '../src/number.js';
import type { Result } from '../src/result.js';
import type { JsonValue } from '../src/types.js';
import { escapeJsonString, JsonWriter, StringSink, stringifyJson } from '../src/writer.js';
import { buildValue } from './helpers.js';

function codeOf(result: Result<unknown>): JsonErrc | undefined {
  return result.ok ? undefined : result.error.code;
}

describe('JsonWriter', () => {
  it('should write events with separators', () => {
    const sink = new StringSink();
    const writer = new JsonWriter(sink);
    writer.startObject();
    writer.key('a');
    writer.startArray();
    writer.number(1);
    writer.number(-2n);
    writer.number(new JsonNumber('0x1F'));
    writer.endArray();
    writer.key('b');
    writer.null();
    writer.key('c');
    writer.bool(false);
    writer.endObject();
    expect(writer.finish().ok).toBe(true);
    expect(sink.toString()).toBe('{"a":[1,-2,0x1F],"b":null,"c":false}');
  });

  it('should escape strings', () => {
    expect(escapeJsonString('a"b\\c/d\be\ff\ng\rh\ti')).toBe('"a\\"b\\\\c\\/d\\be\\ff\\ng\\rh\\ti"');
  });

  it('should reject misplaced events without writing', () => {
    const sink = new StringSink();
    const writer = new JsonWriter(sink);
    expect(codeOf(writer.key('a'))).toBe(JsonErrc.ExpectedValue);
    expect(codeOf(writer.endArray())).toBe(JsonErrc.NotInArray);
    writer.startObject();
    expect(codeOf(writer.string('v'))).toBe(JsonErrc.ExpectedKey);
    writer.key('k');
    expect(codeOf(writer.endObject())).toBe(JsonErrc.ExpectedValue);
    expect(codeOf(writer.finish())).toBe(JsonErrc.ExpectedClosingBraces);
    expect(sink.toString()).toBe('{"k":');
  });

  it('should accept a single top-level value', () => {
    const writer = new JsonWriter(new StringSink());
    expect(writer.number(1).ok).toBe(true);
    expect(codeOf(writer.number(2))).toBe(JsonErrc.UnexpectedOnTopLevel);
  });

  it('should reject numbers without a JSON form', () => {
    const writer = new JsonWriter(new StringSink());
    expect(codeOf(writer.number(Number.NaN))).toBe(JsonErrc.InvalidNumber);
    expect(codeOf(writer.number(Number.POSITIVE_INFINITY))).toBe(JsonErrc.InvalidNumber);
  });

  it('should enforce the maximum depth', () => {
    const writer = new JsonWriter(new StringSink(), { maxDepth: 1 });
    expect(writer.startArray().ok).toBe(true);
    expect(codeOf(writer.startArray())).toBe(JsonErrc.UnexpectedOpeningBrackets);
  });
});

describe('stringifyJson', () => {
  it('should serialise plain values', () => {
    expect(stringifyJson({ a: 1, b: [true, null, 'x"y'], c: {} }).unwrap()).toBe('{"a":1,"b":[true,null,"x\\"y"],"c":{}}');
    expect(stringifyJson('a/b').unwrap()).toBe('"a\\/b"');
    expect(stringifyJson([]).unwrap()).toBe('[]');
  });

  it('should match JSON.stringify for text without slashes', () => {
    const value: JsonValue = { list: [1, -2.5, 1e21, 0.001], text: 'line\nbreak', nested: [[], [{}]] };
    expect(stringifyJson(value).unwrap()).toBe(JSON.stringify(value));
  });

  it('should fail on nesting beyond maxDepth', () => {
    expect(codeOf(stringifyJson([[[1]]], { maxDepth: 2 }))).toBe(JsonErrc.UnexpectedOpeningBrackets);
  });

  it('should round trip through the reader', () => {
    const value: JsonValue = {
      name: 'a/b "quoted"',
      list: [1, -2.5, 1e21, true, false, null],
      nested: { empty: {}, arr: [] },
      escaped: 'tab\tnl\n',
    };
    const { value: read, result } = buildValue(stringifyJson(value).unwrap());
    expect(result.ok).toBe(true);
    expect(read).toEqual(value);
  });
});
