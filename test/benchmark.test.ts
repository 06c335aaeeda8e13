import { describe, it, expect } from 'vitest';
import { readJson } from '../src/parser.js';
import { ChunkSource } from '../src/sources.js';
import { ParserState } from '../src/types.js';

function* chunksOf(text: string, size: number): Generator<string> {
  for (let i = 0; i < text.length; i += size) {
    yield text.slice(i, i + size);
  }
}

describe('Benchmarks', () => {
  describe('performance', () => {
    it('should read a large document through a small window', () => {
      const itemCount = 5000;
      const items = Array.from({ length: itemCount }, (_, i) => ({
        id: i,
        name: `Item ${i}`,
        active: i % 2 === 0,
        tags: ['a', 'b'],
      }));
      const json = JSON.stringify({ items });

      const counts = { objects: 0, arrays: 0, keys: 0, numbers: 0, strings: 0, bools: 0 };
      const start = performance.now();
      const result = readJson(
        new ChunkSource(chunksOf(json, 1000)),
        {
          onStartObject: () => {
            counts.objects += 1;
          },
          onEndObject: () => {},
          onStartArray: () => {
            counts.arrays += 1;
          },
          onEndArray: () => {},
          onKey: () => {
            counts.keys += 1;
          },
          onNumber: () => {
            counts.numbers += 1;
          },
          onString: () => {
            counts.strings += 1;
          },
          onBool: () => {
            counts.bools += 1;
          },
        },
        { bufferSize: 64 },
      );
      const elapsed = performance.now() - start;

      expect(result.unwrap()).toBe(ParserState.Finished);
      expect(counts).toEqual({
        objects: itemCount + 1,
        arrays: itemCount + 1,
        keys: itemCount * 4 + 1,
        numbers: itemCount,
        strings: itemCount * 3,
        bools: itemCount,
      });

      console.log(`Read ${json.length} characters in ${elapsed.toFixed(2)}ms`);
    });

    it('should handle deeply nested input up to the configured depth', () => {
      const depth = 500;
      const json = '['.repeat(depth) + ']'.repeat(depth);
      expect(readJson(json, {}, { maxDepth: depth }).ok).toBe(true);
      const result = readJson(json, {}, { maxDepth: depth - 1 });
      expect(result.ok ? undefined : result.error.supportData).toBe(depth);
    });
  });
});
