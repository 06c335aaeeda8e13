import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { LogEntry } from '../src/logging.js';
import { readJson } from '../src/parser.js';
import { ChunkSource, FileSource, StringSource, type CharSource } from '../src/sources.js';
import { StreamBuffer } from '../src/stream-buffer.js';
import { record } from './helpers.js';

function drain(buffer: StreamBuffer): string {
  let text = '';
  while (!buffer.isEndOfStream()) {
    text += buffer.peek() ?? '';
    buffer.increment();
  }
  return text;
}

describe('StreamBuffer', () => {
  it('should refill the window when the cursor leaves it', () => {
    const buffer = new StreamBuffer(new StringSource('abcde'), 3);
    expect(buffer.peek()).toBe('a');
    buffer.increment();
    expect([buffer.peek(), buffer.tell()]).toEqual(['b', 1]);
    buffer.increment();
    expect([buffer.peek(), buffer.tell()]).toEqual(['c', 2]);
    buffer.increment();
    buffer.increment();
    expect([buffer.peek(), buffer.tell()]).toEqual(['e', 4]);
    expect(buffer.isEndOfStream()).toBe(false);
    buffer.increment();
    expect(buffer.isEndOfStream()).toBe(true);
    expect(buffer.peek()).toBeUndefined();
    expect(buffer.tell()).toBe(5);
  });

  it('should stay at the end once the source is exhausted', () => {
    const buffer = new StreamBuffer(new StringSource('a'), 4);
    buffer.increment();
    buffer.increment();
    buffer.increment();
    expect(buffer.isEndOfStream()).toBe(true);
    expect(buffer.tell()).toBe(1);
  });

  it('should report an empty source as ended', () => {
    const buffer = new StreamBuffer(new StringSource(''));
    expect(buffer.isEndOfStream()).toBe(true);
    expect(buffer.tell()).toBe(0);
  });

  it('should read every character for any window size', () => {
    const text = '{"key": [1, 2, 3]}';
    for (const capacity of [2, 3, 7, 4096]) {
      expect(drain(new StreamBuffer(new StringSource(text), capacity))).toBe(text);
    }
  });

  it('should count offsets in UTF-8 bytes', () => {
    const buffer = new StreamBuffer(new StringSource('é€a'), 3);
    buffer.increment();
    expect([buffer.peek(), buffer.tell()]).toEqual(['€', 2]);
    buffer.increment();
    expect([buffer.peek(), buffer.tell()]).toEqual(['a', 5]);
    buffer.increment();
    expect(buffer.isEndOfStream()).toBe(true);
    expect(buffer.tell()).toBe(6);
  });

  it('should log refills', () => {
    const entries: LogEntry[] = [];
    const buffer = new StreamBuffer(new StringSource('abc'), 3, (entry) => entries.push(entry));
    drain(buffer);
    expect(entries.map((entry) => entry.data)).toEqual([
      { fill: 1, length: 2, offset: 0 },
      { fill: 2, length: 1, offset: 2 },
      { fill: 3, length: 0, offset: 3 },
    ]);
    expect(entries.every((entry) => entry.level === 'debug' && entry.event === 'buffer.refill')).toBe(true);
  });

  it('should record a failing source', () => {
    const failure = new Error('unreadable');
    const source: CharSource = {
      read: () => {
        throw failure;
      },
    };
    const buffer = new StreamBuffer(source, 8);
    expect(buffer.failed).toBe(true);
    expect(buffer.failure).toBe(failure);
    expect(buffer.isEndOfStream()).toBe(true);
  });
});

describe('sources', () => {
  it('should never read across a chunk boundary', () => {
    const source = new ChunkSource(['abc', '', 'de']);
    expect([source.read(2), source.read(5), source.read(5), source.read(5)]).toEqual(['ab', 'c', 'de', '']);
  });

  it('should read strings in pieces', () => {
    const source = new StringSource('hello');
    expect([source.read(3), source.read(3), source.read(3)]).toEqual(['hel', 'lo', '']);
  });

  describe('FileSource', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'pull-json-reader-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should decode multi-byte characters split across reads', () => {
      const path = join(dir, 'doc.json');
      writeFileSync(path, '["é€", 1]', 'utf8');
      const source = new FileSource(path, 2);
      const { events, result } = record(source, { bufferSize: 3 });
      expect(result.ok).toBe(true);
      expect(events).toEqual(['[', 'string(é€)', 'number(1)', '](2)']);
    });

    it('should report error offsets as byte positions in the file', () => {
      const path = join(dir, 'bad.json');
      writeFileSync(path, '["ééé", x]', 'utf8');
      for (const bufferSize of [3, 4096]) {
        const result = readJson(new FileSource(path, 2), {}, { bufferSize });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.name).toBe('InvalidType');
        expect(result.error.supportData).toBe(11);
      }
    });

    it('should close itself at the end of the file', () => {
      const path = join(dir, 'empty.json');
      writeFileSync(path, '', 'utf8');
      const source = new FileSource(path);
      expect(source.read(10)).toBe('');
      expect(source.read(10)).toBe('');
      source.close();
    });
  });
});
