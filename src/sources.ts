import { closeSync, openSync, readSync } from 'node:fs';
import { StringDecoder } from 'node:string_decoder';

/**
 * Synchronous character source read by the stream buffer.
 */
export interface CharSource {
  /**
   * Read up to `maxChars` characters. An empty string means end of input;
   * a source with nothing to deliver yet must block rather than return `''`.
   */
  read(maxChars: number): string;
}

export class StringSource implements CharSource {
  private position = 0;

  constructor(private readonly text: string) {}

  read(maxChars: number): string {
    const chunk = this.text.slice(this.position, this.position + maxChars);
    this.position += chunk.length;
    return chunk;
  }
}

/**
 * Serves a sequence of chunks the way a socket delivers them: a read never
 * crosses a chunk boundary, so reads may come back shorter than asked.
 */
export class ChunkSource implements CharSource {
  private readonly iterator: Iterator<string>;
  private pending = '';

  constructor(chunks: Iterable<string>) {
    this.iterator = chunks[Symbol.iterator]();
  }

  read(maxChars: number): string {
    while (this.pending.length === 0) {
      const next = this.iterator.next();
      if (next.done) return '';
      this.pending = next.value;
    }
    const chunk = this.pending.slice(0, maxChars);
    this.pending = this.pending.slice(chunk.length);
    return chunk;
  }
}

/**
 * Reads a UTF-8 file through a descriptor. Multi-byte sequences split across
 * reads are held back by the decoder until complete.
 */
export class FileSource implements CharSource {
  private fd: number | null;
  private readonly decoder = new StringDecoder('utf8');
  private readonly bytes: Buffer;
  private pending = '';

  constructor(path: string, chunkBytes = 64 * 1024) {
    this.fd = openSync(path, 'r');
    this.bytes = Buffer.alloc(chunkBytes);
  }

  read(maxChars: number): string {
    while (this.pending.length === 0) {
      if (this.fd === null) return '';
      const count = readSync(this.fd, this.bytes, 0, this.bytes.length, null);
      if (count === 0) {
        this.pending = this.decoder.end();
        this.close();
      } else {
        this.pending = this.decoder.write(this.bytes.subarray(0, count));
      }
    }
    const chunk = this.pending.slice(0, maxChars);
    this.pending = this.pending.slice(chunk.length);
    return chunk;
  }

  close(): void {
    if (this.fd === null) return;
    closeSync(this.fd);
    this.fd = null;
  }
}
