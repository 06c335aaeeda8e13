/**
 * pull-json-reader
 * Event-driven JSON reader over a bounded window, for inputs that never have
 * to be held in memory at once
 */

export { Parser, EventParser, createParser, readJson, toParserResult } from './parser.js';
export { StrictParser, SingleObjectParser, SingleArrayParser } from './strict-parser.js';
export { JsonParser } from './json-parser.js';
export { LevelValidator } from './level-validator.js';
export { JsonDocument, ScratchBuffer } from './document.js';
export { JsonOps } from './json-ops.js';
export { StreamBuffer } from './stream-buffer.js';
export { DepthCounter, ItemStack } from './depth-counter.js';
export { JsonNumber, isDigit } from './number.js';
export { StringSource, ChunkSource, FileSource } from './sources.js';
export { JsonWriter, StringSink, escapeJsonString, stringifyJson } from './writer.js';
export { Ok, Err, ok, err, makeResult, isResult } from './result.js';
export { ErrorCode, JsonErrc, JsonErrorDomain, JsonException, makeErrorCode } from './errors.js';
export { ReaderConfigSchema, resolveReaderConfig } from './config.js';
export { createConsoleLogger, silentLogger } from './logging.js';

// Export types
export type { Result } from './result.js';
export type { ErrorDomain } from './errors.js';
export type { ReaderConfig, ReaderConfigInput, ReaderOptions } from './config.js';
export type { Logger, LogEntry, LogLevel } from './logging.js';
export type { CharSource } from './sources.js';
export type { CharSink, WriterOptions } from './writer.js';
export type { NumberKind, NumberKinds } from './number.js';
export type {
  JsonPrimitive,
  JsonArray,
  JsonObject,
  JsonValue,
  HookResult,
  ParserResult,
  ParserEvents,
  ValueHandler,
  ElementHandler,
} from './types.js';

// Export enums for runtime use (also serves as type export)
export { ParserState, ContainerType, Expectation, NumberBase } from './types.js';
