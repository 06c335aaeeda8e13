import type { JsonNumber } from './number.js';
import type { Result } from './result.js';

export type JsonPrimitive = null | boolean | number | string;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/**
 * Signals the dispatch loop whether more tokens are expected.
 */
export enum ParserState {
  Running = 'RUNNING',
  Finished = 'FINISHED',
}

export type ParserResult = Result<ParserState>;

/**
 * Value a parser hook may hand back to the dispatch loop. A plain state is
 * treated as success.
 */
export type HookResult = ParserState | ParserResult;

/**
 * Kind of an open container on the depth stack
 */
export enum ContainerType {
  Object = 'OBJECT',
  Array = 'ARRAY',
}

/**
 * What the innermost open container admits next
 */
export enum Expectation {
  Key = 'KEY',
  Value = 'VALUE',
}

/**
 * Base detected while scanning a number. `ZeroOnly` marks a bare `0`.
 */
export enum NumberBase {
  Octal = 8,
  Decimal = 10,
  Hex = 16,
  ZeroOnly = 0,
}

/**
 * Closure table for `createParser`. Every handler is optional; a missing one
 * is routed to `onUnexpectedEvent`.
 *
 * Strings and keys are handed over as immutable copies of the document's
 * scratch buffers, so retaining them is safe.
 */
export interface ParserEvents {
  onNull?: () => HookResult | void;
  onBool?: (value: boolean) => HookResult | void;
  onNumber?: (value: JsonNumber) => HookResult | void;
  onString?: (value: string) => HookResult | void;
  onKey?: (key: string) => HookResult | void;
  onStartObject?: () => HookResult | void;
  onEndObject?: (count: number) => HookResult | void;
  onStartArray?: () => HookResult | void;
  onEndArray?: (count: number) => HookResult | void;
  onComma?: () => HookResult | void;
  onUnexpectedEvent?: () => HookResult | void;
}

/**
 * Callback shape of the strict parser helpers: either plain side effects or a
 * `Result<void>` that can reject the value.
 */
export type ValueHandler<T> = (value: T) => Result<void> | void;
export type ElementHandler<T> = (index: number, value: T) => Result<void> | void;
