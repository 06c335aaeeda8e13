import { JsonErrc } from './errors.js';
import { err, ok, type Result } from './result.js';
import { NumberBase } from './types.js';

/**
 * Target types a `JsonNumber` converts to. 64-bit integers come back as
 * `bigint`.
 */
export interface NumberKinds {
  int8: number;
  int16: number;
  int32: number;
  int64: bigint;
  uint8: number;
  uint16: number;
  uint32: number;
  uint64: bigint;
  float32: number;
  float64: number;
  bool: boolean;
  byte: number;
}

export type NumberKind = keyof NumberKinds;

type IntegerKind = Exclude<NumberKind, 'float32' | 'float64' | 'bool'>;

const INTEGER_RANGES: Record<IntegerKind, readonly [bigint, bigint]> = {
  int8: [-(2n ** 7n), 2n ** 7n - 1n],
  int16: [-(2n ** 15n), 2n ** 15n - 1n],
  int32: [-(2n ** 31n), 2n ** 31n - 1n],
  int64: [-(2n ** 63n), 2n ** 63n - 1n],
  uint8: [0n, 2n ** 8n - 1n],
  uint16: [0n, 2n ** 16n - 1n],
  uint32: [0n, 2n ** 32n - 1n],
  uint64: [0n, 2n ** 64n - 1n],
  byte: [0n, 2n ** 8n - 1n],
};

const FLOAT32_MAX = 3.4028234663852886e38;

const INTEGER_SYNTAX: Record<NumberBase, RegExp> = {
  [NumberBase.Decimal]: /^(-?)(\d+)$/,
  [NumberBase.Hex]: /^(-?)0[xX]([0-9a-fA-F]+)$/,
  [NumberBase.Octal]: /^(-?)([0-7]+)$/,
  [NumberBase.ZeroOnly]: /^(-?)(0)$/,
};

const INTEGER_PREFIX: Record<NumberBase, string> = {
  [NumberBase.Decimal]: '',
  [NumberBase.Hex]: '0x',
  [NumberBase.Octal]: '0o',
  [NumberBase.ZeroOnly]: '',
};

const FLOAT_SYNTAX = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export function isDigit(char: string, base: NumberBase): boolean {
  switch (base) {
    case NumberBase.Octal:
      return char >= '0' && char <= '7';
    case NumberBase.Decimal:
      return char >= '0' && char <= '9';
    case NumberBase.Hex:
      return (char >= '0' && char <= '9') || (char >= 'a' && char <= 'f') || (char >= 'A' && char <= 'F');
    default:
      return false;
  }
}

/**
 * Raw text of a JSON number together with the base detected while reading it.
 * Conversion is deferred to the consumer, which picks the target width.
 */
export class JsonNumber {
  constructor(
    readonly text: string,
    readonly base: NumberBase = NumberBase.Decimal,
  ) {}

  /**
   * Converts to `kind`. Fails with `InvalidNumber` when the text has trailing
   * characters, does not fit the range of `kind`, or is negative for an
   * unsigned kind.
   */
  tryAs<K extends NumberKind>(kind: K): Result<NumberKinds[K]> {
    const value = this.as(kind);
    return value === undefined ? err(JsonErrc.InvalidNumber, `Could not convert '${this.text}' to ${kind}`) : ok(value);
  }

  /** Like `tryAs`, with `undefined` in place of the error. */
  as<K extends NumberKind>(kind: K): NumberKinds[K] | undefined;
  as(kind: NumberKind): NumberKinds[NumberKind] | undefined {
    switch (kind) {
      case 'bool':
        return this.asBool();
      case 'float32':
      case 'float64':
        return this.asFloat(kind);
      case 'int64':
      case 'uint64':
        return this.asBigInt(kind);
      default:
        return this.asSafeInteger(kind);
    }
  }

  /** Hands the raw text to a custom converter. */
  convert<T>(converter: (text: string) => T): T {
    return converter(this.text);
  }

  toString(): string {
    return this.text;
  }

  private asBool(): boolean | undefined {
    if (this.text === '1') return true;
    if (this.text === '0') return false;
    return undefined;
  }

  private asFloat(kind: 'float32' | 'float64'): number | undefined {
    if (this.base !== NumberBase.Decimal && this.base !== NumberBase.ZeroOnly) return undefined;
    if (!FLOAT_SYNTAX.test(this.text)) return undefined;
    const value = Number(this.text);
    if (!Number.isFinite(value)) return undefined;
    if (kind === 'float32' && Math.abs(value) > FLOAT32_MAX) return undefined;
    return value;
  }

  private asBigInt(kind: IntegerKind): bigint | undefined {
    const match = INTEGER_SYNTAX[this.base].exec(this.text);
    if (!match) return undefined;
    const [, sign = '', digits = ''] = match;
    const magnitude = BigInt(INTEGER_PREFIX[this.base] + digits);
    const value = sign === '-' ? -magnitude : magnitude;
    const [min, max] = INTEGER_RANGES[kind];
    if (sign === '-' && min === 0n) return undefined;
    return value >= min && value <= max ? value : undefined;
  }

  private asSafeInteger(kind: IntegerKind): number | undefined {
    const value = this.asBigInt(kind);
    return value === undefined ? undefined : Number(value);
  }
}
