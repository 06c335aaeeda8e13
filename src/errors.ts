/**
 * Error taxonomy of the reader. Codes are numeric so they can travel with a
 * domain id the same way system error codes do.
 */
export enum JsonErrc {
  NotInitialized = 0,
  UnexpectedEOF = 1,
  InvalidState = 2,
  KeyTooLong = 3,
  StringTooLong = 4,
  TreeDepthError = 5,
  UnexpectedOpeningBrackets = 6,
  UnexpectedClosingBrackets = 7,
  ExpectedClosingBrackets = 8,
  UnexpectedOpeningBraces = 9,
  UnexpectedClosingBraces = 10,
  ExpectedClosingBraces = 11,
  ExpectedKey = 12,
  ExpectedValue = 13,
  InvalidNumber = 17,
  InvalidString = 18,
  InvalidType = 19,
  NotInObject = 20,
  NotInArray = 21,
  UnexpectedOnTopLevel = 24,
  UnicodeEscape = 25,
  UserValidationFailed = 26,
  ExpectedComma = 28,
  StreamError = 29,
}

const MESSAGES: Record<JsonErrc, string> = {
  [JsonErrc.NotInitialized]: 'Not initialized',
  [JsonErrc.UnexpectedEOF]: 'Unexpected end of file',
  [JsonErrc.InvalidState]: 'Invalid state',
  [JsonErrc.KeyTooLong]: 'Key too long',
  [JsonErrc.StringTooLong]: 'String too long',
  [JsonErrc.TreeDepthError]: 'Maximum tree depth reached',
  [JsonErrc.UnexpectedOpeningBrackets]: "Unexpected '['",
  [JsonErrc.UnexpectedClosingBrackets]: "Unexpected ']'",
  [JsonErrc.ExpectedClosingBrackets]: "Expected ']'",
  [JsonErrc.UnexpectedOpeningBraces]: "Unexpected '{'",
  [JsonErrc.UnexpectedClosingBraces]: "Unexpected '}'",
  [JsonErrc.ExpectedClosingBraces]: "Expected '}'",
  [JsonErrc.ExpectedKey]: 'Expected a key',
  [JsonErrc.ExpectedValue]: 'Expected a value',
  [JsonErrc.InvalidNumber]: 'Invalid number',
  [JsonErrc.InvalidString]: 'Invalid string',
  [JsonErrc.InvalidType]: 'Invalid type',
  [JsonErrc.NotInObject]: 'Not inside an object',
  [JsonErrc.NotInArray]: 'Not inside an array',
  [JsonErrc.UnexpectedOnTopLevel]: 'Unexpected token on top level',
  [JsonErrc.UnicodeEscape]: 'Unicode escapes are not supported',
  [JsonErrc.UserValidationFailed]: 'User validation failed',
  [JsonErrc.ExpectedComma]: "Expected ','",
  [JsonErrc.StreamError]: 'Reading from the input stream failed',
};

export interface ErrorDomain {
  readonly id: number;
  readonly name: string;
  message(code: JsonErrc): string;
}

export const JsonErrorDomain: ErrorDomain = Object.freeze({
  id: 0x424242,
  name: 'Json',
  message: (code: JsonErrc) => MESSAGES[code] ?? 'Unknown error',
});

export class JsonException extends Error {
  constructor(readonly errorCode: ErrorCode) {
    super(errorCode.toString());
    this.name = 'JsonException';
  }
}

/**
 * Immutable error value: domain, code, support data and an optional message
 * supplied where the error was raised.
 *
 * The reader stores the absolute stream offset of a failure in `supportData`.
 */
export class ErrorCode {
  constructor(
    readonly code: JsonErrc,
    readonly userMessage = '',
    readonly supportData = 0,
    readonly domain: ErrorDomain = JsonErrorDomain,
  ) {}

  /** Message of the code itself, independent of `userMessage`. */
  get message(): string {
    return this.domain.message(this.code);
  }

  /** Name of the `JsonErrc` member, e.g. `ExpectedValue`. */
  get name(): string {
    return JsonErrc[this.code] ?? String(this.code);
  }

  withSupportData(supportData: number): ErrorCode {
    return new ErrorCode(this.code, this.userMessage, supportData, this.domain);
  }

  withUserMessage(userMessage: string): ErrorCode {
    return new ErrorCode(this.code, userMessage, this.supportData, this.domain);
  }

  equals(other: ErrorCode): boolean {
    return this.domain.id === other.domain.id && this.code === other.code;
  }

  toException(): JsonException {
    return new JsonException(this);
  }

  toString(): string {
    const detail = this.userMessage ? `: ${this.userMessage}` : '';
    return `${this.domain.name}Error ${this.name} (${this.message}) at ${this.supportData}${detail}`;
  }
}

export function makeErrorCode(code: JsonErrc, message = '', supportData = 0): ErrorCode {
  return new ErrorCode(code, message, supportData);
}
