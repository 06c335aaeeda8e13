import { z } from 'zod';
import type { Logger } from './logging.js';

export const ReaderConfigSchema = z.object({
  /** Size of the read window; one slot is reserved, so a fill reads `bufferSize - 1` characters */
  bufferSize: z.number().int().min(2).default(4096),
  /** Maximum number of nested objects and arrays */
  maxDepth: z.number().int().positive().default(32),
  maxKeyLength: z.number().int().positive().default(1024),
  maxStringLength: z.number().int().positive().default(1024 * 1024),
  /** Reject a second value on the top level */
  singleValue: z.boolean().default(false),
});

export type ReaderConfig = z.infer<typeof ReaderConfigSchema>;
export type ReaderConfigInput = z.input<typeof ReaderConfigSchema>;

export interface ReaderOptions extends ReaderConfigInput {
  logger?: Logger;
}

/**
 * Applies defaults and validates the settings. Throws a `ZodError` for
 * settings no reader can work with.
 */
export function resolveReaderConfig(input: ReaderConfigInput = {}): ReaderConfig {
  return ReaderConfigSchema.parse(input);
}
