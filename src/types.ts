// src/types.ts
import type { ZodType, ZodTypeDef } from 'zod';
import type { ArgParseError, MissingKeyError, ParseFailureError } from './errors.js';

/** Anything that can be written to the store via `String(value)`. */
export type Displayable = string | number | boolean | bigint | { toString(): string };

/** Whether an option takes an argument: mandatory, optional, or none (a switch). */
export type HasArg = 'required' | 'optional' | 'none';

/** How often an option may appear on the command line. */
export type Occur = 'required' | 'optional' | 'multi';

/**
 * Declarative description of one command-line option.
 */
export type OptionDescriptor = {
  /** Single-character flag without the dash, or '' for none. */
  short: string;
  /** Long flag without the dashes, or '' for none. */
  long: string;
  /** Human description shown by `usage`. */
  description: string;
  /** Argument placeholder shown by `usage`. */
  hint: string;
  hasArg: HasArg;
  occur: Occur;
};

/**
 * Converts a raw stored string into a value, throwing on input it cannot convert.
 */
export type ValueParser<T> = (raw: string) => T;

/** A parse contract: a parser function or a zod schema over string input. */
export type ParseWith<T> = ValueParser<T> | ZodType<T, ZodTypeDef, unknown>;

export type FetchResult<T> =
  | { success: true; data: T }
  | { success: false; error: MissingKeyError | ParseFailureError };

export type LoadResult =
  | { success: true; free: string[] }
  | { success: false; errors: ArgParseError[]; free: string[] };

export type SocketAddr = {
  ip: string;
  port: number;
};
