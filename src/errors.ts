// src/errors.ts

/**
 * Base class for failures of `Settings.fetch` and friends.
 */
export abstract class FetchError extends Error {
  abstract readonly kind: 'missing-key' | 'parse-failure';

  constructor(
    readonly key: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The key was never set.
 */
export class MissingKeyError extends FetchError {
  readonly kind = 'missing-key';

  constructor(key: string) {
    super(key, `Setting "${key}" is not set`);
    this.name = 'MissingKeyError';
  }
}

/**
 * The key is set but its raw value could not be converted to the requested type.
 */
export class ParseFailureError extends FetchError {
  readonly kind = 'parse-failure';

  constructor(
    key: string,
    readonly raw: string,
    cause?: unknown,
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(key, `Setting "${key}" could not be parsed from "${raw}"${reason}`, { cause });
    this.name = 'ParseFailureError';
  }
}

export type ArgParseErrorKind =
  | 'unrecognized-option'
  | 'argument-missing'
  | 'option-missing'
  | 'option-duplicated'
  | 'unexpected-argument'
  | 'malformed';

function describeArgFailure(kind: ArgParseErrorKind, option: string): string {
  switch (kind) {
    case 'unrecognized-option':
      return `Unrecognized option: '${option}'`;
    case 'argument-missing':
      return `Argument to option '${option}' missing`;
    case 'option-missing':
      return `Required option '${option}' missing`;
    case 'option-duplicated':
      return `Option '${option}' given more than once`;
    case 'unexpected-argument':
      return `Option '${option}' does not take an argument`;
    case 'malformed':
      return `Malformed arguments near '${option}'`;
  }
}

/**
 * One problem found while loading an argument list. Collected, never thrown by `loadArgs`.
 */
export class ArgParseError extends Error {
  constructor(
    readonly kind: ArgParseErrorKind,
    readonly option: string,
    message?: string,
  ) {
    super(message ?? describeArgFailure(kind, option));
    this.name = 'ArgParseError';
  }
}

/**
 * Thrown by `Settings.opt` when a descriptor is malformed.
 */
export class InvalidOptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOptionError';
  }
}
