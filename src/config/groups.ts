// src/config/groups.ts
// Shorthands for the usual option shapes.
import type { OptionDescriptor } from '../types.js';

/** An option that must be given, with a mandatory argument. */
export function reqopt(short: string, long: string, description: string, hint: string): OptionDescriptor {
  return { short, long, description, hint, hasArg: 'required', occur: 'required' };
}

/** An option that may be given once, with a mandatory argument. */
export function optopt(short: string, long: string, description: string, hint: string): OptionDescriptor {
  return { short, long, description, hint, hasArg: 'required', occur: 'optional' };
}

/** A switch that takes no argument. */
export function optflag(short: string, long: string, description: string): OptionDescriptor {
  return { short, long, description, hint: '', hasArg: 'none', occur: 'optional' };
}

/** An option that may be given with or without an argument. */
export function optflagopt(short: string, long: string, description: string, hint: string): OptionDescriptor {
  return { short, long, description, hint, hasArg: 'optional', occur: 'optional' };
}

/**
 * An option that may be repeated. The values are stored joined with ','; read them back with
 * `asList`. A value that itself contains ',' is rejected when loading.
 */
export function optmulti(short: string, long: string, description: string, hint: string): OptionDescriptor {
  return { short, long, description, hint, hasArg: 'required', occur: 'multi' };
}

/**
 * The settings key an option writes to: its long name, or its short name when it has none.
 */
export function optionKey(o: OptionDescriptor): string {
  return o.long !== '' ? o.long : o.short;
}

export function optionNames(o: OptionDescriptor): string[] {
  return [o.long, o.short].filter((n) => n !== '');
}
