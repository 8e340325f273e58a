// src/settings.ts
import path from 'node:path';
import { parseArgList } from './config/argv.js';
import { formatUsage } from './config/usage.js';
import { validateOption } from './config/validate.js';
import { MissingKeyError, ParseFailureError } from './errors.js';
import type { Displayable, FetchResult, LoadResult, OptionDescriptor, ParseWith } from './types.js';
import { getLogger } from './utils/logger.js';

const log = getLogger('settings');

/** Key under which `loadOsArgs` records the running script's name. */
export const PROGNAME_KEY = 'knob.progname';

function runParse<T>(parse: ParseWith<T>, raw: string): { ok: true; value: T } | { ok: false; cause: unknown } {
  if (typeof parse === 'function') {
    try {
      return { ok: true, value: parse(raw) };
    } catch (cause) {
      return { ok: false, cause };
    }
  }
  const parsed = parse.safeParse(raw);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false, cause: parsed.error };
}

/**
 * A string-keyed store of serialized values, read back through a parse contract,
 * plus a table of command-line options that can populate it.
 *
 * Values are kept as strings; all typed interpretation happens when they are fetched.
 */
export class Settings {
  private readonly store = new Map<string, string>();
  private readonly options: OptionDescriptor[] = [];

  /** Sets `key` to `String(value)`, replacing any previous value. */
  set(key: string, value: Displayable): void {
    this.store.set(key, String(value));
  }

  /** Like `set`, but does nothing when `value` is null or undefined. */
  setOpt(key: string, value: Displayable | null | undefined): void {
    if (value === null || value === undefined) return;
    this.set(key, value);
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  /** The raw stored string, if any. */
  get(key: string): string | undefined {
    return this.store.get(key);
  }

  keys(): string[] {
    return [...this.store.keys()];
  }

  /**
   * Looks up `key` and converts its raw value with `parse`.
   * Never throws; a missing key or a value `parse` rejects comes back as the error.
   */
  fetch<T>(key: string, parse: ParseWith<T>): FetchResult<T> {
    const raw = this.store.get(key);
    if (raw === undefined) return { success: false, error: new MissingKeyError(key) };
    const parsed = runParse(parse, raw);
    if (!parsed.ok) return { success: false, error: new ParseFailureError(key, raw, parsed.cause) };
    return { success: true, data: parsed.value };
  }

  /**
   * Fetches `key` and passes the parsed value to `fn`. `fn` is not called when the fetch fails.
   */
  fetchWith<T, R>(key: string, parse: ParseWith<T>, fn: (value: T) => R): FetchResult<R> {
    const res = this.fetch(key, parse);
    return res.success ? { success: true, data: fn(res.data) } : res;
  }

  fetchOr<T>(key: string, parse: ParseWith<T>, fallback: T): T {
    const res = this.fetch(key, parse);
    if (res.success) return res.data;
    if (res.error.kind === 'parse-failure') log.warn(res.error.message);
    return fallback;
  }

  /** Like `fetch`, but throws the `FetchError` instead of returning it. */
  require<T>(key: string, parse: ParseWith<T>): T {
    const res = this.fetch(key, parse);
    if (!res.success) throw res.error;
    return res.data;
  }

  /** Registers a command-line option for a later `loadArgs`. */
  opt(descriptor: OptionDescriptor): void {
    this.options.push(validateOption(descriptor));
  }

  /**
   * Parses `args` against the registered options and stores every option value found.
   * Values that parsed are kept even when other arguments fail.
   */
  loadArgs(args: readonly string[]): LoadResult {
    const { values, errors, free } = parseArgList(args, this.options);
    for (const [key, value] of values) this.set(key, value);

    if (errors.length > 0) {
      log.warn(`${errors.length} argument error(s): ${errors.map((e) => e.message).join('; ')}`);
      return { success: false, errors, free };
    }
    log.debug(`loaded ${values.size} setting(s) from arguments`);
    return { success: true, free };
  }

  /**
   * Loads this process's own arguments, skipping the runtime and script paths.
   * The script's base name is stored under `knob.progname`.
   */
  loadOsArgs(): LoadResult {
    const script = process.argv[1];
    this.setOpt(PROGNAME_KEY, script === undefined ? undefined : path.basename(script));
    return this.loadArgs(process.argv.slice(2));
  }

  /** Human-readable help for every registered option, preceded by `brief`. */
  usage(brief: string): string {
    return formatUsage(brief, this.options);
  }

  /** An independent copy: later changes to either side do not show in the other. */
  clone(): Settings {
    const copy = new Settings();
    for (const [key, value] of this.store) copy.store.set(key, value);
    for (const o of this.options) copy.options.push({ ...o });
    return copy;
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.store);
  }
}
