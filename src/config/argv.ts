// src/config/argv.ts
import yargsParser from 'yargs-parser';
import { ArgParseError } from '../errors.js';
import type { OptionDescriptor } from '../types.js';
import { getLogger } from '../utils/logger.js';
import { optionKey, optionNames } from './groups.js';

const log = getLogger('argv');

// Flags are matched literally; values stay the raw strings the user typed.
const PARSER_CONFIGURATION: Partial<yargsParser.Configuration> = {
  'camel-case-expansion': false,
  'dot-notation': false,
  'parse-numbers': false,
  'boolean-negation': false,
  'duplicate-arguments-array': true,
};

export type ArgvOutcome = {
  /** Settings key → raw value, for every option that was given and carries a value. */
  values: Map<string, string>;
  errors: ArgParseError[];
  /** Positional arguments, in order. */
  free: string[];
};

/**
 * Drops descriptors whose flags collide with an earlier registration: the first one wins.
 */
export function effectiveOptions(options: readonly OptionDescriptor[]): OptionDescriptor[] {
  const seen = new Set<string>();
  const out: OptionDescriptor[] = [];
  for (const o of options) {
    const names = optionNames(o);
    if (names.some((n) => seen.has(n))) {
      log.debug(`ignoring option ${names.join('/')}: flag already registered`);
      continue;
    }
    for (const n of names) seen.add(n);
    out.push(o);
  }
  return out;
}

function occurrences(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/** Separator between the values of a repeated option in the store. */
export const MULTI_SEPARATOR = ',';

// yargs-parser only reads an attached short value when it is numeric, so `-eprod` is passed on as `-e=prod`.
function attachShortValues(args: readonly string[], valuedShorts: ReadonlySet<string>): string[] {
  const out: string[] = [];
  let ended = false;
  for (const arg of args) {
    if (arg === '--') ended = true;
    const m = ended ? null : /^-([^-])(.+)$/.exec(arg);
    out.push(m && valuedShorts.has(m[1]) && !m[2].startsWith('=') ? `-${m[1]}=${m[2]}` : arg);
  }
  return out;
}

// yargs-parser turns `--flag=anything` into a boolean, so inline values on switches are found in the raw list.
function switchesWithInlineValue(args: readonly string[], switches: readonly OptionDescriptor[]): Set<string> {
  const hit = new Set<string>();
  for (const arg of args) {
    if (arg === '--') break;
    const m = /^--([^=]+)=/.exec(arg) ?? /^-([^-])=/.exec(arg);
    if (!m) continue;
    const o = switches.find((s) => optionNames(s).includes(m[1]));
    if (o) hit.add(optionKey(o));
  }
  return hit;
}

function flagLabel(name: string): string {
  return name.length === 1 ? `-${name}` : `--${name}`;
}

/**
 * Parse `args` (without the program name) against the registered option descriptors.
 * Never throws: every problem found is returned in `errors`.
 */
export function parseArgList(args: readonly string[], options: readonly OptionDescriptor[]): ArgvOutcome {
  const effective = effectiveOptions(options);

  const alias: Record<string, string[]> = {};
  const strings: string[] = [];
  const booleans: string[] = [];
  for (const o of effective) {
    const key = optionKey(o);
    if (o.long !== '' && o.short !== '') alias[key] = [o.short];
    if (o.hasArg === 'none') booleans.push(key);
    else strings.push(key);
  }

  const valuedShorts = new Set(effective.filter((o) => o.hasArg !== 'none' && o.short !== '').map((o) => o.short));
  const inlineSwitchValues = switchesWithInlineValue(
    args,
    effective.filter((o) => o.hasArg === 'none'),
  );

  const detailed = yargsParser.detailed(attachShortValues(args, valuedShorts), {
    alias,
    string: strings,
    boolean: booleans,
    configuration: PARSER_CONFIGURATION,
  });

  const errors: ArgParseError[] = [];
  const values = new Map<string, string>();

  if (detailed.error) {
    errors.push(new ArgParseError('malformed', '', detailed.error.message));
  }

  for (const o of effective) {
    const key = optionKey(o);
    const raw = occurrences(detailed.argv[key]);

    if (o.hasArg === 'none' && (inlineSwitchValues.has(key) || raw.some((v) => typeof v !== 'boolean'))) {
      errors.push(new ArgParseError('unexpected-argument', key));
      continue;
    }

    // yargs-parser reports an absent switch as `false`.
    const given =
      o.hasArg === 'none' ? raw.filter((v) => v === true).map(() => '') : raw.map((v) => String(v));

    if (given.length === 0) {
      if (o.occur === 'required') errors.push(new ArgParseError('option-missing', key));
      continue;
    }
    if (given.length > 1 && o.occur !== 'multi') {
      errors.push(new ArgParseError('option-duplicated', key));
      continue;
    }
    if (o.hasArg === 'none') {
      values.set(key, 'true');
      continue;
    }

    const supplied = given.filter((v) => v !== '');
    if (o.hasArg === 'required' && supplied.length < given.length) {
      errors.push(new ArgParseError('argument-missing', key));
      continue;
    }
    if (o.occur === 'multi' && supplied.some((v) => v.includes(MULTI_SEPARATOR))) {
      errors.push(
        new ArgParseError('malformed', key, `Value of repeated option '${key}' must not contain '${MULTI_SEPARATOR}'`),
      );
      continue;
    }
    if (supplied.length > 0) values.set(key, supplied.join(MULTI_SEPARATOR));
  }

  const recognised = new Set(effective.flatMap(optionNames));
  for (const name of Object.keys(detailed.argv)) {
    if (name === '_' || name === '--' || recognised.has(name)) continue;
    errors.push(new ArgParseError('unrecognized-option', name, `Unrecognized option: '${flagLabel(name)}'`));
  }

  const free = detailed.argv._.map((v) => String(v));
  log.debug(`parsed ${args.length} argument(s): ${values.size} value(s), ${errors.length} error(s)`);
  return { values, errors, free };
}
