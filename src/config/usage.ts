// src/config/usage.ts
import type { OptionDescriptor } from '../types.js';

const DESC_COLUMN = 24;

function flagColumn(o: OptionDescriptor): string {
  const short = o.short !== '' ? `-${o.short}` : '  ';
  const sep = o.short !== '' && o.long !== '' ? ', ' : '  ';
  const long = o.long !== '' ? `--${o.long}` : '';
  const hint = o.hint !== '' ? o.hint : 'VALUE';
  const arg = o.hasArg === 'required' ? ` ${hint}` : o.hasArg === 'optional' ? ` [${hint}]` : '';
  return `    ${short}${sep}${long}${arg}`.trimEnd();
}

/**
 * One line per option: flags, argument hint, then the description from column 24 on.
 * Lines are never wrapped.
 */
export function formatOptionLine(o: OptionDescriptor): string {
  const flags = flagColumn(o);
  const gap = flags.length < DESC_COLUMN ? ' '.repeat(DESC_COLUMN - flags.length) : '  ';
  return `${flags}${gap}${o.description}`.trimEnd();
}

export function formatUsage(brief: string, options: readonly OptionDescriptor[]): string {
  if (options.length === 0) return `${brief}\n`;
  return `${brief}\n\nOptions:\n${options.map(formatOptionLine).join('\n')}\n`;
}
