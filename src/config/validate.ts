// src/config/validate.ts
import type { ZodError } from 'zod';
import { InvalidOptionError } from '../errors.js';
import type { OptionDescriptor } from '../types.js';
import { OptionDescriptorSchema } from './schema.js';

/**
 * Format Zod validation errors into a compact, readable multi-line string.
 */
export function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      const base = `${path}: ${issue.message}`;
      if (issue.code === 'invalid_enum_value' && issue.options.length) {
        return `${base} (allowed: ${issue.options.join(', ')})`;
      }
      return base;
    })
    .join('\n');
}

/**
 * Validate a raw option descriptor and return the typed result.
 * Throws an InvalidOptionError with a pretty message on failure.
 */
export function validateOption(raw: unknown): OptionDescriptor {
  const parsed = OptionDescriptorSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidOptionError(`Invalid option descriptor\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}
