// src/config/schema.ts
import { z } from 'zod';

const HasArgEnum = z.enum(['required', 'optional', 'none']);
const OccurEnum = z.enum(['required', 'optional', 'multi']);

// Flags go through yargs-parser, so they must not carry dashes, '=' or whitespace.
const FlagName = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

export const OptionDescriptorSchema = z
  .object({
    short: z
      .string()
      .max(1, 'short name must be a single character')
      .refine((s) => s === '' || FlagName.test(s), { message: 'short name must be alphanumeric' }),
    long: z.string().refine((s) => s === '' || FlagName.test(s), {
      message: 'long name must not start with a dash or contain "=" or whitespace',
    }),
    description: z.string(),
    hint: z.string(),
    hasArg: HasArgEnum,
    occur: OccurEnum,
  })
  .refine((o) => o.short !== '' || o.long !== '', {
    message: 'an option needs a short or a long name',
    path: ['long'],
  })
  .refine((o) => o.long === '' || o.long.length > 1, {
    message: 'long name must be longer than one character',
    path: ['long'],
  });
