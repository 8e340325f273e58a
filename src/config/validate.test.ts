import { describe, expect, it } from 'vitest';
import { InvalidOptionError } from '../errors.js';
import { optflag } from './groups.js';
import { validateOption } from './validate.js';

describe('validateOption', () => {
  it('returns a well-formed descriptor unchanged', () => {
    const o = optflag('v', 'verbose', 'talk more');
    expect(validateOption(o)).toEqual(o);
  });

  it('lists allowed values for a bad enum field', () => {
    const raw = { ...optflag('v', 'verbose', 'talk more'), hasArg: 'sometimes' };
    expect(() => validateOption(raw)).toThrow(InvalidOptionError);
    expect(() => validateOption(raw)).toThrow(/^Invalid option descriptor\nhasArg: .*\(allowed: required, optional, none\)$/);
  });

  it('rejects dashes in flag names', () => {
    expect(() => validateOption(optflag('', '--verbose', 'talk more'))).toThrow(
      'long: long name must not start with a dash or contain "=" or whitespace',
    );
  });

  it('rejects one-character long names', () => {
    expect(() => validateOption(optflag('', 'v', 'talk more'))).toThrow(
      'long: long name must be longer than one character',
    );
  });
});
