import { describe, expect, it } from 'vitest';
import { effectiveOptions, parseArgList } from './argv.js';
import { optflag, optopt } from './groups.js';

describe('parseArgList', () => {
  const options = [optopt('p', 'port', 'the port to bind to', '4000'), optflag('v', 'verbose', 'talk more')];

  it('collects positionals and treats everything after -- as positional', () => {
    const out = parseArgList(['serve', '--port', '80', 'extra', '--', '--verbose'], options);
    expect(out.errors).toEqual([]);
    expect([...out.values]).toEqual([['port', '80']]);
    expect(out.free).toEqual(['serve', 'extra', '--verbose']);
  });

  it('labels unknown short flags with a single dash', () => {
    const out = parseArgList(['-x'], options);
    expect(out.errors.map((e) => e.message)).toEqual(["Unrecognized option: '-x'"]);
    expect(out.values.size).toBe(0);
  });

  it('does not let a valued option swallow the next flag', () => {
    const out = parseArgList(['--port', '--verbose'], options);
    expect(out.errors.map((e) => e.message)).toEqual(["Argument to option 'port' missing"]);
    expect([...out.values]).toEqual([['verbose', 'true']]);
  });

  it('keeps values as the raw strings typed', () => {
    const out = parseArgList(['--port', '0080'], options);
    expect(out.values.get('port')).toBe('0080');
  });
});

describe('effectiveOptions', () => {
  it('drops later descriptors that reuse a flag', () => {
    const first = optopt('p', 'port', 'the port', 'PORT');
    const clash = optopt('q', 'port', 'another port', 'PORT');
    const other = optflag('v', 'verbose', 'talk more');
    expect(effectiveOptions([first, clash, other])).toEqual([first, other]);
  });
});
