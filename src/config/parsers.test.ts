import { describe, expect, it } from 'vitest';
import { asBool, asEnum, asInt, asIp, asList, asNumber, asPort, asSocketAddr } from './parsers.js';

describe('asInt', () => {
  it('parses signed decimal integers', () => {
    expect(asInt('42')).toBe(42);
    expect(asInt(' -7 ')).toBe(-7);
  });

  it.each(['4.5', '', '0x10', '12abc', '9007199254740993'])('rejects %j', (raw) => {
    expect(() => asInt(raw)).toThrow();
  });
});

describe('asNumber', () => {
  it('parses finite numbers only', () => {
    expect(asNumber('4.5')).toBe(4.5);
    expect(() => asNumber('abc')).toThrow('expected a finite number, got "abc"');
    expect(() => asNumber('')).toThrow();
    expect(() => asNumber('Infinity')).toThrow();
  });
});

describe('asBool', () => {
  it('understands the usual spellings', () => {
    expect(asBool('yes')).toBe(true);
    expect(asBool('ON')).toBe(true);
    expect(asBool('"true"')).toBe(true);
    expect(asBool('0')).toBe(false);
    expect(asBool('off')).toBe(false);
  });

  it('rejects anything else', () => {
    expect(() => asBool('maybe')).toThrow('expected a boolean-like value, got "maybe"');
  });
});

describe('asEnum', () => {
  const env = asEnum(['development', 'production']);

  it('matches case-insensitively', () => {
    expect(env('Production')).toBe('production');
  });

  it('matches members declared in mixed case and returns them as declared', () => {
    const speed = asEnum(['Fast', 'Slow']);
    expect(speed('Fast')).toBe('Fast');
    expect(speed('slow')).toBe('Slow');
  });

  it('lists the allowed values on failure', () => {
    expect(() => env('test')).toThrow('expected one of development, production, got "test"');
  });
});

describe('asList', () => {
  it('parses each non-empty item', () => {
    expect(asList(asInt)('1, 2,,3')).toEqual([1, 2, 3]);
    expect(asList(asInt, ';')('4;5')).toEqual([4, 5]);
  });
});

describe('asPort', () => {
  it('accepts 0..65535', () => {
    expect(asPort('8080')).toBe(8080);
    expect(asPort('0')).toBe(0);
  });

  it('rejects values outside the range', () => {
    expect(() => asPort('65536')).toThrow('expected a port in [0..65535], got "65536"');
    expect(() => asPort('-1')).toThrow('expected a port in [0..65535], got "-1"');
  });
});

describe('asIp', () => {
  it('accepts IPv4 and IPv6 addresses', () => {
    expect(asIp('127.0.0.1')).toBe('127.0.0.1');
    expect(asIp(' ::1 ')).toBe('::1');
  });

  it('rejects host names and bad octets', () => {
    expect(() => asIp('localhost')).toThrow('expected an IPv4 or IPv6 address, got "localhost"');
    expect(() => asIp('999.1.1.1')).toThrow();
  });
});

describe('asSocketAddr', () => {
  it('parses ip:port and [ipv6]:port', () => {
    expect(asSocketAddr('0.0.0.0:4567')).toEqual({ ip: '0.0.0.0', port: 4567 });
    expect(asSocketAddr('[::1]:80')).toEqual({ ip: '::1', port: 80 });
  });

  it('requires a port', () => {
    expect(() => asSocketAddr('1.2.3.4')).toThrow('expected host:port, got "1.2.3.4"');
    expect(() => asSocketAddr('::1:80')).toThrow('expected host:port, got "::1:80"');
  });
});
