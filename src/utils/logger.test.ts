import { describe, expect, it } from 'vitest';
import { getLogger, initLogger, mapLevel } from './logger.js';

describe('mapLevel', () => {
  it('keeps npm levels and maps aliases', () => {
    expect(mapLevel('DEBUG')).toBe('debug');
    expect(mapLevel('trace')).toBe('silly');
    expect(mapLevel('log')).toBe('info');
    expect(mapLevel(undefined)).toBe('info');
  });
});

describe('getLogger', () => {
  it('is silent under tests', () => {
    expect(getLogger('test').silent).toBe(true);
  });
});

describe('initLogger', () => {
  it('rebuilds the root logger with the requested level', () => {
    expect(initLogger({ level: 'debug' }).level).toBe('debug');
    expect(initLogger({ level: 'nonsense' }).level).toBe('info');
  });
});
