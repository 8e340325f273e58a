// src/config/parsers.ts
import { isIP } from 'node:net';
import { z } from 'zod';
import type { SocketAddr, ValueParser } from '../types.js';

const INT_RE = /^[+-]?\d+$/;

export function stripQuotes(raw: string): string {
  const s = raw.trim();
  const isSingleQuoted = s.length >= 2 && s.startsWith("'") && s.endsWith("'");
  const isDoubleQuoted = s.length >= 2 && s.startsWith('"') && s.endsWith('"');
  return isSingleQuoted || isDoubleQuoted ? s.slice(1, -1).trim() : s;
}

export const asString: ValueParser<string> = (raw) => raw;

export const asInt: ValueParser<number> = (raw) => {
  const s = raw.trim();
  if (!INT_RE.test(s)) throw new Error(`expected an integer, got "${raw}"`);
  const n = Number(s);
  if (!Number.isSafeInteger(n)) throw new Error(`integer exceeds JS safe integer range: ${s}`);
  return n;
};

export const asNumber: ValueParser<number> = (raw) => {
  const s = raw.trim();
  const n = s === '' ? NaN : Number(s);
  if (!Number.isFinite(n)) throw new Error(`expected a finite number, got "${raw}"`);
  return n;
};

export const asBool: ValueParser<boolean> = (raw) => {
  const s = stripQuotes(raw).toLowerCase();
  if (s === '1' || s === 'true' || s === 'yes' || s === 'y' || s === 'on') return true;
  if (s === '0' || s === 'false' || s === 'no' || s === 'n' || s === 'off') return false;
  throw new Error(`expected a boolean-like value, got "${raw}"`);
};

export function asEnum<T extends string>(values: readonly T[]): ValueParser<T> {
  return (raw) => {
    const s = raw.trim().toLowerCase();
    const hit = values.find((v) => v.toLowerCase() === s);
    if (hit === undefined) throw new Error(`expected one of ${values.join(', ')}, got "${raw}"`);
    return hit;
  };
}

/**
 * Splits on `separator` and parses each non-empty item with `inner`.
 */
export function asList<T>(inner: ValueParser<T>, separator = ','): ValueParser<T[]> {
  return (raw) =>
    raw
      .split(separator)
      .map((item) => item.trim())
      .filter((item) => item !== '')
      .map((item) => inner(item));
}

export const PortSchema = z.coerce.number().int().min(0).max(65535);

export const asPort: ValueParser<number> = (raw) => {
  const parsed = PortSchema.safeParse(asInt(raw));
  if (!parsed.success) throw new Error(`expected a port in [0..65535], got "${raw}"`);
  return parsed.data;
};

export const IpSchema = z
  .string()
  .trim()
  .refine((s) => isIP(s) !== 0, { message: 'expected an IPv4 or IPv6 address' });

export const asIp: ValueParser<string> = (raw) => {
  const parsed = IpSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`expected an IPv4 or IPv6 address, got "${raw}"`);
  return parsed.data;
};

/**
 * Accepts `1.2.3.4:80` and `[::1]:80`.
 */
export const asSocketAddr: ValueParser<SocketAddr> = (raw) => {
  const s = raw.trim();
  const bracketed = /^\[([^\]]+)\]:(\d+)$/.exec(s);
  const plain = /^([^:]+):(\d+)$/.exec(s);
  const m = bracketed ?? plain;
  if (!m) throw new Error(`expected host:port, got "${raw}"`);
  return { ip: asIp(m[1]), port: asPort(m[2]) };
};
