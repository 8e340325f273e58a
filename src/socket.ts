// src/socket.ts
// Helpers that read a listen address out of Settings.
import { isIPv6 } from 'node:net';
import { asIp, asPort, asSocketAddr } from './config/parsers.js';
import type { Settings } from './settings.js';
import type { SocketAddr } from './types.js';
import { getLogger } from './utils/logger.js';

const log = getLogger('socket');

export enum SocketKey {
  Ip = 'ip',
  Port = 'port',
  Addr = 'addr',
}

export const DEFAULT_PORT = 8080;
export const DEFAULT_IP = '127.0.0.1';

export function port(settings: Settings): number {
  return settings.fetchOr(SocketKey.Port, asPort, DEFAULT_PORT);
}

export function ip(settings: Settings): string {
  return settings.fetchOr(SocketKey.Ip, asIp, DEFAULT_IP);
}

/**
 * `addr` when it is set and valid; otherwise `ip` and `port`, each with its default.
 */
export function socketAddr(settings: Settings): SocketAddr {
  const res = settings.fetch(SocketKey.Addr, asSocketAddr);
  if (res.success) return res.data;
  if (res.error.kind === 'parse-failure') log.warn(res.error.message);
  return { ip: ip(settings), port: port(settings) };
}

export function formatSocketAddr(addr: SocketAddr): string {
  return isIPv6(addr.ip) ? `[${addr.ip}]:${addr.port}` : `${addr.ip}:${addr.port}`;
}
