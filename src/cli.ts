#!/usr/bin/env node
/**
 * Demo entry point: registers a couple of options, loads this process's arguments
 * and prints the resulting settings and listen address.
 * Exits with status 1 and the usage text when the arguments do not parse.
 */
// src/cli.ts
import { optflag, optopt } from './config/groups.js';
import { asBool, asEnum } from './config/parsers.js';
import { printSettings } from './config/printer.js';
import { Settings } from './settings.js';
import { formatSocketAddr, socketAddr } from './socket.js';
import { getLogger, setLogLevel } from './utils/logger.js';

const log = getLogger('cli');

function main(): number {
  const settings = new Settings();
  settings.opt(optopt('p', 'port', 'the port to bind to', '4000'));
  settings.opt(optopt('i', 'ip', 'the address to bind to', '127.0.0.1'));
  settings.opt(optopt('a', 'addr', 'full listen address, overrides ip and port', 'HOST:PORT'));
  settings.opt(optopt('e', 'environment', 'the environment to run in', 'ENV'));
  settings.opt(optflag('v', 'verbose', 'log at debug level'));
  settings.opt(optflag('h', 'help', 'print this help'));

  const loaded = settings.loadOsArgs();
  if (!loaded.success) {
    for (const err of loaded.errors) log.error(err.message);
    process.stdout.write(settings.usage('Try one of these:'));
    return 1;
  }
  if (settings.fetchOr('help', asBool, false)) {
    process.stdout.write(settings.usage('Usage: settings-knob [options]'));
    return 0;
  }
  if (settings.fetchOr('verbose', asBool, false)) setLogLevel('debug');

  const env = settings.fetch('environment', asEnum(['development', 'staging', 'production']));
  if (!env.success && env.error.kind === 'parse-failure') {
    log.error(env.error.message);
    return 1;
  }

  printSettings(settings);
  process.stdout.write(`${formatSocketAddr(socketAddr(settings))}\n`);
  return 0;
}

try {
  process.exitCode = main();
} catch (e) {
  const msg = e instanceof Error ? e.stack || e.message : String(e);
  log.error(msg);
  process.exitCode = 1;
}
