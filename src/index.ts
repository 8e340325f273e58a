// src/index.ts
export { Settings, PROGNAME_KEY } from './settings.js';
export { reqopt, optopt, optflag, optflagopt, optmulti, optionKey } from './config/groups.js';
export {
  asString,
  asInt,
  asNumber,
  asBool,
  asEnum,
  asList,
  asIp,
  asPort,
  asSocketAddr,
} from './config/parsers.js';
export { formatUsage } from './config/usage.js';
export { printSettings, renderSettings } from './config/printer.js';
export { SocketKey, DEFAULT_IP, DEFAULT_PORT, port, ip, socketAddr, formatSocketAddr } from './socket.js';
export {
  FetchError,
  MissingKeyError,
  ParseFailureError,
  ArgParseError,
  InvalidOptionError,
  type ArgParseErrorKind,
} from './errors.js';
export { initLogger, getLogger, setLogLevel } from './utils/logger.js';
export type {
  Displayable,
  HasArg,
  Occur,
  OptionDescriptor,
  ValueParser,
  ParseWith,
  FetchResult,
  LoadResult,
  SocketAddr,
} from './types.js';
