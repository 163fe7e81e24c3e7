/**
 * Unified runtime configuration loader.
 *
 * Every environment driven knob of the engine is parsed here once into a typed
 * surface; the rest of the code asks getRuntimeConfig() instead of reading
 * process.env directly. CLI flags (see server/index.ts) are applied on top of the
 * loaded value, never written back to the environment.
 *
 * Variables:
 *  - MCP_TRANSPORT        stdio | tcp                     (stdio)
 *  - MCP_HOST / MCP_PORT  TCP listener address            (127.0.0.1 / 8080)
 *  - MCP_FRAMING          newline | content-length        (newline)
 *  - MCP_MAX_MESSAGE_BYTES                                (16 MiB)
 *  - MCP_BLANK_LINES      end | skip                      (end)
 *  - MCP_PROTOCOL_VERSION                                 (2025-06-18)
 *  - MCP_SERVER_NAME / MCP_SERVER_VERSION
 *  - MCP_NOTIFY_POLL_MS   notification worker poll        (10)
 *  - MCP_FATAL_EXIT_DELAY_MS
 *  - MCP_LOG_LEVEL, MCP_LOG_VERBOSE, MCP_LOG_JSON, MCP_LOG_SYNC, MCP_LOG_PROTOCOL, MCP_LOG_FILE
 */
import path from 'path';
import {
  EnvSource,
  getBooleanEnv,
  getIntegerEnv,
  getStringEnv,
  parseEnumEnv,
} from '../utils/envUtils';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type TransportMode = 'stdio' | 'tcp';
export type FramingMode = 'newline' | 'content-length';
export type BlankLineMode = 'end' | 'skip';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
export const TRANSPORT_MODES: readonly TransportMode[] = ['stdio', 'tcp'];
export const FRAMING_MODES: readonly FramingMode[] = ['newline', 'content-length'];
const BLANK_LINE_MODES: readonly BlankLineMode[] = ['end', 'skip'];

export const DEFAULT_MAX_MESSAGE_BYTES = 16 * 1024 * 1024;
export const DEFAULT_PROTOCOL_VERSION = '2025-06-18';

export interface TransportConfig {
  mode: TransportMode;
  host: string;
  port: number;
  framing: FramingMode;
  maxMessageBytes: number;
  blankLines: BlankLineMode;
}

export interface ProtocolConfig {
  version: string;
  serverName: string;
  serverVersion: string;
}

export interface NotificationsConfig {
  pollIntervalMs: number;
}

export interface ServerConfig {
  fatalExitDelayMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
  verbose: boolean;
  json: boolean;
  sync: boolean;
  protocol: boolean;
  file?: string;
}

export interface RuntimeConfig {
  profile: string;
  transport: TransportConfig;
  protocol: ProtocolConfig;
  notifications: NotificationsConfig;
  server: ServerConfig;
  logging: LoggingConfig;
}

function parseTransportConfig(env: EnvSource): TransportConfig {
  const port = getIntegerEnv('MCP_PORT', 8080, env);
  const maxMessageBytes = getIntegerEnv('MCP_MAX_MESSAGE_BYTES', DEFAULT_MAX_MESSAGE_BYTES, env);
  return {
    mode: parseEnumEnv(env.MCP_TRANSPORT, TRANSPORT_MODES, 'stdio'),
    host: getStringEnv('MCP_HOST', '127.0.0.1', env),
    port: port <= 65535 ? port : 8080,
    framing: parseEnumEnv(env.MCP_FRAMING, FRAMING_MODES, 'newline'),
    maxMessageBytes: maxMessageBytes > 0 ? maxMessageBytes : DEFAULT_MAX_MESSAGE_BYTES,
    blankLines: parseEnumEnv(env.MCP_BLANK_LINES, BLANK_LINE_MODES, 'end'),
  };
}

function parseProtocolConfig(env: EnvSource): ProtocolConfig {
  return {
    version: getStringEnv('MCP_PROTOCOL_VERSION', DEFAULT_PROTOCOL_VERSION, env),
    serverName: getStringEnv('MCP_SERVER_NAME', 'mcp-protocol-engine', env),
    serverVersion: getStringEnv('MCP_SERVER_VERSION', '1.0.0', env),
  };
}

function resolveLogFile(env: EnvSource): string | undefined {
  const raw = env.MCP_LOG_FILE;
  if(!raw || !raw.trim().length) return undefined;
  const normalized = raw.trim().toLowerCase();
  // "1"/"true" asks for the default location
  if(['1', 'true', 'yes', 'on'].includes(normalized)){
    return path.resolve(process.cwd(), 'logs', 'mcp-server.log');
  }
  return path.isAbsolute(raw) ? raw : path.resolve(process.cwd(), raw);
}

function parseLoggingConfig(env: EnvSource): LoggingConfig {
  const verbose = getBooleanEnv('MCP_LOG_VERBOSE', false, env);
  return {
    level: verbose ? 'debug' : parseEnumEnv(env.MCP_LOG_LEVEL, LOG_LEVELS, 'info'),
    verbose,
    json: getBooleanEnv('MCP_LOG_JSON', false, env),
    sync: getBooleanEnv('MCP_LOG_SYNC', false, env),
    protocol: getBooleanEnv('MCP_LOG_PROTOCOL', false, env),
    file: resolveLogFile(env),
  };
}

export function loadRuntimeConfig(env: EnvSource = process.env): RuntimeConfig {
  const pollIntervalMs = getIntegerEnv('MCP_NOTIFY_POLL_MS', 10, env);
  return {
    profile: getStringEnv('MCP_PROFILE', 'default', env),
    transport: parseTransportConfig(env),
    protocol: parseProtocolConfig(env),
    notifications: { pollIntervalMs: pollIntervalMs > 0 ? pollIntervalMs : 10 },
    server: { fatalExitDelayMs: getIntegerEnv('MCP_FATAL_EXIT_DELAY_MS', 15, env) },
    logging: parseLoggingConfig(env),
  };
}

let _cached: RuntimeConfig | undefined;
export function getRuntimeConfig(): RuntimeConfig {
  if(!_cached) _cached = loadRuntimeConfig();
  return _cached;
}

export function reloadRuntimeConfig(env: EnvSource = process.env): RuntimeConfig {
  _cached = loadRuntimeConfig(env);
  return _cached;
}
