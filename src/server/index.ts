#!/usr/bin/env node
/**
 * Process entry point: parse CLI flags over the env-derived runtime config, install
 * the process guards and serve over stdio (default) or TCP.
 */
import { FRAMING_MODES, FramingMode, reloadRuntimeConfig, RuntimeConfig } from '../config/runtimeConfig';
import { logError, logInfo, logWarn } from '../services/logger';
import { createDefaultEngine } from './mcpMethods';
import { framingFromConfig, startStdioTransport, startTcpTransport } from './transport';

export interface CliResult {
  config: RuntimeConfig;
  help: boolean;
  warnings: string[];
}

function isFramingMode(v: string): v is FramingMode {
  return FRAMING_MODES.some(m => m === v);
}

function parsePort(raw: string | undefined, fallback: number, warnings: string[]): number {
  const value = raw !== undefined && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : NaN;
  if(Number.isInteger(value) && value >= 0 && value <= 65535) return value;
  warnings.push(`invalid port "${raw ?? ''}", keeping ${fallback}`);
  return fallback;
}

/** Apply CLI flags to a copy of `base`; flags win over environment variables. */
export function parseArgs(argv: string[], base: RuntimeConfig): CliResult {
  const transport = { ...base.transport };
  const warnings: string[] = [];
  let help = false;

  const args = argv.slice(2);
  for(let i=0;i<args.length;i++){
    const raw = args[i];
    const eq = raw.indexOf('=');
    const flag = eq === -1 ? raw : raw.slice(0, eq);
    const inline = eq === -1 ? undefined : raw.slice(eq + 1);
    const value = () => inline ?? args[++i];
    if(flag === '--stdio') transport.mode = 'stdio';
    else if(flag === '--tcp') transport.mode = 'tcp';
    else if(flag === '--host'){ const v = value(); if(v) transport.host = v; }
    else if(flag === '--port') transport.port = parsePort(value(), transport.port, warnings);
    else if(flag === '--framing'){
      const v = value();
      if(v && isFramingMode(v)) transport.framing = v;
      else warnings.push(`unknown framing "${v ?? ''}", keeping ${transport.framing}`);
    }
    else if(flag === '--help' || flag === '-h') help = true;
    else warnings.push(`unknown argument ${raw}`);
  }
  return { config: { ...base, transport }, help, warnings };
}

export const HELP_TEXT = `mcp-protocol-engine - JSON-RPC 2.0 / Model Context Protocol server

TRANSPORT:
  --stdio                  Serve one session over stdin/stdout (default)
  --tcp                    Listen for TCP clients, one session per connection
  --host=HOST              TCP bind address (default 127.0.0.1)
  --port=PORT              TCP port (default 8080)
  --framing=MODE           newline | content-length (default newline)

ENVIRONMENT VARIABLES:
  MCP_TRANSPORT            stdio | tcp
  MCP_HOST, MCP_PORT       TCP listener address
  MCP_FRAMING              newline | content-length
  MCP_MAX_MESSAGE_BYTES    Largest accepted frame (default 16777216)
  MCP_BLANK_LINES          end | skip: what a blank newline-framed line means (default end)
  MCP_PROTOCOL_VERSION     Protocol version required from clients
  MCP_LOG_LEVEL            error | warn | info | debug (default info)
  MCP_LOG_JSON=1           One JSON record per log line
  MCP_LOG_PROTOCOL=1       Log every frame sent and received (debug)
  MCP_LOG_FILE=PATH        Mirror log lines to a file

GENERAL:
  -h, --help               Show this help and exit
`;

let guardsInstalled = false;

function installProcessGuards(config: RuntimeConfig){
  if(guardsInstalled) return;
  guardsInstalled = true;
  const delay = Math.max(0, config.server.fatalExitDelayMs);
  process.on('uncaughtException', err => {
    logError('uncaught_exception', { message: err.message, stack: err.stack });
    setTimeout(() => process.exit(1), delay);
  });
  process.on('unhandledRejection', (reason: unknown) => {
    logError('unhandled_rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  });
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = parseArgs(argv, reloadRuntimeConfig());
  if(cli.help){
    process.stdout.write(HELP_TEXT);
    return;
  }
  const { config } = cli;
  for(const warning of cli.warnings) logWarn('cli_argument', { warning });
  installProcessGuards(config);

  const engine = createDefaultEngine({
    protocolVersion: config.protocol.version,
    serverInfo: { name: config.protocol.serverName, version: config.protocol.serverVersion },
  });
  const framing = framingFromConfig(config);

  if(config.transport.mode === 'tcp'){
    const handle = await startTcpTransport({ engine, framing, host: config.transport.host, port: config.transport.port });
    const stop = (signal: NodeJS.Signals) => {
      logInfo('signal', { signal });
      handle.close().then(
        () => process.exit(0),
        err => { logError('tcp_close_failed', { message: err instanceof Error ? err.message : String(err) }); process.exit(1); }
      );
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
    logInfo('server_started', { pid: process.pid, transport: 'tcp', address: handle.address() });
    return;
  }

  const connection = startStdioTransport({ engine, framing });
  logInfo('server_started', { pid: process.pid, transport: 'stdio', framing: framing.mode });
  const reason = await connection.whenClosed();
  logInfo('server_exit', { reason });
  process.exit(0);
}

if(require.main === module){
  main().catch(err => {
    logError('startup_failed', { message: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
}
