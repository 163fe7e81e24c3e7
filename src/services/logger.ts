import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { getRuntimeConfig, LogLevel } from '../config/runtimeConfig';

export interface LogRecord {
  ts: string; // ISO timestamp
  level: LogLevel;
  evt: string; // short event key
  msg?: string;
  method?: string;
  ms?: number;
  data?: unknown;
  correlationId?: string;
  connectionId?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

// One id per request/response cycle; threaded through dispatch logs
export function newCorrelationId(){ return crypto.randomBytes(8).toString('hex'); }

let logFileHandle: fs.WriteStream | null = null;
let logFileFailed = false;
// stdout may carry protocol frames, so the default sink is always stderr
let sink: NodeJS.WritableStream | null = null;

/** Redirect log lines (tests, embedded transports). Pass null to restore stderr. */
export function setLogStream(stream: NodeJS.WritableStream | null){
  sink = stream;
}

function initializeFileLogging(file: string): void {
  try {
    const logDir = path.dirname(file);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    logFileHandle = fs.createWriteStream(file, { flags: 'a', encoding: 'utf8' });
    logFileHandle.on('error', err => {
      logFileFailed = true;
      writeLine(`[logger] log file error: ${err.message}`);
    });
    logFileHandle.write(`\n=== MCP protocol engine session started: ${new Date().toISOString()} ===\n`);
    process.on('exit', () => {
      if (logFileHandle && !logFileHandle.destroyed) {
        logFileHandle.write(`=== Session ended: ${new Date().toISOString()} ===\n\n`);
        logFileHandle.end();
      }
    });
  } catch (error) {
    logFileFailed = true;
    writeLine(`[logger] Failed to initialize file logging to ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function writeLine(line: string){
  if(sink){
    sink.write(line + '\n');
    return;
  }
  console.error(line);
}

function format(rec: LogRecord, json: boolean): string {
  if(json) return JSON.stringify(rec);
  const parts = [rec.ts, rec.level.toUpperCase(), rec.evt, rec.msg || ''];
  if(rec.method) parts.push(`[${rec.method}]`);
  if(rec.connectionId) parts.push(`conn=${rec.connectionId}`);
  if(rec.ms !== undefined) parts.push(`${rec.ms}ms`);
  if(rec.data !== undefined) parts.push(JSON.stringify(rec.data));
  return parts.filter(Boolean).join(' ');
}

function emit(rec: LogRecord){
  const cfg = getRuntimeConfig().logging;
  if(LEVEL_RANK[rec.level] > LEVEL_RANK[cfg.level]) return;

  if (!logFileHandle && !logFileFailed && cfg.file) {
    initializeFileLogging(cfg.file);
  }

  const logLine = format(rec, cfg.json);
  writeLine(logLine);

  if (logFileHandle && !logFileHandle.destroyed) {
    logFileHandle.write(logLine + '\n');
    // MCP_LOG_SYNC=1 flushes each line for deterministic tailing
    if(cfg.sync){
      const fd: unknown = Reflect.get(logFileHandle, 'fd');
      if(typeof fd === 'number') fs.fsyncSync(fd);
    }
  }
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] <= LEVEL_RANK[getRuntimeConfig().logging.level];
}

export function log(level: LogRecord['level'], evt: string, fields: Omit<LogRecord,'level'|'evt'|'ts'> = {}){
  emit({ ts: new Date().toISOString(), level, evt, ...fields });
}

export const logDebug = (evt:string, f?:unknown)=> log('debug', evt, { data:f });
export const logInfo = (evt:string, f?:unknown)=> log('info', evt, { data:f });
export const logWarn = (evt:string, f?:unknown)=> log('warn', evt, { data:f });
export const logError = (evt:string, f?:unknown)=> log('error', evt, { data:f });
