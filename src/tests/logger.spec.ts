import { describe, it, expect, afterEach } from 'vitest';
import { Writable } from 'stream';
import { reloadRuntimeConfig } from '../config/runtimeConfig';
import { isLevelEnabled, log, logInfo, logWarn, newCorrelationId, setLogStream } from '../services/logger';
import { parseObject } from './testUtils';

function collect(): string[] {
  const lines: string[] = [];
  setLogStream(new Writable({
    write(chunk: Buffer, _enc, cb){
      lines.push(...chunk.toString('utf8').split('\n').filter(Boolean));
      cb();
    },
  }));
  return lines;
}

afterEach(() => {
  setLogStream(null);
  reloadRuntimeConfig();
});

describe('logger', () => {
  it('writes one JSON record per line above the configured level', () => {
    reloadRuntimeConfig({ MCP_LOG_LEVEL: 'warn', MCP_LOG_JSON: '1' });
    const lines = collect();
    logInfo('hidden', { n: 0 });
    logWarn('shown', { n: 1 });
    log('error', 'failed', { method: 'tools/call', connectionId: 'c1', ms: 3 });
    expect(lines).toHaveLength(2);
    const [first, second] = lines.map(parseObject);
    expect(first).toMatchObject({ level: 'warn', evt: 'shown', data: { n: 1 } });
    expect(second).toMatchObject({ level: 'error', evt: 'failed', method: 'tools/call', connectionId: 'c1', ms: 3 });
    expect(typeof first.ts).toBe('string');
  });

  it('formats text lines', () => {
    reloadRuntimeConfig({ MCP_LOG_LEVEL: 'debug' });
    const lines = collect();
    log('warn', 'careful', { data: { n: 1 } });
    log('info', 'dispatch', { method: 'ping', connectionId: 'tcp-1', ms: 2 });
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z WARN careful \{"n":1\}$/);
    expect(lines[1]).toMatch(/^\S+ INFO dispatch \[ping\] conn=tcp-1 2ms$/);
  });

  it('reports which levels are enabled', () => {
    reloadRuntimeConfig({ MCP_LOG_LEVEL: 'info' });
    expect(isLevelEnabled('error')).toBe(true);
    expect(isLevelEnabled('info')).toBe(true);
    expect(isLevelEnabled('debug')).toBe(false);
  });

  it('creates 16 hex character correlation ids', () => {
    expect(newCorrelationId()).toMatch(/^[0-9a-f]{16}$/);
  });
});
