import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileAuditSink } from '../file-audit-sink';
import { MemoryAuditSink } from '../memory-audit-sink';

describe('FileAuditSink', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'resource-console-audit-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should create the log directory on the first append', () => {
    const directory = join(testDir, 'nested', 'logs');
    const sink = new FileAuditSink(directory);

    expect(existsSync(directory)).toBe(false);

    sink.append('svc1', 'AppService created', new Date(2024, 0, 5, 10, 42));

    expect(readFileSync(join(directory, 'svc1.log'), 'utf8')).toBe('[10:42 AM] AppService created\n');
  });

  it('should write one file per resource', () => {
    const sink = new FileAuditSink(testDir);

    expect(sink.getLogPath('svc1')).toBe(join(testDir, 'svc1.log'));
  });

  it('should append timestamped lines', () => {
    const sink = new FileAuditSink(testDir);
    sink.append('svc1', 'AppService created', new Date(2024, 0, 5, 10, 42));
    sink.append('svc1', 'AppService started in WestEurope', new Date(2024, 0, 5, 13, 7));
    sink.append('cache1', 'CacheDB created', new Date(2024, 0, 5, 0, 1));

    expect(readFileSync(sink.getLogPath('svc1'), 'utf8')).toBe(
      '[10:42 AM] AppService created\n[01:07 PM] AppService started in WestEurope\n'
    );
    expect(readFileSync(sink.getLogPath('cache1'), 'utf8')).toBe('[12:01 AM] CacheDB created\n');
  });

  it('should recreate the directory when it has gone away', () => {
    const directory = join(testDir, 'gone');
    const sink = new FileAuditSink(directory);
    sink.append('svc1', 'AppService created', new Date(2024, 0, 5, 10, 42));
    rmSync(directory, { recursive: true, force: true });

    sink.append('svc1', 'AppService stopped', new Date(2024, 0, 5, 10, 43));

    expect(readFileSync(sink.getLogPath('svc1'), 'utf8')).toBe('[10:43 AM] AppService stopped\n');
  });

  it('should raise when the directory path is taken by a file', () => {
    const blocked = join(testDir, 'blocked');
    writeFileSync(blocked, '');
    const sink = new FileAuditSink(blocked);

    expect(() => sink.append('svc1', 'AppService created')).toThrow();
  });
});

describe('MemoryAuditSink', () => {
  it('should keep lines per resource', () => {
    const sink = new MemoryAuditSink();
    sink.append('svc1', 'AppService created', new Date(2024, 0, 5, 10, 42));
    sink.append('store1', 'StorageAccount created', new Date(2024, 0, 5, 10, 43));

    expect(sink.lines('svc1')).toEqual(['[10:42 AM] AppService created']);
    expect(sink.lines('store1')).toEqual(['[10:43 AM] StorageAccount created']);
    expect(sink.lines('unknown')).toEqual([]);
  });
});
