import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConsoleConfigLoader, createConfigLoader, loadConsoleConfig } from '../loader';
import { createDefaultConfig } from '../validator';

describe('Configuration Loader', () => {
  let testDir: string;
  let loader: ConsoleConfigLoader;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'resource-console-config-'));
    loader = createConfigLoader();
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    delete process.env.RC_TEST_AUDIT_DIR;
  });

  describe('load', () => {
    it('should load a YAML configuration file', async () => {
      const path = join(testDir, 'console.yml');
      writeFileSync(
        path,
        `
audit:
  sink: memory
logging:
  level: info
resources:
  cache_db:
    eviction_policies:
      - LRU
      - LFU
`
      );

      const config = await loader.load(path);

      expect(config).toEqual({
        audit: { sink: 'memory', directory: 'logs' },
        logging: { level: 'info' },
        resources: { cache_db: { eviction_policies: ['LRU', 'LFU'] } }
      });
    });

    it('should load a JSON configuration file', async () => {
      const path = join(testDir, 'console.json');
      writeFileSync(path, JSON.stringify({ audit: { directory: 'audit-trail' } }));

      const config = await loader.load(path);

      expect(config.audit).toEqual({ sink: 'file', directory: 'audit-trail' });
    });

    it('should substitute environment variables', async () => {
      process.env.RC_TEST_AUDIT_DIR = '/tmp/audit';
      const path = join(testDir, 'env.yaml');
      writeFileSync(
        path,
        `
audit:
  directory: \${RC_TEST_AUDIT_DIR}
logging:
  level: \${RC_TEST_UNSET_LEVEL:-debug}
`
      );

      const config = await loader.load(path);

      expect(config.audit.directory).toBe('/tmp/audit');
      expect(config.logging.level).toBe('debug');
    });

    it('should keep placeholders for unset variables without defaults', async () => {
      const path = join(testDir, 'placeholder.yml');
      writeFileSync(path, 'audit:\n  directory: ${RC_TEST_UNSET_DIR}\n');

      const config = await loader.load(path);

      expect(config.audit.directory).toBe('${RC_TEST_UNSET_DIR}');
    });

    it('should reject a missing file', async () => {
      const path = join(testDir, 'missing.yml');

      await expect(loader.load(path)).rejects.toThrow(
        `Failed to load configuration from ${path}: Configuration file not found: ${path}`
      );
    });

    it('should reject unsupported formats', async () => {
      const path = join(testDir, 'console.toml');
      writeFileSync(path, 'audit = {}');

      await expect(loader.load(path)).rejects.toThrow('Unsupported file format');
    });

    it('should reject invalid configuration', async () => {
      const path = join(testDir, 'invalid.json');
      writeFileSync(path, JSON.stringify({ audit: { sink: 'syslog' } }));

      await expect(loader.load(path)).rejects.toThrow(
        `Failed to load configuration from ${path}: Configuration validation failed:\nAudit sink must be one of: file, memory`
      );
    });

    it('should reject malformed JSON', async () => {
      const path = join(testDir, 'broken.json');
      writeFileSync(path, '{ "audit": ');

      await expect(loader.load(path)).rejects.toThrow(`Failed to load configuration from ${path}`);
    });
  });

  describe('validate', () => {
    it('should validate without reading a file', () => {
      expect(loader.validate({ logging: { level: 'error' } })).toEqual({ valid: true, errors: [] });
      expect(loader.validate({ logging: { level: 'loud' } }).valid).toBe(false);
    });
  });

  describe('loadFromPaths', () => {
    it('should load the first existing file', async () => {
      const second = join(testDir, 'second.yml');
      writeFileSync(second, 'logging:\n  level: error\n');

      const config = await loader.loadFromPaths([join(testDir, 'first.yml'), second]);

      expect(config.logging.level).toBe('error');
    });

    it('should fall back to defaults when nothing exists', async () => {
      const config = await loader.loadFromPaths([join(testDir, 'nothing.yml')]);
      expect(config).toEqual(createDefaultConfig());
    });
  });

  describe('loadConsoleConfig', () => {
    it('should search the standard file names in the working directory', async () => {
      writeFileSync(join(testDir, 'resource-console.yaml'), 'audit:\n  sink: memory\n');

      const config = await loadConsoleConfig(undefined, testDir);

      expect(config.audit.sink).toBe('memory');
    });

    it('should resolve an explicit path against the working directory', async () => {
      writeFileSync(join(testDir, 'custom.json'), JSON.stringify({ logging: { level: 'info' } }));

      const config = await loadConsoleConfig('custom.json', testDir);

      expect(config.logging.level).toBe('info');
    });
  });
});
