/**
 * Tests for ConfigManager: caching, defaults and named templates
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigManager } from '../manager.js';
import { join } from 'path';
import { mkdtemp, rm, writeFile, readFile } from 'fs/promises';
import { tmpdir } from 'os';

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pathgrid-config-'));
    configPath = join(tempDir, 'config.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writeConfig(config: unknown): Promise<void> {
    await writeFile(configPath, JSON.stringify(config, null, 2));
  }

  describe('cache', () => {
    it('should return cached config within TTL', async () => {
      await writeConfig({ version: 1, templates: { runs: 'data/run{run:d}.csv' } });
      const manager = new ConfigManager(configPath, { cacheTtlMs: 60_000 });

      const first = await manager.load();
      await writeConfig({ version: 1, templates: {} });
      const second = await manager.load();

      expect(second).toBe(first);
      expect(Object.keys(second.templates)).toEqual(['runs']);
    });

    it('should reload after invalidateCache', async () => {
      await writeConfig({ version: 1, templates: { runs: 'data/run{run:d}.csv' } });
      const manager = new ConfigManager(configPath, { cacheTtlMs: 60_000 });

      await manager.load();
      await writeConfig({ version: 1, templates: {} });
      manager.invalidateCache();

      expect((await manager.load()).templates).toEqual({});
    });
  });

  describe('load', () => {
    it('should fail when the file is missing', async () => {
      const manager = new ConfigManager(configPath);
      await expect(manager.load()).rejects.toThrow(`Config file not found: ${configPath}`);
    });

    it('should fail on an invalid config', async () => {
      await writeConfig({ version: 2, templates: {} });
      const manager = new ConfigManager(configPath);
      await expect(manager.load()).rejects.toThrow('Invalid config: version: version must be 1');
    });
  });

  describe('loadOrDefault', () => {
    it('should return defaults when the file is missing', async () => {
      const manager = new ConfigManager(configPath);
      expect(await manager.loadOrDefault()).toEqual({ version: 1, templates: {} });
    });

    it('should still reject an invalid file', async () => {
      await writeFile(configPath, '{ not json');
      const manager = new ConfigManager(configPath);
      await expect(manager.loadOrDefault()).rejects.toThrow('Invalid config');
    });
  });

  describe('init', () => {
    it('should create a default config once', async () => {
      const manager = new ConfigManager(configPath);

      expect(await manager.init()).toEqual({ created: true, path: configPath });
      expect(await manager.init()).toEqual({ created: false, path: configPath });
      expect(JSON.parse(await readFile(configPath, 'utf-8'))).toEqual({ version: 1, templates: {} });
    });
  });

  describe('validate', () => {
    it('should report a missing file', async () => {
      const manager = new ConfigManager(configPath);
      expect(await manager.validate()).toEqual({
        valid: false,
        errors: [{ path: '', message: 'Config file not found' }],
      });
    });
  });

  describe('templates', () => {
    it('should store and resolve a named template', async () => {
      const manager = new ConfigManager(configPath);
      await manager.setTemplate('runs', 'data/run{run:d}_p{parameter:d}.csv');

      expect(await manager.resolveTemplate('@runs')).toBe('data/run{run:d}_p{parameter:d}.csv');
      expect(JSON.parse(await readFile(configPath, 'utf-8')).templates).toEqual({
        runs: 'data/run{run:d}_p{parameter:d}.csv',
      });
    });

    it('should pass plain templates through', async () => {
      const manager = new ConfigManager(configPath);
      expect(await manager.resolveTemplate('data/{name}.csv')).toBe('data/{name}.csv');
    });

    it('should list known aliases for an unknown one', async () => {
      const manager = new ConfigManager(configPath);
      await manager.setTemplate('runs', 'data/run{run:d}.csv');

      await expect(manager.resolveTemplate('@rnus')).rejects.toThrow('Unknown template alias "@rnus"; defined: @runs');
    });

    it('should reject an invalid template', async () => {
      const manager = new ConfigManager(configPath);
      await expect(manager.setTemplate('bad', 'data/{run')).rejects.toThrow('Unterminated placeholder');
    });

    it('should remove a template', async () => {
      const manager = new ConfigManager(configPath);
      await manager.setTemplate('runs', 'data/run{run:d}.csv');

      expect(await manager.removeTemplate('runs')).toBe(true);
      expect(await manager.removeTemplate('runs')).toBe(false);
      expect(await manager.getTemplates()).toEqual({});
    });
  });
});
