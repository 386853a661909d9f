import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { AppError } from './logger.js';
import { coerceConfig, ConfigManager, DEFAULT_CONFIG } from './config.js';

describe('ConfigManager', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = mkdtempSync(join(tmpdir(), 'config-'));
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
  });

  describe('Initialization', () => {
    it('should load defaults if the file does not exist', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      const config = manager.getAll();

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(config.output).toBeUndefined();
    });

    it('should remember the config path', () => {
      const configPath = join(configDir, 'po.yaml');
      expect(new ConfigManager(configPath).getPath()).toBe(configPath);
    });
  });

  describe('YAML Configuration', () => {
    it('should load YAML configuration and resolve paths against the file', () => {
      const configPath = join(configDir, 'po.yaml');
      writeFileSync(
        configPath,
        [
          'inputs:',
          '  - camera',
          '  - /mnt/phone',
          'output: library',
          'extensions: [jpg, png]',
          'sort_policy: date',
          'logLevel: debug',
        ].join('\n')
      );

      const config = new ConfigManager(configPath).getAll();

      expect(config.inputs).toEqual([join(configDir, 'camera'), '/mnt/phone']);
      expect(config.output).toBe(join(configDir, 'library'));
      expect(config.extensions).toEqual(['jpg', 'png']);
      expect(config.sortPolicy).toBe('date');
      expect(config.logLevel).toBe('debug');
    });

    it('should treat an empty file as defaults', () => {
      const configPath = join(configDir, 'empty.yml');
      writeFileSync(configPath, '');

      expect(new ConfigManager(configPath).getAll()).toEqual(DEFAULT_CONFIG);
    });

    it('should fail on malformed YAML', () => {
      const configPath = join(configDir, 'broken.yaml');
      writeFileSync(configPath, 'inputs: [camera\noutput: :');

      expect(() => new ConfigManager(configPath)).toThrow(AppError);
    });
  });

  describe('JSON Configuration', () => {
    it('should load JSON configuration', () => {
      const configPath = join(configDir, 'po.json');
      writeFileSync(configPath, JSON.stringify({ output: '/srv/photos', sortPolicy: 'none' }));

      const manager = new ConfigManager(configPath);

      expect(manager.get('output')).toBe('/srv/photos');
      expect(manager.get('sortPolicy')).toBe('move-to-root');
      expect(manager.get('extensions')).toEqual(DEFAULT_CONFIG.extensions);
    });

    it('should reject unsupported file formats', () => {
      const configPath = join(configDir, 'po.toml');
      writeFileSync(configPath, 'output = "x"');

      expect(() => new ConfigManager(configPath)).toThrow(/Unsupported config format/);
    });
  });

  describe('Overrides', () => {
    it('should let overrides win over file values', () => {
      const configPath = join(configDir, 'po.yaml');
      writeFileSync(configPath, 'output: library\nsortPolicy: date\n');

      const config = new ConfigManager(configPath, {
        output: '/override',
        sortPolicy: 'move-to-root',
      }).getAll();

      expect(config.output).toBe('/override');
      expect(config.sortPolicy).toBe('move-to-root');
    });

    it('should not share arrays with the defaults', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      manager.getAll().extensions.push('gif');

      expect(DEFAULT_CONFIG.extensions).toEqual(['jpg', 'jpeg', 'png', 'heic']);
      expect(manager.get('extensions')).toEqual(['jpg', 'jpeg', 'png', 'heic']);
    });
  });

  describe('coerceConfig', () => {
    it('should accept a single string where a list is expected', () => {
      expect(coerceConfig({ extensions: 'heic' }, '/etc/po.yaml')).toEqual({ extensions: ['heic'] });
    });

    it('should reject values of the wrong type', () => {
      expect(() => coerceConfig({ output: 42 }, '/etc/po.yaml')).toThrow(AppError);
      expect(() => coerceConfig({ inputs: [1, 2] }, '/etc/po.yaml')).toThrow(AppError);
      expect(() => coerceConfig({ sortPolicy: 'by-camera' }, '/etc/po.yaml')).toThrow(/Unknown sort policy/);
      expect(() => coerceConfig({ logLevel: 'verbose' }, '/etc/po.yaml')).toThrow(/Invalid log level/);
      expect(() => coerceConfig(['output'], '/etc/po.yaml')).toThrow(/mapping/);
    });
  });

  describe('Validation', () => {
    it('should require an output root', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));

      const result = manager.validate();
      expect(result.valid).toBe(false);
      expect(result.errors).toHaveLength(1);
    });

    it('should require inputs for an import', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'), { output: '/srv/photos' });

      expect(manager.validate().valid).toBe(true);
      expect(manager.validate({ requireInputs: true }).errors).toEqual([
        'At least one input directory is required (--input or "inputs")',
      ]);
    });
  });
});
