import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseConfigFile, validateConfigFile } from '../../../src/cli/config/parser.js';
import { ConfigError } from '../../../src/utils/errors.js';

describe('Config Parser', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'config-parser-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const filePath = join(dir, name);
    writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  it('should parse a YAML config file', () => {
    const filePath = writeConfig(
      'compiler.yaml',
      ['logLevel: debug', 'synthesis:', '  apiPrefix: /v1', '  databaseDialect: mysql', ''].join('\n'),
    );

    expect(parseConfigFile(filePath)).toEqual({
      logLevel: 'debug',
      synthesis: { apiPrefix: '/v1', databaseDialect: 'mysql' },
    });
  });

  it('should parse a JSON config file', () => {
    const filePath = writeConfig(
      'compiler.json',
      JSON.stringify({ validation: { allowSelfReferences: true }, output: { dir: './out' } }),
    );

    expect(parseConfigFile(filePath)).toEqual({
      validation: { allowSelfReferences: true },
      output: { dir: './out' },
    });
  });

  it('should treat an empty YAML document as an empty config', () => {
    expect(parseConfigFile(writeConfig('empty.yml', ''))).toEqual({});
  });

  it('should reject unsupported extensions', () => {
    expect(() => parseConfigFile(join(dir, 'compiler.toml'))).toThrow(
      `Unsupported config file format: ${join(dir, 'compiler.toml')}. Must be .json, .yaml, or .yml`,
    );
  });

  it('should report missing and malformed files', () => {
    const missing = join(dir, 'missing.json');
    expect(() => parseConfigFile(missing)).toThrow(`Failed to read config file: ${missing}`);

    const broken = writeConfig('broken.json', '{ "synthesis": ');
    expect(() => parseConfigFile(broken)).toThrow(`Failed to parse config file: ${broken}`);
  });

  it('should list schema violations', () => {
    let caught: unknown;
    try {
      validateConfigFile({ synthesis: { port: 8080 } }, 'inline');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.message).toBe('Invalid config file: inline');
      expect(caught.details).toEqual({
        errors: ['/synthesis/port: must NOT have additional properties'],
      });
    }
  });

  it('should reject out-of-range values', () => {
    expect(() => validateConfigFile({ synthesis: { defaultPageSize: 0 } })).toThrow(ConfigError);
    expect(() => validateConfigFile({ synthesis: { apiPrefix: 'api' } })).toThrow(ConfigError);
    expect(() => validateConfigFile({ logLevel: 'verbose' })).toThrow(ConfigError);
  });
});
