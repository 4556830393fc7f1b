import { describe, it, expect } from 'vitest';
import { loadCompilerConfig, validateCompilerConfig } from '../../../src/utils/config-loader.js';
import { DEFAULT_COMPILER_CONFIG, type CompilerConfig } from '../../../src/types/config.js';

function withSynthesis(overrides: Partial<CompilerConfig['synthesis']>): CompilerConfig {
  return {
    ...DEFAULT_COMPILER_CONFIG,
    synthesis: { ...DEFAULT_COMPILER_CONFIG.synthesis, ...overrides },
  };
}

describe('Config Loader', () => {
  it('should use defaults when nothing is set', () => {
    expect(loadCompilerConfig()).toEqual({
      validation: { allowSelfReferences: false },
      synthesis: {
        apiPrefix: '/api',
        defaultPageSize: 20,
        maxPageSize: 100,
        databaseDialect: 'postgres',
      },
      output: {},
    });
  });

  it('should prefer CLI options over the config file', () => {
    const config = loadCompilerConfig(
      { pageSize: 50, dialect: 'sqlite', outputDir: './out' },
      {
        validation: { allowSelfReferences: true },
        synthesis: { defaultPageSize: 25, maxPageSize: 200, databaseDialect: 'mysql', packageName: 'shop-api' },
        output: { dir: './generated' },
      },
    );

    expect(config).toEqual({
      validation: { allowSelfReferences: true },
      synthesis: {
        apiPrefix: '/api',
        defaultPageSize: 50,
        maxPageSize: 200,
        databaseDialect: 'sqlite',
        packageName: 'shop-api',
      },
      output: { dir: './out' },
    });
  });

  it('should reject an unsupported dialect', () => {
    expect(() => loadCompilerConfig({ dialect: 'oracle' })).toThrow(
      'Unsupported database dialect: oracle',
    );
  });

  it('should reject a default page size above the maximum', () => {
    expect(() => loadCompilerConfig({ pageSize: 150 })).toThrow(
      'defaultPageSize (150) must not exceed maxPageSize (100)',
    );
  });

  it('should validate merged values', () => {
    expect(() => validateCompilerConfig(withSynthesis({ apiPrefix: 'api' }))).toThrow(
      'API prefix must start with "/", got api',
    );
    expect(() => validateCompilerConfig(withSynthesis({ maxPageSize: 0 }))).toThrow(
      'maxPageSize must be a positive integer, got 0',
    );
    expect(() => validateCompilerConfig(withSynthesis({ defaultPageSize: 2.5 }))).toThrow(
      'defaultPageSize must be a positive integer, got 2.5',
    );
    expect(() => validateCompilerConfig(withSynthesis({ packageName: 'Shop API' }))).toThrow(
      'Invalid package name: Shop API',
    );
    expect(() => validateCompilerConfig(withSynthesis({ packageName: '@corner/shop-api' }))).not.toThrow();
  });
});
