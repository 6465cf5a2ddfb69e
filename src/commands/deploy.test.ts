import { describe, it, expect, vi } from 'vitest';
import type { EngineFactory } from '../types/deploy.types.js';
import { applyOverrides, deployCommand } from './deploy.js';
import { ConfigError } from '../services/errors.js';
import { makeConfig, makeSection, silentLogger } from '../test-support/fixtures.js';

const config = makeConfig({
  sections: [makeSection({ name: 'web' }), makeSection({ name: 'api', mode: 'deploy' })],
});

describe('applyOverrides', () => {
  it('returns the configuration unchanged without switches', () => {
    expect(applyOverrides(config, {})).toEqual(config);
  });

  it('keeps only the selected sections, in configuration order', () => {
    const result = applyOverrides(config, { sections: ['api', 'web'] });
    expect(result.sections.map((s) => s.name)).toEqual(['web', 'api']);
  });

  it('rejects an unknown section', () => {
    expect(() => applyOverrides(config, { sections: ['cdn'] })).toThrow(
      new ConfigError('Section "cdn" not found. Available sections: web, api')
    );
  });

  it('forces test mode on every section', () => {
    expect(applyOverrides(config, { test: true }).sections.every((s) => s.testMode)).toBe(true);
  });

  it('forces generate mode, including sections with their own mode', () => {
    const result = applyOverrides(config, { generate: true });
    expect(result.mode).toBe('generate');
    expect(result.sections.map((s) => s.mode)).toEqual(['generate', 'generate']);
  });

  it('lets the colors switch win over the file', () => {
    expect(applyOverrides(makeConfig({ colors: true }), { colors: false }).colors).toBe(false);
  });
});

describe('deployCommand', () => {
  const factory: EngineFactory = (options) => ({
    testMode: options.testMode,
    allowDelete: options.allowDelete,
    collectPaths: async () => new Map(),
    writeDeploymentFile: async () => '/srv/.htdeployment',
    deploy: vi.fn(async () => undefined),
  });

  it('reports a successful run', async () => {
    const result = await deployCommand(config, { logger: silentLogger(), engineFactory: factory });

    expect(result.success).toBe(true);
    expect(result.sectionsProcessed).toBe(2);
    expect(result.errors).toEqual([]);
  });

  it('reports the error that aborted the run', async () => {
    const logger = silentLogger();
    const broken = makeConfig({ sections: [makeSection({ remote: '' })] });

    const result = await deployCommand(broken, { logger, engineFactory: factory });

    expect(result.success).toBe(false);
    expect(result.sectionsProcessed).toBe(0);
    expect(result.errors).toEqual(["Missing or invalid 'remote' URL in config."]);
    expect(logger.getEntries().at(-1)).toMatchObject({
      message: "\nError: Missing or invalid 'remote' URL in config.",
      color: 'red',
    });
  });

  it('counts the sections deployed before the failing one', async () => {
    const partial = makeConfig({
      sections: [makeSection({ name: 'web' }), makeSection({ name: 'api', remote: '' }), makeSection({ name: 'cdn' })],
    });

    const result = await deployCommand(partial, { logger: silentLogger(), engineFactory: factory });

    expect(result.success).toBe(false);
    expect(result.sectionsProcessed).toBe(1);
  });
});
