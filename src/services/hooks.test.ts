import { describe, it, expect, vi } from 'vitest';
import type { DeploymentEngine, HookCallback, HookRef } from '../types/deploy.types.js';
import { createHookUnit, describeHook, resolveHook } from './hooks.js';
import { makeConfig, makeSection, silentLogger } from '../test-support/fixtures.js';
import { MemoryServer } from '../test-support/memory-server.js';

function stubEngine(): DeploymentEngine {
  return {
    testMode: false,
    allowDelete: true,
    collectPaths: async () => new Map(),
    writeDeploymentFile: async () => '/tmp/.htdeployment',
    deploy: async () => undefined,
  };
}

describe('resolveHook', () => {
  it('resolves a member that is a function', () => {
    const target = { notify: vi.fn() };
    const resolved = resolveHook('before', { kind: 'member', target, typeName: 'Notifier', member: 'notify' });
    expect(resolved.ok).toBe(true);
  });

  it('reports a member that is missing or not callable', () => {
    const resolved = resolveHook('after', { kind: 'member', target: { count: 3 }, typeName: 'Stats', member: 'count' });
    expect(resolved).toEqual({
      ok: false,
      warning: { kind: 'hook-resolution', direction: 'after', typeName: 'Stats', member: 'count' },
    });
  });
});

describe('describeHook', () => {
  it('names both hook variants', () => {
    expect(describeHook({ kind: 'function', fn: async () => undefined, name: 'warmCache' })).toBe('warmCache');
    expect(describeHook({ kind: 'member', target: {}, typeName: './hooks.js', member: 'notify' })).toBe(
      './hooks.js::notify'
    );
  });
});

describe('createHookUnit', () => {
  it('calls invocable hooks once, in order, with the full argument tuple', async () => {
    const calls: string[] = [];
    const first = vi.fn<HookCallback>(async () => {
      calls.push('first');
    });
    const target = {
      label: 'member',
      second(this: { label: string }) {
        calls.push(this.label);
      },
    };
    const hooks: HookRef[] = [
      { kind: 'function', fn: first },
      { kind: 'member', target, typeName: 'Deploy', member: 'second' },
    ];
    const config = makeConfig();
    const section = makeSection({ beforeCallbacks: hooks });
    const server = new MemoryServer();
    const logger = silentLogger();
    const deployer = stubEngine();

    await createHookUnit('before', hooks, config, section)({ server, logger, deployer });

    expect(calls).toEqual(['first', 'member']);
    expect(first).toHaveBeenCalledTimes(1);
    expect(first).toHaveBeenCalledWith(config, section, server, logger, deployer);
    expect(logger.getMessages()).toEqual([]);
  });

  it('logs a warning for a hook that cannot be invoked and keeps going', async () => {
    const valid = vi.fn<HookCallback>();
    const hooks: HookRef[] = [
      { kind: 'member', target: {}, typeName: 'Notifier', member: 'send' },
      { kind: 'function', fn: valid },
    ];
    const logger = silentLogger();

    await createHookUnit('before', hooks, makeConfig(), makeSection())({
      server: new MemoryServer(),
      logger,
      deployer: stubEngine(),
    });

    expect(valid).toHaveBeenCalledTimes(1);
    expect(logger.getEntries().map(({ message, color }) => [message, color])).toEqual([
      ["Before callback 'Notifier::send' does not exist.", 'red'],
    ]);
  });

  it('lets an error thrown by a hook propagate', async () => {
    const failing: HookRef = {
      kind: 'function',
      fn: async () => {
        throw new Error('cache warmup failed');
      },
    };

    await expect(
      createHookUnit('after', [failing], makeConfig(), makeSection())({
        server: new MemoryServer(),
        logger: silentLogger(),
        deployer: stubEngine(),
      })
    ).rejects.toThrow('cache warmup failed');
  });
});
