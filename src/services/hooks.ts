import type { Config, Section } from '../types/config.types.js';
import type { HookCallback, HookContext, HookDirection, HookRef, HookUnit } from '../types/deploy.types.js';
import { formatWarning, type HookResolutionWarning } from './errors.js';

type ResolvedHook =
  | { ok: true; invoke: (args: HookArgs) => Promise<void> }
  | { ok: false; warning: HookResolutionWarning };

type HookArgs = Parameters<HookCallback>;

export function resolveHook(direction: HookDirection, hook: HookRef): ResolvedHook {
  switch (hook.kind) {
    case 'function':
      return {
        ok: true,
        invoke: async (args) => {
          await hook.fn(...args);
        },
      };
    case 'member': {
      const candidate: unknown = Reflect.get(hook.target, hook.member);
      if (typeof candidate !== 'function') {
        return {
          ok: false,
          warning: {
            kind: 'hook-resolution',
            direction,
            typeName: hook.typeName,
            member: hook.member,
            ...(hook.loadError ? { reason: hook.loadError } : {}),
          },
        };
      }
      return {
        ok: true,
        invoke: async (args) => {
          const result: unknown = Reflect.apply(candidate, hook.target, args);
          await result;
        },
      };
    }
  }
}

export function describeHook(hook: HookRef): string {
  return hook.kind === 'function' ? hook.name || hook.fn.name || '(anonymous)' : `${hook.typeName}::${hook.member}`;
}

/**
 * Wraps a section's callback list into the single unit the engine runs.
 * Hooks that cannot be invoked are reported through the logger and skipped.
 */
export function createHookUnit(direction: HookDirection, hooks: HookRef[], config: Config, section: Section): HookUnit {
  return async ({ server, logger, deployer }: HookContext) => {
    for (const hook of hooks) {
      const resolved = resolveHook(direction, hook);
      if (!resolved.ok) {
        logger.log(formatWarning(resolved.warning), 'red');
        continue;
      }
      await resolved.invoke([config, section, server, logger, deployer]);
    }
  };
}
