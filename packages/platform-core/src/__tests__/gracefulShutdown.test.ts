import { describe, it, expect } from 'vitest';
import {
  isShutdownInProgress,
  registerPhasedShutdownHook,
  runShutdownHooks,
} from '../lifecycle/gracefulShutdown';

describe('graceful shutdown hooks', () => {
  it('should run hooks phase by phase and keep going past a failing hook', async () => {
    const calls: string[] = [];

    registerPhasedShutdownHook('default', async () => {
      calls.push('default');
    });
    registerPhasedShutdownHook(
      'connections',
      async () => {
        calls.push('pool');
      },
      'database:pool'
    );
    registerPhasedShutdownHook('drain', async () => {
      calls.push('drain');
      throw new Error('drain failed');
    });
    registerPhasedShutdownHook('connections', async () => {
      calls.push('cache');
    });

    await runShutdownHooks();

    expect(calls).toEqual(['drain', 'pool', 'cache', 'default']);
  });

  it('should not report a shutdown before a signal arrives', () => {
    expect(isShutdownInProgress()).toBe(false);
  });
});
