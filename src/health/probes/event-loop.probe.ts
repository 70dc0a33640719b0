import type { DependencyProbe } from '../types/health.types.js';

/**
 * API probe: time until a setImmediate callback runs.
 * Informational only, a busy event loop shows up as degraded latency.
 */
export function createEventLoopProbe(): DependencyProbe {
  return {
    component: 'api',
    required: false,
    check(signal: AbortSignal): Promise<void> {
      return new Promise<void>((resolve, reject) => {
        const onAbort = (): void => {
          clearImmediate(handle);
          reject(new Error('Event loop probe aborted'));
        };

        const handle = setImmediate(() => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        });

        if (signal.aborted) {
          onAbort();
          return;
        }
        signal.addEventListener('abort', onAbort, { once: true });
      });
    }
  };
}
