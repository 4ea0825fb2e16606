// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN HANDLER — Abort Long-Running Work on Process Signals
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';

const logger = getLogger({ component: 'shutdown' });

export interface ShutdownConfig {
  /** Signals that trigger the abort */
  readonly signals: readonly NodeJS.Signals[];
}

export const DEFAULT_SHUTDOWN_CONFIG: ShutdownConfig = {
  signals: ['SIGTERM', 'SIGINT'],
};

export interface ShutdownSignal {
  /** Aborts on the first configured signal */
  readonly signal: AbortSignal;

  /** Remove the signal listeners */
  dispose(): void;
}

/**
 * Create an AbortSignal that fires on SIGTERM/SIGINT, for passing to
 * `EntityResolver.fit({ signal })`.
 */
export function createShutdownSignal(config: Partial<ShutdownConfig> = {}): ShutdownSignal {
  const { signals } = { ...DEFAULT_SHUTDOWN_CONFIG, ...config };
  const controller = new AbortController();

  const onSignal = (received: NodeJS.Signals): void => {
    if (controller.signal.aborted) return;
    logger.info('Shutdown signal received, aborting in-progress work', { signal: received });
    controller.abort(new Error(`Received ${received}`));
    dispose();
  };

  const dispose = (): void => {
    for (const name of signals) {
      process.off(name, onSignal);
    }
  };

  for (const name of signals) {
    process.once(name, onSignal);
  }

  return { signal: controller.signal, dispose };
}
