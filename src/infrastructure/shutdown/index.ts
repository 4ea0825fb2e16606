// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN MODULE
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type ShutdownConfig,
  type ShutdownSignal,
  DEFAULT_SHUTDOWN_CONFIG,
  createShutdownSignal,
} from './handler.js';
