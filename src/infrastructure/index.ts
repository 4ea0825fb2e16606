// ═══════════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE MODULE — Retry and Shutdown Helpers
// ═══════════════════════════════════════════════════════════════════════════════

export * from './retry/index.js';
export * from './shutdown/index.js';
