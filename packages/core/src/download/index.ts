export * from './types.js';
export * from './error-codes.js';
export * from './errors.js';
export * from './checksum.js';
export * from './confirmation-store.js';
export * from './selection.js';
export * from './process-runner.js';
export * from './http-transfer.js';
export * from './providers/tools.js';
export * from './providers/plan.js';
export * from './providers/adapter.js';
export * from './prerequisites.js';
export * from './default-model.js';
export * from './orchestrator.js';
