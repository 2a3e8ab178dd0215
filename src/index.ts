export { loadConfig } from './shared/config.js';
export type { Config, HashMode, CollisionPolicy } from './shared/config.js';
export * from './shared/errors.js';
export * from './shared/types.js';
export {
  LATEST,
  createSession,
  resolveSession,
  listSessions,
  readLatest,
  deleteSession,
  deleteAllSessions,
  deleteOlderThan,
} from './engine/session-manager.js';
export { writeFinding, listFindings, readFindings, parseCategory, parseCategoryFilter } from './engine/findings.js';
export { appendStatus, currentStatus, statusHistory, parsePhase } from './engine/status.js';
export { synthesize, renderSynthesis } from './engine/aggregator.js';
export { runWorker, waitForFindings } from './engine/worker.js';
export type { WorkerSpec, WaitOptions } from './engine/worker.js';
