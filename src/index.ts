// ===========================================
// TOKEN RADAR - LIBRARY EXPORTS
// ===========================================

export * from './types/index.js';
export { parseConfig } from './config/index.js';
export * from './utils/errors.js';
export { TokenRadar } from './app.js';
export * from './modules/pipeline/index.js';
export * from './modules/store/index.js';
export * from './modules/scoring/index.js';
export * from './modules/sources/index.js';
export * from './modules/enrichment/index.js';
export * from './modules/notifications/index.js';
export { MergeEngine, resolveIdentity, blacklistConfirmation } from './modules/merge/merge-engine.js';
export { mergeFields, emptyMarket } from './modules/merge/field-merge.js';
export { deriveTargetStatus, planTransitions, canEnterSideState } from './modules/merge/status-machine.js';
export { HealthServer, createHealthApp, healthStatusCode } from './modules/health/health-server.js';
