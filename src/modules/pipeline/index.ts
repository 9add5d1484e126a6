// ===========================================
// DISCOVERY PIPELINE - MODULE INDEX
// ===========================================

export { DiscoveryPipeline, sourceConfigFor, type PipelineDeps, type SweepResult } from './discovery-pipeline.js';
export { WorkQueue, type WorkQueueOptions, type QueueStats } from './work-queue.js';
export { Scheduler, type ScheduledTask } from './scheduler.js';
export { PRESET_NAMES, buildPresets, isPresetName, type PresetName } from './presets.js';
