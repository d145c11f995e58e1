export { createImageTriage, ImageTriage } from './main/engine';
export type { CommandOutcome, EngineStats, ImageTriageOptions, MutationOutcome, UndoOutcome } from './main/engine';
export { defaultConfig, getConfigFilePath, loadConfig, normalizeConfig, saveConfig } from './main/config';
export { EventHub } from './main/events';
export type { EngineEvent, EngineEventListener, LibraryChange } from './main/events';
export type { WatchFactory, WatchHandle } from './main/library/library-watcher';
export { buildKeyBindings } from './main/key-bindings';
export type { Command } from './main/key-bindings';
export type { LoadOutcome, MetadataOutcome, NavigationHandle } from './main/navigation/navigation-orchestrator';
export type { SlideshowState } from './main/slideshow/rate-controller';
export type { ImageDecoder, DecodeResult } from './main/image-cache/image-decoder';
export type { CancellationToken } from './main/scheduler/task-scheduler';
export * from './shared/types';
export * from './shared/image-cache-types';
