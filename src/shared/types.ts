export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
}

/**
 * Absolute, normalised filesystem path of one image. Unique among live entries.
 */
export type ImageIdentity = string;

export type Direction = 'next' | 'previous' | 'first' | 'last' | 'random';

/**
 * Directions that drive slideshow cycling and rate negotiation.
 */
export type CycleDirection = 'next' | 'previous' | 'random';

export interface CacheBudget {
  maxEntries: number;
  maxBytes: number;
}

export interface SlideshowConfig {
  defaultIntervalMs: number;
  secondPressTimeoutMs: number;
}

export interface AppConfig {
  categories: string[];
  startDirs: string[];
  sortDir?: string; // defaults to each start dir
  logDir: string;
  cacheDir: string;
  logLevel: LogLevel;
  cache: CacheBudget;
  prefetchRadius: number;
  workerCount: number;
  maxBackgroundQueue: number;
  undoCapacity: number;
  watchFiles: boolean; // follow changes made outside the app
  slideshow: SlideshowConfig;
}

// ============================================================================
// Errors crossing task boundaries
// ============================================================================

export type EngineErrorKind =
  | 'not-found'
  | 'decode'
  | 'filesystem'
  | 'capacity'
  | 'empty-undo'
  | 'invalid-request'
  | 'cancelled';

export interface EngineError {
  kind: EngineErrorKind;
  message: string;
  identity?: ImageIdentity;
  cause?: unknown;
}

// ============================================================================
// Mutations
// ============================================================================

export type MutationAction = 'move' | 'delete';

export interface MovedFile {
  from: string;
  to: string;
}

export interface UndoRecord {
  identity: ImageIdentity;
  action: MutationAction;
  category?: string;
  originalDirectory: string;
  destinationDirectory: string;
  movedFiles: MovedFile[];
  timestamp: number;
}

export type MutationResult =
  | { ok: true; record: UndoRecord }
  | { ok: false; error: EngineError };

export type UndoResult =
  | { ok: true; record: UndoRecord }
  | { ok: false; error: EngineError };
