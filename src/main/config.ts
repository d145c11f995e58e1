import fs from 'fs';
import path from 'path';
import { AppConfig, LogLevel } from '../shared/types';
import { describeError, log } from './logging';
import { DELETED_FOLDER_NAME, THUMBNAIL_FOLDER_NAME } from './mutation/sort-folders';
import { DEFAULT_UNDO_CAPACITY } from './mutation/undo-stack';
import { getDefaultCacheDir, getDefaultLogDir, getUserDataPath } from './paths';
import { DEFAULT_MAX_BACKGROUND_QUEUE, defaultWorkerCount } from './scheduler/task-scheduler';
import { DEFAULT_SLIDESHOW_CONFIG, MIN_INTERVAL_MS } from './slideshow/rate-controller';
import { buildAppConfigYaml, parseYaml } from './yaml-utils';

export const CONFIG_FILE_NAME = 'config.yaml';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_CACHE_MAX_ENTRIES = 500;
export const DEFAULT_CACHE_MAX_BYTES = 100 * 1024 * 1024;
export const DEFAULT_PREFETCH_RADIUS = 2;

export function defaultConfig(): AppConfig {
  return {
    categories: [],
    startDirs: [process.cwd()],
    logDir: getDefaultLogDir(),
    cacheDir: getDefaultCacheDir(),
    logLevel: 'info',
    cache: { maxEntries: DEFAULT_CACHE_MAX_ENTRIES, maxBytes: DEFAULT_CACHE_MAX_BYTES },
    prefetchRadius: DEFAULT_PREFETCH_RADIUS,
    workerCount: defaultWorkerCount(),
    maxBackgroundQueue: DEFAULT_MAX_BACKGROUND_QUEUE,
    undoCapacity: DEFAULT_UNDO_CAPACITY,
    watchFiles: true,
    slideshow: { ...DEFAULT_SLIDESHOW_CONFIG },
  };
}

export function getConfigFilePath(configDir: string = getUserDataPath()): string {
  return path.join(configDir, CONFIG_FILE_NAME);
}

// ============================================================================
// Normalization
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function integerAtLeast(value: unknown, min: number, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min ? value : fallback;
}

function directory(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? path.resolve(value.trim()) : undefined;
}

function directoryList(value: unknown): string[] | undefined {
  const items = typeof value === 'string' ? [value] : Array.isArray(value) ? value : undefined;
  if (!items) {
    return undefined;
  }
  const dirs = items.map(directory).filter((dir): dir is string => dir !== undefined);
  return dirs.length > 0 ? Array.from(new Set(dirs)) : undefined;
}

/**
 * A category name becomes a single folder name under the sort root.
 */
export function isValidCategory(name: string): boolean {
  return (
    name.length > 0 &&
    name !== '.' &&
    name !== '..' &&
    name !== DELETED_FOLDER_NAME &&
    name !== THUMBNAIL_FOLDER_NAME &&
    !name.includes('/') &&
    !name.includes('\\')
  );
}

function categoryList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  const names: string[] = [];
  for (const item of value) {
    const name = typeof item === 'number' ? String(item) : typeof item === 'string' ? item.trim() : '';
    if (!isValidCategory(name)) {
      log('warn', `Ignoring invalid category name: ${JSON.stringify(item)}`);
      continue;
    }
    if (!names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * normalizeConfig(raw: unknown, defaults?: AppConfig): AppConfig
 *
 * CONTRACT:
 *   Inputs:
 *     - raw: parsed YAML (any shape)
 *     - defaults: values used for every missing or invalid field
 *
 *   Outputs:
 *     - complete AppConfig
 *
 *   Invariants:
 *     - Each field falls back independently; one bad field never discards the rest
 *     - Paths are absolute (relative paths resolve against the working directory)
 *     - startDirs is never empty; a single string is accepted as one start dir
 *     - categories are unique folder names; 'deleted', '.thumbs' and names with
 *       path separators are dropped with a warning
 *     - Counts are integers: workerCount, maxBackgroundQueue, undoCapacity and
 *       cache limits >= 1, prefetchRadius >= 0, slideshow interval >= MIN_INTERVAL_MS
 */
export function normalizeConfig(raw: unknown, defaults: AppConfig = defaultConfig()): AppConfig {
  const source = isRecord(raw) ? raw : {};
  const cache = isRecord(source.cache) ? source.cache : {};
  const slideshow = isRecord(source.slideshow) ? source.slideshow : {};

  return {
    categories: categoryList(source.categories) ?? defaults.categories,
    startDirs: directoryList(source.startDirs) ?? defaults.startDirs,
    sortDir: directory(source.sortDir) ?? defaults.sortDir,
    logDir: directory(source.logDir) ?? defaults.logDir,
    cacheDir: directory(source.cacheDir) ?? defaults.cacheDir,
    logLevel: isLogLevel(source.logLevel) ? source.logLevel : defaults.logLevel,
    cache: {
      maxEntries: integerAtLeast(cache.maxEntries, 1, defaults.cache.maxEntries),
      maxBytes: integerAtLeast(cache.maxBytes, 1, defaults.cache.maxBytes),
    },
    prefetchRadius: integerAtLeast(source.prefetchRadius, 0, defaults.prefetchRadius),
    workerCount: integerAtLeast(source.workerCount, 1, defaults.workerCount),
    maxBackgroundQueue: integerAtLeast(source.maxBackgroundQueue, 1, defaults.maxBackgroundQueue),
    undoCapacity: integerAtLeast(source.undoCapacity, 1, defaults.undoCapacity),
    watchFiles: typeof source.watchFiles === 'boolean' ? source.watchFiles : defaults.watchFiles,
    slideshow: {
      defaultIntervalMs: integerAtLeast(
        slideshow.defaultIntervalMs,
        MIN_INTERVAL_MS,
        defaults.slideshow.defaultIntervalMs
      ),
      secondPressTimeoutMs: integerAtLeast(
        slideshow.secondPressTimeoutMs,
        1,
        defaults.slideshow.secondPressTimeoutMs
      ),
    },
  };
}

// ============================================================================
// Load / save
// ============================================================================

/**
 * loadConfig(configDir?: string): AppConfig
 *
 * CONTRACT:
 *   Outputs:
 *     - normalized config from <configDir>/config.yaml
 *
 *   Invariants:
 *     - Missing file: defaults are returned and written with comments
 *     - Unreadable or malformed file: defaults are returned, a warning is logged,
 *       and the file is left untouched
 *     - Never throws
 */
export function loadConfig(configDir: string = getUserDataPath()): AppConfig {
  const file = getConfigFilePath(configDir);
  const defaults = defaultConfig();

  if (!fs.existsSync(file)) {
    writeConfigFile(file, defaults);
    return defaults;
  }

  let content: string;
  try {
    content = fs.readFileSync(file, 'utf8');
  } catch (error) {
    log('warn', `Failed to read config ${file}, using defaults: ${describeError(error)}`);
    return defaults;
  }

  const parsed = parseYaml(content);
  if (!parsed.success) {
    log('warn', `Malformed config ${file}, using defaults: ${describeError(parsed.error)}`);
    return defaults;
  }
  return normalizeConfig(parsed.data, defaults);
}

/**
 * Normalizes `config` and writes it atomically. Write failures are logged, not thrown.
 */
export function saveConfig(config: Partial<AppConfig>, configDir: string = getUserDataPath()): AppConfig {
  const merged = normalizeConfig({ ...defaultConfig(), ...config });
  writeConfigFile(getConfigFilePath(configDir), merged);
  return merged;
}

function writeConfigFile(file: string, config: AppConfig): void {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true, mode: 0o755 });
    const tmpPath = `${file}.tmp`;
    fs.writeFileSync(tmpPath, buildAppConfigYaml(config), { mode: 0o600 });
    fs.renameSync(tmpPath, file);
    log('info', `Configuration saved to ${file}`);
  } catch (error) {
    log('error', `Failed to save config ${file}: ${describeError(error)}`);
  }
}
