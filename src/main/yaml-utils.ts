import YAML from 'yaml';
import { AppConfig } from '../shared/types';

/**
 * YAML helpers for the config file: parse without throwing and render the
 * commented config layout.
 */

export interface YamlParseResult {
  success: boolean;
  data?: unknown;
  error?: Error;
}

/**
 * parseYaml(content: string): YamlParseResult
 *
 * CONTRACT:
 *   Outputs:
 *     - success case: { success: true, data: parsed value }
 *     - failure case: { success: false, error: Error }
 *
 *   Invariants:
 *     - Exactly one of data or error is set on failure; data may be null on success
 *     - Empty input is valid YAML and parses to null
 *     - Never throws; the caller validates the shape of data
 */
export function parseYaml(content: string): YamlParseResult {
  try {
    const data: unknown = YAML.parse(content);
    return { success: true, data };
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

/**
 * One scalar as it appears after `key: `, quoted by the yaml library when needed.
 */
function scalar(value: string | number): string {
  return YAML.stringify(value, { lineWidth: 0 }).trimEnd();
}

function list(key: string, values: string[], indent = ''): string[] {
  if (values.length === 0) {
    return [`${indent}${key}: []`];
  }
  return [`${indent}${key}:`, ...values.map((value) => `${indent}  - ${scalar(value)}`)];
}

/**
 * buildAppConfigYaml(config: AppConfig): string
 *
 * CONTRACT:
 *   Outputs:
 *     - YAML text with a comment line before every field
 *
 *   Invariants:
 *     - parse(buildAppConfigYaml(cfg)) normalizes back to cfg
 *     - An unset sortDir is written as a commented-out example
 *     - Paths and category names are quoted whenever YAML would misread them
 */
export function buildAppConfigYaml(config: AppConfig): string {
  const lines: string[] = [];

  lines.push('# image-triage configuration (YAML format)');
  lines.push('');
  lines.push('# Category names, bound to keys 1-9 in this order');
  lines.push(...list('categories', config.categories));
  lines.push('');
  lines.push('# Directories scanned recursively for images');
  lines.push(...list('startDirs', config.startDirs));
  lines.push('');
  lines.push('# Root for category and deleted folders (defaults to each start dir)');
  if (config.sortDir !== undefined) {
    lines.push(`sortDir: ${scalar(config.sortDir)}`);
  } else {
    lines.push('# sortDir: /path/to/sorted');
  }
  lines.push('');
  lines.push('# Directory for app.log');
  lines.push(`logDir: ${scalar(config.logDir)}`);
  lines.push('');
  lines.push('# Directory for the metadata database');
  lines.push(`cacheDir: ${scalar(config.cacheDir)}`);
  lines.push('');
  lines.push('# Log level: debug, info, warn, or error');
  lines.push(`logLevel: ${config.logLevel}`);
  lines.push('');
  lines.push('# Decoded image cache budget (entries and bytes)');
  lines.push('cache:');
  lines.push(`  maxEntries: ${config.cache.maxEntries}`);
  lines.push(`  maxBytes: ${config.cache.maxBytes}`);
  lines.push('');
  lines.push('# Images preloaded on each side of the current one');
  lines.push(`prefetchRadius: ${config.prefetchRadius}`);
  lines.push('');
  lines.push('# Concurrent decode and file workers');
  lines.push(`workerCount: ${config.workerCount}`);
  lines.push('');
  lines.push('# Queued background loads before the oldest is dropped');
  lines.push(`maxBackgroundQueue: ${config.maxBackgroundQueue}`);
  lines.push('');
  lines.push('# Number of moves and deletes that can be undone');
  lines.push(`undoCapacity: ${config.undoCapacity}`);
  lines.push('');
  lines.push('# Pick up images added, changed or removed by other programs');
  lines.push(`watchFiles: ${config.watchFiles}`);
  lines.push('');
  lines.push('# Slideshow timing in milliseconds');
  lines.push('slideshow:');
  lines.push(`  defaultIntervalMs: ${config.slideshow.defaultIntervalMs}`);
  lines.push(`  secondPressTimeoutMs: ${config.slideshow.secondPressTimeoutMs}`);

  return lines.join('\n') + '\n';
}
