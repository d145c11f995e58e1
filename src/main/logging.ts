import fs from 'fs';
import path from 'path';
import { LogEntry, LogLevel } from '../shared/types';
import { getDefaultLogDir } from './paths';

const LOG_FILE_NAME = 'app.log';
const MAX_LINES = 200;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';
let logFile: string | null = null;

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

/**
 * Redirects the log file into `dir` (created on first write).
 */
export function setLogDirectory(dir: string) {
  logFile = path.join(dir, LOG_FILE_NAME);
}

export function getLogFilePath(): string {
  if (!logFile) {
    logFile = path.join(getDefaultLogDir(), LOG_FILE_NAME);
  }
  return logFile;
}

export function log(level: LogLevel, message: string) {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) {
    return;
  }
  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
  };
  writeEntry(entry);
}

/**
 * Renders anything caught in a `catch` clause for a log line.
 */
export function describeError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export function getRecentLogs(): LogEntry[] {
  const file = getLogFilePath();
  try {
    if (!fs.existsSync(file)) {
      return [];
    }
    const lines = fs.readFileSync(file, 'utf8').trim().split('\n');
    return lines
      .filter(Boolean)
      .slice(-MAX_LINES)
      .map((line): unknown => JSON.parse(line))
      .filter(isLogEntry);
  } catch (error) {
    console.error('Failed to read logs', error);
    return [];
  }
}

function isLogEntry(value: unknown): value is LogEntry {
  return typeof value === 'object' && value !== null && 'level' in value && 'message' in value && 'timestamp' in value;
}

function writeEntry(entry: LogEntry) {
  const file = getLogFilePath();
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.appendFileSync(file, JSON.stringify(entry) + '\n');
    console.log(`[${entry.timestamp}] [${entry.level}] ${entry.message}`);
  } catch (error) {
    console.error('Failed to write log', error);
  }
}
