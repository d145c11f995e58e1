/**
 * Jest Global Setup
 *
 * Points the per-user data directory at a temp location and suppresses
 * expected console output during tests.
 */

import os from 'os';
import path from 'path';

process.env.IMAGE_TRIAGE_CONFIG_DIR = path.join(os.tmpdir(), `image-triage-test-${process.pid}`);

const originalLog = console.log;
const originalError = console.error;

console.log = (...args: unknown[]) => {
  const message = args[0];
  // Application log entries are mirrored to console.log with an ISO timestamp prefix
  if (typeof message === 'string' && message.match(/^\[\d{4}-\d{2}-\d{2}T/)) {
    return;
  }
  originalLog.apply(console, args);
};

console.error = (...args: unknown[]) => {
  const message = args[0];
  if (typeof message === 'string' && message.startsWith('Failed to write log')) {
    return;
  }
  originalError.apply(console, args);
};
