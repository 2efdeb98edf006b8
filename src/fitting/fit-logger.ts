// Fit logging module - isolated so models and solver can log without importing each other.
// The buffer holds the log of the current fit only; fitSeries and fitDoubleSigmoid start a new one.

export const fitLogs: string[] = [];

// Messages already logged once in the current fit
const loggedOnceMessages = new Set<string>();

// Track last logged message to prevent consecutive duplicates
let lastLoggedMessage: string | null = null;

// Label of the fit the buffer belongs to (the model name)
let currentFit: string | null = null;

// Current verbosity level - 'normal' shows only essential logs, 'verbose' shows all
let verbosity: 'normal' | 'verbose' = 'normal';

const isTest = typeof process !== 'undefined' && process.env.NODE_ENV === 'test';

// Allow enabling console logs during tests via environment variable
const FORCE_CONSOLE_LOGS = typeof process !== 'undefined' && process.env.FIT_VERBOSE_TESTS === 'true';

let onLogCallback: ((message: string) => void) | null = null;

export function setLogCallback(callback: ((message: string) => void) | null) {
  onLogCallback = callback;
}

/**
 * Set verbosity level for fit logging.
 * - 'normal': Only essential logs (summary, warnings)
 * - 'verbose': All logs including per-iteration detail
 */
export function setVerbosity(level: 'normal' | 'verbose') {
  verbosity = level;
}

export function getVerbosity(): 'normal' | 'verbose' {
  return verbosity;
}

/**
 * Start the log of a new fit: drops the previous fit's messages and
 * re-arms every once-per-fit warning.
 */
export function beginFitLog(label: string) {
  clearFitLogs();
  currentFit = label;
}

/** Label passed to the last beginFitLog, or null outside a fit */
export function getCurrentFit(): string | null {
  return currentFit;
}

/**
 * Main log function - always logs to the buffer, and to the console outside tests.
 * Use logDebug() for messages that should be hidden in normal mode.
 */
export function log(message: string) {
  if (message === lastLoggedMessage) {
    return;
  }
  lastLoggedMessage = message;

  if (!isTest || FORCE_CONSOLE_LOGS) {
    console.log(message);
  }

  fitLogs.push(message);
  onLogCallback?.(message);
}

/**
 * Debug log function - only logs when verbosity is 'verbose'.
 */
export function logDebug(message: string) {
  if (verbosity !== 'verbose') {
    return;
  }
  log(message);
}

/**
 * Empty the buffer without starting a new fit.
 */
export function clearFitLogs() {
  fitLogs.length = 0;
  loggedOnceMessages.clear();
  lastLoggedMessage = null;
  currentFit = null;
}

/**
 * Log a message at most once per fit. Used for warnings that would
 * otherwise repeat on every iteration.
 */
export function logOnce(message: string) {
  if (loggedOnceMessages.has(message)) {
    return;
  }
  loggedOnceMessages.add(message);
  log(message);
}
