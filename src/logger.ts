/**
 * Structured logging for simcheck internals
 *
 * Logs are written to ~/.simcheck/logs/<run-dir-name>/debug.log.
 * Progress lines for humans go through the UserInterface (ui.ts), not here.
 */

import pino, { type Logger } from "pino";
import { homedir } from "node:os";
import { mkdirSync, existsSync } from "node:fs";
import { join, basename, resolve } from "node:path";

const LOG_BASE_DIR = join(homedir(), ".simcheck", "logs");

/**
 * Log folder name for a run directory
 * e.g. "/work/RunTests" → "RunTests", "./nightly.v2" → "nightly-v2"
 */
export function getRunLogName(runDir: string): string {
  const name = basename(resolve(runDir)).replace(/\./g, "-");
  return name || "root";
}

/**
 * Get log file path for a run directory
 */
export function getRunLogPath(runDir: string): string {
  return join(LOG_BASE_DIR, getRunLogName(runDir), "debug.log");
}

// Default silent logger until initialized with a run directory
let currentLogger: Logger = pino({ level: "silent" });
let currentLogPath: string | null = null;

/**
 * Initialize logger for a run directory
 * Creates a log file at ~/.simcheck/logs/<run-dir-name>/debug.log
 */
export function initLogger(runDir: string): Logger {
  const logFile = getRunLogPath(runDir);
  const logDir = join(LOG_BASE_DIR, getRunLogName(runDir));

  // Ensure run log directory exists
  if (!existsSync(logDir)) {
    try {
      mkdirSync(logDir, { recursive: true });
    } catch {
      // Logging to file is optional: stay silent
      currentLogger = pino({ level: "silent" });
      currentLogPath = null;
      return currentLogger;
    }
  }

  currentLogPath = logFile;

  // File only - stdout belongs to the simulation and the progress lines
  currentLogger = pino(
    {
      level: "debug",
      base: { run: getRunLogName(runDir) },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: logFile, sync: false })
  );

  return currentLogger;
}

/**
 * Get the current logger instance
 */
export function getLogger(): Logger {
  return currentLogger;
}

/**
 * Get the current run's log file path
 */
export function getCurrentLogPath(): string | null {
  return currentLogPath;
}

/**
 * Reset to the silent logger (for tests)
 */
export function resetLogger(): void {
  currentLogger = pino({ level: "silent" });
  currentLogPath = null;
}

// Convenience child loggers - these use the current logger
export function getResolveLogger(): Logger {
  return currentLogger.child({ module: "resolve" });
}

export function getSandboxLogger(): Logger {
  return currentLogger.child({ module: "sandbox" });
}

export function getPatchLogger(): Logger {
  return currentLogger.child({ module: "patch" });
}

export function getRunLogger(): Logger {
  return currentLogger.child({ module: "run" });
}

export function getValidateLogger(): Logger {
  return currentLogger.child({ module: "validate" });
}

export function getReportLogger(): Logger {
  return currentLogger.child({ module: "report" });
}
