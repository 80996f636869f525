/**
 * Debug logging utilities for the summarizer.
 *
 * Writes timestamped lines to the console and, when enabled, appends them to
 * a technical log file (request/response excerpts, usage, retry decisions).
 *
 * @module summarizer/debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

function isFileLoggingEnabled(): boolean {
  return (process.env.SUMMARY_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";
}

export function getDebugLogPath(): string {
  return process.env.SUMMARY_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-summary.log");
}

let fileWriteWarned = false;

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

export function formatLogLine(message: string, data?: unknown, timestamp = new Date().toISOString()): string {
  let logLine = `[${timestamp}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "…[truncated]";
    }
    logLine += ` | ${payload}`;
  }
  return logLine;
}

/**
 * Log a message to the console and (optionally) the debug file
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatLogLine(message, data);

  // Async append so a long run is never blocked on disk
  if (isFileLoggingEnabled()) {
    fs.promises.appendFile(getDebugLogPath(), logLine + "\n").catch((err: unknown) => {
      if (fileWriteWarned) return;
      fileWriteWarned = true;
      console.warn(
        `[Summary] Debug log file write failed (${getDebugLogPath()}):`,
        err instanceof Error ? err.message : String(err),
      );
    });
  }

  console.log(logLine);
}

/**
 * Truncate long text for log excerpts
 */
export function excerpt(text: string, max = 600): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max)}…(+${text.length - max} chars)`;
}
