/**
 * @fileoverview Buffered file logger with per-session log files.
 *
 * Each process writes a new timestamped file under the log directory
 * (`LOG_DIR`, default `_logs/`). Directory size is managed by deleting the
 * oldest session files first, then trimming the current session file if it is
 * still over budget.
 */

import { stat, readFile, writeFile, readdir, unlink } from 'fs/promises';
import { appendFileSync, mkdirSync } from 'fs';
import { join, resolve } from 'path';
import { format } from 'util';

const FLUSH_INTERVAL_MS = 5_000;
const MAX_BUFFER_SIZE = 100;
const MAX_DIR_BYTES = 20 * 1024 * 1024;  // 20 MB total
const MAX_FILE_BYTES = 5 * 1024 * 1024;  // 5 MB per session file

export type LogLevel = 'info' | 'warn' | 'error';

let logDir = resolve(process.env.LOG_DIR || join(process.cwd(), '_logs'));
let buffer: string[] = [];
let flushTimer: ReturnType<typeof setInterval> | null = null;
let processLabel = 'server';
let logFilePath: string | null = null;
let dirEnsured = false;
let trimming = false;

/** Logger failures go straight to stderr so a captured console cannot recurse. */
function reportFailure(action: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`[FileLogger] ${action} failed: ${message}\n`);
}

/**
 * Sets the label used in the log filename, and optionally the directory.
 * Call once at startup before any logging occurs.
 */
export function initLogger(label: string, options: { dir?: string } = {}): void {
  processLabel = label;
  if (options.dir) {
    logDir = resolve(options.dir);
    dirEnsured = false;
    logFilePath = null;
  }
}

/** Path of the current session file, created on first use. */
export function currentLogFile(): string {
  if (logFilePath) return logFilePath;

  if (!dirEnsured) {
    mkdirSync(logDir, { recursive: true });
    dirEnsured = true;
  }

  const timestamp = new Date().toISOString().replace(/:/g, '-');
  logFilePath = join(logDir, `${timestamp}_${processLabel}.log`);
  return logFilePath;
}

/** Formats a log line with timestamp and level. */
export function formatLine(level: LogLevel, message: string, now = new Date()): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}\n`;
}

/** Writes buffered lines to disk, then trims if needed. */
export async function flushLogs(): Promise<void> {
  if (buffer.length === 0) return;
  const lines = buffer.join('');
  buffer = [];
  try {
    await writeFile(currentLogFile(), lines, { flag: 'a' });
    await trimIfNeeded();
  } catch (error) {
    reportFailure('Log flush', error);
  }
}

/**
 * Two-tier size management:
 * 1. If the directory exceeds MAX_DIR_BYTES, delete oldest session files (never the current one).
 * 2. If the current session file exceeds MAX_FILE_BYTES, discard its oldest half.
 */
async function trimIfNeeded(): Promise<void> {
  if (trimming) return;
  trimming = true;

  try {
    const currentFile = currentLogFile();
    const entries = await readdir(logDir);

    const fileInfos: Array<{ name: string; path: string; size: number }> = [];
    let totalSize = 0;

    for (const name of entries) {
      const fullPath = join(logDir, name);
      const info = await stat(fullPath).catch(() => null);
      if (info?.isFile()) {
        fileInfos.push({ name, path: fullPath, size: info.size });
        totalSize += info.size;
      }
    }

    if (totalSize > MAX_DIR_BYTES) {
      // Filenames start with ISO timestamps so name order is chronological
      fileInfos.sort((a, b) => a.name.localeCompare(b.name));

      for (const fileInfo of fileInfos) {
        if (totalSize <= MAX_DIR_BYTES) break;
        if (fileInfo.path === currentFile) continue;
        try {
          await unlink(fileInfo.path);
          totalSize -= fileInfo.size;
        } catch (error) {
          reportFailure(`Deleting ${fileInfo.name}`, error);
        }
      }
    }

    const currentInfo = await stat(currentFile);
    if (currentInfo.size > MAX_FILE_BYTES) {
      const content = await readFile(currentFile, 'utf-8');
      const midpoint = Math.floor(content.length / 2);
      const cutIndex = content.indexOf('\n', midpoint);
      const trimmed = cutIndex === -1 ? '' : content.slice(cutIndex + 1);
      await writeFile(currentFile, trimmed);
    }
  } catch (error) {
    reportFailure('Log trim', error);
  } finally {
    trimming = false;
  }
}

/** Synchronous flush for process exit handlers where async isn't possible. */
function flushSync(): void {
  if (buffer.length === 0) return;
  const lines = buffer.join('');
  buffer = [];
  try {
    appendFileSync(currentLogFile(), lines);
  } catch (error) {
    reportFailure('Final log flush', error);
  }
}

/** Starts the periodic flush timer. Called automatically on first log. */
function ensureTimer(): void {
  if (flushTimer) return;
  flushTimer = setInterval(() => { void flushLogs(); }, FLUSH_INTERVAL_MS);
  flushTimer.unref();
  process.on('exit', flushSync);
}

/**
 * Appends a log line to the buffer. Triggers a flush if the buffer is full.
 *
 * @param level - Log severity.
 * @param message - The log message.
 */
export function logToFile(level: LogLevel, message: string): void {
  ensureTimer();
  buffer.push(formatLine(level, message));
  if (buffer.length >= MAX_BUFFER_SIZE) {
    void flushLogs();
  }
}

/**
 * Tees console.log/warn/error into the session log file.
 *
 * @returns A function restoring the original console methods.
 */
export function installConsoleCapture(): () => void {
  const originalLog = console.log;
  const originalWarn = console.warn;
  const originalError = console.error;

  console.log = (...args: unknown[]) => {
    originalLog(...args);
    logToFile('info', format(...args));
  };
  console.warn = (...args: unknown[]) => {
    originalWarn(...args);
    logToFile('warn', format(...args));
  };
  console.error = (...args: unknown[]) => {
    originalError(...args);
    logToFile('error', format(...args));
  };

  return () => {
    console.log = originalLog;
    console.warn = originalWarn;
    console.error = originalError;
  };
}
