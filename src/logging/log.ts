/**
 * Logging for langshift
 *
 * Every line goes to stderr (or the stream set with setLogStream) and is
 * appended to ~/.langshift/logs/langshift.log.
 * LANGSHIFT_LOG_FILE overrides the file path; an empty value turns file logging off.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Writable } from 'stream';

const DEFAULT_LOG_FILE = path.join(os.homedir(), '.langshift', 'logs', 'langshift.log');

/**
 * Output stream for log lines (defaults to process.stderr)
 */
let outputStream: Writable = process.stderr;

/** Directories already created for the log file */
const preparedDirs = new Set<string>();

/**
 * Redirect the console side of logging.
 * Embedders pass their own stream; tests pass a sink to keep output quiet.
 */
export function setLogStream(stream: Writable): void {
  outputStream = stream;
}

function resolveLogFile(): string | null {
  const override = process.env.LANGSHIFT_LOG_FILE;
  if (override === undefined) {
    return DEFAULT_LOG_FILE;
  }
  return override.length > 0 ? override : null;
}

function appendToFile(logFile: string, line: string): void {
  const dir = path.dirname(logFile);
  if (!preparedDirs.has(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    preparedDirs.add(dir);
  }
  fs.appendFileSync(logFile, line + '\n', 'utf-8');
}

/**
 * Log to both the output stream and the log file
 */
export function log(message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  const formattedMessage = `[${timestamp}] [langshift] ${message}`;
  const fullMessage = args.length > 0
    ? `${formattedMessage} ${args.map(a => JSON.stringify(a)).join(' ')}`
    : formattedMessage;

  outputStream.write(fullMessage + '\n');

  const logFile = resolveLogFile();
  if (!logFile) {
    return;
  }

  try {
    appendToFile(logFile, fullMessage);
  } catch (error) {
    // Don't fail if we can't write to log file
    const reason = error instanceof Error ? error.message : String(error);
    outputStream.write(`[langshift] Failed to write to log file: ${reason}\n`);
  }
}
