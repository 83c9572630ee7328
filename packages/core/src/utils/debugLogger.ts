/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview Process-wide debug logger.
 *
 * Writes to the console and, when `RECALL_DEBUG_LOG_FILE` is set, appends
 * every line to that file as well. Components prefix their messages with
 * their own name (`ResilientStore: ...`).
 */

import * as fs from 'node:fs';
import * as util from 'node:util';

type LogLevel = 'log' | 'warn' | 'error' | 'debug';

class DebugLogger {
  private logStream: fs.WriteStream | undefined;

  constructor() {
    const logFile = process.env['RECALL_DEBUG_LOG_FILE'];
    this.logStream = logFile
      ? fs.createWriteStream(logFile, { flags: 'a' })
      : undefined;
    this.logStream?.on('error', (err) => {
      this.logStream = undefined;
      console.error('Error writing to debug log stream:', err);
    });
  }

  private writeToFile(level: LogLevel, args: unknown[]): void {
    if (!this.logStream) {
      return;
    }
    const message = util.format(...args);
    const timestamp = new Date().toISOString();
    this.logStream.write(`[${timestamp}] [${level.toUpperCase()}] ${message}\n`);
  }

  log(...args: unknown[]): void {
    this.writeToFile('log', args);
    console.log(...args);
  }

  warn(...args: unknown[]): void {
    this.writeToFile('warn', args);
    console.warn(...args);
  }

  error(...args: unknown[]): void {
    this.writeToFile('error', args);
    console.error(...args);
  }

  debug(...args: unknown[]): void {
    this.writeToFile('debug', args);
    console.debug(...args);
  }
}

export const debugLogger = new DebugLogger();
