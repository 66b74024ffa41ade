// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { chalk } from 'zx';
import type { Writable } from 'stream';
import type { ActivityLogger } from '../types/activity-logger.js';

function formatAttrs(attrs?: Record<string, unknown>): string {
  if (!attrs) return '';
  const parts = Object.entries(attrs)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return parts.length > 0 ? ` ${chalk.dim(parts.join(' '))}` : '';
}

export interface ConsoleLoggerStreams {
  stdout?: Writable;
  stderr?: Writable;
}

/** Console logger: info to stdout, warn and error to stderr. */
export function createConsoleLogger(streams: ConsoleLoggerStreams = {}): ActivityLogger {
  const stdout = streams.stdout ?? process.stdout;
  const stderr = streams.stderr ?? process.stderr;

  return {
    info(message, attrs) {
      stdout.write(`${chalk.cyan('[*]')} ${message}${formatAttrs(attrs)}\n`);
    },
    warn(message, attrs) {
      stderr.write(`${chalk.yellow('[!]')} ${message}${formatAttrs(attrs)}\n`);
    },
    error(message, attrs) {
      stderr.write(`${chalk.red('[x]')} ${message}${formatAttrs(attrs)}\n`);
    },
  };
}
