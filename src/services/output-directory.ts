// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Interactive output directory selection.
 *
 * Loops until a usable directory exists. Sanitized names that differ from
 * the input need explicit confirmation.
 */

import { fs, path } from 'zx';
import { ReconError, errorMessage, formatReconError } from './error-handling.js';
import { ErrorCode } from '../types/errors.js';
import { sanitizeName } from '../utils/sanitize.js';
import { fileExists, isDirectory } from '../utils/file-io.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { Terminal } from '../cli/terminal.js';

export const CURRENT_DIRECTORY_TOKEN = '.';

export async function resolveOutputDirectory(
  terminal: Terminal,
  logger: ActivityLogger,
  cwd: string = process.cwd()
): Promise<string> {
  while (true) {
    const raw = (
      await terminal.ask("Enter the output directory (use '.' for the current working directory): ")
    ).trim();

    if (!raw) {
      logger.warn('Output directory cannot be empty.');
      continue;
    }

    // 1. Confirm sanitization changes
    const sanitized = sanitizeName(raw);
    if (sanitized !== raw) {
      logger.warn(`The directory name contained invalid characters. Sanitized to: ${sanitized}`);
      const confirm = (await terminal.ask('Do you want to use the sanitized directory name? (y/n): '))
        .trim()
        .toLowerCase();
      if (confirm !== 'y') {
        continue;
      }
      if (!sanitized) {
        logger.warn('Sanitized directory name is empty.');
        continue;
      }
    }

    // 2. Resolve against the working directory
    const resolved = sanitized === CURRENT_DIRECTORY_TOKEN ? cwd : path.resolve(cwd, sanitized);

    // 3. Create when missing
    if (await fileExists(resolved)) {
      if (!(await isDirectory(resolved))) {
        logger.error(`Error: '${resolved}' exists and is not a directory.`);
        continue;
      }
      return resolved;
    }

    logger.info(`Directory '${resolved}' does not exist. Creating it...`);
    try {
      await fs.mkdir(resolved, { recursive: true });
    } catch (error) {
      const failure = new ReconError(
        `Error creating directory: ${errorMessage(error)}`,
        'filesystem',
        { directory: resolved },
        ErrorCode.OUTPUT_DIR_FAILED
      );
      logger.error(formatReconError(failure));
      continue;
    }
    return resolved;
  }
}
