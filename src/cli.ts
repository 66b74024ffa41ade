#!/usr/bin/env node
// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * recon-relay entry point.
 *
 * Usage:
 *   recon-relay [--nmap-bin <path>] [--gobuster-bin <path>] [--wordlist <path>] [--no-banner]
 *
 * Environment (a .env file in the working directory is loaded first):
 *   RECON_NMAP_BIN     - Port scanner binary (default: nmap)
 *   RECON_GOBUSTER_BIN - Content discovery binary (default: gobuster)
 *   RECON_WORDLIST     - Default wordlist for the per-port prompt
 */

import dotenv from 'dotenv';
import { parseCliArgs, usage } from './cli/args.js';
import { createReadlineTerminal } from './cli/terminal.js';
import { applyOverrides, loadConfig } from './config-loader.js';
import { displaySplashScreen } from './splash-screen.js';
import { formatReconError, isReconError } from './services/error-handling.js';
import { runCommandToFile } from './services/process-runner.js';
import { runReconSession } from './services/recon-session.js';
import { createConsoleLogger } from './utils/logger.js';
import { formatDuration } from './utils/formatting.js';
import type { ActivityLogger } from './types/activity-logger.js';
import type { SessionSummary } from './types/scan.js';

dotenv.config();

function reportSummary(summary: SessionSummary, logger: ActivityLogger): void {
  if (summary.portScan) {
    logger.info(`Port scan took ${formatDuration(summary.portScan.durationMs)}`, {
      file: summary.portScan.outputFile,
    });
  }
  if (summary.contentScans.length > 0) {
    logger.info(`Content discovery runs completed: ${summary.contentScans.length}`);
  }
  if (summary.failures.length > 0) {
    logger.warn(`${summary.failures.length} step(s) failed:`);
    for (const failure of summary.failures) {
      logger.warn(`  ${formatReconError(failure)}`);
    }
  }
}

async function main(): Promise<number> {
  const logger = createConsoleLogger();

  // 1. Arguments and configuration
  const args = parseCliArgs(process.argv.slice(2));
  if (!args.ok) {
    logger.error(formatReconError(args.error));
    console.log(usage());
    return 1;
  }
  if (args.value.help) {
    console.log(usage());
    return 0;
  }

  const loaded = loadConfig();
  if (!loaded.ok) {
    logger.error(formatReconError(loaded.error));
    return 1;
  }
  const config = applyOverrides(loaded.value, args.value);

  if (args.value.showBanner) {
    displaySplashScreen();
  }

  // 2. Interactive session
  const terminal = createReadlineTerminal();
  try {
    const summary = await runReconSession({
      terminal,
      logger,
      runner: runCommandToFile,
      config,
    });
    reportSummary(summary, logger);
    return summary.failures.length > 0 ? 1 : 0;
  } catch (error) {
    if (isReconError(error) && error.category === 'input') {
      logger.warn('Input closed. Exiting.');
      return 1;
    }
    throw error;
  } finally {
    terminal.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('recon-relay error:', error);
    process.exitCode = 1;
  });
