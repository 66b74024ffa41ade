// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Interactive recon session.
 *
 * Flow:
 * 1. Choose tool (nmap, gobuster, both); anything else ends the session
 * 2. Target and output directory
 * 3. nmap path: options -> scan -> parse -> review -> port strategy
 * 4. gobuster-only path: comma-separated port entries
 * 5. One content-discovery run per selected port, sequentially
 *
 * Every menu re-prompts on unknown input without a retry limit.
 */

import { formatReconError } from './error-handling.js';
import { collectPortScanOptions, runPortScan, DONE_TOKEN } from './port-scan.js';
import {
  parseManualPortEntries,
  runContentDiscovery,
  targetFromManualEntry,
  targetFromPort,
  type ContentDiscoveryDeps,
} from './content-discovery.js';
import { collectReviewLines, parseWebPorts } from './output-parser.js';
import { resolveOutputDirectory } from './output-directory.js';
import type { CommandRunner } from './process-runner.js';
import { formatPortList } from '../utils/formatting.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { ReconConfig } from '../types/config.js';
import { isErr } from '../types/result.js';
import type { ContentDiscoveryTarget, SessionSummary, ToolMode, WebPort } from '../types/scan.js';
import type { Terminal } from '../cli/terminal.js';

export interface SessionDeps {
  terminal: Terminal;
  logger: ActivityLogger;
  runner: CommandRunner;
  config: ReconConfig;
  now?: () => Date;
  cwd?: string;
}

type PortStrategy = 'all' | 'select' | 'skip';

const TOOL_MODES = new Map<string, ToolMode>([
  ['1', 'nmap'],
  ['2', 'gobuster'],
  ['3', 'both'],
]);

const PORT_STRATEGIES = new Map<string, PortStrategy>([
  ['1', 'all'],
  ['2', 'select'],
  ['3', 'skip'],
]);

// === Prompts ===

async function chooseTool(terminal: Terminal): Promise<ToolMode | null> {
  terminal.print('Choose the tool to use:');
  terminal.print('1. Nmap');
  terminal.print('2. Gobuster');
  terminal.print('3. Both Nmap and Gobuster');
  const choice = (await terminal.ask('Enter your choice (1/2/3): ')).trim();
  return TOOL_MODES.get(choice) ?? null;
}

async function askTarget(terminal: Terminal, logger: ActivityLogger): Promise<string> {
  while (true) {
    const target = (await terminal.ask('Enter the target IP address or domain: ')).trim();
    if (target) {
      return target;
    }
    logger.warn('Target cannot be empty.');
  }
}

async function choosePortStrategy(
  terminal: Terminal,
  logger: ActivityLogger,
  ports: readonly WebPort[],
  mode: ToolMode
): Promise<PortStrategy> {
  const skipLabel = mode === 'nmap' ? 'Skip Gobuster and exit' : 'Exit without running Gobuster';
  while (true) {
    terminal.print('\nDo you want to:');
    terminal.print(`1. Scan all detected ports (${formatPortList(ports)}) with Gobuster`);
    terminal.print('2. Select specific ports');
    terminal.print(`3. ${skipLabel}`);
    const choice = (await terminal.ask('Enter your choice (1/2/3): ')).trim();

    const strategy = PORT_STRATEGIES.get(choice);
    if (strategy) {
      return strategy;
    }
    logger.warn("Invalid input. Please type '1', '2', or '3'.");
  }
}

/**
 * Pick ports one at a time. A chosen port leaves the available list, so it
 * cannot be picked twice.
 */
export async function selectPorts(
  terminal: Terminal,
  logger: ActivityLogger,
  detected: readonly WebPort[]
): Promise<WebPort[]> {
  const available = [...detected];
  const selected: WebPort[] = [];

  while (true) {
    terminal.print(
      available.length > 0
        ? `\nPorts available for selection: ${formatPortList(available)}`
        : '\nNo ports left to select.'
    );
    terminal.print(
      selected.length > 0
        ? `Ports already added for Gobuster scan: ${formatPortList(selected)}`
        : 'No ports added yet.'
    );

    const answer = (await terminal.ask(`Enter a port to scan (or '${DONE_TOKEN}' to finish selection): `)).trim();
    if (answer === DONE_TOKEN) {
      return selected;
    }

    const port = /^\d+$/.test(answer) ? Number.parseInt(answer, 10) : NaN;
    const index = available.indexOf(port);
    if (index === -1) {
      logger.warn(`Invalid input. Please enter a valid port from the list: ${formatPortList(available)}.`);
      continue;
    }

    available.splice(index, 1);
    selected.push(port);
    terminal.print(`Added port ${port} for Gobuster scan.`);
  }
}

// === Session ===

export async function runReconSession(deps: SessionDeps): Promise<SessionSummary> {
  const { terminal, logger, runner, config } = deps;
  const now = deps.now ?? (() => new Date());
  const cwd = deps.cwd ?? process.cwd();

  const summary: SessionSummary = { mode: null, webPorts: [], contentScans: [], failures: [] };

  // 1. Tool choice
  const mode = await chooseTool(terminal);
  if (!mode) {
    logger.error('Invalid choice. Exiting.');
    return summary;
  }
  summary.mode = mode;

  // 2. Target and output directory
  const target = await askTarget(terminal, logger);
  summary.target = target;
  const outputDir = await resolveOutputDirectory(terminal, logger, cwd);
  summary.outputDir = outputDir;

  const discoveryDeps: ContentDiscoveryDeps = {
    terminal,
    logger,
    runner,
    gobusterBin: config.gobusterBin,
    defaultWordlist: config.defaultWordlist,
    now,
  };

  const runDiscovery = async (targets: readonly ContentDiscoveryTarget[]): Promise<void> => {
    const result = await runContentDiscovery(targets, outputDir, discoveryDeps);
    summary.contentScans.push(...result.scans);
    summary.failures.push(...result.failures);
  };

  // 3a. Content discovery only
  if (mode === 'gobuster') {
    terminal.print('\nConfiguring Gobuster scan...');
    const entries = parseManualPortEntries(
      await terminal.ask('Enter the ports to scan (comma-separated, e.g., 80,443): ')
    );
    if (entries.length === 0) {
      logger.warn('No ports entered. Skipping Gobuster.');
      return summary;
    }
    await runDiscovery(entries.map((entry) => targetFromManualEntry(target, entry)));
    return summary;
  }

  // 3b. Port scan
  terminal.print('\nConfiguring Nmap scan...');
  const flags = await collectPortScanOptions(terminal, logger);
  const scanResult = await runPortScan(target, flags, outputDir, {
    logger,
    runner,
    nmapBin: config.nmapBin,
    now,
  });
  if (isErr(scanResult)) {
    logger.error(`Nmap scan failed: ${formatReconError(scanResult.error)}`);
    summary.failures.push(scanResult.error);
    return summary;
  }
  summary.portScan = scanResult.value;

  // 4. Parse and review
  const resultFile = scanResult.value.outputFile;
  const webPorts = await parseWebPorts(resultFile, logger);
  summary.webPorts = webPorts;
  if (webPorts.length === 0) {
    terminal.print('No potential web application ports detected. Skipping Gobuster.');
    return summary;
  }

  terminal.print('\nPotential Web Application Ports Detected:');
  terminal.print('Review the following lines to ensure these are valid web applications before proceeding.');
  const review = await collectReviewLines(resultFile, webPorts);
  if (review.ok) {
    for (const { port, line } of review.value) {
      terminal.print(`Port ${port}: ${line}`);
    }
  } else {
    logger.error(`Error: ${review.error.message}`);
    if (mode === 'both') {
      summary.failures.push(review.error);
      return summary;
    }
  }

  // 5. Port strategy
  const strategy = await choosePortStrategy(terminal, logger, webPorts, mode);
  if (strategy === 'skip') {
    terminal.print('No further scans selected. Skipping Gobuster.');
    return summary;
  }

  let ports: WebPort[];
  if (strategy === 'all') {
    ports = webPorts;
    terminal.print(`\nRunning Gobuster on all detected ports: ${formatPortList(ports)}`);
  } else {
    ports = await selectPorts(terminal, logger, webPorts);
    if (ports.length === 0) {
      terminal.print('No ports selected. Skipping Gobuster.');
      return summary;
    }
    terminal.print(`\nFinal list of ports selected for Gobuster scan: ${formatPortList(ports)}`);
  }

  // 6. Content discovery per port
  await runDiscovery(ports.map((port) => targetFromPort(target, port)));
  return summary;
}
