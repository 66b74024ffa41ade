// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Port scan stage: option menu, command construction and execution.
 */

import { path } from 'zx';
import type { ReconError } from './error-handling.js';
import type { CommandRunner } from './process-runner.js';
import { toFileToken } from '../utils/sanitize.js';
import { formatFileTimestamp, renderCommand } from '../utils/formatting.js';
import type { Result } from '../types/result.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { CommandSpec, RunOutcome } from '../types/scan.js';
import type { Terminal } from '../cli/terminal.js';

export interface PortScanOption {
  key: string;
  label: string;
  /** Empty for the default top-1000 scan, which needs no flag. */
  flag: string;
}

export const PORT_SCAN_OPTIONS: readonly PortScanOption[] = [
  { key: '1', label: 'Stealth scan (SYN scan)', flag: '-sS' },
  { key: '2', label: 'Verbose output', flag: '-v' },
  { key: '3', label: 'Full port scan (all 65535 ports)', flag: '-p-' },
  { key: '4', label: 'Version scan', flag: '-sV' },
  { key: '5', label: 'Top 1000 port scan (default)', flag: '' },
  { key: '6', label: 'Ping scan (determine live hosts)', flag: '-sn' },
  { key: '7', label: 'OS detection', flag: '-O' },
  { key: '8', label: 'Script scan (default Nmap scripts)', flag: '-sC' },
  { key: '9', label: 'Aggressive scan (OS + version + script + traceroute)', flag: '-A' },
  { key: '10', label: 'Disable DNS resolution (faster scans)', flag: '-n' },
];

export const DONE_TOKEN = 'done';

const OPTIONS_BY_KEY = new Map(PORT_SCAN_OPTIONS.map((option) => [option.key, option]));

export interface PortScanDeps {
  logger: ActivityLogger;
  runner: CommandRunner;
  nmapBin: string;
  now: () => Date;
}

/**
 * Multi-select menu ending with "done". Returns the chosen flags in the
 * order they were picked; the default scan contributes an empty flag.
 */
export async function collectPortScanOptions(
  terminal: Terminal,
  logger: ActivityLogger
): Promise<string[]> {
  terminal.print('\nChoose the type of scan options (you can select multiple):');
  for (const option of PORT_SCAN_OPTIONS) {
    terminal.print(`${option.key}. ${option.label}`);
  }
  terminal.print(`\nType the numbers corresponding to your choices. Type '${DONE_TOKEN}' when finished.`);

  const flags: string[] = [];
  while (true) {
    const choice = (await terminal.ask(`Enter your choice (1-10 or '${DONE_TOKEN}'): `)).trim();

    if (choice === DONE_TOKEN) {
      if (flags.length === 0) {
        terminal.print('No options selected. Adding default top 1000 port scan.');
        flags.push('');
      }
      return flags;
    }

    const option = OPTIONS_BY_KEY.get(choice);
    if (!option) {
      logger.warn('Invalid choice. Please select a valid option.');
      continue;
    }

    if (flags.includes(option.flag)) {
      terminal.print(`Option ${choice} already added.`);
    } else {
      flags.push(option.flag);
      terminal.print(`Added option ${choice}`);
    }
  }
}

export function buildPortScanCommand(nmapBin: string, flags: readonly string[], target: string): CommandSpec {
  return {
    command: nmapBin,
    args: [...flags.filter((flag) => flag !== ''), target],
  };
}

export function portScanFileName(target: string, date: Date): string {
  return `nmap_scan_${toFileToken(target)}_${formatFileTimestamp(date)}.txt`;
}

export async function runPortScan(
  target: string,
  flags: readonly string[],
  outputDir: string,
  deps: PortScanDeps
): Promise<Result<RunOutcome, ReconError>> {
  const spec = buildPortScanCommand(deps.nmapBin, flags, target);
  const outputFile = path.join(outputDir, portScanFileName(target, deps.now()));

  deps.logger.info(`Running the Nmap scan: ${renderCommand(spec.command, spec.args)}`);
  const result = await deps.runner(spec, outputFile);

  if (result.ok) {
    deps.logger.info(`Nmap scan completed. Results saved to: ${result.value.outputFile}`);
  }
  return result;
}
