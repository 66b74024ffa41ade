// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Content discovery stage: one gobuster `dir` run per selected port.
 *
 * Ports reach this stage from two places with different types. Ports found
 * by the port scan are numbers; ports typed in content-discovery-only mode
 * stay raw strings and are used verbatim, so a service name is accepted
 * there. Both are turned into a ContentDiscoveryTarget before running.
 */

import { path } from 'zx';
import { formatReconError, type ReconError } from './error-handling.js';
import type { CommandRunner } from './process-runner.js';
import { fileExists } from '../utils/file-io.js';
import { sanitizeName } from '../utils/sanitize.js';
import { formatFileTimestamp, renderCommand } from '../utils/formatting.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type {
  CommandSpec,
  ContentDiscoveryTarget,
  ContentScanRecord,
  ManualPortEntry,
  WebPort,
} from '../types/scan.js';
import type { Terminal } from '../cli/terminal.js';

const HTTPS_PORT = 443;

export interface ContentDiscoveryDeps {
  terminal: Terminal;
  logger: ActivityLogger;
  runner: CommandRunner;
  gobusterBin: string;
  defaultWordlist?: string | undefined;
  now: () => Date;
}

export interface ContentDiscoveryResult {
  scans: ContentScanRecord[];
  failures: ReconError[];
}

export function protocolForPort(port: WebPort): 'http' | 'https' {
  return port === HTTPS_PORT ? 'https' : 'http';
}

export function targetFromPort(host: string, port: WebPort): ContentDiscoveryTarget {
  return {
    label: String(port),
    url: `${protocolForPort(port)}://${host}:${port}`,
    fileToken: String(port),
  };
}

export function targetFromManualEntry(host: string, entry: ManualPortEntry): ContentDiscoveryTarget {
  const protocol = entry === String(HTTPS_PORT) ? 'https' : 'http';
  return {
    label: entry,
    url: `${protocol}://${host}:${entry}`,
    fileToken: sanitizeName(entry).replaceAll('/', '_'),
  };
}

/** Split a comma-separated answer into trimmed, non-empty entries. */
export function parseManualPortEntries(answer: string): ManualPortEntry[] {
  return answer
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function buildContentDiscoveryCommand(
  gobusterBin: string,
  url: string,
  wordlist: string
): CommandSpec {
  return { command: gobusterBin, args: ['dir', '-u', url, '-w', wordlist] };
}

export function contentDiscoveryFileName(fileToken: string, date: Date): string {
  return `${fileToken}_gobuster_scan_${formatFileTimestamp(date)}.txt`;
}

async function askWordlist(target: ContentDiscoveryTarget, deps: ContentDiscoveryDeps): Promise<string> {
  const suffix = deps.defaultWordlist ? ` [${deps.defaultWordlist}]` : '';
  while (true) {
    const answer = (
      await deps.terminal.ask(`Enter the path to your wordlist for port ${target.label}${suffix}: `)
    ).trim();
    const wordlist = answer || deps.defaultWordlist;

    if (!wordlist) {
      deps.logger.warn('Wordlist path cannot be empty.');
      continue;
    }
    if (!(await fileExists(wordlist))) {
      deps.logger.warn(`Wordlist not found: ${wordlist} (file must exist; '~' is not expanded)`);
      continue;
    }
    return wordlist;
  }
}

/** Runs targets strictly one after another; a failed port does not stop the rest. */
export async function runContentDiscovery(
  targets: readonly ContentDiscoveryTarget[],
  outputDir: string,
  deps: ContentDiscoveryDeps
): Promise<ContentDiscoveryResult> {
  const scans: ContentScanRecord[] = [];
  const failures: ReconError[] = [];

  for (const target of targets) {
    const wordlist = await askWordlist(target, deps);
    const spec = buildContentDiscoveryCommand(deps.gobusterBin, target.url, wordlist);
    const outputFile = path.join(outputDir, contentDiscoveryFileName(target.fileToken, deps.now()));

    deps.logger.info(`Running Gobuster scan on port ${target.label}: ${renderCommand(spec.command, spec.args)}`);
    const result = await deps.runner(spec, outputFile);

    if (!result.ok) {
      deps.logger.error(`Gobuster scan for port ${target.label} failed: ${formatReconError(result.error)}`);
      failures.push(result.error);
      continue;
    }

    deps.logger.info(`Gobuster scan for port ${target.label} completed. Results saved to: ${result.value.outputFile}`);
    scans.push({ target, wordlist, outcome: result.value });
  }

  return { scans, failures };
}
