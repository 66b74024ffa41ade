// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Scan session type definitions
 */

import type { ReconError } from '../services/error-handling.js';

/** Top-level menu answer: 1 = port scan, 2 = content discovery only, 3 = both. */
export type ToolMode = 'nmap' | 'gobuster' | 'both';

/** Port discovered in a port-scan result file. Always numeric. */
export type WebPort = number;

/**
 * Port typed by the user in content-discovery-only mode. Kept as the raw
 * trimmed string; it may be a number or a service name and is never parsed.
 */
export type ManualPortEntry = string;

export interface CommandSpec {
  command: string;
  args: string[];
}

export interface RunOutcome extends CommandSpec {
  outputFile: string;
  exitCode: number;
  durationMs: number;
}

export interface ContentDiscoveryTarget {
  /** Shown in prompts and logs. */
  label: string;
  url: string;
  /** Leading segment of the result file name. */
  fileToken: string;
}

export interface ContentScanRecord {
  target: ContentDiscoveryTarget;
  wordlist: string;
  outcome: RunOutcome;
}

export interface SessionSummary {
  mode: ToolMode | null;
  target?: string;
  outputDir?: string;
  portScan?: RunOutcome;
  webPorts: WebPort[];
  contentScans: ContentScanRecord[];
  failures: ReconError[];
}
