// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Port-scan result parsing.
 *
 * A line names a candidate web service when it contains "open" and "http"
 * (which also covers "https"). The text before the first "/" on such a line
 * is the port number.
 */

import { ReconError, errorMessage } from './error-handling.js';
import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import { readLines } from '../utils/file-io.js';
import type { ActivityLogger } from '../types/activity-logger.js';
import type { WebPort } from '../types/scan.js';

export interface ReviewLine {
  port: WebPort;
  line: string;
}

export function isWebServiceLine(line: string): boolean {
  return line.includes('open') && (line.includes('http') || line.includes('https'));
}

/** Port from a qualifying line, or null when the leading token is not a number. */
export function extractPort(line: string): WebPort | null {
  const token = (line.split('/')[0] ?? '').trim();
  if (!/^\d+$/.test(token)) {
    return null;
  }
  return Number.parseInt(token, 10);
}

export function parseWebPortsFromLines(lines: Iterable<string>): WebPort[] {
  const ports = new Set<WebPort>();
  for (const line of lines) {
    if (!isWebServiceLine(line)) continue;
    const port = extractPort(line);
    if (port !== null) {
      ports.add(port);
    }
  }
  return [...ports].sort((a, b) => a - b);
}

/** Ascending list of open web ports in a result file; empty when it cannot be read. */
export async function parseWebPorts(resultFile: string, logger: ActivityLogger): Promise<WebPort[]> {
  let lines: string[];
  try {
    lines = await readLines(resultFile);
  } catch (error) {
    logger.error(`Error: Nmap output file ${resultFile} not found.`, { reason: errorMessage(error) });
    return [];
  }
  return parseWebPortsFromLines(lines);
}

/**
 * Second pass over the result file: every line containing "<port>/" for a
 * discovered port, in file order, ports ascending within a line.
 */
export async function collectReviewLines(
  resultFile: string,
  ports: readonly WebPort[]
): Promise<Result<ReviewLine[], ReconError>> {
  let lines: string[];
  try {
    lines = await readLines(resultFile);
  } catch (error) {
    return err(
      new ReconError(
        `Could not open Nmap output file ${resultFile} for review.`,
        'filesystem',
        { resultFile, reason: errorMessage(error) },
        ErrorCode.RESULT_FILE_MISSING
      )
    );
  }

  const sortedPorts = [...ports].sort((a, b) => a - b);
  const review: ReviewLine[] = [];
  for (const line of lines) {
    for (const port of sortedPorts) {
      if (line.includes(`${port}/`)) {
        review.push({ port, line: line.trim() });
      }
    }
  }
  return ok(review);
}
