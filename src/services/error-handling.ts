// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { ErrorCode, type ReconErrorType } from '../types/errors.js';

/** Maps error codes to actionable remediation hints. */
const REMEDIATION_HINTS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.CONFIG_INVALID]: 'Check RECON_* variables in .env and the command-line flags.',
  [ErrorCode.OUTPUT_DIR_FAILED]: 'Pick a directory you can create and write to.',
  [ErrorCode.OUTPUT_WRITE_FAILED]: 'Check free space and write permissions on the output directory.',
  [ErrorCode.RESULT_FILE_MISSING]: 'The result file was moved or deleted before it could be read.',
  [ErrorCode.TOOL_NOT_FOUND]:
    'Install the tool or point RECON_NMAP_BIN / RECON_GOBUSTER_BIN at its binary.',
  [ErrorCode.TOOL_FAILED]: 'Read the tool output above. Stealth and OS scans usually need root.',
};

export class ReconError extends Error {
  override name = 'ReconError' as const;

  constructor(
    message: string,
    public readonly category: ReconErrorType,
    public readonly context: Record<string, unknown> = {},
    public readonly code?: ErrorCode
  ) {
    super(message);
  }
}

export function isReconError(error: unknown): error is ReconError {
  return error instanceof ReconError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render an error as `category|code|message|Hint: ...` segments joined by
 * " | ". Pipe characters inside the message are replaced so the segments
 * stay unambiguous.
 */
export function formatReconError(error: unknown): string {
  if (!isReconError(error)) {
    return errorMessage(error).replaceAll('|', '/');
  }

  const segments: string[] = [error.category];
  if (error.code) {
    segments.push(error.code);
  }
  segments.push(error.message.replaceAll('|', '/'));

  const hint = error.code ? REMEDIATION_HINTS[error.code] : undefined;
  if (hint) {
    segments.push(`Hint: ${hint}`);
  }

  return segments.join(' | ');
}
