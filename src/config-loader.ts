// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Runtime configuration from the environment.
 *
 * `.env` is loaded by the CLI entry point through dotenv before this runs;
 * here only the resulting variables are read and validated.
 */

import { ReconError } from './services/error-handling.js';
import { ErrorCode } from './types/errors.js';
import { type Result, ok, err } from './types/result.js';
import type { CliOverrides, ReconConfig } from './types/config.js';

export const DEFAULT_NMAP_BIN = 'nmap';
export const DEFAULT_GOBUSTER_BIN = 'gobuster';

type Env = Record<string, string | undefined>;

function readVar(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function validateBinary(name: string, value: string): Result<string, ReconError> {
  // Binaries are spawned without a shell; control characters can only be a mistake.
  if (/[\0\r\n]/.test(value)) {
    return err(
      new ReconError(
        `${name} contains control characters`,
        'config',
        { name },
        ErrorCode.CONFIG_INVALID
      )
    );
  }
  return ok(value);
}

export function loadConfig(env: Env = process.env): Result<ReconConfig, ReconError> {
  const nmapBin = validateBinary('RECON_NMAP_BIN', readVar(env, 'RECON_NMAP_BIN') ?? DEFAULT_NMAP_BIN);
  if (!nmapBin.ok) return nmapBin;

  const gobusterBin = validateBinary(
    'RECON_GOBUSTER_BIN',
    readVar(env, 'RECON_GOBUSTER_BIN') ?? DEFAULT_GOBUSTER_BIN
  );
  if (!gobusterBin.ok) return gobusterBin;

  return ok({
    nmapBin: nmapBin.value,
    gobusterBin: gobusterBin.value,
    defaultWordlist: readVar(env, 'RECON_WORDLIST'),
  });
}

/** Command-line flags take precedence over the environment. */
export function applyOverrides(config: ReconConfig, overrides: CliOverrides): ReconConfig {
  return {
    nmapBin: overrides.nmapBin ?? config.nmapBin,
    gobusterBin: overrides.gobusterBin ?? config.gobusterBin,
    defaultWordlist: overrides.wordlist ?? config.defaultWordlist,
  };
}
