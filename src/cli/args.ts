// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { ReconError } from '../services/error-handling.js';
import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { CliOverrides } from '../types/config.js';

export interface CliArgs extends CliOverrides {
  help: boolean;
}

const VALUE_FLAGS = {
  '--nmap-bin': 'nmapBin',
  '--gobuster-bin': 'gobusterBin',
  '--wordlist': 'wordlist',
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(arg: string): arg is ValueFlag {
  return Object.hasOwn(VALUE_FLAGS, arg);
}

function invalidArgs(message: string, arg: string): Result<never, ReconError> {
  return err(new ReconError(message, 'config', { arg }, ErrorCode.CONFIG_INVALID));
}

export function usage(): string {
  return [
    '',
    'recon-relay',
    'Interactive nmap -> gobuster relay for web-port reconnaissance',
    '',
    'Usage:',
    '  recon-relay [options]',
    '',
    'Options:',
    '  --nmap-bin <path>       Port scanner binary (env RECON_NMAP_BIN, default: nmap)',
    '  --gobuster-bin <path>   Content discovery binary (env RECON_GOBUSTER_BIN, default: gobuster)',
    '  --wordlist <path>       Default wordlist offered at each port prompt (env RECON_WORDLIST)',
    '  --no-banner             Do not print the banner',
    '  -h, --help              Show this help',
    '',
  ].join('\n');
}

export function parseCliArgs(argv: readonly string[]): Result<CliArgs, ReconError> {
  const parsed: CliArgs = { help: false, showBanner: true };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else if (arg === '--no-banner') {
      parsed.showBanner = false;
    } else if (isValueFlag(arg)) {
      const nextArg = argv[i + 1];
      if (!nextArg || nextArg.startsWith('-')) {
        return invalidArgs(`Missing value for ${arg}`, arg);
      }
      parsed[VALUE_FLAGS[arg]] = nextArg;
      i++;
    } else {
      return invalidArgs(`Unknown argument: ${arg}`, arg);
    }
  }

  return ok(parsed);
}
