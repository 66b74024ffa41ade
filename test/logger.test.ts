// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { createConsoleLogger } from '../src/utils/logger.js';

function collect(stream: PassThrough): () => string {
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
  return () => chunks.join('');
}

describe('createConsoleLogger', () => {
  it('routes info to stdout and problems to stderr', async () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const out = collect(stdout);
    const errOut = collect(stderr);
    const logger = createConsoleLogger({ stdout, stderr });

    logger.info('Running the Nmap scan', { file: 'scan.txt' });
    logger.warn('Wordlist not found');
    logger.error('Nmap scan failed');
    await new Promise((resolve) => setImmediate(resolve));

    expect(out()).toContain('Running the Nmap scan');
    expect(out()).toContain('file=scan.txt');
    expect(out().endsWith('\n')).toBe(true);
    expect(errOut()).toContain('Wordlist not found');
    expect(errOut()).toContain('Nmap scan failed');
    expect(out()).not.toContain('Nmap scan failed');
  });
});
