// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { createReadlineTerminal } from '../src/cli/terminal.js';
import { isReconError } from '../src/services/error-handling.js';

function collect(stream: PassThrough): () => string {
  const chunks: string[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
  return () => chunks.join('');
}

describe('createReadlineTerminal', () => {
  it('answers prompts from piped lines written ahead of time', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const written = collect(output);
    const terminal = createReadlineTerminal(input, output);

    input.end('1\nexample.com\n');

    expect(await terminal.ask('tool? ')).toBe('1');
    expect(await terminal.ask('target? ')).toBe('example.com');
    terminal.print('done');
    terminal.close();
    await new Promise((resolve) => setImmediate(resolve));

    expect(written()).toBe('tool? target? done\n');
  });

  it('throws an input error once input is exhausted', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const terminal = createReadlineTerminal(input, output);

    input.end('');

    const error = await terminal.ask('anything? ').catch((reason: unknown) => reason);
    expect(isReconError(error) && error.category).toBe('input');
    terminal.close();
  });
});
