// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Line-oriented terminal used for menus and prompts.
 *
 * Answers are read through the readline async iterator, which buffers lines
 * that arrive before the next prompt, so piped input is not lost between
 * questions.
 */

import { createInterface, type Interface } from 'readline';
import type { Readable, Writable } from 'stream';
import { ReconError } from '../services/error-handling.js';

export interface Terminal {
  /** Write the prompt and resolve with the next input line, untrimmed. */
  ask(question: string): Promise<string>;
  print(line?: string): void;
  close(): void;
}

export function inputClosedError(question: string): ReconError {
  return new ReconError('Input closed before an answer was given', 'input', { question });
}

export function createReadlineTerminal(
  input: Readable = process.stdin,
  output: Writable = process.stdout
): Terminal {
  const rl: Interface = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question: string): Promise<string> {
      output.write(question);
      const next = await lines.next();
      if (next.done) {
        throw inputClosedError(question);
      }
      return next.value;
    },
    print(line = ''): void {
      output.write(`${line}\n`);
    },
    close(): void {
      rl.close();
    },
  };
}
