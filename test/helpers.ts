// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { inputClosedError, type Terminal } from '../src/cli/terminal.js';
import { ok } from '../src/types/result.js';
import type { ActivityLogger } from '../src/types/activity-logger.js';
import type { CommandRunner } from '../src/services/process-runner.js';
import type { CommandSpec } from '../src/types/scan.js';

export interface ScriptedTerminal extends Terminal {
  prompts: string[];
  printed: string[];
}

/** Answers questions from a fixed script; running out of answers behaves like closed stdin. */
export function createScriptedTerminal(answers: string[]): ScriptedTerminal {
  const queue = [...answers];
  const prompts: string[] = [];
  const printed: string[] = [];
  return {
    prompts,
    printed,
    async ask(question) {
      prompts.push(question);
      const answer = queue.shift();
      if (answer === undefined) {
        throw inputClosedError(question);
      }
      return answer;
    },
    print(line = '') {
      printed.push(line);
    },
    close() {},
  };
}

export interface LogEntry {
  level: 'info' | 'warn' | 'error';
  message: string;
  attrs?: Record<string, unknown>;
}

export interface RecordingLogger extends ActivityLogger {
  entries: LogEntry[];
  messages(level: LogEntry['level']): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const record = (level: LogEntry['level']) => (message: string, attrs?: Record<string, unknown>) => {
    entries.push({ level, message, ...(attrs && { attrs }) });
  };
  return {
    entries,
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    messages(level) {
      return entries.filter((entry) => entry.level === level).map((entry) => entry.message);
    },
  };
}

export interface StubCall {
  spec: CommandSpec;
  outputFile: string;
}

export interface StubRunner {
  runner: CommandRunner;
  calls: StubCall[];
}

/** Writes canned stdout for each command name into the output file and reports success. */
export function createStubRunner(outputs: Record<string, string> = {}): StubRunner {
  const calls: StubCall[] = [];
  const runner: CommandRunner = async (spec, outputFile) => {
    calls.push({ spec, outputFile });
    await fs.writeFile(outputFile, outputs[spec.command] ?? '', 'utf8');
    return ok({ ...spec, outputFile, exitCode: 0, durationMs: 1 });
  };
  return { runner, calls };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'recon-relay-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Fixed clock: 2024-03-05 07:08:09 local time. */
export const FIXED_DATE = new Date(2024, 2, 5, 7, 8, 9);
export const FIXED_STAMP = '2024_03_05_07_08_09';
