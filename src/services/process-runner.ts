// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Runs an external tool with its stdout written to a result file.
 *
 * The command is an argument vector passed to spawn without a shell, so
 * paths and URLs containing spaces or shell metacharacters reach the tool
 * unchanged. The exit status is checked: a missing binary and a non-zero
 * exit are reported as distinct errors instead of an empty result file.
 */

import { spawn } from 'child_process';
import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import type { Writable } from 'stream';
import { ReconError, errorMessage } from './error-handling.js';
import { ErrorCode } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import type { CommandSpec, RunOutcome } from '../types/scan.js';

const STDERR_TAIL_LENGTH = 2000;

interface ExitInfo {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
  spawnError?: NodeJS.ErrnoException;
}

export interface RunOptions {
  /** Receives the tool's stderr as it arrives. Defaults to process.stderr. */
  stderr?: Writable;
}

/** Signature shared by the real runner and test stubs. */
export type CommandRunner = (
  spec: CommandSpec,
  outputFile: string
) => Promise<Result<RunOutcome, ReconError>>;

function tail(text: string): string {
  return text.length <= STDERR_TAIL_LENGTH ? text : text.slice(-STDERR_TAIL_LENGTH);
}

function waitForExit(spec: CommandSpec, stdoutFd: number, stderrSink: Writable): Promise<ExitInfo> {
  return new Promise((resolve) => {
    // Only the last STDERR_TAIL_LENGTH characters are kept for error context.
    let stderrTail = '';
    let settled = false;
    const finish = (info: ExitInfo): void => {
      if (settled) return;
      settled = true;
      resolve(info);
    };

    let child: ReturnType<typeof spawn>;
    try {
      child = spawn(spec.command, spec.args, {
        stdio: ['ignore', stdoutFd, 'pipe'],
        windowsHide: true,
        shell: false,
      });
    } catch (error) {
      finish({
        exitCode: null,
        signal: null,
        stderr: '',
        spawnError: error instanceof Error ? error : new Error(String(error)),
      });
      return;
    }

    child.stderr?.on('data', (chunk: Buffer) => {
      stderrSink.write(chunk);
      stderrTail = tail(stderrTail + chunk.toString('utf8'));
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      finish({
        exitCode: null,
        signal: null,
        stderr: stderrTail,
        spawnError: error,
      });
    });

    child.on('close', (code, signal) => {
      finish({
        exitCode: code,
        signal,
        stderr: stderrTail,
      });
    });
  });
}

export async function runCommandToFile(
  spec: CommandSpec,
  outputFile: string,
  options: RunOptions = {}
): Promise<Result<RunOutcome, ReconError>> {
  // 1. Open the result file before anything is spawned
  let handle: FileHandle;
  try {
    handle = await fs.open(outputFile, 'w');
  } catch (error) {
    return err(
      new ReconError(
        `Error saving results: ${errorMessage(error)}`,
        'filesystem',
        { outputFile },
        ErrorCode.OUTPUT_WRITE_FAILED
      )
    );
  }

  // 2. Run the tool to completion; there is no timeout
  const startedAt = Date.now();
  let exit: ExitInfo;
  try {
    exit = await waitForExit(spec, handle.fd, options.stderr ?? process.stderr);
  } finally {
    await handle.close();
  }
  const durationMs = Date.now() - startedAt;

  // 3. Classify the exit
  const context = { command: spec.command, args: spec.args, outputFile };

  if (exit.spawnError) {
    const notFound = exit.spawnError.code === 'ENOENT';
    return err(
      new ReconError(
        notFound
          ? `${spec.command} was not found on PATH`
          : `Failed to start ${spec.command}: ${exit.spawnError.message}`,
        'tool',
        context,
        notFound ? ErrorCode.TOOL_NOT_FOUND : ErrorCode.TOOL_FAILED
      )
    );
  }

  if (exit.exitCode !== 0) {
    const how = exit.signal ? `was killed by ${exit.signal}` : `exited with code ${exit.exitCode}`;
    return err(
      new ReconError(
        `${spec.command} ${how}`,
        'tool',
        { ...context, exitCode: exit.exitCode, stderr: exit.stderr.trim() },
        ErrorCode.TOOL_FAILED
      )
    );
  }

  return ok({
    command: spec.command,
    args: spec.args,
    outputFile,
    exitCode: 0,
    durationMs,
  });
}
