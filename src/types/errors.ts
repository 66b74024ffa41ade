// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Error classification shared by services and the CLI.
 */

export type ReconErrorType = 'config' | 'filesystem' | 'tool' | 'input';

export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  OUTPUT_DIR_FAILED = 'OUTPUT_DIR_FAILED',
  OUTPUT_WRITE_FAILED = 'OUTPUT_WRITE_FAILED',
  RESULT_FILE_MISSING = 'RESULT_FILE_MISSING',
  TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
  TOOL_FAILED = 'TOOL_FAILED',
}
