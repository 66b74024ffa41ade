// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { describe, it, expect } from 'vitest';
import { ReconError, formatReconError, isReconError } from '../src/services/error-handling.js';
import { ErrorCode } from '../src/types/errors.js';

describe('formatReconError', () => {
  it('joins category, code, message and hint', () => {
    const error = new ReconError('gobuster was not found on PATH', 'tool', {}, ErrorCode.TOOL_NOT_FOUND);
    expect(formatReconError(error)).toBe(
      'tool | TOOL_NOT_FOUND | gobuster was not found on PATH | ' +
        'Hint: Install the tool or point RECON_NMAP_BIN / RECON_GOBUSTER_BIN at its binary.'
    );
  });

  it('omits code and hint when there is no code', () => {
    expect(formatReconError(new ReconError('bad | input', 'input'))).toBe('input | bad / input');
  });

  it('falls back to the message of other errors', () => {
    expect(formatReconError(new Error('boom'))).toBe('boom');
    expect(formatReconError('plain')).toBe('plain');
  });
});

describe('ReconError', () => {
  it('defaults to an empty context and no code', () => {
    const error = new ReconError('x', 'filesystem');
    expect(isReconError(error)).toBe(true);
    expect(error.context).toEqual({});
    expect(error.code).toBeUndefined();
    expect(error.name).toBe('ReconError');
  });
});
