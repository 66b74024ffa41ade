// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import {
  collectReviewLines,
  extractPort,
  isWebServiceLine,
  parseWebPorts,
  parseWebPortsFromLines,
} from '../src/services/output-parser.js';
import { ErrorCode } from '../src/types/errors.js';
import { createRecordingLogger, makeTempDir, removeTempDir } from './helpers.js';

const SAMPLE = [
  'Starting Nmap 7.94 ( https://nmap.org ) at 2024-03-05 07:08 UTC',
  'Nmap scan report for 10.0.0.5',
  'PORT     STATE SERVICE',
  '22/tcp   open  ssh',
  '80/tcp   open  http',
  '443/tcp  open  https',
  '8080/tcp closed http-proxy',
  '',
  'Nmap done: 1 IP address (1 host up) scanned in 0.10 seconds',
].join('\n');

describe('isWebServiceLine', () => {
  it('needs both "open" and "http"', () => {
    expect(isWebServiceLine('80/tcp open http')).toBe(true);
    expect(isWebServiceLine('443/tcp open https')).toBe(true);
    expect(isWebServiceLine('22/tcp open ssh')).toBe(false);
    expect(isWebServiceLine('8080/tcp closed http-proxy')).toBe(false);
  });
});

describe('extractPort', () => {
  it('reads the token before the first slash', () => {
    expect(extractPort('  8443/tcp open https-alt')).toBe(8443);
  });

  it('returns null for non-numeric tokens', () => {
    expect(extractPort('|_http-title: open directory listing')).toBeNull();
    expect(extractPort('Starting Nmap ( https://nmap.org )')).toBeNull();
  });
});

describe('parseWebPortsFromLines', () => {
  it('finds single ports', () => {
    expect(parseWebPortsFromLines(['80/tcp open http'])).toEqual([80]);
    expect(parseWebPortsFromLines(['22/tcp open ssh'])).toEqual([]);
    expect(parseWebPortsFromLines(['443/tcp open https'])).toEqual([443]);
  });

  it('returns sorted unique ports', () => {
    expect(
      parseWebPortsFromLines(['8080/tcp open http-proxy', '80/tcp open http', '80/udp open http'])
    ).toEqual([80, 8080]);
  });

  it('ignores the header line that mentions an https URL', () => {
    expect(parseWebPortsFromLines(SAMPLE.split('\n'))).toEqual([80, 443]);
  });
});

describe('result files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('parses web ports from a result file', async () => {
    const file = path.join(dir, 'scan.txt');
    await fs.writeFile(file, SAMPLE, 'utf8');
    const logger = createRecordingLogger();

    expect(await parseWebPorts(file, logger)).toEqual([80, 443]);
    expect(logger.entries).toEqual([]);
  });

  it('returns no ports and logs when the file is missing', async () => {
    const file = path.join(dir, 'missing.txt');
    const logger = createRecordingLogger();

    expect(await parseWebPorts(file, logger)).toEqual([]);
    expect(logger.messages('error')).toEqual([`Error: Nmap output file ${file} not found.`]);
  });

  it('collects every line mentioning a discovered port', async () => {
    const file = path.join(dir, 'scan.txt');
    await fs.writeFile(file, SAMPLE, 'utf8');

    const review = await collectReviewLines(file, [443, 80]);

    expect(review).toEqual({
      ok: true,
      value: [
        { port: 80, line: '80/tcp   open  http' },
        { port: 443, line: '443/tcp  open  https' },
        { port: 80, line: '8080/tcp closed http-proxy' },
      ],
    });
  });

  it('reports a missing file during review', async () => {
    const review = await collectReviewLines(path.join(dir, 'gone.txt'), [80]);

    expect(review.ok).toBe(false);
    if (!review.ok) {
      expect(review.error.code).toBe(ErrorCode.RESULT_FILE_MISSING);
    }
  });
});
