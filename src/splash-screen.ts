// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

import { chalk } from 'zx';
import type { Writable } from 'stream';

const BANNER = [
  '                                          __',
  '   ________  _________  ____        _____/ /___ ___  __',
  '  / ___/ _ \\/ ___/ __ \\/ __ \\______/ ___/ / __ `/ / / /',
  ' / /  /  __/ /__/ /_/ / / / /_____/ /  / / /_/ / /_/ /',
  '/_/   \\___/\\___/\\____/_/ /_/     /_/  /_/\\__,_/\\__, /',
  '                                              /____/',
];

export function displaySplashScreen(output: Writable = process.stdout): void {
  output.write(`${chalk.cyan(BANNER.join('\n'))}\n`);
  output.write(`${chalk.dim('  nmap -> gobuster relay. Only scan hosts you are authorised to test.')}\n\n`);
}
