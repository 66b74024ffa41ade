// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Configuration type definitions
 */

export interface ReconConfig {
  nmapBin: string;
  gobusterBin: string;
  defaultWordlist?: string | undefined;
}

export interface CliOverrides {
  nmapBin?: string;
  gobusterBin?: string;
  wordlist?: string;
  showBanner: boolean;
}
