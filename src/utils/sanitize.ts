// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

/**
 * Allowlist sanitization for directory and file names.
 */

const DISALLOWED_CHARACTERS = /[^a-zA-Z0-9_\-./]/g;

/**
 * Replace every character outside `[A-Za-z0-9_-./]` with `_`, collapse runs
 * of `/` and trim separators at both ends. `..` segments are left as they are.
 */
export function sanitizeName(name: string): string {
  return name
    .replace(DISALLOWED_CHARACTERS, '_')
    .replace(/\/{2,}/g, '/')
    .replace(/^\/+|\/+$/g, '');
}

/** Strip scheme, fragment and query from a URL or hostname, then sanitize. */
export function cleanUrl(url: string): string {
  const withoutScheme = url.replace(/^https?:\/\//, '');
  const withoutFragment = withoutScheme.split('#')[0] ?? '';
  const withoutQuery = withoutFragment.split('?')[0] ?? '';
  return sanitizeName(withoutQuery);
}

/** Like cleanUrl, but flat: path separators become underscores. */
export function toFileToken(value: string): string {
  return cleanUrl(value).replaceAll('/', '_');
}
