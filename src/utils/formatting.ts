// Copyright (C) 2025 Keygraph, Inc.
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU Affero General Public License version 3
// as published by the Free Software Foundation.

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as YYYY_MM_DD_HH_MM_SS, used in result file names. */
export function formatFileTimestamp(date: Date = new Date()): string {
  return [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join('_');
}

export function formatPortList(ports: ReadonlyArray<number | string>): string {
  return ports.join(', ');
}

/** Render an argument vector for display, quoting arguments that contain whitespace. */
export function renderCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((part) => (/\s/.test(part) || part === '' ? JSON.stringify(part) : part))
    .join(' ');
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);

  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}
