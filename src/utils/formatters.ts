import { isAbsolute, relative } from 'path';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Path relative to `cwd` when it lies inside it, else the path unchanged.
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (!isAbsolute(path)) {
    return path;
  }
  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }
  return path;
}

/**
 * Format file size in appropriate units (KB or MB)
 */
export function formatFileSize(bytes: number): string {
  const mb = bytes / (1024 * 1024);
  if (mb >= 1) {
    return `${mb.toFixed(2)}MB`;
  }
  const kb = bytes / 1024;
  return `${kb.toFixed(2)}KB`;
}

/**
 * `1 mod`, `3 mods`
 */
export function formatCount(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

/**
 * `2026-10-18 14:25` in local time, or `never` for null
 */
export function formatTimestamp(iso: string | null): string {
  if (!iso) {
    return 'never';
  }
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

export interface TableColumn<T> {
  header: string;
  accessor: (item: T) => string;
}

/**
 * Lay out rows as a fixed-width table. Each column is as wide as its widest
 * cell plus two spaces; the last column is not padded.
 */
export function renderTable<T>(items: T[], columns: Array<TableColumn<T>>): string[] {
  const cells = items.map(item => columns.map(col => col.accessor(item)));
  const widths = columns.map((col, index) =>
    Math.max(col.header.length, ...cells.map(row => (row[index] ?? '').length))
  );

  const renderRow = (row: string[]): string =>
    row
      .map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd((widths[index] ?? 0) + 2)))
      .join('');

  return [
    renderRow(columns.map(col => col.header)),
    renderRow(columns.map(col => '-'.repeat(col.header.length))),
    ...cells.map(renderRow)
  ];
}
