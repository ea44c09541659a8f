/**
 * Status Table Formatter
 *
 * @module cli/formatters/status-table
 */

import chalk from 'chalk';

/**
 * One row of the per-unit status table.
 */
export interface UnitStatusRow {
  unitId: string;
  /** Extracted entry count */
  keys: number;
  translated: 'present' | 'stale' | 'absent';
  /** Last ledger status, or '-' when the ledger has none */
  state: 'pending' | 'done' | 'failed' | '-';
  reason?: string;
}

function padRight(str: string, width: number): string {
  // ANSI codes take no columns
  const visibleLength = str.replace(/\x1b\[[0-9;]*m/g, '').length;
  return str + ' '.repeat(Math.max(0, width - visibleLength));
}

function colorTranslated(value: UnitStatusRow['translated']): string {
  switch (value) {
    case 'present':
      return chalk.green(value);
    case 'stale':
      return chalk.yellow(value);
    case 'absent':
      return chalk.dim(value);
  }
}

function colorState(value: UnitStatusRow['state']): string {
  switch (value) {
    case 'done':
      return chalk.green(value);
    case 'failed':
      return chalk.red(value);
    default:
      return chalk.dim(value);
  }
}

/**
 * Format unit rows as an aligned table. Failure reasons follow their row.
 *
 * @example
 * ```
 * UNIT           KEYS  TRANSLATED  STATE
 * mod/create     2     present     done
 * kubejs/kubejs  0     absent      -
 * ```
 */
export function formatStatusTable(rows: readonly UnitStatusRow[]): string {
  if (rows.length === 0) {
    return chalk.dim('No units extracted yet.');
  }

  const header = ['UNIT', 'KEYS', 'TRANSLATED', 'STATE'];
  const widths = [
    Math.max(header[0].length, ...rows.map((row) => row.unitId.length)),
    Math.max(header[1].length, ...rows.map((row) => String(row.keys).length)),
    header[2].length,
  ];

  const lines = [
    chalk.bold(
      `${padRight(header[0], widths[0])}  ${padRight(header[1], widths[1])}  ${padRight(header[2], widths[2])}  ${header[3]}`
    ),
  ];

  for (const row of rows) {
    lines.push(
      `${padRight(row.unitId, widths[0])}  ${padRight(String(row.keys), widths[1])}  ` +
        `${padRight(colorTranslated(row.translated), widths[2])}  ${colorState(row.state)}`
    );
    if (row.reason !== undefined) {
      lines.push(chalk.dim(`  ${row.reason}`));
    }
  }

  return lines.join('\n');
}
