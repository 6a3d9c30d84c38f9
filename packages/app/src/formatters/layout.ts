/**
 * Table and panel helpers over cli-table3. Colors come from the Theme, so the
 * table's own styling is switched off.
 */

import Table from 'cli-table3';

const PLAIN = { head: [], border: [] };

export interface PanelSection {
  title: string;
  lines: string[];
}

/**
 * Renders sections side by side, one column each
 */
export function renderPanels(sections: readonly PanelSection[]): string {
  const table = new Table({
    head: sections.map((section) => section.title),
    style: PLAIN,
  });
  table.push(sections.map((section) => section.lines.join('\n')));
  return table.toString();
}

export interface ColumnSpec {
  header: string;
  align?: 'left' | 'center' | 'right';
}

/**
 * Renders a grid with a header row
 */
export function renderGrid(columns: readonly ColumnSpec[], rows: readonly string[][]): string {
  const table = new Table({
    head: columns.map((column) => column.header),
    colAligns: columns.map((column) => column.align ?? 'right'),
    style: PLAIN,
  });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}

/**
 * Renders label/value pairs as a two-column table
 */
export function renderKeyValue(headers: readonly [string, string], rows: ReadonlyArray<readonly [string, string]>): string {
  const table = new Table({
    head: [...headers],
    colAligns: ['left', 'left'],
    style: PLAIN,
  });
  for (const [label, value] of rows) {
    table.push([label, value]);
  }
  return table.toString();
}
