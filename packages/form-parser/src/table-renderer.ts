/**
 * Table rendering: aligned grid for reading, pipe-separated labeled rows for
 * consumers that need to trace values back to their fields.
 */
import type { ParsedTable, TableCell } from '@formtext/types';
import { EMPTY_FIELD_PLACEHOLDER } from '@formtext/types';
import { widgetDisplayValue } from './field-display.js';

export interface TableRenderOptions {
  /** Render field values as `"{fieldName}: {value}"` (default: false) */
  useWidgetLabel?: boolean;
}

/**
 * Space-joined text of every element in a cell. Empty cells yield `''`.
 */
export function cellText(cell: TableCell, useWidgetLabel: boolean = false): string {
  const words: string[] = [];
  for (const element of cell) {
    const text =
      element.kind === 'text'
        ? element.span.text
        : widgetDisplayValue(element.widget, useWidgetLabel);
    if (text !== '') words.push(text);
  }
  return words.join(' ');
}

/**
 * Cell texts, one array per row and one string per column.
 */
export function tableToTextRows(table: ParsedTable, useWidgetLabel: boolean = false): string[][] {
  return table.rows.map((row) => row.map((cell) => cellText(cell, useWidgetLabel)));
}

/**
 * One record per row, keyed by header name. Empty cells become `N/A`.
 * Later columns win when two headers share a name.
 */
export function tableToRecords(
  table: ParsedTable,
  options: TableRenderOptions = {}
): Array<Record<string, string>> {
  const useWidgetLabel = options.useWidgetLabel ?? false;
  return tableToTextRows(table, useWidgetLabel).map((row) => {
    const record: Record<string, string> = {};
    table.headerNames.forEach((name, index) => {
      const value = row[index] ?? '';
      record[name] = value !== '' ? value : EMPTY_FIELD_PLACEHOLDER;
    });
    return record;
  });
}

/**
 * Render a table as a bordered grid:
 *
 * ```
 * +------+-----+
 * | Name | Age |
 * +======+=====+
 * | Jane | 30  |
 * +------+-----+
 * ```
 *
 * A table without header cells renders as `''`.
 */
export function formatTableGrid(table: ParsedTable): string {
  const headers = table.headerNames;
  if (headers.length === 0) return '';

  const rows = tableToTextRows(table);
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => (row[index] ?? '').length))
  );

  const border = (fill: string): string =>
    `+${widths.map((width) => fill.repeat(width + 2)).join('+')}+`;
  const renderRow = (cells: readonly string[]): string =>
    `| ${widths.map((width, index) => (cells[index] ?? '').padEnd(width)).join(' | ')} |`;

  const out = [border('-'), renderRow(headers), border('=')];
  rows.forEach((row, index) => {
    if (index > 0) out.push(border('-'));
    out.push(renderRow(row));
  });
  if (rows.length > 0) out.push(border('-'));

  return out.join('\n');
}

/**
 * Render a table as `|`-joined lines with field names on field values:
 *
 * ```
 * Name | Age
 * ----------------
 * full_name: Jane | 30
 * ```
 *
 * Empty cells render as `N/A`. A table without header cells renders as `''`.
 */
export function formatTableLabeled(table: ParsedTable): string {
  if (table.headerNames.length === 0) return '';

  const headerLine = table.headerNames.join(' | ');
  const out = [headerLine, '-'.repeat(headerLine.length + 5)];

  for (const row of tableToTextRows(table, true)) {
    const cells = table.headerNames.map((_, index) => {
      const value = row[index] ?? '';
      return value !== '' ? value : EMPTY_FIELD_PLACEHOLDER;
    });
    out.push(cells.join(' | '));
  }

  return out.join('\n');
}

export function formatTable(table: ParsedTable, options: TableRenderOptions = {}): string {
  return options.useWidgetLabel === true ? formatTableLabeled(table) : formatTableGrid(table);
}
