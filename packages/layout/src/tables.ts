/**
 * Table detection and column segmentation.
 * Moves lines that fall inside a table's bounding box out of the page flow and
 * splits them into cells using the header cells as column slots.
 */
import type {
  Element,
  Line,
  ParsedTable,
  TableColumn,
  TableHeader,
  TableRow,
  TableStructure,
} from '@formtext/types';
import { DEFAULT_TOLERANCE, isPartiallyInside, isRectInside, isWordInColumn } from './geometry.js';
import { elementRect } from './elements.js';

/**
 * Result of running table detection over one page.
 */
export interface TableDetectionResult {
  /** Lines outside every table, in their original order */
  lines: Line[];
  /** One parsed table per input structure, in input order */
  tables: ParsedTable[];
  /** Lines that fell inside at least one table */
  tableLines: Line[];
}

/**
 * Pair each header cell with its name. Missing names become `col{index}`.
 */
export function getTableColumns(header: TableHeader): TableColumn[] {
  return header.cells.map((cell, index) => ({
    name: header.names[index] ?? `col${index}`,
    cell,
  }));
}

export function isLineInTable(line: Line, table: TableStructure, tolerance: number = DEFAULT_TOLERANCE): boolean {
  return isRectInside(table.bbox, line.rect, tolerance);
}

/**
 * Lines that lie inside any of the given tables.
 */
export function findTableLines(
  lines: readonly Line[],
  tables: readonly TableStructure[],
  tolerance: number = DEFAULT_TOLERANCE
): Line[] {
  if (tables.length === 0) return [];
  return lines.filter((line) => tables.some((table) => isLineInTable(line, table, tolerance)));
}

/**
 * Drop lines that repeat the header row.
 *
 * A line is a header duplicate when it sits inside a header cell, or starts
 * within the cell horizontally and ends above the cell's bottom edge.
 */
export function removeHeaderDuplicates(
  lines: readonly Line[],
  header: TableHeader,
  tolerance: number = DEFAULT_TOLERANCE
): Line[] {
  return lines.filter(
    (line) =>
      !header.cells.some(
        (cell) => isRectInside(cell, line.rect, tolerance) || isPartiallyInside(cell, line.rect)
      )
  );
}

/**
 * Split each line into one cell per column.
 *
 * Columns are visited in header order and every element whose left edge falls
 * inside the column's x-range is copied into that column's cell. Overlapping
 * column ranges are not made exclusive, so an element may land in two cells.
 */
export function splitIntoColumns(lines: readonly Line[], columns: readonly TableColumn[]): TableRow[] {
  return lines.map((line) =>
    columns.map((column): Element[] =>
      line.elements.filter((element) => isWordInColumn(elementRect(element), column.cell))
    )
  );
}

/**
 * Build the parsed form of one table from the page's table lines.
 *
 * @param tableLines - Candidate lines; only those inside `structure.bbox` are used
 * @param structure - Bounding box and header reported by the extraction layer
 */
export function parseTable(
  tableLines: readonly Line[],
  structure: TableStructure,
  tolerance: number = DEFAULT_TOLERANCE
): ParsedTable {
  const columns = getTableColumns(structure.header);
  const ownLines = tableLines.filter((line) => isLineInTable(line, structure, tolerance));
  const bodyLines = removeHeaderDuplicates(ownLines, structure.header, tolerance);

  return {
    headerNames: columns.map((column) => column.name),
    headerCells: columns.map((column) => column.cell),
    rows: splitIntoColumns(bodyLines, columns),
    rect: structure.bbox,
  };
}

/**
 * Separate a page's lines into flowing text and parsed tables.
 */
export function detectTables(
  lines: readonly Line[],
  structures: readonly TableStructure[],
  tolerance: number = DEFAULT_TOLERANCE
): TableDetectionResult {
  if (structures.length === 0) {
    return { lines: [...lines], tables: [], tableLines: [] };
  }

  const tableLines = findTableLines(lines, structures, tolerance);
  const members = new Set(tableLines);

  return {
    lines: lines.filter((line) => !members.has(line)),
    tables: structures.map((structure) => parseTable(tableLines, structure, tolerance)),
    tableLines,
  };
}
