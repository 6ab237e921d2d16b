import type { Line, Page, ParsedTable, Rect } from '@formtext/types';
import { PAGE_HEADER_PREFIX } from '@formtext/types';
import { assertNever, sortByVerticalPosition } from '@formtext/layout';
import { renderLine } from './widget-overlay.js';
import type { OverlayOptions } from './widget-overlay.js';
import { formatTable } from './table-renderer.js';

export type PageFormatOptions = OverlayOptions;

export type PageBlock =
  | { readonly kind: 'line'; readonly rect: Rect; readonly line: Line }
  | { readonly kind: 'table'; readonly rect: Rect; readonly table: ParsedTable };

/**
 * Lines and tables of a page in reading order (by top edge; lines before tables on ties).
 */
export function pageBlocks(page: Page): PageBlock[] {
  const blocks: PageBlock[] = [
    ...page.lines.map((line): PageBlock => ({ kind: 'line', rect: line.rect, line })),
    ...page.tables.map((table): PageBlock => ({ kind: 'table', rect: table.rect, table })),
  ];
  return sortByVerticalPosition(blocks);
}

function renderBlock(block: PageBlock, options: PageFormatOptions): string {
  switch (block.kind) {
    case 'line':
      return renderLine(block.line, options);
    case 'table':
      return formatTable(block.table, { useWidgetLabel: options.useWidgetLabel ?? false });
    default:
      return assertNever(block);
  }
}

/**
 * Render one page:
 *
 * ```
 * Page # 1
 *
 * first line
 * +------+
 * | grid |
 * ...
 * ```
 *
 * Blocks that render to nothing are left out.
 */
export function formatPage(page: Page, options: PageFormatOptions = {}): string {
  const result = [`${PAGE_HEADER_PREFIX}${page.number}\n`];

  for (const block of pageBlocks(page)) {
    const rendered = renderBlock(block, options);
    if (rendered !== '') result.push(rendered);
  }

  return result.join('\n') + '\n';
}
