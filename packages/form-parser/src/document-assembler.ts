/**
 * Document assembly: runs the page pipeline over every scraped page and
 * collects the document text and the field-value map.
 *
 * Per page: line grouping -> table detection -> overlay -> render -> accumulate.
 * Pages are independent; a page that throws is recorded as a PageError and
 * the remaining pages are still assembled.
 */
import type {
  FieldValues,
  Line,
  Logger,
  Page,
  PageError,
  ParsedDocument,
  ParseResult,
  ParserHooks,
  ParserOptions,
  ParserOptionsInput,
  ScrapedPage,
} from '@formtext/types';
import { PARSER_VERSION, createConsoleLogger, resolveParserOptions } from '@formtext/types';
import { buildLines, detectTables, elementsFromPage } from '@formtext/layout';
import { formatPage } from './page-formatter.js';
import { collectFieldValues, mergeFieldValues } from './field-values.js';

export type AssembleOptions = ParserOptionsInput & ParserHooks;

/**
 * A built page plus the lines that were moved into its tables.
 */
export interface PageBuildResult {
  page: Page;
  tableLines: Line[];
}

export interface DocumentBuildResult {
  document: ParsedDocument;
  errors: PageError[];
}

/**
 * Build the model of one page. Returns `null` when the page has no spans and no widgets.
 *
 * @param scraped - Primitives of the page
 * @param index - 0-based position of the page in the document
 */
export function buildPage(
  scraped: ScrapedPage,
  index: number,
  options: ParserOptions = resolveParserOptions()
): PageBuildResult | null {
  if (scraped.rawSpans.length === 0 && scraped.widgets.length === 0) {
    return null;
  }

  const lines = buildLines(elementsFromPage(scraped.rawSpans, scraped.widgets), options.lineTolerance);
  const detected = detectTables(lines, scraped.tables, options.tableTolerance);

  return {
    page: {
      number: index + 1,
      lines: detected.lines,
      widgets: scraped.widgets,
      tables: detected.tables,
    },
    tableLines: detected.tableLines,
  };
}

function createPageError(pageNumber: number, error: unknown): PageError {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    page: pageNumber,
    error: message,
    stack,
    timestamp: new Date().toISOString(),
  };
}

interface PageRun<T> {
  outcomes: T[];
  errors: PageError[];
}

/**
 * Apply `step` to every page, isolating failures per page.
 * `null` outcomes (empty pages) are skipped.
 */
function runPages<T>(
  scrapedPages: readonly ScrapedPage[],
  logger: Logger,
  hooks: ParserHooks,
  step: (scraped: ScrapedPage, index: number) => T | null
): PageRun<T> {
  const outcomes: T[] = [];
  const errors: PageError[] = [];

  scrapedPages.forEach((scraped, index) => {
    try {
      const outcome = step(scraped, index);
      if (outcome === null) {
        logger.debug(`Page ${index + 1}: no spans or widgets, skipped`);
        return;
      }
      outcomes.push(outcome);
    } catch (error) {
      const pageError = createPageError(index + 1, error);
      errors.push(pageError);
      logger.warn(`Page ${pageError.page} failed: ${pageError.error}`);
      if (hooks.onError !== undefined) {
        hooks.onError(pageError);
      }
    }
  });

  return { outcomes, errors };
}

function splitOptions(options: AssembleOptions): { parserOptions: ParserOptions; hooks: ParserHooks; logger: Logger } {
  const { logger, onError, ...input } = options;
  const parserOptions = resolveParserOptions(input);
  return {
    parserOptions,
    hooks: { onError },
    logger: logger ?? createConsoleLogger({ verbose: parserOptions.verbose }),
  };
}

/**
 * Build the document model without rendering it.
 */
export function buildDocument(
  scrapedPages: readonly ScrapedPage[],
  options: AssembleOptions = {}
): DocumentBuildResult {
  const { parserOptions, hooks, logger } = splitOptions(options);
  const run = runPages(scrapedPages, logger, hooks, (scraped, index) =>
    buildPage(scraped, index, parserOptions)?.page ?? null
  );
  return { document: { pages: run.outcomes }, errors: run.errors };
}

interface PageOutcome {
  text: string;
  fields: FieldValues;
}

/**
 * Parse a whole document into text and field values.
 *
 * Page texts are concatenated in page order, each starting with `Page # N`.
 * Field maps are built per page and merged once all pages are done.
 */
export function parseDocument(
  scrapedPages: readonly ScrapedPage[],
  options: AssembleOptions = {}
): ParseResult {
  const { parserOptions, hooks, logger } = splitOptions(options);

  const run = runPages(scrapedPages, logger, hooks, (scraped, index): PageOutcome | null => {
    const built = buildPage(scraped, index, parserOptions);
    if (built === null) return null;

    const { page, tableLines } = built;
    logger.debug(
      `Page ${page.number}: ${page.lines.length} lines, ${page.tables.length} tables, ${page.widgets.length} widgets`
    );

    return {
      text: formatPage(page, {
        useWidgetLabel: parserOptions.useWidgetLabel,
        toleranceBefore: parserOptions.overlayToleranceBefore,
        toleranceAfter: parserOptions.overlayToleranceAfter,
      }),
      fields: collectFieldValues(page.widgets, tableLines, {
        includeEmptyFields: parserOptions.includeEmptyFields,
      }),
    };
  });

  return {
    documentText: run.outcomes.map((outcome) => outcome.text).join(''),
    fieldValues: mergeFieldValues(run.outcomes.map((outcome) => outcome.fields)),
    metadata: {
      parserVersion: PARSER_VERSION,
      parsedAt: new Date().toISOString(),
      pageCount: scrapedPages.length,
      pagesParsed: run.outcomes.length,
      warnings: run.errors.map((error) => `Page ${error.page}: ${error.error}`),
    },
    errors: run.errors,
  };
}
