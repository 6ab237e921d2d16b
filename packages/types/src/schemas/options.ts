import { z } from 'zod';
import type { Logger } from '../utils/logger.js';
import type { PageError } from '../types/output.js';

const tolerance = z.number().finite().nonnegative();

export const ParserOptionsSchema = z.object({
  /** Max |Δy0| or |Δy1| for two rectangles to share a line */
  lineTolerance: tolerance.default(5),
  /** Slack around table and header-cell rectangles when testing containment */
  tableTolerance: tolerance.default(5),
  /** Characters kept before the widget/span intersection when splicing */
  overlayToleranceBefore: z.number().int().nonnegative().default(2),
  /** Characters kept after the widget/span intersection when splicing */
  overlayToleranceAfter: z.number().int().nonnegative().default(1),
  useWidgetLabel: z.boolean().default(false),
  includeEmptyFields: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type ParserOptions = z.infer<typeof ParserOptionsSchema>;
export type ParserOptionsInput = z.input<typeof ParserOptionsSchema>;

/**
 * Runtime hooks that cannot live in a schema.
 */
export interface ParserHooks {
  logger?: Logger | undefined;
  onError?: ((error: PageError) => void) | undefined;
}

/**
 * Fill defaults and check ranges.
 *
 * @throws ZodError on out-of-range values
 */
export function resolveParserOptions(input: ParserOptionsInput = {}): ParserOptions {
  return ParserOptionsSchema.parse(input);
}

const envBool = (value: string | undefined): boolean | undefined => {
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1';
};

const envNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value === '') return undefined;
  return Number(value);
};

/**
 * Read parser options from `FORMTEXT_*` environment variables.
 * Unset variables fall back to the schema defaults.
 */
export function loadParserOptionsFromEnv(
  env: Record<string, string | undefined> = process.env
): ParserOptions {
  const input: ParserOptionsInput = {};

  const lineTolerance = envNumber(env['FORMTEXT_LINE_TOLERANCE']);
  if (lineTolerance !== undefined) input.lineTolerance = lineTolerance;

  const tableTolerance = envNumber(env['FORMTEXT_TABLE_TOLERANCE']);
  if (tableTolerance !== undefined) input.tableTolerance = tableTolerance;

  const useWidgetLabel = envBool(env['FORMTEXT_USE_WIDGET_LABEL']);
  if (useWidgetLabel !== undefined) input.useWidgetLabel = useWidgetLabel;

  const includeEmptyFields = envBool(env['FORMTEXT_INCLUDE_EMPTY_FIELDS']);
  if (includeEmptyFields !== undefined) input.includeEmptyFields = includeEmptyFields;

  const verbose = envBool(env['FORMTEXT_VERBOSE']);
  if (verbose !== undefined) input.verbose = verbose;

  return resolveParserOptions(input);
}
