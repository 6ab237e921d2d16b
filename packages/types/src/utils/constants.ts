export const PARSER_VERSION = '1.0.0';

/** Placeholder for an unfilled Text or ComboBox field, and for an empty table cell */
export const EMPTY_FIELD_PLACEHOLDER = 'N/A';

export const CHECKBOX_DISPLAY = {
  ON: 'ON',
  OFF: 'OFF',
} as const;

/** CheckBox export values that mean "unchecked" (compared case-insensitively) */
export const CHECKBOX_OFF_VALUES: readonly string[] = ['off', 'false'];

export const PAGE_HEADER_PREFIX = 'Page # ';
