import type { Widget } from '@formtext/types';
import { CHECKBOX_DISPLAY, CHECKBOX_OFF_VALUES, EMPTY_FIELD_PLACEHOLDER } from '@formtext/types';
import { assertNever, getFilledValue } from '@formtext/layout';

/**
 * A checkbox counts as checked when it carries any export value other than an "off" marker.
 */
export function isCheckboxOn(widget: Widget): boolean {
  const value = getFilledValue(widget);
  return value !== null && !CHECKBOX_OFF_VALUES.includes(value.trim().toLowerCase());
}

/**
 * Text shown for a field when it is spliced into a line or a table cell.
 *
 * Text and ComboBox fields show their value or `N/A`, checkboxes show `ON` or
 * `OFF`. Other field types have no display value and yield `''`.
 * With `useWidgetLabel` the value is prefixed with `"{fieldName}: "`.
 */
export function widgetDisplayValue(widget: Widget, useWidgetLabel: boolean = false): string {
  let value: string;
  switch (widget.fieldType) {
    case 'Text':
    case 'ComboBox':
      value = getFilledValue(widget) ?? EMPTY_FIELD_PLACEHOLDER;
      break;
    case 'CheckBox':
      value = isCheckboxOn(widget) ? CHECKBOX_DISPLAY.ON : CHECKBOX_DISPLAY.OFF;
      break;
    case 'Other':
      return '';
    default:
      return assertNever(widget.fieldType);
  }

  return useWidgetLabel ? `${widget.fieldName}: ${value}` : value;
}

export function hasDisplayValue(widget: Widget): boolean {
  return widget.fieldType !== 'Other';
}
