import { describe, it, expect } from 'vitest';
import { FieldTypeSchema, RectSchema, parseScrapedPages } from '@formtext/types';

describe('RectSchema', () => {
  it('should accept objects and tuples and yield objects', () => {
    expect(RectSchema.parse({ x0: 1, y0: 2, x1: 3, y1: 4 })).toEqual({ x0: 1, y0: 2, x1: 3, y1: 4 });
    expect(RectSchema.parse([1, 2, 3, 4])).toEqual({ x0: 1, y0: 2, x1: 3, y1: 4 });
  });

  it('should reject short tuples and non-finite coordinates', () => {
    expect(RectSchema.safeParse([1, 2, 3]).success).toBe(false);
    expect(RectSchema.safeParse({ x0: 0, y0: 0, x1: Infinity, y1: 1 }).success).toBe(false);
  });
});

describe('FieldTypeSchema', () => {
  it('should keep known types and collapse unknown ones to Other', () => {
    expect(FieldTypeSchema.parse('CheckBox')).toBe('CheckBox');
    expect(FieldTypeSchema.parse('RadioButton')).toBe('Other');
    expect(FieldTypeSchema.parse(7)).toBe('Other');
  });
});

describe('parseScrapedPages', () => {
  it('should normalize spans, widgets and tables', () => {
    const pages = parseScrapedPages([
      {
        rawSpans: [{ text: 'Name:', bbox: [0, 0, 40, 10] }],
        widgets: [{ fieldName: 'full_name', fieldType: 'Text', fieldValue: 'Jane', rect: [50, 0, 150, 10] }],
        tables: [{ bbox: [0, 20, 200, 80], header: { cells: [[0, 20, 200, 30]], names: ['Item'] } }],
      },
    ]);

    expect(pages).toEqual([
      {
        rawSpans: [{ text: 'Name:', rect: { x0: 0, y0: 0, x1: 40, y1: 10 } }],
        widgets: [
          { fieldName: 'full_name', fieldType: 'Text', fieldValue: 'Jane', rect: { x0: 50, y0: 0, x1: 150, y1: 10 } },
        ],
        tables: [
          {
            bbox: { x0: 0, y0: 20, x1: 200, y1: 80 },
            header: { cells: [{ x0: 0, y0: 20, x1: 200, y1: 30 }], names: ['Item'] },
          },
        ],
      },
    ]);
  });

  it('should default missing collections to empty arrays', () => {
    expect(parseScrapedPages([{}])).toEqual([{ rawSpans: [], widgets: [], tables: [] }]);
  });

  it('should accept widgets without a value', () => {
    const [page] = parseScrapedPages([
      { widgets: [{ fieldName: 'phone', fieldType: 'Text', fieldValue: null, rect: [0, 0, 1, 1] }] },
    ]);
    expect(page?.widgets[0]?.fieldValue).toBeNull();
  });

  it('should list the problems of invalid input', () => {
    expect(() => parseScrapedPages([{ rawSpans: [{ text: 5, bbox: [0, 0, 1, 1] }] }])).toThrow(
      'Invalid scraped page input:\n  /0/rawSpans/0/text: Expected string, received number'
    );
  });

  it('should reject input that is not an array', () => {
    expect(() => parseScrapedPages({ pages: [] })).toThrow('Invalid scraped page input:\n  /: Expected array, received object');
  });
});
