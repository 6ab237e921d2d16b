import { describe, it, expect } from 'vitest';
import { formatPage, pageBlocks } from '@formtext/form-parser';
import type { Page, ParsedTable } from '@formtext/types';
import { fieldElement, line, rect, span, textElement, widget } from '../helpers/factories.js';

const applicants: ParsedTable = {
  headerNames: ['Name'],
  headerCells: [rect(0, 100, 200, 112)],
  rows: [[[textElement(span('Jane', 5, 120, 40, 132))]]],
  rect: rect(0, 100, 200, 140),
};

const title = line([textElement(span('Applicants', 0, 50, 80, 62))], rect(0, 50, 80, 62));
const footer = line([textElement(span('Signature', 0, 250, 80, 262))], rect(0, 250, 80, 262));

function page(overrides: Partial<Page> = {}): Page {
  return { number: 1, lines: [], widgets: [], tables: [], ...overrides };
}

describe('pageBlocks', () => {
  it('should interleave lines and tables by vertical position', () => {
    const blocks = pageBlocks(page({ lines: [title, footer], tables: [applicants] }));
    expect(blocks.map((block) => block.kind)).toEqual(['line', 'table', 'line']);
  });

  it('should put a line before a table starting at the same height', () => {
    const level = line([textElement(span('Level', 300, 100, 340, 112))], rect(300, 100, 340, 112));
    const blocks = pageBlocks(page({ lines: [level], tables: [applicants] }));
    expect(blocks.map((block) => block.kind)).toEqual(['line', 'table']);
  });
});

describe('formatPage', () => {
  it('should render the header, lines and tables in reading order', () => {
    const text = formatPage(page({ number: 3, lines: [footer, title], tables: [applicants] }));

    expect(text).toBe(
      [
        'Page # 3\n',
        'Applicants',
        '+------+',
        '| Name |',
        '+======+',
        '| Jane |',
        '+------+',
        'Signature',
      ].join('\n') + '\n'
    );
  });

  it('should render a page without content as its header', () => {
    expect(formatPage(page())).toBe('Page # 1\n\n');
  });

  it('should skip lines that render to nothing', () => {
    const signature = line(
      [fieldElement(widget('signature', 'Other', null, rect(0, 10, 100, 20)))],
      rect(0, 10, 100, 20)
    );
    expect(formatPage(page({ lines: [signature, title] }))).toBe('Page # 1\n\nApplicants\n');
  });

  it('should pass the label option to lines and tables', () => {
    const named = line(
      [textElement(span('Name:', 0, 10, 40, 20)), fieldElement(widget('full_name', 'Text', 'Jane', rect(200, 10, 300, 20)))],
      rect(0, 10, 40, 20)
    );

    expect(formatPage(page({ lines: [named], tables: [applicants] }), { useWidgetLabel: true })).toBe(
      'Page # 1\n\nName: [full_name: Jane]\nName\n---------\nJane\n'
    );
  });
});
