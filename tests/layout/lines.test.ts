/**
 * Tests for line clustering.
 */
import { describe, it, expect } from 'vitest';
import { buildLines, removeWidgetEchoes, elementsFromPage, elementRect, sortByVerticalPosition } from '@formtext/layout';
import type { Element } from '@formtext/types';
import { fieldElement, rect, span, textElement, widget } from '../helpers/factories.js';

const texts = (elements: readonly Element[]): string[] =>
  elements.map((element) => (element.kind === 'text' ? element.span.text : `<${element.widget.fieldName}>`));

describe('buildLines', () => {
  it('should split three separated bands into three lines in ascending y order', () => {
    const elements = [
      textElement(span('third', 0, 100, 40, 110)),
      textElement(span('first', 0, 0, 40, 10)),
      textElement(span('second', 0, 50, 40, 60)),
    ];

    const lines = buildLines(elements, 5);

    expect(lines).toHaveLength(3);
    expect(lines.map((line) => texts(line.elements))).toEqual([['first'], ['second'], ['third']]);
    expect(lines.map((line) => line.rect.y0)).toEqual([0, 50, 100]);
  });

  it('should order elements of a line left to right', () => {
    const elements = [
      textElement(span('C', 300, 101, 320, 111)),
      textElement(span('A', 10, 100, 30, 110)),
      textElement(span('B', 150, 102, 170, 112)),
    ];

    const lines = buildLines(elements);

    expect(lines).toHaveLength(1);
    expect(texts(lines[0]?.elements ?? [])).toEqual(['A', 'B', 'C']);
  });

  it('should keep the seed rectangle fixed as the line grows', () => {
    // 4 from the seed joins; 8 from the seed does not, even though it is 4 from the previous element
    const elements = [
      textElement(span('a', 0, 0, 10, 10)),
      textElement(span('b', 20, 4, 30, 14)),
      textElement(span('c', 40, 8, 50, 18)),
    ];

    const lines = buildLines(elements);

    expect(lines).toHaveLength(2);
    expect(texts(lines[0]?.elements ?? [])).toEqual(['a', 'b']);
    expect(texts(lines[1]?.elements ?? [])).toEqual(['c']);
    expect(lines[0]?.rect).toEqual(rect(0, 0, 10, 10));
    expect(lines[1]?.rect).toEqual(rect(40, 8, 50, 18));
  });

  it('should use the topmost element as the seed, not the leftmost', () => {
    const elements = [
      textElement(span('right', 200, 100, 260, 112)),
      textElement(span('left', 10, 102, 60, 112)),
    ];

    const [first] = buildLines(elements);

    expect(texts(first?.elements ?? [])).toEqual(['left', 'right']);
    expect(first?.rect).toEqual(rect(200, 100, 260, 112));
  });

  it('should group fields with the text on their line', () => {
    const name = widget('full_name', 'Text', null, rect(100, 99, 300, 113));
    const elements = elementsFromPage(
      [span('Name:', 10, 100, 90, 112), span('Date:', 10, 140, 90, 152)],
      [name]
    );

    const lines = buildLines(elements);

    expect(lines).toHaveLength(2);
    expect(texts(lines[0]?.elements ?? [])).toEqual(['Name:', '<full_name>']);
    expect(texts(lines[1]?.elements ?? [])).toEqual(['Date:']);
  });

  it('should drop text that repeats a filled field value on the same line', () => {
    const name = widget('full_name', 'Text', 'Jane Doe', rect(100, 100, 300, 112));
    const elements = [
      textElement(span('Name:', 10, 100, 90, 112)),
      textElement(span('Jane Doe', 102, 101, 160, 111)),
      fieldElement(name),
      textElement(span('Jane Doe', 10, 200, 70, 212)),
    ];

    const lines = buildLines(elements);

    expect(lines).toHaveLength(2);
    expect(texts(lines[0]?.elements ?? [])).toEqual(['Name:', '<full_name>']);
    // the same words on another line are real text
    expect(texts(lines[1]?.elements ?? [])).toEqual(['Jane Doe']);
  });

  it('should return no lines for no elements', () => {
    expect(buildLines([])).toEqual([]);
  });

  it('should keep every element except widget echoes', () => {
    const spans = [
      span('Header', 0, 0, 80, 12),
      span('Name:', 0, 30, 40, 42),
      span('Jane', 50, 31, 80, 41),
      span('Footer', 0, 300, 80, 312),
    ];
    const widgets = [widget('first_name', 'Text', 'Jane', rect(45, 30, 120, 42))];

    const lines = buildLines(elementsFromPage(spans, widgets));
    const kept = lines.flatMap((line) => line.elements);

    expect(kept).toHaveLength(spans.length + widgets.length - 1);
    expect(texts(kept).sort()).toEqual(['<first_name>', 'Footer', 'Header', 'Name:']);
  });

  it('should produce lines with strictly ascending seeds and x-sorted elements', () => {
    const elements = [
      textElement(span('d', 90, 61, 99, 71)),
      textElement(span('a', 50, 0, 60, 10)),
      textElement(span('c', 10, 60, 20, 70)),
      textElement(span('b', 5, 2, 15, 12)),
      textElement(span('e', 0, 130, 9, 140)),
    ];

    const lines = buildLines(elements);

    for (let i = 1; i < lines.length; i++) {
      expect(lines[i]?.rect.y0).toBeGreaterThan(lines[i - 1]?.rect.y0 ?? Infinity);
    }
    for (const built of lines) {
      const xs = built.elements.map((element) => elementRect(element).x0);
      expect(xs).toEqual([...xs].sort((a, b) => a - b));
    }
  });
});

describe('removeWidgetEchoes', () => {
  it('should ignore unfilled fields', () => {
    const elements = [
      textElement(span('N/A', 0, 0, 20, 10)),
      fieldElement(widget('empty', 'Text', '', rect(30, 0, 60, 10))),
    ];

    expect(removeWidgetEchoes(elements)).toHaveLength(2);
  });

  it('should compare trimmed text', () => {
    const elements = [
      textElement(span(' 42 ', 0, 0, 20, 10)),
      fieldElement(widget('age', 'Text', '42', rect(0, 0, 20, 10))),
    ];

    expect(texts(removeWidgetEchoes(elements))).toEqual(['<age>']);
  });
});

describe('sortByVerticalPosition', () => {
  it('should sort by top edge and keep ties in input order', () => {
    const items = [
      { id: 'b', rect: rect(0, 50, 10, 60) },
      { id: 'a1', rect: rect(0, 10, 10, 20) },
      { id: 'a2', rect: rect(5, 10, 15, 20) },
    ];

    expect(sortByVerticalPosition(items).map((item) => item.id)).toEqual(['a1', 'a2', 'b']);
  });
});
