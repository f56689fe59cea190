import { describe, it, expect } from 'vitest';
import { displayValue, renderResultTable, toDisplayRow } from './result-table.js';

describe('toDisplayRow', () => {
  it('keeps exactly the display fields', () => {
    const row = toDisplayRow({
      name: 'Pump layout',
      source_pdf: 'plant-manual.pdf',
      page_index: 12,
      mediaType: 'image',
      text: 'not shown',
    });
    expect(row).toEqual({
      name: 'Pump layout',
      source_pdf: 'plant-manual.pdf',
      page_index: '12',
      mediaType: 'image',
    });
    expect(Object.keys(row)).toEqual(['name', 'source_pdf', 'page_index', 'mediaType']);
  });

  it('renders missing properties as empty strings', () => {
    expect(toDisplayRow({ name: 'Only a name' })).toEqual({
      name: 'Only a name',
      source_pdf: '',
      page_index: '',
      mediaType: '',
    });
  });
});

describe('displayValue', () => {
  it('joins arrays and serializes objects', () => {
    expect(displayValue(['a', 1])).toBe('a, 1');
    expect(displayValue({ lat: 1 })).toBe('{"lat":1}');
    expect(displayValue(null)).toBe('');
  });
});

describe('renderResultTable', () => {
  it('renders a header, divider and one line per row', () => {
    const table = renderResultTable([
      { name: 'Intro', source_pdf: 'a.pdf', page_index: '0', mediaType: 'text' },
      { name: 'A | B', source_pdf: 'b.pdf', page_index: '3', mediaType: 'image' },
    ]);
    expect(table).toBe(
      [
        '| name | source_pdf | page_index | mediaType |',
        '| --- | --- | --- | --- |',
        '| Intro | a.pdf | 0 | text |',
        '| A \\| B | b.pdf | 3 | image |',
      ].join('\n')
    );
  });
});
