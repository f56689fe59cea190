/**
 * Reduce search results to the display fields and render them as a Markdown table.
 */

import { DISPLAY_FIELDS } from '../constants.js';
import type { DisplayRow, RecordProperties } from '../types.js';

/** Render a property value as table text; missing values become empty strings. */
export function displayValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((item) => displayValue(item)).join(', ');
  return JSON.stringify(value);
}

export function toDisplayRow(properties: RecordProperties): DisplayRow {
  return {
    name: displayValue(properties['name']),
    source_pdf: displayValue(properties['source_pdf']),
    page_index: displayValue(properties['page_index']),
    mediaType: displayValue(properties['mediaType']),
  };
}

function escapeCell(text: string): string {
  return text.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

/** Markdown table with one column per display field, in DISPLAY_FIELDS order. */
export function renderResultTable(rows: DisplayRow[]): string {
  const header = `| ${DISPLAY_FIELDS.join(' | ')} |`;
  const divider = `| ${DISPLAY_FIELDS.map(() => '---').join(' | ')} |`;
  const body = rows.map(
    (row) => `| ${DISPLAY_FIELDS.map((field) => escapeCell(row[field])).join(' | ')} |`
  );
  return [header, divider, ...body].join('\n');
}
