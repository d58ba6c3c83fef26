import Table from 'cli-table3';
import type { FundamentalsTable } from '../../types.ts';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export const escapeHtml = (text: string): string =>
  text.replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char);

export const formatMetricValue = (value: number | null): string =>
  value == null ? 'N/A' : String(value);

/**
 * Renders the fundamentals table as HTML for prompt embedding: one row per
 * metric, columns Metric, Unit, then the periods most recent first.
 */
export function renderFundamentalsHtml(table: FundamentalsTable): string {
  const header = ['Metric', 'Unit', ...table.periods]
    .map(cell => `<th>${escapeHtml(cell)}</th>`)
    .join('');

  const body = table.rows
    .map(row => {
      const cells = [row.label, row.unit, ...row.values.map(formatMetricValue)]
        .map(cell => `<td>${escapeHtml(cell)}</td>`)
        .join('');
      return `<tr>${cells}</tr>`;
    })
    .join('\n');

  return [
    '<table class="fundamentals">',
    `<caption>${escapeHtml(table.ticker)} quarterly fundamentals</caption>`,
    `<thead><tr>${header}</tr></thead>`,
    `<tbody>\n${body}\n</tbody>`,
    '</table>'
  ].join('\n');
}

/** Plain-text rendering for the terminal and text exports. */
export function renderFundamentalsText(table: FundamentalsTable): string {
  const text = new Table({
    head: ['Metric', 'Unit', ...table.periods],
    style: { head: [], border: [] }
  });
  for (const row of table.rows) {
    text.push([row.label, row.unit, ...row.values.map(formatMetricValue)]);
  }
  return text.toString();
}
