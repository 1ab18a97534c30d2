/**
 * Formatter Utilities
 */

/**
 * Money with two decimals and thousands separators, e.g. "-1,234.50".
 */
export function formatMoney(value: number): string {
  const sign = value < 0 ? '-' : '';
  const [whole = '0', cents = '00'] = Math.abs(value).toFixed(2).split('.');
  return `${sign}${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}.${cents}`;
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Left-aligned text table; numeric-looking cells are right-aligned.
 */
export function formatTable(header: readonly string[], rows: readonly string[][]): string[] {
  const widths = header.map((h, i) =>
    Math.max(h.length, ...rows.map((row) => (row[i] ?? '').length))
  );
  const isNumeric = (cell: string) => /^-?[\d,]+(\.\d+)?%?$/.test(cell);
  const render = (cells: readonly string[]) =>
    cells
      .map((cell, i) => {
        const width = widths[i] ?? cell.length;
        return isNumeric(cell) ? cell.padStart(width) : cell.padEnd(width);
      })
      .join('  ')
      .trimEnd();

  return [render(header), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(render)];
}
