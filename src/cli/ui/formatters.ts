/**
 * Table and summary formatters
 */

import color from "picocolors";

export const TABLE_WIDTHS = {
  name: 40,
  created: 19,
  size: 12,
  kind: 8,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const visible = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...visible.map((i) => i.label.length));
  return visible
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns
    .map((col, i) => col.padEnd(widths[i] ?? 0))
    .join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * Local timestamp as "YYYY-MM-DD HH:MM:SS".
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
