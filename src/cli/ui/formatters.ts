/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { RunStatus } from "../../types";

export const TABLE_WIDTHS = {
  profile: 12,
  name: 24,
  state: 9,
  mountPoint: 40,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const visible = items.filter((i) => i.value !== null && i.value !== undefined);
  const maxLabelLen = Math.max(0, ...visible.map((i) => i.label.length));
  return visible.map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`).join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * Spinner text for a long-running step, with a percentage once one is known.
 */
export function formatProgress(status: string, percent: number): string {
  return percent > 0 ? `${status} ${percent}%` : status;
}

export function colorStatus(status: RunStatus): string {
  switch (status) {
    case "complete":
      return color.green(status);
    case "stopped":
    case "idle":
    case "running":
      return color.yellow(status);
    default:
      return color.red(status);
  }
}
