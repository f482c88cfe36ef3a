/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { BackupArtifact } from "../../types";
import { formatBytes } from "../../utils/format";
import { formatArtifactTimestamp } from "../../utils/naming";

export const TABLE_WIDTHS = {
  storage: 12,
  host: 12,
  vm: 28,
  timestamp: 25,
  size: 12,
  compression: 6,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

/**
 * Table cells for one stored artifact
 */
export function artifactColumns(storage: string, artifact: BackupArtifact): string[] {
  return [
    storage,
    artifact.hostId || "-",
    artifact.objectName,
    formatArtifactTimestamp(artifact.timestamp),
    artifact.size === undefined ? "-" : formatBytes(artifact.size),
    artifact.compression ?? "none",
  ];
}

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvRow(values: (string | number)[]): string {
  return values.map((value) => csvField(String(value))).join(",");
}
