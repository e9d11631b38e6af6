/**
 * Tether CLI - table and summary rendering
 */

import { LabeledMatrix, toRows } from "../../core/models/matrix";

export function formatTable(headers: string[], rows: string[][]): string {
  if (rows.length === 0) {
    return "No data to display";
  }

  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIndex) => {
    return Math.max(...allRows.map((row) => (row[colIndex] ?? "").length));
  });

  const render = (row: string[]) =>
    row
      .map((cell, i) => (cell ?? "").padEnd(colWidths[i]))
      .join(" │ ")
      .trimEnd();

  const separator = colWidths.map((width) => "─".repeat(width)).join("─┼─");

  return [render(headers), separator, ...rows.map(render)].join("\n");
}

export function isLabeledMatrix(value: unknown): value is LabeledMatrix {
  return (
    value !== null &&
    typeof value === "object" &&
    "nrow" in value &&
    "ncol" in value &&
    "data" in value &&
    Array.isArray(value.data)
  );
}

export function formatMatrix(m: LabeledMatrix): string {
  const headers = ["", ...(m.colNames ?? Array.from({ length: m.ncol }, (_, i) => `[${i + 1}]`))];
  const rows = toRows(m).map((values, r) => [m.rowNames?.[r] ?? "", ...values.map(String)]);
  return formatTable(headers, rows);
}

/**
 * Render a model summary: matrices as tables, everything else on one line.
 */
export function formatSummary(summary: object): string {
  const blocks: string[] = [];
  for (const [name, value] of Object.entries(summary)) {
    if (isLabeledMatrix(value)) {
      blocks.push(`${name}:\n${formatMatrix(value)}`);
    } else if (Array.isArray(value)) {
      blocks.push(`${name}: [${value.join(", ")}]`);
    } else {
      blocks.push(`${name}: ${String(value)}`);
    }
  }
  return blocks.join("\n\n");
}
