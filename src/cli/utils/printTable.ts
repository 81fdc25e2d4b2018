/**
 * Table printer for CLI output
 */

export function formatTable(headers: string[], rows: string[][]): string[] {
  if (rows.length === 0) {
    return ["No data to display"];
  }

  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIndex) => {
    return Math.max(...allRows.map(row => stripAnsi(row[colIndex] || "").length));
  });

  const line = (row: string[]) =>
    row
      .map((cell, i) => (cell || "").padEnd(colWidths[i]))
      .join(" │ ")
      .trimEnd();

  return [
    line(headers),
    colWidths.map(width => "─".repeat(width)).join("─┼─"),
    ...rows.map(line),
  ];
}

export function printTable(headers: string[], rows: string[][], write: (line: string) => void = console.log): void {
  for (const line of formatTable(headers, rows)) {
    write(line);
  }
}

/**
 * Strip ANSI escape codes from string for length calculation
 */
function stripAnsi(str: string): string {
  return str.replace(/\u001b\[[0-9;]*m/g, "");
}
