// Plain-text table output shared by the list commands.

export type TableColumn<Row> = {
  header: string;
  value: (row: Row) => string;
};

export function renderTable<Row>(rows: Row[], columns: TableColumn<Row>[]): string[] {
  const cells = rows.map((row) => columns.map((column) => column.value(row)));
  const widths = columns.map((column, index) =>
    columnWidth(
      cells.map((line) => line[index] ?? ""),
      column.header,
    ),
  );

  const renderLine = (values: string[]): string =>
    values
      .map((value, index) => pad(value, widths[index] ?? value.length))
      .join("  ")
      .trimEnd();

  return [renderLine(columns.map((column) => column.header)), ...cells.map(renderLine)];
}

export function formatTimestamp(ts: string): string {
  const parsed = new Date(ts);
  if (Number.isNaN(parsed.getTime())) return ts;
  return parsed
    .toISOString()
    .replace("T", " ")
    .replace(/\.\d+Z$/, "Z");
}

function columnWidth(values: string[], header: string): number {
  const lengths = values.map((value) => value.length);
  return Math.max(header.length, ...lengths, 4);
}

function pad(value: string, width: number): string {
  return value.padEnd(width);
}
