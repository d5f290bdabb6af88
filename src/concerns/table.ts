import Table from 'cli-table3';

export type TableRow = Array<string | number>;

export interface RenderTableOptions {
  /** Colour codes for the header cells; none keeps the output free of escapes. */
  headStyle?: string[];
}

/** Renders rows as a box-drawn table. */
export function renderTable(head: string[], rows: readonly TableRow[], options: RenderTableOptions = {}): string {
  const table = new Table({
    head,
    style: { head: options.headStyle ?? [], border: [] }
  }) as Table.GenericTable<Table.HorizontalTableRow>;

  for (const row of rows) {
    table.push(row);
  }

  return table.toString();
}
