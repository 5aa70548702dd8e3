// Spreadsheet value after rich text, hyperlinks and formulas are resolved.
export type Cell = string | number | boolean | Date | null;

// One worksheet as a grid of cells. rows[0] is the header row.
export interface RawSheet {
  name: string;
  rows: Cell[][];
}
