import Decimal from 'decimal.js';
import { MalformedSheetError } from '../common/errors/report.errors';
import { parseDecimal } from '../common/utils/decimal.util';
import { parseDate } from '../common/utils/date.util';
import { normalizeText } from '../common/utils/text.util';
import { Cell } from '../workbook/entities/raw-sheet.entity';

export function isBlankCell(cell: Cell | undefined): boolean {
  return cell === null || cell === undefined || (typeof cell === 'string' && cell.trim() === '');
}

// Header name → column index, matched accent- and case-insensitively.
export class SheetHeader {
  private readonly columns = new Map<string, number>();

  constructor(
    readonly sheet: string,
    cells: readonly Cell[],
  ) {
    cells.forEach((cell, index) => {
      if (!isBlankCell(cell)) {
        const key = normalizeText(cell);
        if (!this.columns.has(key)) {
          this.columns.set(key, index);
        }
      }
    });
  }

  has(column: string): boolean {
    return this.columns.has(normalizeText(column));
  }

  indexOf(column: string): number | undefined {
    return this.columns.get(normalizeText(column));
  }

  missing(columns: readonly string[]): string[] {
    return columns.filter((column) => !this.has(column));
  }
}

// Typed access to one data row. Every accessor that fails throws
// MalformedSheetError pointing at the sheet, row and column.
export class SheetRow {
  constructor(
    private readonly header: SheetHeader,
    readonly rowNumber: number,
    private readonly cells: readonly Cell[],
  ) {}

  get sheet(): string {
    return this.header.sheet;
  }

  isBlank(): boolean {
    return this.cells.every((cell) => isBlankCell(cell));
  }

  has(column: string): boolean {
    return this.header.has(column);
  }

  isEmpty(column: string): boolean {
    return isBlankCell(this.cell(column));
  }

  cell(column: string): Cell {
    const index = this.header.indexOf(column);
    if (index === undefined) {
      return this.fail(column, 'column is missing');
    }
    return this.cells[index] ?? null;
  }

  text(column: string): string {
    const value = this.optionalText(column);
    if (value === null) {
      return this.fail(column, 'required value is empty');
    }
    return value;
  }

  optionalText(column: string): string | null {
    const cell = this.cell(column);
    if (isBlankCell(cell)) {
      return null;
    }
    if (cell instanceof Date) {
      return this.fail(column, 'expected text, found a date');
    }
    return String(cell).trim();
  }

  decimal(column: string): Decimal {
    const value = this.optionalDecimal(column);
    if (value === null) {
      return this.fail(column, 'required value is empty');
    }
    return value;
  }

  optionalDecimal(column: string): Decimal | null {
    const cell = this.cell(column);
    if (isBlankCell(cell)) {
      return null;
    }
    const value = parseDecimal(cell);
    if (value === null) {
      return this.fail(column, `expected a number, found "${String(cell)}"`);
    }
    return value;
  }

  date(column: string): Date {
    const cell = this.cell(column);
    if (isBlankCell(cell)) {
      return this.fail(column, 'required value is empty');
    }
    const value = parseDate(cell);
    if (value === null) {
      return this.fail(column, `expected a dd/mm/yyyy date, found "${String(cell)}"`);
    }
    return value;
  }

  fail(column: string, detail: string): never {
    throw new MalformedSheetError({ sheet: this.sheet, row: this.rowNumber, column }, detail);
  }
}
