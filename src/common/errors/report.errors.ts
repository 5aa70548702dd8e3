export type ReportErrorCode =
  | 'USAGE'
  | 'FILE_UNREADABLE'
  | 'MALFORMED_SHEET'
  | 'NEGATIVE_QUANTITY'
  | 'NO_RECOGNIZED_SHEETS';

// Fatal failures of a report run. Each one maps to a process exit code.
export abstract class IrpfReportError extends Error {
  abstract readonly code: ReportErrorCode;
  abstract readonly exitCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UsageError extends IrpfReportError {
  readonly code = 'USAGE';
  readonly exitCode = 1;
}

export class FileUnreadableError extends IrpfReportError {
  readonly code = 'FILE_UNREADABLE';
  readonly exitCode = 2;

  constructor(
    readonly path: string,
    reason: string,
  ) {
    super(`Cannot read input file ${path}: ${reason}`);
  }
}

export interface MalformedSheetLocation {
  sheet: string;
  row?: number;       // 1-based spreadsheet row, header included
  column?: string;
}

export class MalformedSheetError extends IrpfReportError {
  readonly code = 'MALFORMED_SHEET';
  readonly exitCode = 3;

  constructor(
    readonly location: MalformedSheetLocation,
    detail: string,
  ) {
    super(`${MalformedSheetError.describe(location)}: ${detail}`);
  }

  private static describe({ sheet, row, column }: MalformedSheetLocation): string {
    let where = `Malformed sheet "${sheet}"`;
    if (row !== undefined) {
      where += ` at row ${row}`;
    }
    if (column !== undefined) {
      where += `, column "${column}"`;
    }
    return where;
  }
}

export class NegativeQuantityError extends IrpfReportError {
  readonly code = 'NEGATIVE_QUANTITY';
  readonly exitCode = 4;

  constructor(
    readonly assetKey: string,
    readonly date: string,
    readonly held: string,
    readonly requested: string,
  ) {
    super(`Disposal of ${requested} ${assetKey} on ${date} exceeds the ${held} held`);
  }
}

export class NoRecognizedSheetsError extends IrpfReportError {
  readonly code = 'NO_RECOGNIZED_SHEETS';
  readonly exitCode = 5;

  constructor(readonly sheets: string[]) {
    super(`No recognized sheets in the input file (found: ${sheets.length ? sheets.join(', ') : 'none'})`);
  }
}
