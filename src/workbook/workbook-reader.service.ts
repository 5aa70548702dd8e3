import { Injectable, Logger } from '@nestjs/common';
import { CellValue, Workbook, Worksheet } from 'exceljs';
import { FileUnreadableError } from '../common/errors/report.errors';
import { Cell, RawSheet } from './entities/raw-sheet.entity';

/**
 * Reduces an ExcelJS cell value to a plain value:
 * rich text and hyperlinks become their text, formulas their cached result,
 * error values null.
 */
export function toCell(value: CellValue): Cell {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value instanceof Date) {
    return value;
  }
  if ('richText' in value) {
    return value.richText.map((part) => part.text).join('');
  }
  if ('hyperlink' in value) {
    return value.text;
  }
  if ('formula' in value || 'sharedFormula' in value) {
    return value.result === undefined ? null : toCell(value.result);
  }
  return null;
}

// Loads .xlsx workbooks into raw cell grids.
// The file is fully read and released before any sheet is parsed.
@Injectable()
export class WorkbookReaderService {
  private readonly logger = new Logger(WorkbookReaderService.name);

  /**
   * @throws FileUnreadableError when the file is missing or not a workbook
   */
  async readWorkbook(path: string): Promise<RawSheet[]> {
    const workbook = new Workbook();
    try {
      await workbook.xlsx.readFile(path);
    } catch (error) {
      throw new FileUnreadableError(path, error instanceof Error ? error.message : String(error));
    }

    const sheets = workbook.worksheets.map((worksheet) => this.toRawSheet(worksheet));
    this.logger.debug(`Loaded ${sheets.length} sheet(s) from ${path}: ${sheets.map((s) => s.name).join(', ')}`);
    return sheets;
  }

  private toRawSheet(worksheet: Worksheet): RawSheet {
    const rows: Cell[][] = [];
    for (let r = 1; r <= worksheet.rowCount; r++) {
      const row = worksheet.getRow(r);
      const cells: Cell[] = [];
      for (let c = 1; c <= worksheet.columnCount; c++) {
        cells.push(toCell(row.getCell(c).value));
      }
      while (cells.length > 0 && cells[cells.length - 1] === null) {
        cells.pop();
      }
      rows.push(cells);
    }
    return { name: worksheet.name, rows };
  }
}
