import { Injectable, Logger } from '@nestjs/common';
import { Workbook, Worksheet } from 'exceljs';
import { writeFile } from 'fs/promises';
import { toMoneyNumber, toMoneyString } from '../common/utils/decimal.util';
import {
  DeclarationEntry,
  DeclarationLayout,
  InventoryEntry,
  IrpfReport,
} from './entities/irpf-report.entity';

export type OutputFormat = 'json' | 'xlsx';

export type DeclarationField = Exclude<keyof DeclarationEntry, 'layout' | 'closed'>;
export type InventoryField = keyof InventoryEntry;

// Field order of each declaration layout, as filled in the declaration program.
export const DECLARATION_FIELDS: Record<DeclarationLayout, readonly DeclarationField[]> = {
  listed: [
    'category', 'group', 'code', 'cnpj', 'ticker', 'name', 'brokers', 'description',
    'quantity', 'averageCost', 'situation', 'realizedGain', 'notes',
  ],
  'fixed-income': [
    'category', 'group', 'code', 'cnpj', 'name', 'issuer', 'maturityDate', 'brokers', 'description',
    'quantity', 'averageCost', 'situation', 'realizedGain', 'notes',
  ],
};

export const INVENTORY_FIELDS: readonly InventoryField[] = [
  'category', 'name', 'brokers', 'type', 'cnpj', 'ticker', 'maturityDate', 'issuer',
  'quantity', 'averageCost', 'situation',
];

// Spreadsheet columns: every declaration field, whichever the layout.
const SHEET_DECLARATION_FIELDS: readonly DeclarationField[] = [
  'category', 'group', 'code', 'cnpj', 'ticker', 'name', 'issuer', 'maturityDate', 'brokers',
  'description', 'quantity', 'averageCost', 'situation', 'realizedGain', 'notes',
];

const MONEY_FIELDS = new Set<string>(['averageCost', 'situation', 'realizedGain']);

export const FORMAT_CURRENCY_REAL = '"R$ "#,##0.00';

export const DECLARATIONS_SHEET = 'Bens e Direitos';
export const INVENTORY_SHEET = 'Inventário';

function labels(year: number): Record<DeclarationField | InventoryField, string> {
  return {
    category: 'Categoria',
    group: 'Grupo',
    code: 'Código',
    cnpj: 'CNPJ',
    ticker: 'Código de Negociação',
    name: 'Nome',
    issuer: 'Emissor',
    maturityDate: 'Data de Vencimento',
    brokers: 'Instituição',
    description: 'Descrição',
    type: 'Tipo',
    quantity: 'Quantidade',
    averageCost: 'Preço Médio',
    situation: `Situação em 31/12/${year}`,
    realizedGain: 'Lucro/Prejuízo Realizado',
    notes: 'Observações',
  };
}

type JsonValue = string | number | string[] | null;

export interface RenderedReport {
  format: OutputFormat;
  content: string | Buffer;
}

/** Format implied by the output path: ".xlsx" files get a workbook */
export function formatForPath(path: string | undefined): OutputFormat {
  return path !== undefined && path.toLowerCase().endsWith('.xlsx') ? 'xlsx' : 'json';
}

// Pure formatting of a built report. Rendering finishes before anything is
// written, so a failing run leaves no partial output behind.
@Injectable()
export class ReportEmitterService {
  private readonly logger = new Logger(ReportEmitterService.name);

  async render(report: IrpfReport, format: OutputFormat): Promise<RenderedReport> {
    if (format === 'xlsx') {
      return { format, content: await this.renderWorkbook(report) };
    }
    return { format, content: this.renderJson(report) };
  }

  async write(
    rendered: RenderedReport,
    destination: string | undefined,
    stdout: Pick<NodeJS.WritableStream, 'write'> = process.stdout,
  ): Promise<void> {
    if (destination === undefined) {
      stdout.write(rendered.content);
      return;
    }
    await writeFile(destination, rendered.content);
    this.logger.log(`Report written to ${destination}`);
  }

  renderJson(report: IrpfReport): string {
    const document = {
      year: report.year,
      entries: report.entries.map((entry) =>
        this.pick(DECLARATION_FIELDS[entry.layout], (field) => this.declarationValue(entry, field)),
      ),
      inventory: report.inventory.map((entry) =>
        this.pick(INVENTORY_FIELDS, (field) => this.inventoryValue(entry, field)),
      ),
      warnings: report.warnings.map(({ sheet, message }) => ({ sheet, message })),
    };
    return `${JSON.stringify(document, null, 2)}\n`;
  }

  async renderWorkbook(report: IrpfReport): Promise<Buffer> {
    const workbook = new Workbook();
    workbook.creator = 'irpf-report';
    workbook.created = new Date();
    const header = labels(report.year);

    const declarations = workbook.addWorksheet(DECLARATIONS_SHEET);
    declarations.columns = SHEET_DECLARATION_FIELDS.map((field) => ({
      header: header[field],
      key: field,
      width: field === 'description' ? 80 : field === 'notes' ? 50 : 18,
    }));
    for (const entry of report.entries) {
      declarations.addRow(
        this.pick(SHEET_DECLARATION_FIELDS, (field) => {
          if (field === 'notes') {
            return entry.notes.join('\n');
          }
          return MONEY_FIELDS.has(field) || field === 'quantity'
            ? this.numericValue(entry, field)
            : this.declarationValue(entry, field);
        }),
      );
    }
    this.styleSheet(declarations);
    declarations.getColumn('notes').eachCell((cell, rowNumber) => {
      if (rowNumber > 1) {
        cell.alignment = { wrapText: true, vertical: 'top' };
      }
    });

    const inventory = workbook.addWorksheet(INVENTORY_SHEET);
    inventory.columns = INVENTORY_FIELDS.map((field) => ({
      header: header[field],
      key: field,
      width: field === 'name' ? 50 : 18,
    }));
    for (const entry of report.inventory) {
      inventory.addRow(
        this.pick(INVENTORY_FIELDS, (field) =>
          MONEY_FIELDS.has(field) || field === 'quantity'
            ? this.numericValue(entry, field)
            : this.inventoryValue(entry, field),
        ),
      );
    }
    this.styleSheet(inventory);

    return Buffer.from(await workbook.xlsx.writeBuffer());
  }

  private styleSheet(sheet: Worksheet): void {
    sheet.getRow(1).eachCell((cell) => {
      cell.font = { name: 'Helvetica', bold: true };
      cell.alignment = { horizontal: 'center', vertical: 'middle', wrapText: true };
    });
    for (const field of MONEY_FIELDS) {
      if (!sheet.columns.some((column) => column.key === field)) {
        continue;
      }
      sheet.getColumn(field).eachCell((cell, rowNumber) => {
        if (rowNumber > 1) {
          cell.numFmt = FORMAT_CURRENCY_REAL;
        }
      });
    }
  }

  private pick<F extends string>(fields: readonly F[], value: (field: F) => JsonValue): Record<string, JsonValue> {
    const result: Record<string, JsonValue> = {};
    for (const field of fields) {
      result[field] = value(field);
    }
    return result;
  }

  private numericValue(entry: DeclarationEntry | InventoryEntry, field: string): number | null {
    switch (field) {
      case 'quantity':
        return entry.quantity.toNumber();
      case 'averageCost':
        return toMoneyNumber(entry.averageCost);
      case 'situation':
        return toMoneyNumber(entry.situation);
      case 'realizedGain':
        return 'realizedGain' in entry ? toMoneyNumber(entry.realizedGain) : null;
      default:
        return null;
    }
  }

  private declarationValue(entry: DeclarationEntry, field: DeclarationField): JsonValue {
    switch (field) {
      case 'quantity':
        return entry.quantity.toFixed();
      case 'averageCost':
      case 'situation':
      case 'realizedGain':
        return toMoneyString(entry[field]);
      default:
        return entry[field];
    }
  }

  private inventoryValue(entry: InventoryEntry, field: InventoryField): JsonValue {
    switch (field) {
      case 'quantity':
        return entry.quantity.toFixed();
      case 'averageCost':
      case 'situation':
        return toMoneyString(entry[field]);
      default:
        return entry[field];
    }
  }
}
