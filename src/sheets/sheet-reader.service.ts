import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { MalformedSheetError } from '../common/errors/report.errors';
import { ZERO, divide } from '../common/utils/decimal.util';
import { normalizeText } from '../common/utils/text.util';
import { RawSheet } from '../workbook/entities/raw-sheet.entity';
import { ListedAsset, assetKey, isListed } from './entities/asset.entity';
import { Operation, PositionRow } from './entities/position-row.entity';
import {
  SHEET_KINDS,
  SheetKind,
  UnrecognizedCategoryWarning,
  isCategorySheet,
  resolveSheetKind,
} from './entities/sheet-kind';
import { COLUMNS, PRICE_COLUMNS, SHEET_LAYOUTS, SheetLayout, TickerResolver } from './sheet-layouts';
import { SheetHeader, SheetRow } from './sheet-row';
import { classFromSearch } from './ticker-classifier';
import { TickerLookupService } from './ticker-lookup.service';

const OPERATIONS = new Map<string, Operation>([
  ['compra', Operation.BUY],
  ['credito', Operation.BUY],
  ['entrada', Operation.BUY],
  ['venda', Operation.SELL],
  ['debito', Operation.SELL],
  ['saida', Operation.SELL],
]);

export interface ReadOptions {
  // Date of snapshot sheet rows, which carry no trade date. They are opening
  // balances, so this is the last day before the declaration year.
  referenceDate: Date;
  // Listed assets declared by category sheets, by ticker.
  knownAssets?: ReadonlyMap<string, ListedAsset>;
}

export interface SheetsReadResult {
  rows: PositionRow[];
  recognized: string[];
  warnings: UnrecognizedCategoryWarning[];
}

// Turns B3 sheets into normalized position rows.
// One layout per sheet kind; unknown sheets are reported and skipped.
@Injectable()
export class SheetReaderService {
  private readonly logger = new Logger(SheetReaderService.name);

  constructor(private readonly tickerLookup: TickerLookupService) {}

  /**
   * Reads every recognized sheet of a workbook. Category sheets are read
   * first (in SHEET_KINDS order), so stock loans and trades resolve their
   * tickers against the assets those sheets declare.
   */
  async readSheets(sheets: readonly RawSheet[], options: ReadOptions): Promise<SheetsReadResult> {
    const result: SheetsReadResult = { rows: [], recognized: [], warnings: [] };
    const pending: Array<{ sheet: RawSheet; kind: SheetKind }> = [];

    for (const sheet of sheets) {
      const kind = resolveSheetKind(sheet.name);
      if (kind === null) {
        const warning: UnrecognizedCategoryWarning = {
          kind: 'UnrecognizedCategory',
          sheet: sheet.name,
          message: `Sheet "${sheet.name}" is not a known B3 category. Skipping...`,
        };
        this.logger.warn(warning.message);
        result.warnings.push(warning);
        continue;
      }
      result.recognized.push(sheet.name);
      pending.push({ sheet, kind });
    }

    pending.sort((a, b) => SHEET_KINDS.indexOf(a.kind) - SHEET_KINDS.indexOf(b.kind));

    const knownAssets = new Map<string, ListedAsset>();
    for (const { sheet, kind } of pending) {
      const rows = await this.readSheet(sheet, kind, { ...options, knownAssets });
      this.logger.log(`Read ${rows.length} row(s) from sheet "${sheet.name}" (${kind})`);
      if (isCategorySheet(kind)) {
        for (const { asset } of rows) {
          if (isListed(asset) && !knownAssets.has(asset.ticker)) {
            knownAssets.set(asset.ticker, asset);
          }
        }
      }
      result.rows.push(...rows);
    }

    return result;
  }

  /**
   * Validates the header of one sheet and normalizes its rows.
   * @throws MalformedSheetError on missing columns or bad cells
   */
  async readSheet(sheet: RawSheet, kind: SheetKind, options: ReadOptions): Promise<PositionRow[]> {
    const layout = SHEET_LAYOUTS[kind];
    if (sheet.rows.length === 0) {
      throw new MalformedSheetError({ sheet: sheet.name }, 'sheet has no header row');
    }

    const header = new SheetHeader(sheet.name, sheet.rows[0]);
    this.validateHeader(header, layout);

    const resolver: TickerResolver = {
      knownAsset: (ticker) => options.knownAssets?.get(ticker),
      lookup: async (ticker) => {
        const type = await this.tickerLookup.lookupAssetType(ticker);
        return type === null ? null : classFromSearch(type);
      },
    };

    const rows: PositionRow[] = [];
    let afterGap = false;
    for (let index = 1; index < sheet.rows.length; index++) {
      const row = new SheetRow(header, index + 1, sheet.rows[index]);
      if (row.isBlank()) {
        afterGap = rows.length > 0;
        continue;
      }
      // Below a blank line, a row without identifier starts the footer (totals).
      if (afterGap && row.isEmpty(layout.identifier)) {
        this.logger.debug(`Sheet "${sheet.name}": footer from row ${row.rowNumber} skipped`);
        break;
      }
      rows.push(await this.parseRow(row, layout, resolver, options));
    }
    return rows;
  }

  private validateHeader(header: SheetHeader, layout: SheetLayout): void {
    const missing = header.missing([COLUMNS.BROKER, COLUMNS.QUANTITY, ...layout.columns]);
    if (!PRICE_COLUMNS.some(({ column }) => header.has(column))) {
      missing.push(COLUMNS.PRICE);
    }
    if (missing.length > 0) {
      throw new MalformedSheetError(
        { sheet: header.sheet },
        `missing required column(s): ${missing.join(', ')}`,
      );
    }
  }

  private async parseRow(
    row: SheetRow,
    layout: SheetLayout,
    resolver: TickerResolver,
    options: ReadOptions,
  ): Promise<PositionRow> {
    // identifier first, so a half-filled row reports the missing asset
    row.text(layout.identifier);

    const asset = await layout.toAsset(row, resolver);
    const broker = row.text(COLUMNS.BROKER);
    const quantity = row.decimal(COLUMNS.QUANTITY);
    if (!quantity.greaterThan(ZERO)) {
      return row.fail(COLUMNS.QUANTITY, `quantity must be positive, found ${quantity.toString()}`);
    }

    return {
      asset,
      category: asset.category,
      key: assetKey(asset, broker),
      operation: this.operation(row),
      quantity,
      unitPrice: this.unitPrice(row, quantity),
      date: row.has(COLUMNS.DATE) ? row.date(COLUMNS.DATE) : options.referenceDate,
      opening: !row.has(COLUMNS.DATE),
      broker,
      sheet: layout.kind,
      sourceRow: row.rowNumber,
    };
  }

  // Snapshot sheets have no operation column: every row is a holding.
  private operation(row: SheetRow): Operation {
    if (!row.has(COLUMNS.OPERATION)) {
      return Operation.BUY;
    }
    const value = row.text(COLUMNS.OPERATION);
    const operation = OPERATIONS.get(normalizeText(value));
    if (operation === undefined) {
      return row.fail(COLUMNS.OPERATION, `unknown operation "${value}"`);
    }
    return operation;
  }

  private unitPrice(row: SheetRow, quantity: Decimal): Decimal {
    const source = PRICE_COLUMNS.find(({ column }) => row.has(column));
    if (source === undefined) {
      return row.fail(COLUMNS.PRICE, 'column is missing');
    }
    const value = row.decimal(source.column);
    if (value.isNegative()) {
      return row.fail(source.column, `value must not be negative, found ${value.toString()}`);
    }
    return source.total ? divide(value, quantity) : value;
  }
}
