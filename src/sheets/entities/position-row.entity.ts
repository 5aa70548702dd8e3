import Decimal from 'decimal.js';
import { Asset, AssetCategory } from './asset.entity';
import { SheetKind } from './sheet-kind';

export enum Operation {
  BUY = 'buy',
  SELL = 'sell',
}

// One normalized line of a source sheet.
// Immutable; consumed by the aggregator.
export interface PositionRow {
  readonly asset: Asset;
  readonly category: AssetCategory;
  readonly key: string;              // asset identity within category
  readonly operation: Operation;
  readonly quantity: Decimal;        // always positive
  readonly unitPrice: Decimal;
  readonly date: Date;
  readonly opening: boolean;         // holding from a positions sheet, folded before any movement
  readonly broker: string;
  readonly sheet: SheetKind;         // where the row came from
  readonly sourceRow: number;        // 1-based row in that sheet
}
