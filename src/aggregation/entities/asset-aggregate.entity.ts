import Decimal from 'decimal.js';
import { Asset, AssetCategory } from '../../sheets/entities/asset.entity';
import { SheetKind } from '../../sheets/entities/sheet-kind';

// Per-asset running state, folded row by row in date order.
// averageCost is the weighted average of acquisitions still held.
export interface AssetAggregate {
  category: AssetCategory;
  key: string;
  asset: Asset;
  quantity: Decimal;
  averageCost: Decimal;
  totalInvested: Decimal;       // quantity × averageCost
  realizedGain: Decimal;        // Σ disposed × (price − averageCost)
  totalAcquired: Decimal;
  totalDisposed: Decimal;
  lastDisposalDate: Date | null;
  brokers: string[];            // custodians in first-seen order
  sheets: SheetKind[];          // source sheets in first-seen order
  rowCount: number;
}
