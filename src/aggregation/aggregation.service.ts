import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { NegativeQuantityError } from '../common/errors/report.errors';
import { ZERO, divide } from '../common/utils/decimal.util';
import { formatDate } from '../common/utils/date.util';
import { ASSET_CATEGORIES } from '../sheets/entities/asset.entity';
import { Operation, PositionRow } from '../sheets/entities/position-row.entity';
import { isCategorySheet } from '../sheets/entities/sheet-kind';
import { AssetAggregate } from './entities/asset-aggregate.entity';

// Weighted-average cost basis per (category, asset).
// All arithmetic in Decimal; no rounding until the report.
@Injectable()
export class AggregationService {
  private readonly logger = new Logger(AggregationService.name);

  /**
   * Groups rows by category and asset key, folds each group in date order
   * and returns the finalized aggregates sorted by category then key.
   * @throws NegativeQuantityError when a disposal exceeds the holding
   */
  aggregate(rows: readonly PositionRow[]): AssetAggregate[] {
    const groups = new Map<string, PositionRow[]>();
    for (const row of rows) {
      const groupKey = `${row.category}|${row.key}`;
      const group = groups.get(groupKey);
      if (group) {
        group.push(row);
      } else {
        groups.set(groupKey, [row]);
      }
    }

    const aggregates = Array.from(groups.values()).map((group) => this.foldGroup(group));
    this.logger.log(`Aggregated ${rows.length} row(s) into ${aggregates.length} asset(s)`);

    return aggregates.sort(
      (a, b) =>
        ASSET_CATEGORIES.indexOf(a.category) - ASSET_CATEGORIES.indexOf(b.category) ||
        a.key.localeCompare(b.key),
    );
  }

  /**
   * Folds the rows of a single asset: opening balances first, then movements
   * by date. Rows on the same date keep sheet order.
   */
  foldGroup(group: readonly PositionRow[]): AssetAggregate {
    const [first] = group;
    if (first === undefined) {
      throw new Error('Cannot aggregate an empty group');
    }
    // category sheets carry the CNPJ and company name; movements only the ticker
    const declared = group.find((row) => isCategorySheet(row.sheet)) ?? first;
    const aggregate: AssetAggregate = {
      category: first.category,
      key: first.key,
      asset: declared.asset,
      quantity: new Decimal(0),
      averageCost: new Decimal(0),
      totalInvested: new Decimal(0),
      realizedGain: new Decimal(0),
      totalAcquired: new Decimal(0),
      totalDisposed: new Decimal(0),
      lastDisposalDate: null,
      brokers: [],
      sheets: [],
      rowCount: 0,
    };

    // Array.prototype.sort is stable
    const ordered = [...group].sort(
      (a, b) => Number(b.opening) - Number(a.opening) || a.date.getTime() - b.date.getTime(),
    );
    for (const row of ordered) {
      this.apply(aggregate, row);
    }
    return aggregate;
  }

  // Mutates the aggregate with one row.
  private apply(aggregate: AssetAggregate, row: PositionRow): void {
    if (row.operation === Operation.BUY) {
      this.handleAcquisition(aggregate, row);
    } else {
      this.handleDisposal(aggregate, row);
    }

    aggregate.totalInvested = aggregate.quantity.times(aggregate.averageCost);
    aggregate.rowCount += 1;
    if (!aggregate.brokers.includes(row.broker)) {
      aggregate.brokers.push(row.broker);
    }
    if (!aggregate.sheets.includes(row.sheet)) {
      aggregate.sheets.push(row.sheet);
    }
  }

  // avg' = (q × avg + q_new × price) / (q + q_new)
  private handleAcquisition(aggregate: AssetAggregate, row: PositionRow): void {
    const quantity = aggregate.quantity.plus(row.quantity);
    const cost = aggregate.quantity.times(aggregate.averageCost).plus(row.quantity.times(row.unitPrice));

    aggregate.averageCost = divide(cost, quantity);
    aggregate.quantity = quantity;
    aggregate.totalAcquired = aggregate.totalAcquired.plus(row.quantity);
  }

  // Realizes (price − avg) per unit sold. Average cost is kept for what
  // remains and reset once the position is closed.
  private handleDisposal(aggregate: AssetAggregate, row: PositionRow): void {
    if (row.quantity.greaterThan(aggregate.quantity)) {
      throw new NegativeQuantityError(
        aggregate.key,
        formatDate(row.date),
        aggregate.quantity.toString(),
        row.quantity.toString(),
      );
    }

    const gain = row.unitPrice.minus(aggregate.averageCost).times(row.quantity);
    aggregate.realizedGain = aggregate.realizedGain.plus(gain);
    aggregate.quantity = aggregate.quantity.minus(row.quantity);
    aggregate.totalDisposed = aggregate.totalDisposed.plus(row.quantity);
    if (aggregate.lastDisposalDate === null || row.date > aggregate.lastDisposalDate) {
      aggregate.lastDisposalDate = row.date;
    }

    if (aggregate.quantity.isZero()) {
      aggregate.averageCost = ZERO;
    }
  }
}
