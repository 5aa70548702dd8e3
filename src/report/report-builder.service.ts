import { Injectable } from '@nestjs/common';
import { ZERO } from '../common/utils/decimal.util';
import { formatDate } from '../common/utils/date.util';
import { AssetAggregate } from '../aggregation/entities/asset-aggregate.entity';
import { isListed } from '../sheets/entities/asset.entity';
import { PositionRow } from '../sheets/entities/position-row.entity';
import { UnrecognizedCategoryWarning } from '../sheets/entities/sheet-kind';
import {
  assetTypeLabel,
  closedPositionSuffix,
  declarationCode,
  describeAsset,
  formatCnpj,
  hasMatured,
  padCode,
} from './declaration';
import { DeclarationEntry, InventoryEntry, IrpfReport } from './entities/irpf-report.entity';

export const NOTES = {
  MATURED: (date: string) => `Título vencido em ${date}`,
  STOCK_LOAN: 'Inclui ativos em empréstimo (aluguel de ações)',
  MISSING_CNPJ: 'CNPJ não informado no relatório, verificar',
} as const;

// Turns finalized aggregates into declaration and inventory entries.
@Injectable()
export class ReportBuilderService {
  /**
   * Year of the latest movement, or the fallback when there is none.
   * Opening balances are dated before the year and do not count.
   */
  declarationYear(rows: readonly PositionRow[], fallback: number): number {
    return rows.reduce<number | null>((latest, row) => {
      if (row.opening) {
        return latest;
      }
      const year = row.date.getFullYear();
      return latest === null || year > latest ? year : latest;
    }, null) ?? fallback;
  }

  build(
    aggregates: readonly AssetAggregate[],
    year: number,
    warnings: UnrecognizedCategoryWarning[] = [],
  ): IrpfReport {
    return {
      year,
      entries: aggregates.map((aggregate) => this.toDeclarationEntry(aggregate, year)),
      inventory: aggregates
        .filter((aggregate) => aggregate.quantity.greaterThan(ZERO))
        .map((aggregate) => this.toInventoryEntry(aggregate)),
      warnings,
    };
  }

  toDeclarationEntry(aggregate: AssetAggregate, year: number): DeclarationEntry {
    const { asset } = aggregate;
    const { group, code } = declarationCode(asset);
    const brokers = aggregate.brokers.join(', ');
    const closed = aggregate.quantity.isZero();
    const matured = hasMatured(asset, year);

    let description = describeAsset(asset, aggregate.quantity, brokers);
    if (closed && !matured && aggregate.lastDisposalDate !== null) {
      description += closedPositionSuffix(aggregate.lastDisposalDate, aggregate.realizedGain);
    }

    const notes: string[] = [];
    if ((asset.category === 'fixed-income' || asset.category === 'treasury') && matured) {
      notes.push(NOTES.MATURED(formatDate(asset.maturityDate)));
    }
    if (aggregate.sheets.includes('stock-loans')) {
      notes.push(NOTES.STOCK_LOAN);
    }
    const cnpj = formatCnpj(asset);
    if (cnpj === 'Desconhecido') {
      notes.push(NOTES.MISSING_CNPJ);
    }

    return {
      layout: isListed(asset) ? 'listed' : 'fixed-income',
      category: aggregate.category,
      group: padCode(group),
      code: padCode(code),
      cnpj,
      ticker: isListed(asset) ? asset.ticker : null,
      name: asset.name,
      issuer: asset.category === 'fixed-income' ? asset.issuer : null,
      maturityDate: 'maturityDate' in asset ? formatDate(asset.maturityDate) : null,
      brokers,
      description,
      quantity: aggregate.quantity,
      averageCost: aggregate.averageCost,
      situation: closed ? ZERO : aggregate.totalInvested,
      realizedGain: aggregate.realizedGain,
      closed,
      notes,
    };
  }

  toInventoryEntry(aggregate: AssetAggregate): InventoryEntry {
    const { asset } = aggregate;
    return {
      category: aggregate.category,
      name: asset.name,
      brokers: aggregate.brokers.join(', '),
      type: assetTypeLabel(asset),
      cnpj: formatCnpj(asset),
      ticker: isListed(asset) ? asset.ticker : null,
      maturityDate: 'maturityDate' in asset ? formatDate(asset.maturityDate) : null,
      issuer: asset.category === 'fixed-income' ? asset.issuer : null,
      quantity: aggregate.quantity,
      averageCost: aggregate.averageCost,
      situation: aggregate.totalInvested,
    };
  }
}
