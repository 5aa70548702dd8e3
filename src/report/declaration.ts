import Decimal from 'decimal.js';
import { formatBRL, formatQuantity } from '../common/utils/decimal.util';
import { formatDate, yearEnd } from '../common/utils/date.util';
import { productSuffix } from '../common/utils/text.util';
import { Asset, FundType, StockType } from '../sheets/entities/asset.entity';

// "Bens e Direitos" group and code of each asset type.
export interface DeclarationCode {
  group: number;
  code: number;
}

// Subscription receipts have no code of their own; 99/99 flags them for review.
const FUND_CODES: Record<FundType, DeclarationCode> = {
  FII: { group: 7, code: 3 },
  FII_RECEIPT: { group: 99, code: 99 },
  FIDC: { group: 7, code: 10 },
};

export function declarationCode(asset: Asset): DeclarationCode {
  switch (asset.category) {
    case 'stocks':
      return { group: 3, code: 1 };
    case 'bdrs':
      return { group: 4, code: 4 };
    case 'etfs':
      return { group: 7, code: 8 };
    case 'funds':
      return FUND_CODES[asset.fundType];
    case 'fixed-income':
      return asset.fixedIncomeType === 'CDB' ? { group: 4, code: 2 } : { group: 4, code: 3 };
    case 'treasury':
      return { group: 4, code: 2 };
  }
}

/** Two-digit form used by the declaration program: 3 → "03" */
export function padCode(value: number): string {
  return String(value).padStart(2, '0');
}

export function assetTypeLabel(asset: Asset): string {
  switch (asset.category) {
    case 'stocks':
      return asset.stockType;
    case 'bdrs':
      return 'BDR';
    case 'etfs':
      return 'ETF';
    case 'funds':
      return asset.fundType;
    case 'fixed-income':
      return asset.fixedIncomeType;
    case 'treasury':
      return 'TESOURO';
  }
}

/**
 * 14 digits → "00.000.000/0000-00". Listed assets without a CNPJ in the
 * report are "Desconhecido"; assets declared without one are "N/A".
 */
export function formatCnpj(asset: Asset): string {
  if (asset.category === 'stocks' || asset.category === 'etfs' || asset.category === 'funds') {
    const { cnpj } = asset;
    if (cnpj === null) {
      return 'Desconhecido';
    }
    if (cnpj.length !== 14) {
      return cnpj;
    }
    return `${cnpj.slice(0, 2)}.${cnpj.slice(2, 5)}.${cnpj.slice(5, 8)}/${cnpj.slice(8, 12)}-${cnpj.slice(12)}`;
  }
  return 'N/A';
}

/** Matured before the last day of the declaration year */
export function hasMatured(asset: Asset, year: number): boolean {
  if (asset.category === 'fixed-income' || asset.category === 'treasury') {
    return asset.maturityDate < yearEnd(year);
  }
  return false;
}

const STOCK_LABELS: Record<StockType, string> = {
  ON: 'ações ON',
  PN: 'ações PN',
  UNIT: 'UNITs',
};

/**
 * pt-BR asset description as typed into the declaration program.
 */
export function describeAsset(asset: Asset, quantity: Decimal, broker: string): string {
  const q = formatQuantity(quantity);
  switch (asset.category) {
    case 'stocks':
      return `${q} ${STOCK_LABELS[asset.stockType]} emitidas pela empresa ${productSuffix(asset.name)}`;
    case 'bdrs':
      return `${q} BDRs da empresa ${productSuffix(asset.name)}`;
    case 'etfs':
      return `${q} cotas do ETF ${productSuffix(asset.name)}`;
    case 'funds':
      if (asset.fundType === 'FII_RECEIPT') {
        return `${q} recibos de subscrição do fundo ${productSuffix(asset.name)} (código de negociação: ${asset.ticker})`;
      }
      return `${q} cotas do fundo ${productSuffix(asset.name)}`;
    case 'fixed-income': {
      const custody = `com vencimento em ${formatDate(asset.maturityDate)}, sob custódia da corretora ${broker}`;
      if (asset.fixedIncomeType === 'CDB') {
        return `${q} CDBs emitidos pelo banco ${asset.issuer}, ${custody}`;
      }
      return `${q} ${asset.fixedIncomeType}s emitidas pelo banco ${asset.issuer}, ${custody}`;
    }
    case 'treasury':
      return `${q} títulos do ${asset.name}, com vencimento em ${formatDate(asset.maturityDate)}, sob custódia da corretora ${broker}`;
  }
}

/** " - Posição encerrada em 10/05/2024 com lucro de R$ 200,00" */
export function closedPositionSuffix(closedAt: Date, realizedGain: Decimal): string {
  const outcome = realizedGain.isNegative() ? 'prejuízo' : 'lucro';
  return ` - Posição encerrada em ${formatDate(closedAt)} com ${outcome} de ${formatBRL(realizedGain.abs())}`;
}
