import {
  Asset,
  FixedIncomeType,
  FundType,
  ListedAsset,
  StockType,
} from './entities/asset.entity';
import { SheetKind } from './entities/sheet-kind';
import { SheetRow } from './sheet-row';
import { TickerClass, classifyTicker, normalizeTicker } from './ticker-classifier';
import { normalizeText, productPrefix } from '../common/utils/text.util';

// B3 report column headers.
export const COLUMNS = {
  NAME: 'Produto',
  BROKER: 'Instituição',
  QUANTITY: 'Quantidade',
  DATE: 'Data do Negócio',
  OPERATION: 'Tipo de Movimentação',
  PRICE: 'Preço',
  AVERAGE_PRICE: 'Preço Médio',
  INVESTED_AMOUNT: 'Valor Aplicado',
  TICKER: 'Código de Negociação',
  TYPE: 'Tipo',
  COMPANY_CNPJ: 'CNPJ da Empresa',
  FUND_CNPJ: 'CNPJ do Fundo',
  ISSUER: 'Emissor',
  MATURITY: 'Vencimento',
} as const;

// Where the row value comes from, in order of preference.
export const PRICE_COLUMNS = [
  { column: COLUMNS.PRICE, total: false },
  { column: COLUMNS.AVERAGE_PRICE, total: false },
  { column: COLUMNS.INVESTED_AMOUNT, total: true },
] as const;

// How stock loans and trades name their asset from a bare ticker: an asset
// already declared by a category sheet wins, then the suffix, then the
// online search.
export interface TickerResolver {
  knownAsset(ticker: string): ListedAsset | undefined;
  lookup(ticker: string): Promise<TickerClass | null>;
}

export interface SheetLayout {
  kind: SheetKind;
  identifier: string;                 // column that names the asset
  columns: readonly string[];         // required besides broker and quantity
  toAsset(row: SheetRow, resolver: TickerResolver): Asset | Promise<Asset>;
}

const STOCK_TYPES: Record<string, StockType> = {
  on: 'ON',
  pn: 'PN',
  pna: 'PN',
  pnb: 'PN',
  unit: 'UNIT',
};

const FUND_TYPES: Record<string, FundType> = {
  cotas: 'FII',
  recibo: 'FII_RECEIPT',
  fundo: 'FIDC',
};

const FIXED_INCOME_TYPES: Record<string, FixedIncomeType> = {
  cdb: 'CDB',
  lci: 'LCI',
  lca: 'LCA',
};

function tag<T>(row: SheetRow, column: string, value: string, mapping: Record<string, T>): T {
  const key = normalizeText(value);
  if (!Object.prototype.hasOwnProperty.call(mapping, key)) {
    return row.fail(column, `unknown type "${value}"`);
  }
  return mapping[key];
}

/** Digits-only CNPJ, left-padded to 14 when the cell lost its leading zeros */
function cnpj(row: SheetRow, column: string): string | null {
  if (!row.has(column)) {
    return null;
  }
  const raw = row.optionalText(column);
  if (raw === null) {
    return null;
  }
  const digits = raw.replace(/\D/g, '');
  if (digits.length === 0 || digits.length > 14) {
    return row.fail(column, `invalid CNPJ "${raw}"`);
  }
  return digits.padStart(14, '0');
}

function ticker(row: SheetRow): string {
  return normalizeTicker(row.text(COLUMNS.TICKER));
}

function listedAsset(cls: TickerClass, tickerValue: string, name: string): ListedAsset {
  switch (cls.category) {
    case 'stocks':
      return { category: 'stocks', ticker: tickerValue, name, stockType: cls.stockType, cnpj: null };
    case 'bdrs':
      return { category: 'bdrs', ticker: tickerValue, name };
    case 'etfs':
      return { category: 'etfs', ticker: tickerValue, name, cnpj: null };
    case 'funds':
      return { category: 'funds', ticker: tickerValue, name, fundType: 'FII', cnpj: null };
  }
}

async function resolvedAsset(
  row: SheetRow,
  column: string,
  tickerValue: string,
  name: string,
  resolver: TickerResolver,
): Promise<ListedAsset> {
  const known = resolver.knownAsset(tickerValue);
  if (known !== undefined) {
    return known;
  }
  const cls = classifyTicker(tickerValue) ?? (await resolver.lookup(tickerValue));
  if (cls === null) {
    return row.fail(column, `could not determine the asset class of ticker ${tickerValue}`);
  }
  return listedAsset(cls, tickerValue, name);
}

const stocks: SheetLayout = {
  kind: 'stocks',
  identifier: COLUMNS.NAME,
  columns: [COLUMNS.NAME, COLUMNS.TICKER, COLUMNS.TYPE],
  toAsset: (row) => ({
    category: 'stocks',
    ticker: ticker(row),
    name: row.text(COLUMNS.NAME),
    stockType: tag(row, COLUMNS.TYPE, row.text(COLUMNS.TYPE), STOCK_TYPES),
    cnpj: cnpj(row, COLUMNS.COMPANY_CNPJ),
  }),
};

const bdrs: SheetLayout = {
  kind: 'bdrs',
  identifier: COLUMNS.NAME,
  columns: [COLUMNS.NAME, COLUMNS.TICKER],
  toAsset: (row) => ({
    category: 'bdrs',
    ticker: ticker(row),
    name: row.text(COLUMNS.NAME),
  }),
};

const etfs: SheetLayout = {
  kind: 'etfs',
  identifier: COLUMNS.NAME,
  columns: [COLUMNS.NAME, COLUMNS.TICKER],
  toAsset: (row) => ({
    category: 'etfs',
    ticker: ticker(row),
    name: row.text(COLUMNS.NAME),
    cnpj: cnpj(row, COLUMNS.FUND_CNPJ),
  }),
};

const funds: SheetLayout = {
  kind: 'funds',
  identifier: COLUMNS.NAME,
  columns: [COLUMNS.NAME, COLUMNS.TICKER, COLUMNS.TYPE],
  toAsset: (row) => ({
    category: 'funds',
    ticker: ticker(row),
    name: row.text(COLUMNS.NAME),
    fundType: tag(row, COLUMNS.TYPE, row.text(COLUMNS.TYPE), FUND_TYPES),
    cnpj: cnpj(row, COLUMNS.FUND_CNPJ),
  }),
};

const fixedIncome: SheetLayout = {
  kind: 'fixed-income',
  identifier: COLUMNS.NAME,
  columns: [COLUMNS.NAME, COLUMNS.ISSUER, COLUMNS.MATURITY],
  toAsset: (row) => {
    const name = row.text(COLUMNS.NAME);
    return {
      category: 'fixed-income',
      fixedIncomeType: tag(row, COLUMNS.NAME, productPrefix(name), FIXED_INCOME_TYPES),
      name,
      issuer: row.text(COLUMNS.ISSUER).toUpperCase(),
      maturityDate: row.date(COLUMNS.MATURITY),
    };
  },
};

const treasury: SheetLayout = {
  kind: 'treasury',
  identifier: COLUMNS.NAME,
  columns: [COLUMNS.NAME, COLUMNS.MATURITY],
  toAsset: (row) => ({
    category: 'treasury',
    name: row.text(COLUMNS.NAME),
    maturityDate: row.date(COLUMNS.MATURITY),
  }),
};

// "PETR4 - PETROBRAS PN": the loaned asset is named by its ticker prefix.
const stockLoans: SheetLayout = {
  kind: 'stock-loans',
  identifier: COLUMNS.NAME,
  columns: [COLUMNS.NAME],
  toAsset: (row, resolver) => {
    const name = row.text(COLUMNS.NAME);
    return resolvedAsset(row, COLUMNS.NAME, normalizeTicker(productPrefix(name)), name, resolver);
  },
};

// Exchange trades list tickers only; the ticker doubles as the name.
const trades: SheetLayout = {
  kind: 'trades',
  identifier: COLUMNS.TICKER,
  columns: [COLUMNS.TICKER, COLUMNS.DATE, COLUMNS.OPERATION],
  toAsset: (row, resolver) => {
    const tickerValue = ticker(row);
    return resolvedAsset(row, COLUMNS.TICKER, tickerValue, tickerValue, resolver);
  },
};

export const SHEET_LAYOUTS: Record<SheetKind, SheetLayout> = {
  stocks,
  bdrs,
  etfs,
  funds,
  'fixed-income': fixedIncome,
  treasury,
  'stock-loans': stockLoans,
  trades,
};
