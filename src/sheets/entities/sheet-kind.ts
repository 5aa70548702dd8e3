import { normalizeText } from '../../common/utils/text.util';

export type SheetKind =
  | 'stocks'
  | 'bdrs'
  | 'etfs'
  | 'funds'
  | 'fixed-income'
  | 'treasury'
  | 'stock-loans'
  | 'trades';

// B3 sheet names, compared accent- and case-insensitively.
export const SHEET_NAMES: Record<SheetKind, readonly string[]> = {
  stocks: ['Acoes', 'Ações'],
  bdrs: ['BDR'],
  etfs: ['ETF'],
  funds: ['Fundo de Investimento'],
  'fixed-income': ['Renda Fixa'],
  treasury: ['Tesouro Direto'],
  'stock-loans': ['Empréstimos'],
  trades: ['Negociação'],
};

// Processing order: category sheets first, so that stock loans and trades
// can resolve their tickers against the assets those sheets declare.
export const SHEET_KINDS: readonly SheetKind[] = [
  'stocks',
  'bdrs',
  'etfs',
  'funds',
  'fixed-income',
  'treasury',
  'stock-loans',
  'trades',
];

const KIND_BY_NAME = new Map<string, SheetKind>(
  SHEET_KINDS.flatMap((kind) => SHEET_NAMES[kind].map((name): [string, SheetKind] => [normalizeText(name), kind])),
);

/** Category sheets declare assets; stock loans and trades only move them */
export function isCategorySheet(kind: SheetKind): boolean {
  return kind !== 'stock-loans' && kind !== 'trades';
}

/** Returns null for sheets that are not one of the known B3 layouts */
export function resolveSheetKind(sheetName: string): SheetKind | null {
  return KIND_BY_NAME.get(normalizeText(sheetName)) ?? null;
}

// Sheet present in the workbook but skipped.
export interface UnrecognizedCategoryWarning {
  kind: 'UnrecognizedCategory';
  sheet: string;
  message: string;
}
