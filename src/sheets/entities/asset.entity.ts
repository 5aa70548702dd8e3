export type AssetCategory = 'stocks' | 'bdrs' | 'etfs' | 'funds' | 'fixed-income' | 'treasury';

// Declaration order of categories in the report.
export const ASSET_CATEGORIES: readonly AssetCategory[] = [
  'stocks',
  'bdrs',
  'etfs',
  'funds',
  'fixed-income',
  'treasury',
];

export type StockType = 'ON' | 'PN' | 'UNIT';
export type FundType = 'FII' | 'FII_RECEIPT' | 'FIDC';
export type FixedIncomeType = 'CDB' | 'LCI' | 'LCA';

interface ListedAssetBase {
  ticker: string;
  name: string;
}

export interface StockAsset extends ListedAssetBase {
  category: 'stocks';
  stockType: StockType;
  cnpj: string | null;
}

export interface BdrAsset extends ListedAssetBase {
  category: 'bdrs';
}

export interface EtfAsset extends ListedAssetBase {
  category: 'etfs';
  cnpj: string | null;
}

export interface FundAsset extends ListedAssetBase {
  category: 'funds';
  fundType: FundType;
  cnpj: string | null;
}

export interface FixedIncomeAsset {
  category: 'fixed-income';
  fixedIncomeType: FixedIncomeType;
  name: string;
  issuer: string;
  maturityDate: Date;
}

export interface TreasuryAsset {
  category: 'treasury';
  name: string;
  maturityDate: Date;
}

export type ListedAsset = StockAsset | BdrAsset | EtfAsset | FundAsset;
export type Asset = ListedAsset | FixedIncomeAsset | TreasuryAsset;

export function isListed(asset: Asset): asset is ListedAsset {
  return 'ticker' in asset;
}

/**
 * Asset identity within its category. Listed assets are identified by
 * ticker; bonds and notes by name plus custodian, since the same title
 * held at two brokers is declared twice.
 */
export function assetKey(asset: Asset, broker: string): string {
  return isListed(asset) ? asset.ticker : `${asset.name} - ${broker}`;
}
