import Decimal from 'decimal.js';
import { AssetCategory } from '../../sheets/entities/asset.entity';
import { UnrecognizedCategoryWarning } from '../../sheets/entities/sheet-kind';

// Field sets differ between exchange-listed assets and bonds/notes.
export type DeclarationLayout = 'listed' | 'fixed-income';

// One "Bens e Direitos" line.
export interface DeclarationEntry {
  layout: DeclarationLayout;
  category: AssetCategory;
  group: string;
  code: string;
  cnpj: string;
  ticker: string | null;
  name: string;
  issuer: string | null;
  maturityDate: string | null;     // dd/MM/yyyy
  brokers: string;
  description: string;
  quantity: Decimal;
  averageCost: Decimal;
  situation: Decimal;              // amount held on 31/12, zero once closed
  realizedGain: Decimal;
  closed: boolean;
  notes: string[];
}

// Open position carried into next year's declaration.
export interface InventoryEntry {
  category: AssetCategory;
  name: string;
  brokers: string;
  type: string;
  cnpj: string;
  ticker: string | null;
  maturityDate: string | null;
  issuer: string | null;
  quantity: Decimal;
  averageCost: Decimal;
  situation: Decimal;
}

export interface IrpfReport {
  year: number;
  entries: DeclarationEntry[];
  inventory: InventoryEntry[];
  warnings: UnrecognizedCategoryWarning[];
}
