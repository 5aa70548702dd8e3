import { Test, TestingModule } from '@nestjs/testing';
import { MalformedSheetError } from '../common/errors/report.errors';
import { Cell, RawSheet } from '../workbook/entities/raw-sheet.entity';
import { Operation } from './entities/position-row.entity';
import { SheetReaderService } from './sheet-reader.service';
import { TickerLookupService } from './ticker-lookup.service';

describe('SheetReaderService', () => {
  let service: SheetReaderService;
  let lookupAssetType: jest.Mock;

  const referenceDate = new Date(2024, 11, 31);
  const options = { referenceDate };

  const sheet = (name: string, header: Cell[], ...rows: Cell[][]): RawSheet => ({
    name,
    rows: [header, ...rows],
  });

  const STOCKS_HEADER: Cell[] = [
    'Produto', 'Instituição', 'Código de Negociação', 'CNPJ da Empresa', 'Tipo',
    'Data do Negócio', 'Tipo de Movimentação', 'Quantidade', 'Preço',
  ];

  const petr4 = (overrides: Partial<Record<number, Cell>> = {}): Cell[] => {
    const row: Cell[] = [
      'PETR4 - PETROLEO BRASILEIRO S.A. PETROBRAS', 'XP INVESTIMENTOS', 'PETR4', 33000167000101, 'PN',
      '02/01/2024', 'Compra', 100, 10,
    ];
    Object.entries(overrides).forEach(([index, value]) => {
      row[Number(index)] = value ?? null;
    });
    return row;
  };

  beforeEach(async () => {
    lookupAssetType = jest.fn().mockResolvedValue(null);
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SheetReaderService,
        { provide: TickerLookupService, useValue: { lookupAssetType } },
      ],
    }).compile();

    service = module.get<SheetReaderService>(SheetReaderService);
  });

  describe('readSheet - stocks', () => {
    it('should normalize a movement row', async () => {
      const [row] = await service.readSheet(sheet('Acoes', STOCKS_HEADER, petr4()), 'stocks', options);

      expect(row.asset).toEqual({
        category: 'stocks',
        ticker: 'PETR4',
        name: 'PETR4 - PETROLEO BRASILEIRO S.A. PETROBRAS',
        stockType: 'PN',
        cnpj: '33000167000101',
      });
      expect(row.category).toBe('stocks');
      expect(row.key).toBe('PETR4');
      expect(row.operation).toBe(Operation.BUY);
      expect(row.quantity.toString()).toBe('100');
      expect(row.unitPrice.toString()).toBe('10');
      expect(row.date).toEqual(new Date(2024, 0, 2));
      expect(row.opening).toBe(false);
      expect(row.broker).toBe('XP INVESTIMENTOS');
      expect(row.sheet).toBe('stocks');
      expect(row.sourceRow).toBe(2);
    });

    it('should read disposals and pt-BR numbers', async () => {
      const [row] = await service.readSheet(
        sheet('Acoes', STOCKS_HEADER, petr4({ 6: 'Venda', 7: '1.500,00', 8: '15,50' })),
        'stocks',
        options,
      );

      expect(row.operation).toBe(Operation.SELL);
      expect(row.quantity.toString()).toBe('1500');
      expect(row.unitPrice.toString()).toBe('15.5');
    });

    it('should skip blank rows', async () => {
      const rows = await service.readSheet(
        sheet('Acoes', STOCKS_HEADER, petr4(), [null, null], petr4({ 7: 50 }), ['', '  '], []),
        'stocks',
        options,
      );

      expect(rows).toHaveLength(2);
      expect(rows[1].sourceRow).toBe(4);
    });

    it('should stop at a footer below the data', async () => {
      const totals: Cell[] = ['', '', '', '', '', '', '', '', 1000];
      const rows = await service.readSheet(
        sheet('Acoes', STOCKS_HEADER, petr4(), [], totals, petr4({ 0: null, 8: 'Total' })),
        'stocks',
        options,
      );

      expect(rows).toHaveLength(1);
      expect(rows[0].sourceRow).toBe(2);
    });

    it('should not take a row without identifier for a footer before any data', async () => {
      await expect(
        service.readSheet(sheet('Acoes', STOCKS_HEADER, [], ['', '', '', '', '', '', '', '', 1000]), 'stocks', options),
      ).rejects.toThrow('Malformed sheet "Acoes" at row 3, column "Produto": required value is empty');
    });

    it('should fail when a required column is missing', async () => {
      const header = STOCKS_HEADER.filter((column) => column !== 'Tipo');

      await expect(service.readSheet(sheet('Acoes', header, petr4()), 'stocks', options)).rejects.toThrow(
        new MalformedSheetError({ sheet: 'Acoes' }, 'missing required column(s): Tipo'),
      );
    });

    it('should fail when no value column is present', async () => {
      const header = STOCKS_HEADER.filter((column) => column !== 'Preço');

      await expect(service.readSheet(sheet('Acoes', header), 'stocks', options)).rejects.toThrow(
        'Malformed sheet "Acoes": missing required column(s): Preço',
      );
    });

    it('should fail on a row without identifier', async () => {
      await expect(
        service.readSheet(sheet('Acoes', STOCKS_HEADER, petr4(), petr4({ 0: null })), 'stocks', options),
      ).rejects.toThrow('Malformed sheet "Acoes" at row 3, column "Produto": required value is empty');
    });

    it('should fail on a row without value', async () => {
      await expect(
        service.readSheet(sheet('Acoes', STOCKS_HEADER, petr4({ 8: '' })), 'stocks', options),
      ).rejects.toThrow('Malformed sheet "Acoes" at row 2, column "Preço": required value is empty');
    });

    it('should fail on mistyped cells', async () => {
      await expect(
        service.readSheet(sheet('Acoes', STOCKS_HEADER, petr4({ 7: 'cem' })), 'stocks', options),
      ).rejects.toThrow('column "Quantidade": expected a number, found "cem"');

      await expect(
        service.readSheet(sheet('Acoes', STOCKS_HEADER, petr4({ 5: '2024-01-02' })), 'stocks', options),
      ).rejects.toThrow('column "Data do Negócio": expected a dd/mm/yyyy date, found "2024-01-02"');

      await expect(
        service.readSheet(sheet('Acoes', STOCKS_HEADER, petr4({ 4: 'PNZ' })), 'stocks', options),
      ).rejects.toThrow('column "Tipo": unknown type "PNZ"');

      await expect(
        service.readSheet(sheet('Acoes', STOCKS_HEADER, petr4({ 6: 'Bonificação' })), 'stocks', options),
      ).rejects.toThrow('column "Tipo de Movimentação": unknown operation "Bonificação"');
    });

    it('should reject non-positive quantities', async () => {
      await expect(
        service.readSheet(sheet('Acoes', STOCKS_HEADER, petr4({ 7: 0 })), 'stocks', options),
      ).rejects.toThrow('quantity must be positive, found 0');
    });

    it('should match headers regardless of accents and case', async () => {
      const header = STOCKS_HEADER.map((column) => String(column).toUpperCase().replace('Ç', 'C'));
      const rows = await service.readSheet(sheet('Ações', header, petr4()), 'stocks', options);

      expect(rows).toHaveLength(1);
    });

    it('should fail on a sheet without header row', async () => {
      await expect(service.readSheet({ name: 'Acoes', rows: [] }, 'stocks', options)).rejects.toThrow(
        'Malformed sheet "Acoes": sheet has no header row',
      );
    });
  });

  describe('readSheet - snapshot sheets', () => {
    it('should read treasury holdings as opening balances', async () => {
      const [row] = await service.readSheet(
        sheet(
          'Tesouro Direto',
          ['Produto', 'Instituição', 'Vencimento', 'Quantidade', 'Valor Aplicado'],
          ['Tesouro IPCA+ 2035', 'NU INVEST', '15/05/2035', 2.5, 5000],
        ),
        'treasury',
        options,
      );

      expect(row.asset).toEqual({
        category: 'treasury',
        name: 'Tesouro IPCA+ 2035',
        maturityDate: new Date(2035, 4, 15),
      });
      expect(row.key).toBe('Tesouro IPCA+ 2035 - NU INVEST');
      expect(row.operation).toBe(Operation.BUY);
      expect(row.unitPrice.toString()).toBe('2000');
      expect(row.date).toBe(referenceDate);
      expect(row.opening).toBe(true);
    });

    it('should read fixed income type from the product name', async () => {
      const header: Cell[] = ['Produto', 'Instituição', 'Emissor', 'Vencimento', 'Quantidade', 'Preço'];
      const [cdb, lci] = await service.readSheet(
        sheet(
          'Renda Fixa',
          header,
          ['CDB - BANCO INTER S.A.', 'INTER DTVM', 'Banco Inter', '10/01/2026', 2, 1000],
          ['LCI - BANCO XP', 'XP INVESTIMENTOS', 'Banco XP', '20/06/2025', 1, 500],
        ),
        'fixed-income',
        options,
      );

      expect(cdb.asset).toEqual({
        category: 'fixed-income',
        fixedIncomeType: 'CDB',
        name: 'CDB - BANCO INTER S.A.',
        issuer: 'BANCO INTER',
        maturityDate: new Date(2026, 0, 10),
      });
      expect(cdb.key).toBe('CDB - BANCO INTER S.A. - INTER DTVM');
      expect(lci.asset.category).toBe('fixed-income');
      expect(lci.asset).toMatchObject({ fixedIncomeType: 'LCI' });
    });

    it('should reject unknown fixed income products', async () => {
      await expect(
        service.readSheet(
          sheet(
            'Renda Fixa',
            ['Produto', 'Instituição', 'Emissor', 'Vencimento', 'Quantidade', 'Preço'],
            ['CRI - SECURITIZADORA', 'XP INVESTIMENTOS', 'Securitizadora', '10/01/2026', 1, 1000],
          ),
          'fixed-income',
          options,
        ),
      ).rejects.toThrow('column "Produto": unknown type "CRI"');
    });

    it('should map fund types', async () => {
      const header: Cell[] = [
        'Produto', 'Instituição', 'Código de Negociação', 'CNPJ do Fundo', 'Tipo', 'Quantidade', 'Preço Médio',
      ];
      const [fii, receipt, fidc] = await service.readSheet(
        sheet(
          'Fundo de Investimento',
          header,
          ['HGLG11 - CSHG LOGISTICA', 'XP INVESTIMENTOS', 'HGLG11', '11.728.688/0001-47', 'Cotas', 10, 160],
          ['HGLG13 - CSHG LOGISTICA', 'XP INVESTIMENTOS', 'HGLG13', null, 'Recibo', 2, 150],
          ['CPTI11 - CAPITANIA', 'XP INVESTIMENTOS', 'CPTI11', 123, 'Fundo', 5, 90],
        ),
        'funds',
        options,
      );

      expect(fii.asset).toMatchObject({ category: 'funds', fundType: 'FII', cnpj: '11728688000147' });
      expect(fii.unitPrice.toString()).toBe('160');
      expect(receipt.asset).toMatchObject({ fundType: 'FII_RECEIPT', cnpj: null });
      expect(fidc.asset).toMatchObject({ fundType: 'FIDC', cnpj: '00000000000123' });
    });

    it('should read BDRs and ETFs', async () => {
      const [bdr] = await service.readSheet(
        sheet(
          'BDR',
          ['Produto', 'Instituição', 'Código de Negociação', 'Quantidade', 'Preço'],
          ['AAPL34 - APPLE INC', 'XP INVESTIMENTOS', 'AAPL34', 3, 50],
        ),
        'bdrs',
        options,
      );
      const [etf] = await service.readSheet(
        sheet(
          'ETF',
          ['Produto', 'Instituição', 'Código de Negociação', 'Quantidade', 'Preço'],
          ['BOVA11 - ISHARES BOVA', 'XP INVESTIMENTOS', 'BOVA11', 4, 120],
        ),
        'etfs',
        options,
      );

      expect(bdr.asset).toEqual({ category: 'bdrs', ticker: 'AAPL34', name: 'AAPL34 - APPLE INC' });
      expect(etf.asset).toEqual({ category: 'etfs', ticker: 'BOVA11', name: 'BOVA11 - ISHARES BOVA', cnpj: null });
    });
  });

  describe('readSheet - stock loans and trades', () => {
    const LOANS_HEADER: Cell[] = ['Produto', 'Instituição', 'Quantidade', 'Preço'];

    it('should classify loaned assets by ticker suffix', async () => {
      const [itsa, bdr] = await service.readSheet(
        sheet(
          'Empréstimos',
          LOANS_HEADER,
          ['ITSA4 - ITAUSA S.A.', 'XP INVESTIMENTOS', 200, 9],
          ['MSFT34 - MICROSOFT', 'XP INVESTIMENTOS', 1, 60],
        ),
        'stock-loans',
        options,
      );

      expect(itsa.asset).toEqual({
        category: 'stocks',
        ticker: 'ITSA4',
        name: 'ITSA4 - ITAUSA S.A.',
        stockType: 'PN',
        cnpj: null,
      });
      expect(itsa.category).toBe('stocks');
      expect(itsa.sheet).toBe('stock-loans');
      expect(bdr.category).toBe('bdrs');
      expect(lookupAssetType).not.toHaveBeenCalled();
    });

    it('should look up ambiguous tickers online', async () => {
      lookupAssetType.mockResolvedValueOnce('Stock');

      const [row] = await service.readSheet(
        sheet('Empréstimos', LOANS_HEADER, ['TAEE11 - TAESA', 'XP INVESTIMENTOS', 10, 35]),
        'stock-loans',
        options,
      );

      expect(lookupAssetType).toHaveBeenCalledWith('TAEE11');
      expect(row.asset).toMatchObject({ category: 'stocks', stockType: 'UNIT' });
    });

    it('should fail when the asset class cannot be determined', async () => {
      await expect(
        service.readSheet(
          sheet('Empréstimos', LOANS_HEADER, ['TAEE11 - TAESA', 'XP INVESTIMENTOS', 10, 35]),
          'stock-loans',
          options,
        ),
      ).rejects.toThrow('column "Produto": could not determine the asset class of ticker TAEE11');
    });

    it('should read exchange trades', async () => {
      lookupAssetType.mockResolvedValueOnce('ETF');

      const rows = await service.readSheet(
        sheet(
          'Negociação',
          ['Data do Negócio', 'Tipo de Movimentação', 'Instituição', 'Código de Negociação', 'Quantidade', 'Preço', 'Valor'],
          ['05/02/2024', 'Compra', 'XP INVESTIMENTOS', 'PETR4F', 7, 38.5, 269.5],
          ['06/03/2024', 'Venda', 'XP INVESTIMENTOS', 'PETR4', 2, 40, 80],
          ['07/03/2024', 'Compra', 'XP INVESTIMENTOS', 'BOVA11', 1, 120, 120],
        ),
        'trades',
        options,
      );

      expect(rows.map((row) => [row.key, row.category, row.operation])).toEqual([
        ['PETR4', 'stocks', Operation.BUY],
        ['PETR4', 'stocks', Operation.SELL],
        ['BOVA11', 'etfs', Operation.BUY],
      ]);
      expect(rows[0].asset.name).toBe('PETR4');
    });
  });

  describe('readSheets', () => {
    it('should warn about unrecognized sheets and keep going', async () => {
      const result = await service.readSheets(
        [
          sheet('Proventos', ['Produto', 'Valor']),
          sheet('Acoes', STOCKS_HEADER, petr4()),
          sheet('Resumo', ['Total']),
        ],
        options,
      );

      expect(result.rows).toHaveLength(1);
      expect(result.recognized).toEqual(['Acoes']);
      expect(result.warnings).toEqual([
        {
          kind: 'UnrecognizedCategory',
          sheet: 'Proventos',
          message: 'Sheet "Proventos" is not a known B3 category. Skipping...',
        },
        {
          kind: 'UnrecognizedCategory',
          sheet: 'Resumo',
          message: 'Sheet "Resumo" is not a known B3 category. Skipping...',
        },
      ]);
    });

    it('should resolve movement tickers against assets of category sheets', async () => {
      const taee11: Cell[] = ['TAEE11 - TAESA', 'XP INVESTIMENTOS', 'TAEE11', null, 'UNIT', '02/01/2024', 'Compra', 100, 35];
      const result = await service.readSheets(
        [
          sheet(
            'Negociação',
            ['Data do Negócio', 'Tipo de Movimentação', 'Instituição', 'Código de Negociação', 'Quantidade', 'Preço'],
            ['10/04/2024', 'Compra', 'XP INVESTIMENTOS', 'TAEE11', 10, 36],
          ),
          sheet('Empréstimos', ['Produto', 'Instituição', 'Quantidade', 'Preço'], ['PETR4 - PETROBRAS PN', 'XP INVESTIMENTOS', 5, 30]),
          sheet('Acoes', STOCKS_HEADER, taee11, petr4()),
        ],
        options,
      );

      expect(result.recognized).toEqual(['Negociação', 'Empréstimos', 'Acoes']);
      expect(result.rows.map((row) => [row.sheet, row.key])).toEqual([
        ['stocks', 'TAEE11'],
        ['stocks', 'PETR4'],
        ['stock-loans', 'PETR4'],
        ['trades', 'TAEE11'],
      ]);
      expect(result.rows[3].asset).toBe(result.rows[0].asset);
      expect(result.rows[3].asset).toMatchObject({ stockType: 'UNIT', name: 'TAEE11 - TAESA' });
      expect(result.rows[2].asset).toMatchObject({ cnpj: '33000167000101' });
      expect(lookupAssetType).not.toHaveBeenCalled();
    });

    it('should return nothing but warnings when no sheet is recognized', async () => {
      const result = await service.readSheets([sheet('Planilha1', ['A'])], options);

      expect(result.rows).toEqual([]);
      expect(result.recognized).toEqual([]);
      expect(result.warnings.map((warning) => warning.sheet)).toEqual(['Planilha1']);
    });
  });
});
