import { classFromSearch, classifyTicker, normalizeTicker } from './ticker-classifier';

describe('ticker-classifier', () => {
  describe('normalizeTicker', () => {
    it('should strip the fractional market suffix', () => {
      expect(normalizeTicker('PETR4F')).toBe('PETR4');
      expect(normalizeTicker(' itsa4f ')).toBe('ITSA4');
      expect(normalizeTicker('TAEE11F')).toBe('TAEE11');
    });

    it('should keep tickers that only end in F', () => {
      expect(normalizeTicker('PETR4')).toBe('PETR4');
      expect(normalizeTicker('IVVBF')).toBe('IVVBF');
    });
  });

  describe('classifyTicker', () => {
    it('should classify by B3 suffix', () => {
      expect(classifyTicker('VALE3')).toEqual({ category: 'stocks', stockType: 'ON' });
      expect(classifyTicker('PETR4')).toEqual({ category: 'stocks', stockType: 'PN' });
      expect(classifyTicker('USIM5')).toEqual({ category: 'stocks', stockType: 'PN' });
      expect(classifyTicker('AAPL34')).toEqual({ category: 'bdrs' });
      expect(classifyTicker('ROXO34')).toEqual({ category: 'bdrs' });
      expect(classifyTicker('AMZO35')).toEqual({ category: 'bdrs' });
    });

    it('should leave ambiguous tickers unresolved', () => {
      expect(classifyTicker('TAEE11')).toBeNull();
      expect(classifyTicker('XPTO')).toBeNull();
    });
  });

  it('should map search answers to asset classes', () => {
    expect(classFromSearch('Stock')).toEqual({ category: 'stocks', stockType: 'UNIT' });
    expect(classFromSearch('ETF')).toEqual({ category: 'etfs' });
    expect(classFromSearch('Fund')).toEqual({ category: 'funds' });
  });
});
