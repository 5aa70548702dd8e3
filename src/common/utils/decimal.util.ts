import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

export const ZERO = new Decimal(0);

const PT_BR_NUMBER = /^-?\d{1,3}(\.\d{3})*(,\d+)?$|^-?\d+(,\d+)?$/;
const PLAIN_NUMBER = /^-?\d+(\.\d+)?$/;

/**
 * Parses a spreadsheet number. Numeric cells pass through; strings may be
 * pt-BR (`1.234,56`, `1.000`, `R$ 10,00`) or plain (`1234.56`).
 * Returns null when the value is not a number.
 */
export function parseDecimal(value: unknown): Decimal | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(value) : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.replace(/R\$/g, '').replace(/\s+/g, '');
  // "1.000" is one thousand: dotted groups of three digits are always pt-BR
  if (PT_BR_NUMBER.test(text)) {
    return new Decimal(text.replace(/\./g, '').replace(',', '.'));
  }
  if (PLAIN_NUMBER.test(text)) {
    return new Decimal(text);
  }
  return null;
}

/**
 * Money amount as a plain string with 2 decimal places, e.g. "1234.50".
 */
export function toMoneyString(value: Decimal): string {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2);
}

/**
 * Money amount rounded to cents as a JavaScript number, for spreadsheet cells.
 */
export function toMoneyNumber(value: Decimal): number {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

function groupThousands(integerPart: string): string {
  return integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
}

/**
 * Brazilian currency text: "R$ 1.234,50". Negative values get a leading "-".
 */
export function formatBRL(value: Decimal): string {
  const [integerPart, fraction] = value.abs().toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2).split('.');
  const sign = value.isNegative() && !value.isZero() ? '-' : '';
  return `${sign}R$ ${groupThousands(integerPart)},${fraction}`;
}

/**
 * Quantity in pt-BR notation without trailing zeros: 100 → "100", 1.5 → "1,5".
 */
export function formatQuantity(value: Decimal): string {
  const [integerPart, fraction] = value.toFixed().split('.');
  const grouped = groupThousands(integerPart);
  return fraction ? `${grouped},${fraction}` : grouped;
}

/**
 * Safe division with zero check.
 */
export function divide(a: Decimal, b: Decimal): Decimal {
  if (b.isZero()) {
    throw new Error('Division by zero');
  }
  return a.dividedBy(b);
}
