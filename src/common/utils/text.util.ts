/**
 * Folds accents, case and repeated whitespace so that "Ações", "ACOES" and
 * " acoes " compare equal.
 */
export function normalizeText(input: unknown): string {
  return String(input ?? '')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

/** Text after the first "-" of a B3 product name ("PETR4 - PETROBRAS" → "PETROBRAS") */
export function productSuffix(name: string): string {
  const index = name.indexOf('-');
  return index === -1 ? name.trim() : name.slice(index + 1).trim();
}

/** Text before the first "-" of a B3 product name ("CDB - BANCO X" → "CDB") */
export function productPrefix(name: string): string {
  const index = name.indexOf('-');
  return index === -1 ? name.trim() : name.slice(0, index).trim();
}
