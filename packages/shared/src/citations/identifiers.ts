/**
 * Letter identifier forms.
 *
 * The registry and the letter body disagree on how an identifier is written:
 * "90-753", "A-90-753", "90753", "A90753" and the old "90A753" can all name
 * the same letter. Every comparison between identifiers goes through the
 * variant set built here.
 */

export type LetterPrefix = 'A' | 'I' | 'M';

export const LETTER_PREFIXES: readonly LetterPrefix[] = ['A', 'I', 'M'];

export interface IdentifierCore {
  prefix: LetterPrefix | null;
  year: string;
  number: string;
}

function asPrefix(value: string): LetterPrefix | null {
  return value === 'A' || value === 'I' || value === 'M' ? value : null;
}

/**
 * Year and sequence number of an identifier, or null for forms that carry
 * neither (placeholders, free text).
 */
export function parseIdentifierCore(id: string): IdentifierCore | null {
  const upper = id.trim().toUpperCase();

  // A-22-078
  let m = /^([AIM])-(\d{2})-(\d{3,4})$/.exec(upper);
  if (m) return { prefix: asPrefix(m[1]), year: m[2], number: m[3] };

  // 90-753
  m = /^(\d{2})-(\d{3,4})$/.exec(upper);
  if (m) return { prefix: null, year: m[1], number: m[2] };

  // 84263
  m = /^(\d{2})(\d{3,4})$/.exec(upper);
  if (m) return { prefix: null, year: m[1], number: m[2] };

  // A22078
  m = /^([AIM])(\d{2})(\d{3,4})$/.exec(upper);
  if (m) return { prefix: asPrefix(m[1]), year: m[2], number: m[3] };

  // 83A195
  m = /^(\d{2})([AIM])(\d{3,4})$/.exec(upper);
  if (m) return { prefix: asPrefix(m[2]), year: m[1], number: m[3] };

  // 16-079-1090: compound ids lead with the core
  m = /^(\d{2})-(\d{3,4})-/.exec(upper);
  if (m) return { prefix: null, year: m[1], number: m[2] };

  return null;
}

/**
 * Every written form of an identifier: the literal id, the bare dashed and
 * compact forms, and each prefix in dashed, compact and old infix form.
 */
export function identifierVariants(id: string): Set<string> {
  const literal = id.trim().toUpperCase();
  const variants = new Set<string>([literal]);

  const core = parseIdentifierCore(literal);
  if (!core) return variants;

  const { year, number } = core;
  variants.add(`${year}-${number}`);
  variants.add(`${year}${number}`);
  for (const prefix of LETTER_PREFIXES) {
    variants.add(`${prefix}-${year}-${number}`);
    variants.add(`${prefix}${year}${number}`);
    variants.add(`${year}${prefix}${number}`);
  }
  return variants;
}

/**
 * Canonical form for a cited identifier when no stored document matches it.
 * Prefix defaults to A, the advice letter series.
 */
export function normalizePriorDecision(raw: string): string {
  const id = raw.trim().toUpperCase();

  if (/^[AIM]-\d{2}-\d{3}$/.test(id)) return id;
  if (/^\d{5}$/.test(id)) return `A-${id.slice(0, 2)}-${id.slice(2)}`;
  if (/^\d{2}-\d{3}$/.test(id)) return `A-${id}`;
  return id;
}

/**
 * Map from every variant of every stored identifier to the stored form.
 * A stored identifier always maps to itself; where two stored identifiers
 * share a variant, the one that sorts first keeps it.
 */
export function buildVariantLookup(ids: Iterable<string>): Map<string, string> {
  const sorted = Array.from(new Set(ids)).sort();
  const lookup = new Map<string, string>();

  for (const id of sorted) {
    lookup.set(id.toUpperCase(), id);
  }
  for (const id of sorted) {
    for (const variant of identifierVariants(id)) {
      if (!lookup.has(variant)) lookup.set(variant, id);
    }
  }
  return lookup;
}
