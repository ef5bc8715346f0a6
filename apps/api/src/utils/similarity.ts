import levenshtein from 'fast-levenshtein';

// Order matters: `_id` must be tried before the bare `id`.
const KEY_SUFFIXES = ['_id', '_key', '_fk', 'id'];

export type EntityStem = {
  stem: string;
  keyed: boolean; // a key suffix was stripped
};

export const normalizeName = (name: string) =>
  name
    .toLowerCase()
    .replace(/[_\s-]/g, '')
    .trim();

export const entityStem = (columnName: string): EntityStem => {
  const lower = columnName.trim().toLowerCase().replace(/[\s-]+/g, '_');
  for (const suffix of KEY_SUFFIXES) {
    if (lower.length > suffix.length && lower.endsWith(suffix)) {
      return { stem: normalizeName(lower.slice(0, -suffix.length)), keyed: true };
    }
  }
  return { stem: normalizeName(lower), keyed: false };
};

/** The table name plus its simple singular or plural forms, normalized. */
export const tableNameVariants = (tableName: string): string[] => {
  const base = normalizeName(tableName);
  if (!base) return [];

  const variants = new Set([base]);
  if (base.endsWith('ies') && base.length > 3) variants.add(`${base.slice(0, -3)}y`);
  if (base.endsWith('es') && base.length > 2) variants.add(base.slice(0, -2));
  if (base.endsWith('s') && base.length > 1) variants.add(base.slice(0, -1));
  else variants.add(`${base}s`);

  return Array.from(variants).sort();
};

export const nameSimilarity = (a: string, b: string) => {
  const na = normalizeName(a);
  const nb = normalizeName(b);
  if (!na || !nb) return 0;
  const dist = levenshtein.get(na, nb);
  const maxLen = Math.max(na.length, nb.length) || 1;
  return 1 - dist / maxLen;
};
