import type { TypeClass } from '../types/schema';

const INTEGER_TYPE = /\b(tiny|small|medium|big)?int(eger|[248])?\b|serial/;
const STRING_TYPE = /char|text|string|clob|enum/;

export const classifyType = (sqlType: string): TypeClass => {
  const t = sqlType
    .toLowerCase()
    .replace(/\(.*?\)/g, '')
    .replace(/\bunsigned\b/g, '')
    .trim();

  if (t.includes('uuid') || t.includes('uniqueidentifier')) return 'uuid';
  if (t.includes('date') || t.includes('time') || t.includes('interval') || t === 'year') return 'temporal';
  if (INTEGER_TYPE.test(t)) return 'integer';
  if (STRING_TYPE.test(t)) return 'string';
  return 'other';
};

/** Declared types compared loosely: case and surrounding space only. */
export const sameDeclaredType = (a: string, b: string) => a.trim().toLowerCase() === b.trim().toLowerCase();
