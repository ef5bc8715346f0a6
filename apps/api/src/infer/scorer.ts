import type { ColumnModel, InferredBasis, TableModel } from '../types/schema';
import { entityStem, nameSimilarity, normalizeName, tableNameVariants } from '../utils/similarity';
import { sameDeclaredType } from '../utils/type-class';

export type CandidateScore = {
  confidence: number;
  basis: InferredBasis;
};

// Names that say nothing about which entity they point at. Valid as targets only.
const GENERIC_NAMES = new Set([
  'id',
  'key',
  'name',
  'title',
  'status',
  'state',
  'type',
  'kind',
  'code',
  'value',
  'label',
  'description'
]);

const HIERARCHY_MARKERS = ['parent', 'manager', 'supervisor', 'superior', 'ancestor'];

const EXACT_SCORE = 0.95;
const EXACT_SAME_TYPE_SCORE = 0.98;
const PATTERN_THRESHOLD = 0.7;
const PATTERN_MIN = 0.5;
const PATTERN_MAX = 0.92;
const HIERARCHICAL_SCORE = 0.9;
const HIERARCHICAL_LOOSE_SCORE = 0.8;

const round2 = (n: number) => Number(n.toFixed(2));

export const isGenericName = (columnName: string) => GENERIC_NAMES.has(normalizeName(columnName));

const hierarchyRemainder = (stem: string): string | null => {
  for (const marker of HIERARCHY_MARKERS) {
    if (stem.startsWith(marker)) return stem.slice(marker.length);
    if (stem.endsWith(marker)) return stem.slice(0, -marker.length);
  }
  return null;
};

const scoreHierarchical = (stem: string, keyed: boolean, table: TableModel): CandidateScore | null => {
  if (!keyed) return null;
  const remainder = hierarchyRemainder(stem);
  if (remainder === null) return null;

  const namesTable = remainder === '' || tableNameVariants(table.name).includes(remainder);
  return {
    confidence: namesTable ? HIERARCHICAL_SCORE : HIERARCHICAL_LOOSE_SCORE,
    basis: 'HIERARCHICAL'
  };
};

/** Linear map of [PATTERN_THRESHOLD, 1] onto [PATTERN_MIN, PATTERN_MAX]. */
const patternConfidence = (similarity: number) =>
  round2(PATTERN_MIN + ((PATTERN_MAX - PATTERN_MIN) * (similarity - PATTERN_THRESHOLD)) / (1 - PATTERN_THRESHOLD));

/**
 * Scores `sourceColumn` of `sourceTable` as a reference to `targetKey`, the
 * primary key of `targetTable`. Returns null when the pair is not a
 * candidate at all.
 */
export const scoreCandidate = (
  sourceColumn: ColumnModel,
  sourceTable: TableModel,
  targetTable: TableModel,
  targetKey: ColumnModel
): CandidateScore | null => {
  if (isGenericName(sourceColumn.name)) return null;

  const { stem, keyed } = entityStem(sourceColumn.name);
  if (!stem) return null;

  if (sourceColumn.typeClass !== targetKey.typeClass) return null;

  if (sourceTable.name === targetTable.name) {
    if (sourceColumn.name === targetKey.name) return null;
    return scoreHierarchical(stem, keyed, targetTable);
  }

  const variants = tableNameVariants(targetTable.name);
  const sameName = sourceColumn.name.toLowerCase() === targetKey.name.toLowerCase();
  if (sameName && variants.includes(stem)) {
    return {
      confidence: sameDeclaredType(sourceColumn.dataType, targetKey.dataType) ? EXACT_SAME_TYPE_SCORE : EXACT_SCORE,
      basis: 'EXACT_MATCH'
    };
  }

  if (!keyed) return null;

  const keyStem = entityStem(targetKey.name).stem;
  const references = keyStem && !isGenericName(targetKey.name) ? [...variants, keyStem] : variants;
  const similarity = Math.max(0, ...references.map(ref => nameSimilarity(stem, ref)));
  if (similarity < PATTERN_THRESHOLD) return null;

  return { confidence: patternConfidence(similarity), basis: 'PATTERN_MATCH' };
};
