import type {
  ClassifiedColumn,
  ColumnClassification,
  ColumnKeywords,
  ColumnRole,
} from '../types.js';

const matchesAny = (name: string, keywords: readonly string[]): boolean => {
  const lower = name.toLowerCase();
  return keywords.some((keyword) => keyword !== '' && lower.includes(keyword.toLowerCase()));
};

/**
 * First header containing a datetime keyword, in header order.
 */
export const detectDatetimeColumn = (
  columnNames: readonly string[],
  keywords: readonly string[]
): string | undefined => {
  return columnNames.find((name) => matchesAny(name, keywords));
};

/**
 * Every header containing a volume keyword, in header order, without
 * duplicates.
 */
export const detectVolumeColumns = (
  columnNames: readonly string[],
  keywords: readonly string[]
): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const name of columnNames) {
    if (!seen.has(name) && matchesAny(name, keywords)) {
      seen.add(name);
      result.push(name);
    }
  }

  return result;
};

const rolesFor = (name: string, keywords: ColumnKeywords): ColumnRole[] => {
  const roles: ColumnRole[] = [];
  if (matchesAny(name, keywords.datetime)) roles.push('Datetime');
  if (matchesAny(name, keywords.volume)) roles.push('VolumeCandidate');
  return roles.length > 0 ? roles : ['Other'];
};

/**
 * Assigns roles to headers using the keyword table.
 *
 * Never fails: a missing datetime column is reported as `undefined` and an
 * empty `volumeColumns` list means nothing looked like a measurement.
 */
export const classifyColumns = (
  columnNames: readonly string[],
  keywords: ColumnKeywords
): ColumnClassification => {
  const columns: ClassifiedColumn[] = columnNames.map((name) => ({
    name,
    roles: rolesFor(name, keywords),
  }));

  return {
    datetimeColumn: detectDatetimeColumn(columnNames, keywords.datetime),
    volumeColumns: detectVolumeColumns(columnNames, keywords.volume),
    columns,
  };
};
