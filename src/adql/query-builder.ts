/**
 * ADQL Query Builder
 *
 * Composes ADQL statements against pscomppars.
 *
 * The archive evaluates `SELECT TOP n ... ORDER BY x` by cutting the row set
 * before the ordering is applied to the whole table, so "top n by x" is not
 * guaranteed. Ranked queries therefore order every matching row inside a
 * subquery and limit in the outer query through the ROWNUM pseudo-column:
 *
 * ```sql
 * SELECT pl_name, pl_masse
 * FROM (
 *   SELECT pl_name, pl_masse
 *   FROM pscomppars
 *   WHERE pl_masse IS NOT NULL
 *   ORDER BY pl_masse DESC, pl_name ASC
 * )
 * WHERE ROWNUM <= 10
 * ```
 */

import { ValidationError } from '../errors.js';
import { NAME_COLUMN, PLANET_TABLE } from './columns.js';

export type Literal = string | number;

export type Predicate =
  | { kind: 'equals'; column: string; value: Literal }
  | { kind: 'in'; column: string; values: readonly Literal[] }
  | { kind: 'contains'; column: string; value: string }
  | { kind: 'range'; column: string; min?: number; max?: number; exclusive?: boolean }
  | { kind: 'notNull'; column: string };

export type SortDirection = 'ASC' | 'DESC';

export interface Ordering {
  /** Column name or expression over columns (never user text) */
  expression: string;
  direction: SortDirection;
}

export interface RankedQuerySpec {
  columns: readonly string[];
  filters?: readonly Predicate[];
  orderBy: Ordering;
  limit: number;
  table?: string;
}

export interface LookupQuerySpec {
  columns: readonly string[];
  filters: readonly Predicate[];
  table?: string;
}

export interface CountAggregate {
  alias: string;
  /** Count distinct values of this column; omitted means COUNT(*) */
  distinct?: string;
}

export interface GroupedCountQuerySpec {
  groupBy: string;
  counts: readonly CountAggregate[];
  filters?: readonly Predicate[];
  orderBy: Ordering;
  table?: string;
}

/**
 * Quote a string literal, doubling embedded single quotes.
 */
export function quoteString(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

function renderLiteral(column: string, value: Literal): string {
  if (typeof value === 'string') return quoteString(value);
  if (!Number.isFinite(value)) {
    throw new ValidationError(column, `must be a finite number, received ${value}`);
  }
  return String(value);
}

/**
 * Render one predicate, or null when it constrains nothing (a range without bounds).
 */
export function renderPredicate(predicate: Predicate): string | null {
  const { column } = predicate;
  switch (predicate.kind) {
    case 'equals':
      return `${column} = ${renderLiteral(column, predicate.value)}`;

    case 'in': {
      if (predicate.values.length === 0) {
        throw new ValidationError(column, 'must list at least one value');
      }
      const values = predicate.values.map(v => renderLiteral(column, v)).join(', ');
      return `${column} IN (${values})`;
    }

    case 'contains':
      if (/[%_]/.test(predicate.value)) {
        throw new ValidationError(column, 'substring must not contain the LIKE wildcards % or _');
      }
      return `${column} LIKE ${quoteString(`%${predicate.value}%`)}`;

    case 'range': {
      const lower = predicate.exclusive ? '>' : '>=';
      const upper = predicate.exclusive ? '<' : '<=';
      const parts: string[] = [];
      if (predicate.min !== undefined) parts.push(`${column} ${lower} ${renderLiteral(column, predicate.min)}`);
      if (predicate.max !== undefined) parts.push(`${column} ${upper} ${renderLiteral(column, predicate.max)}`);
      return parts.length > 0 ? parts.join(' AND ') : null;
    }

    case 'notNull':
      return `${column} IS NOT NULL`;
  }
}

/**
 * Join predicates with AND. Returns null when nothing constrains the query.
 */
export function renderWhere(filters: readonly Predicate[] = []): string | null {
  const rendered = filters
    .map(renderPredicate)
    .filter((clause): clause is string => clause !== null);
  return rendered.length > 0 ? rendered.join(' AND ') : null;
}

/**
 * Primary ordering followed by the identifier, so ties come back in the same
 * order on every call.
 */
export function renderOrderBy(ordering: Ordering): string {
  const primary = `${ordering.expression} ${ordering.direction}`;
  return ordering.expression === NAME_COLUMN ? primary : `${primary}, ${NAME_COLUMN} ASC`;
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError('limit', `must be a positive integer, received ${limit}`);
  }
}

function assertColumns(columns: readonly string[]): void {
  if (columns.length === 0) {
    throw new ValidationError('columns', 'must select at least one column');
  }
}

/**
 * Top-n query: globally ordered subquery, limited in the outer query.
 */
export function buildRankedQuery(spec: RankedQuerySpec): string {
  assertColumns(spec.columns);
  assertLimit(spec.limit);

  const columns = spec.columns.join(', ');
  const where = renderWhere(spec.filters);

  return [
    `SELECT ${columns}`,
    'FROM (',
    `  SELECT ${columns}`,
    `  FROM ${spec.table ?? PLANET_TABLE}`,
    ...(where ? [`  WHERE ${where}`] : []),
    `  ORDER BY ${renderOrderBy(spec.orderBy)}`,
    ')',
    `WHERE ROWNUM <= ${spec.limit}`,
  ].join('\n');
}

/**
 * Unordered, unlimited selection (lookups by name).
 */
export function buildLookupQuery(spec: LookupQuerySpec): string {
  assertColumns(spec.columns);
  const where = renderWhere(spec.filters);

  return [
    `SELECT ${spec.columns.join(', ')}`,
    `FROM ${spec.table ?? PLANET_TABLE}`,
    ...(where ? [`WHERE ${where}`] : []),
  ].join('\n');
}

/**
 * Counts grouped by one column.
 */
export function buildGroupedCountQuery(spec: GroupedCountQuerySpec): string {
  if (spec.counts.length === 0) {
    throw new ValidationError('counts', 'must request at least one count');
  }
  const aggregates = spec.counts.map(({ alias, distinct }) =>
    distinct ? `COUNT(DISTINCT ${distinct}) AS ${alias}` : `COUNT(*) AS ${alias}`
  );
  const where = renderWhere(spec.filters);

  return [
    `SELECT ${[spec.groupBy, ...aggregates].join(', ')}`,
    `FROM ${spec.table ?? PLANET_TABLE}`,
    ...(where ? [`WHERE ${where}`] : []),
    `GROUP BY ${spec.groupBy}`,
    `ORDER BY ${spec.orderBy.expression} ${spec.orderBy.direction}`,
  ].join('\n');
}
