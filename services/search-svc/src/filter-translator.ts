import { ValidationError } from '@competency-search/common';

import { FILTER_OPERATORS, type FilterOperator, type JsonScalar, type SearchFilter } from './types';

export type RangeOperator = 'gt' | 'gte' | 'lt' | 'lte';

export type CompiledCondition =
  | { kind: 'equals'; path: string[]; values: JsonScalar[]; negate: boolean }
  | { kind: 'isNull'; path: string[]; negate: boolean }
  | { kind: 'range'; path: string[]; operator: RangeOperator; value: number };

/**
 * Store-independent form of a filter list. Repositories render it natively
 * (SQL for pgvector, a matcher for the in-memory store).
 */
export type CompiledPredicate =
  | { kind: 'conjunction'; conditions: CompiledCondition[] }
  | { kind: 'matchNothing'; reason: string };

type FieldShape = 'scalar' | 'list' | 'object';

const ROOT_FIELDS: Readonly<Record<string, FieldShape>> = {
  code: 'scalar',
  lang: 'scalar',
  type: 'scalar',
  provider: 'scalar',
  title: 'scalar',
  url: 'scalar',
  category: 'scalar',
  description: 'scalar',
  indexed_text: 'scalar',
  keywords: 'list',
  metadata: 'object'
};

const KNOWN_OPERATORS: ReadonlySet<string> = new Set<string>(FILTER_OPERATORS);
const RANGE_OPERATORS: ReadonlySet<string> = new Set<RangeOperator>(['gt', 'gte', 'lt', 'lte']);

export const MATCH_ALL: CompiledPredicate = { kind: 'conjunction', conditions: [] };

function isFilterOperator(value: unknown): value is FilterOperator {
  return typeof value === 'string' && KNOWN_OPERATORS.has(value);
}

function isRangeOperator(operator: FilterOperator): operator is RangeOperator {
  return RANGE_OPERATORS.has(operator);
}

function isScalar(value: unknown): value is JsonScalar {
  return typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
}

function parsePath(field: unknown, position: number): string[] {
  if (typeof field !== 'string' || field.trim().length === 0) {
    throw new ValidationError(`Filter #${position} has an empty field path.`, { details: { position } });
  }

  const segments = field.split('.').map((segment) => segment.trim());
  if (segments.some((segment) => segment.length === 0)) {
    throw new ValidationError(`Filter #${position} has a malformed field path "${field}".`, {
      details: { position, field }
    });
  }

  return segments;
}

/** False when the path cannot exist on any stored competency. */
function isKnownPath(path: string[]): boolean {
  const shape = ROOT_FIELDS[path[0]];
  if (!shape) {
    return false;
  }

  return shape === 'object' || path.length === 1;
}

function compileCondition(filter: SearchFilter, path: string[], position: number): CompiledCondition | 'matchNothing' | null {
  const { operator, value } = filter;

  if (isRangeOperator(operator)) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ValidationError(`Operator "${operator}" on "${filter.field}" requires a numeric value.`, {
        details: { position, field: filter.field, operator }
      });
    }
    return { kind: 'range', path, operator, value };
  }

  if (operator === 'eq' || operator === 'neq') {
    const negate = operator === 'neq';
    if (value === null) {
      return { kind: 'isNull', path, negate };
    }
    if (!isScalar(value)) {
      throw new ValidationError(`Operator "${operator}" on "${filter.field}" requires a scalar or null value.`, {
        details: { position, field: filter.field, operator }
      });
    }
    return { kind: 'equals', path, values: [value], negate };
  }

  if (!Array.isArray(value) || !value.every(isScalar)) {
    throw new ValidationError(`Operator "${operator}" on "${filter.field}" requires an array of scalar values.`, {
      details: { position, field: filter.field, operator }
    });
  }

  const values: JsonScalar[] = value.filter(isScalar);
  if (values.length === 0) {
    return operator === 'in' ? 'matchNothing' : null;
  }

  return { kind: 'equals', path, values, negate: operator === 'nin' };
}

/**
 * Compiles an ordered filter list into a single conjunctive predicate.
 * Unknown field paths compile to a predicate that matches nothing.
 */
export function compileFilters(filters: readonly SearchFilter[] | undefined): CompiledPredicate {
  if (!filters || filters.length === 0) {
    return MATCH_ALL;
  }

  const conditions: CompiledCondition[] = [];
  let unmatched: string | null = null;

  for (const [position, filter] of filters.entries()) {
    if (!isFilterOperator(filter.operator)) {
      throw new ValidationError(`Filter #${position} has an unsupported operator "${String(filter.operator)}".`, {
        details: { position, supported: [...FILTER_OPERATORS] }
      });
    }

    const path = parsePath(filter.field, position);
    const condition = compileCondition(filter, path, position);

    if (!isKnownPath(path)) {
      unmatched ??= `Field "${filter.field}" does not exist on competencies.`;
    } else if (condition === 'matchNothing') {
      unmatched ??= `Filter on "${filter.field}" has an empty "in" list.`;
    } else if (condition) {
      conditions.push(condition);
    }
  }

  if (unmatched !== null) {
    return { kind: 'matchNothing', reason: unmatched };
  }

  return { kind: 'conjunction', conditions };
}

function collectValues(current: unknown, path: readonly string[], output: unknown[]): void {
  if (Array.isArray(current)) {
    for (const item of current) {
      collectValues(item, path, output);
    }
    return;
  }

  if (path.length === 0) {
    output.push(current);
    return;
  }

  if (current === null || typeof current !== 'object') {
    return;
  }

  if (!Object.hasOwn(current, path[0])) {
    return;
  }

  const next: unknown = Reflect.get(current, path[0]);
  if (next === undefined) {
    return;
  }

  collectValues(next, path.slice(1), output);
}

/** Values reached by a dotted path, with arrays unwrapped at every level. */
export function resolvePath(document: unknown, path: readonly string[]): unknown[] {
  const output: unknown[] = [];
  collectValues(document, path, output);
  return output;
}

function compareRange(operator: RangeOperator, actual: number, expected: number): boolean {
  switch (operator) {
    case 'gt':
      return actual > expected;
    case 'gte':
      return actual >= expected;
    case 'lt':
      return actual < expected;
    case 'lte':
      return actual <= expected;
  }
}

function matchesCondition(document: unknown, condition: CompiledCondition): boolean {
  const resolved = resolvePath(document, condition.path);

  switch (condition.kind) {
    case 'equals': {
      const hit = resolved.some((candidate) => condition.values.some((expected) => candidate === expected));
      return condition.negate ? !hit : hit;
    }
    case 'isNull': {
      const hasValue = resolved.some((candidate) => candidate !== null);
      return condition.negate ? hasValue : !hasValue;
    }
    case 'range':
      return resolved.some(
        (candidate) => typeof candidate === 'number' && compareRange(condition.operator, candidate, condition.value)
      );
  }
}

export function matchesPredicate(document: unknown, predicate: CompiledPredicate): boolean {
  if (predicate.kind === 'matchNothing') {
    return false;
  }

  return predicate.conditions.every((condition) => matchesCondition(document, condition));
}
