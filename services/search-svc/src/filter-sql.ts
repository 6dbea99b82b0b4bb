import type { CompiledCondition, CompiledPredicate, RangeOperator } from './filter-translator';
import type { JsonScalar } from './types';

export interface SqlFragment {
  clause: string;
  values: unknown[];
}

const RANGE_SYMBOLS: Record<RangeOperator, string> = {
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<='
};

/** `$."metadata"."level"`: every segment quoted so no key is read as jsonpath syntax. */
export function toJsonPath(path: readonly string[]): string {
  const quoted = path.map((segment) => `"${segment.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`);
  return `$.${quoted.join('.')}`;
}

interface ConditionParts {
  jsonPath: string;
  vars: Record<string, JsonScalar> | null;
  negate: boolean;
}

function describeCondition(condition: CompiledCondition): ConditionParts {
  const base = toJsonPath(condition.path);

  switch (condition.kind) {
    case 'equals': {
      const vars: Record<string, JsonScalar> = {};
      const tests = condition.values.map((value, index) => {
        vars[`v${index}`] = value;
        return `@ == $v${index}`;
      });
      return { jsonPath: `${base} ? (${tests.join(' || ')})`, vars, negate: condition.negate };
    }
    case 'isNull':
      // eq null holds when no non-null value exists at the path
      return { jsonPath: `${base} ? (@.type() != "null")`, vars: null, negate: !condition.negate };
    case 'range':
      return {
        jsonPath: `${base} ? (@.type() == "number" && @ ${RANGE_SYMBOLS[condition.operator]} $v0)`,
        vars: { v0: condition.value },
        negate: false
      };
  }
}

/**
 * Renders a compiled predicate as a SQL boolean over a JSONB column.
 * Placeholders start at `$${firstParameterIndex}`.
 */
export function renderSqlPredicate(
  predicate: CompiledPredicate,
  column: string,
  firstParameterIndex: number
): SqlFragment {
  if (predicate.kind === 'matchNothing') {
    return { clause: 'FALSE', values: [] };
  }

  if (predicate.conditions.length === 0) {
    return { clause: 'TRUE', values: [] };
  }

  const values: unknown[] = [];
  const clauses = predicate.conditions.map((condition) => {
    const parts = describeCondition(condition);
    values.push(parts.jsonPath);
    const pathParam = `$${firstParameterIndex + values.length - 1}::jsonpath`;

    let call: string;
    if (parts.vars) {
      values.push(JSON.stringify(parts.vars));
      const varsParam = `$${firstParameterIndex + values.length - 1}::jsonb`;
      call = `jsonb_path_exists(${column}, ${pathParam}, ${varsParam})`;
    } else {
      call = `jsonb_path_exists(${column}, ${pathParam})`;
    }

    return parts.negate ? `NOT ${call}` : call;
  });

  return { clause: clauses.join(' AND '), values };
}
