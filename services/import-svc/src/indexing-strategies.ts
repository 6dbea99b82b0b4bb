import { ValidationError } from '@competency-search/common';

import { INDEXING_FIELDS, type Competency, type IndexingField, type IndexingStrategyName } from './types';

export const DEFAULT_FIELDS: readonly IndexingField[] = INDEXING_FIELDS;

/** Expands one mapped competency into the competencies actually sent for indexing. */
export interface IndexingStrategy {
  readonly name: IndexingStrategyName;
  expand(competency: Competency): Competency[];
}

function fieldValues(competency: Competency, field: IndexingField): string[] {
  switch (field) {
    case 'title':
      return [competency.title];
    case 'description':
      return competency.description ? [competency.description] : [];
    case 'category':
      return competency.category ? [competency.category] : [];
    case 'keywords':
      return competency.keywords ?? [];
  }
}

/** One competency per non-empty value of each selected field. */
export class FieldDuplicationStrategy implements IndexingStrategy {
  readonly name = 'field_duplication';

  constructor(private readonly fields: readonly IndexingField[]) {}

  expand(competency: Competency): Competency[] {
    return this.fields.flatMap((field) =>
      fieldValues(competency, field)
        .filter((value) => value.trim().length > 0)
        .map((value) => ({ ...competency, indexed_text: value }))
    );
  }
}

/** A single competency whose indexed text joins the selected fields. */
export class FieldCombinationStrategy implements IndexingStrategy {
  readonly name = 'field_combination';

  constructor(private readonly fields: readonly IndexingField[]) {}

  expand(competency: Competency): Competency[] {
    const parts = this.fields
      .map((field) => {
        const values = fieldValues(competency, field).filter((value) => value.trim().length > 0);
        if (field === 'keywords') {
          return values.join(', ');
        }
        const [value = ''] = values;
        return value.endsWith('.') ? value.slice(0, -1) : value;
      })
      .filter((part) => part.length > 0);

    return [{ ...competency, indexed_text: parts.join('. ').trim() }];
  }
}

/**
 * Without an explicit field list both strategies fall back to the default
 * fields.
 */
export function createIndexingStrategy(
  name: IndexingStrategyName = 'field_duplication',
  fields?: readonly IndexingField[]
): IndexingStrategy {
  const selected = fields && fields.length > 0 ? [...new Set(fields)] : DEFAULT_FIELDS;

  switch (name) {
    case 'field_duplication':
      return new FieldDuplicationStrategy(selected);
    case 'field_combination':
      return new FieldCombinationStrategy(selected);
    default:
      throw new ValidationError(`Unsupported indexing strategy: ${String(name)}`);
  }
}
