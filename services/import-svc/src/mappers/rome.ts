import { z } from 'zod';

import type { Competency } from '../types';
import { compactCompetency, parseRecord, uniqueSorted, type MapperContext, type MapperFactory } from './contract';

export const ROME_SHEET_URL = 'https://candidat.pole-emploi.fr/metierscope/fiche-metier';

export const romeRecordSchema = z.object({
  code: z.string().min(1),
  intitule: z.string().min(1),
  category: z.string(),
  description: z.string(),
  keywords: z.array(z.string()),
  indexed_text: z.string().nullish()
});

export type RomeRecord = z.infer<typeof romeRecordSchema>;

/**
 * Expands a two-sided appellation such as `"Agent / Agente de sécurité"`.
 * The longer side lends its extra leading words (prefix) or trailing words
 * (suffix) to the shorter one.
 */
export function splitRomeAppellation(appellation: string): string[] {
  if (!appellation.includes('/')) {
    return [appellation];
  }

  const parts = appellation.split('/').map((part) => part.trim());
  if (parts.length !== 2) {
    return [appellation];
  }

  const [left, right] = parts;
  const leftWords = left.split(/\s+/).filter(Boolean);
  const rightWords = right.split(/\s+/).filter(Boolean);

  let first = left;
  let second = right;

  if (leftWords.length > rightWords.length) {
    const prefix = leftWords.slice(0, leftWords.length - rightWords.length).join(' ');
    second = `${prefix} ${right}`;
  } else if (rightWords.length > leftWords.length) {
    const suffix = rightWords.slice(leftWords.length - rightWords.length).join(' ');
    first = `${left} ${suffix}`;
  }

  return [first.trim(), second.trim()];
}

export class RomeMapper {
  constructor(private readonly record: RomeRecord, private readonly context: MapperContext) {}

  toCompetency(): Competency {
    const { record } = this;

    return compactCompetency({
      code: record.code,
      lang: this.context.lang,
      type: this.context.type,
      provider: this.context.provider,
      title: record.intitule,
      url: `${ROME_SHEET_URL}/${record.code}`,
      category: record.category,
      description: record.description,
      keywords: uniqueSorted(record.keywords.flatMap(splitRomeAppellation)),
      indexed_text: record.indexed_text || record.intitule
    });
  }
}

export const createRomeMapper: MapperFactory = (raw, context) =>
  new RomeMapper(parseRecord(romeRecordSchema, raw, context.provider), context);
