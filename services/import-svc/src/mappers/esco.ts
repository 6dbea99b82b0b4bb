import { z } from 'zod';

import type { Competency } from '../types';
import { capitalize, compactCompetency, parseRecord, splitList, uniqueSorted, type MapperContext, type MapperFactory } from './contract';

export const escoRecordSchema = z.object({
  preferredLabel: z.string().min(1),
  description: z.string(),
  conceptUri: z.string().min(1),
  altLabels: z.string().nullish(),
  hiddenLabels: z.string().nullish(),
  code: z.string().nullish(),
  category: z.string().nullish(),
  broaderConceptPT: z.string().nullish(),
  indexed_text: z.string().nullish()
});

export type EscoRecord = z.infer<typeof escoRecordSchema>;

/** `"A/B"` yields both halves; anything else stays whole. */
export function splitEscoAppellation(appellation: string): string[] {
  if (!appellation.includes('/')) {
    return [appellation];
  }
  const parts = appellation.split('/').map((part) => part.trim());
  return parts.length === 2 ? parts : [appellation];
}

function altLabelList(altLabels: string | null | undefined): string[] {
  if (!altLabels) {
    return [];
  }
  if (altLabels.includes(' | ')) {
    return splitList(altLabels, ' | ');
  }
  return splitList(altLabels, '\n');
}

export class EscoMapper {
  constructor(private readonly record: EscoRecord, private readonly context: MapperContext) {}

  toCompetency(): Competency {
    const { record } = this;
    const title = capitalize(record.preferredLabel.trim());
    const category = record.category || record.broaderConceptPT?.trim().replace(/ \| /g, ', ');

    const keywords = [...altLabelList(record.altLabels), ...splitList(record.hiddenLabels, '\n')];
    const appellations = splitEscoAppellation(title);
    if (appellations.length > 1) {
      keywords.push(...appellations);
    }

    return compactCompetency({
      code: record.code || record.conceptUri.trim(),
      lang: this.context.lang,
      type: this.context.type,
      provider: this.context.provider,
      title,
      url: record.conceptUri,
      category: category || undefined,
      description: record.description,
      keywords: uniqueSorted(keywords.map(capitalize)),
      indexed_text: record.indexed_text || title
    });
  }
}

export const createEscoMapper: MapperFactory = (raw, context) =>
  new EscoMapper(parseRecord(escoRecordSchema, raw, context.provider), context);
