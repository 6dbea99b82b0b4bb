import { z } from 'zod';

import type { Competency } from '../types';
import { capitalize, compactCompetency, parseRecord, splitList, uniqueSorted, type MapperContext, type MapperFactory } from './contract';

export const FORMACODE_URL = 'https://formacode.centre-inffo.fr/spip.php?page=thesaurus&fcd_code=';

export const formaRecordSchema = z.object({
  code: z.number().int(),
  title: z.string().min(1),
  category: z.string(),
  NSF: z.string().nullish(),
  semantic_field: z.string().nullish(),
  synonym: z.string().nullish(),
  synonym_job: z.string().nullish(),
  specific_terms: z.string().nullish(),
  associated_terms: z.string().nullish(),
  ROME: z.string().nullish(),
  explication_note: z.string().nullish(),
  application_note: z.string().nullish(),
  indexed_text: z.string().nullish()
});

export type FormaRecord = z.infer<typeof formaRecordSchema>;

/** Drops a leading `"12345 "` style code of the given length. */
export function stripLeadingCode(text: string, codeLength: number): string {
  return text.slice(codeLength + 1);
}

function codedTerms(value: string | null | undefined): string[] {
  return splitList(value, '$').map((term) => stripLeadingCode(term, 5));
}

export class FormaMapper {
  constructor(private readonly record: FormaRecord, private readonly context: MapperContext) {}

  toCompetency(): Competency {
    const { record } = this;
    const title = capitalize(record.title);
    const nsf = record.NSF ? stripLeadingCode(record.NSF, 3) : undefined;

    const keywords = [
      ...(record.semantic_field ? [capitalize(stripLeadingCode(record.semantic_field, 3))] : []),
      ...splitList(record.synonym, '$'),
      ...splitList(record.synonym_job, '$'),
      ...codedTerms(record.specific_terms),
      ...codedTerms(record.associated_terms),
      ...codedTerms(record.ROME)
    ];

    const description = [nsf, record.explication_note, record.application_note].filter(Boolean).join('. ');

    return compactCompetency({
      code: String(record.code),
      lang: this.context.lang,
      type: this.context.type,
      provider: this.context.provider,
      title,
      url: `${FORMACODE_URL}${record.code}`,
      category: record.category ? capitalize(stripLeadingCode(record.category, 5)) : undefined,
      description,
      keywords: uniqueSorted(keywords.map(capitalize)),
      indexed_text: record.indexed_text || title
    });
  }
}

export const createFormaMapper: MapperFactory = (raw, context) =>
  new FormaMapper(parseRecord(formaRecordSchema, raw, context.provider), context);
