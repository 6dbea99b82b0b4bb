import { z } from 'zod';

import type { Competency } from '../types';
import { capitalize, compactCompetency, parseRecord, splitList, uniqueSorted, type MapperContext, type MapperFactory } from './contract';

export const FORMACODE14_URL = 'https://centreinffo.mondeca.com/KB/index#Concept:uri=https://centre-inffo.fr/descripteur_formacode/';

// Column headers of the Formacode v14 export.
export const formaV14RecordSchema = z.object({
  'Code du Terme': z.number().int(),
  'Descripteur en typo riche': z.string().min(1),
  'TG (Terme Générique)': z.string(),
  'Champ sémantique': z.string(),
  Synonymes: z.string().nullish(),
  'Synonymes métier': z.string().nullish(),
  'TS (Termes Spécifiques)': z.string().nullish(),
  'TA (Termes Associés)': z.string().nullish(),
  'NA (Note d’Application)': z.string().nullish(),
  'NE (Note d’Explication)': z.string().nullish(),
  indexed_text: z.string().nullish()
});

export type FormaV14Record = z.infer<typeof formaV14RecordSchema>;

/** `"123 Text"` becomes `"Text"` when the leading code has exactly `codeLength` digits. */
export function stripCodePrefix(text: string, codeLength: number): string {
  const pattern = new RegExp(`^\\d{${codeLength}} `);
  return pattern.test(text) ? text.slice(text.indexOf(' ') + 1) : text;
}

/** `"Text - 12345"` becomes `"Text"` when the trailing code has exactly `codeLength` digits. */
export function stripCodeSuffix(text: string, codeLength: number): string {
  const pattern = new RegExp(` - \\d{${codeLength}}$`);
  return pattern.test(text) ? text.slice(0, text.lastIndexOf(' - ')) : text;
}

export class FormaV14Mapper {
  constructor(private readonly record: FormaV14Record, private readonly context: MapperContext) {}

  toCompetency(): Competency {
    const { record } = this;
    const code = record['Code du Terme'];
    const title = record['Descripteur en typo riche'];

    const keywords = [
      capitalize(stripCodePrefix(record['Champ sémantique'], 3)),
      ...splitList(record.Synonymes, '###').map(capitalize),
      ...splitList(record['Synonymes métier'], '###').map(capitalize),
      ...splitList(record['TS (Termes Spécifiques)'], '###').map((term) => stripCodeSuffix(term, 5)),
      ...splitList(record['TA (Termes Associés)'], '$').map((term) => stripCodeSuffix(term, 5))
    ];

    const description = [record['NE (Note d’Explication)'], record['NA (Note d’Application)']]
      .filter(Boolean)
      .join(' ')
      .trim();

    return compactCompetency({
      code: String(code),
      lang: this.context.lang,
      type: this.context.type,
      provider: this.context.provider,
      title,
      url: `${FORMACODE14_URL}${code};tab=props;`,
      category: stripCodeSuffix(record['TG (Terme Générique)'], 5),
      description,
      keywords: uniqueSorted(keywords),
      indexed_text: record.indexed_text || title
    });
  }
}

export const createFormaV14Mapper: MapperFactory = (raw, context) =>
  new FormaV14Mapper(parseRecord(formaV14RecordSchema, raw, context.provider), context);
