export const LANGUAGES = ['en', 'fr'] as const;
export const COMPETENCY_TYPES = ['occupation', 'skill', 'certification'] as const;
export const PROVIDERS = ['esco', 'rome', 'forma', 'forma14'] as const;
export const INDEXING_STRATEGIES = ['field_duplication', 'field_combination'] as const;
export const INDEXING_FIELDS = ['title', 'description', 'category', 'keywords'] as const;

export type Language = (typeof LANGUAGES)[number];
export type CompetencyType = (typeof COMPETENCY_TYPES)[number];
export type Provider = (typeof PROVIDERS)[number];
export type IndexingStrategyName = (typeof INDEXING_STRATEGIES)[number];
export type IndexingField = (typeof INDEXING_FIELDS)[number];

/** Competency as accepted by the search service `POST /entities`. */
export interface Competency {
  code: string;
  lang: Language;
  type: CompetencyType;
  provider: Provider;
  title: string;
  url?: string;
  category?: string;
  description?: string;
  keywords?: string[];
  indexed_text?: string;
}

export interface Entity {
  identifier: string;
  competency: Competency;
}

export interface ImportOptions {
  provider: Provider;
  competency_type: CompetencyType;
  lang: Language;
  indexing_strategy?: IndexingStrategyName;
  fields_to_index?: IndexingField[];
}

export interface ImportRequestBody extends ImportOptions {
  data: Record<string, unknown>;
}

export interface BatchImportRequestBody extends ImportOptions {
  items: Array<Record<string, unknown>>;
}

export interface ImportSummary {
  imported: number;
  identifiers: string[];
}
