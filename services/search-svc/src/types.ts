export const LANGUAGES = ['en', 'fr'] as const;
export const COMPETENCY_TYPES = ['occupation', 'skill', 'certification'] as const;
export const PROVIDERS = ['esco', 'rome', 'forma', 'forma14'] as const;
export const SEARCH_TYPES = ['semantic', 'sparse', 'hybrid'] as const;
export const FILTER_OPERATORS = ['eq', 'neq', 'in', 'nin', 'gt', 'gte', 'lt', 'lte'] as const;

export type Language = (typeof LANGUAGES)[number];
export type CompetencyType = (typeof COMPETENCY_TYPES)[number];
export type Provider = (typeof PROVIDERS)[number];
export type SearchType = (typeof SEARCH_TYPES)[number];
export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export type JsonScalar = string | number | boolean;

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
  metadata?: Record<string, unknown>;
}

export interface Entity {
  identifier: string;
  competency: Competency;
}

export type DenseVector = number[];

/** Indices are unique, ascending and below the configured sparse dimension. */
export interface SparseVector {
  indices: number[];
  values: number[];
}

export interface SearchFilter {
  field: string;
  operator: FilterOperator;
  value: unknown;
}

export interface SearchRequest {
  text: string;
  searchType: SearchType;
  top: number;
  filters?: SearchFilter[];
}

export interface SearchResult {
  identifier: string;
  competency: Competency;
  score: number;
}

export interface ScoredPoint {
  id: string;
  score: number;
}

export interface StoredPoint {
  id: string;
  dense: DenseVector;
  sparse: SparseVector;
  payload: Competency;
}

export interface CreateEntityRequestBody {
  identifier?: string;
  competency: Record<string, unknown>;
}

export interface UpdateEntityRequestBody {
  competency: Record<string, unknown>;
}

export interface SearchRequestBody {
  text: string;
  search_type?: SearchType;
  top?: number;
  filters?: SearchFilter[];
}

export interface SearchResponseBody {
  results: SearchResult[];
}
