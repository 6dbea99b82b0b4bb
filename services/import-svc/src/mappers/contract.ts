import { ValidationError } from '@competency-search/common';
import type { z } from 'zod';

import type { Competency, CompetencyType, Language, Provider } from '../types';

export interface MapperContext {
  provider: Provider;
  type: CompetencyType;
  lang: Language;
}

/** Turns one validated source record into a cleaned competency. */
export interface Mapper {
  toCompetency(): Competency;
}

export type MapperFactory = (raw: unknown, context: MapperContext) => Mapper;

export function parseRecord<T extends z.ZodTypeAny>(schema: T, raw: unknown, provider: Provider): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Record does not match the ${provider} format.`, {
      details: {
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
      }
    });
  }
  return parsed.data;
}

/** Upper-cases the first character and lower-cases the rest. */
export function capitalize(value: string): string {
  if (value.length === 0) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

export function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].filter((value) => value.trim().length > 0).sort();
}

/** Splits on a separator, trimming and dropping empty parts. */
export function splitList(value: string | null | undefined, separator: string | RegExp): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(separator)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/** Drops optional fields that ended up empty. */
export function compactCompetency(competency: Competency): Competency {
  const { url, category, description, keywords, indexed_text, ...required } = competency;
  return {
    ...required,
    ...(url ? { url } : {}),
    ...(category ? { category } : {}),
    ...(description ? { description } : {}),
    ...(keywords && keywords.length > 0 ? { keywords } : {}),
    ...(indexed_text ? { indexed_text } : {})
  };
}
